export type { IUserDocument } from './IUserDocument.js';
