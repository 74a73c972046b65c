export type { IPasswordService } from './IPasswordService.js';
