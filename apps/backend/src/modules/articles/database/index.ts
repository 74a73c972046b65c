export type { IArticleDocument } from './IArticleDocument.js';
