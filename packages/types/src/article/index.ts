export type { IArticle, ICreateArticleInput, IUpdateArticleInput } from './IArticle.js';
export type { IArticleService } from './IArticleService.js';
