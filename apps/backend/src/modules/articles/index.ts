export { ArticlesModule } from './ArticlesModule.js';
export type { IArticlesModuleDependencies } from './ArticlesModule.js';
export { ArticleService, ARTICLE_COLLECTION, AUTHOR_COLLECTION } from './services/index.js';
export { sanitizeTitle } from './utils/slug.js';
export type { IArticleDocument } from './database/index.js';
