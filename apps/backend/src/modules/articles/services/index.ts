export { ArticleService, ARTICLE_COLLECTION, AUTHOR_COLLECTION } from './article.service.js';
