import type { IDatabaseService, IModule, IModuleMetadata } from '@quire/types';
import { logger } from '../../lib/logger.js';
import { ArticleService } from './services/article.service.js';

/**
 * Articles module dependencies.
 */
export interface IArticlesModuleDependencies {
    /**
     * Database service for MongoDB operations (article storage).
     */
    database: IDatabaseService;
}

/**
 * Articles module.
 *
 * Configures the ArticleService singleton and its indexes during init().
 * Author references point into the user collection but are never resolved
 * here; callers that need the author go through the user module.
 */
export class ArticlesModule implements IModule<IArticlesModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'articles',
        name: 'Articles',
        version: '1.0.0',
        description: 'Blog articles with title-derived slugs'
    };

    private articleService: ArticleService | null = null;

    private readonly logger = logger.child({ module: 'articles' });

    async init(dependencies: IArticlesModuleDependencies): Promise<void> {
        this.logger.info('Initializing articles module...');

        ArticleService.setDependencies(dependencies.database, this.logger);
        this.articleService = ArticleService.getInstance();

        await this.articleService.createIndexes();

        this.logger.info('Articles module initialized');
    }

    async run(): Promise<void> {
        this.getService();
        this.logger.info('Articles module running');
    }

    /**
     * Access the configured article service.
     *
     * @throws Error if init() has not completed
     */
    getService(): ArticleService {
        if (!this.articleService) {
            throw new Error('ArticlesModule.init() must be called before getService()');
        }
        return this.articleService;
    }
}
