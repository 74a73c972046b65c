import { DBRef, ObjectId } from 'mongodb';
import type { Collection, DeleteResult, UpdateResult } from 'mongodb';
import type {
    IArticle,
    IArticleService,
    ICreateArticleInput,
    IDatabaseService,
    ILogger,
    IUpdateArticleInput,
    ReferenceCollection
} from '@quire/types';
import type { IArticleDocument } from '../database/index.js';
import { NotFoundError, NotPersistedError, QueryError } from '../../../lib/errors.js';
import { parseObjectId } from '../../../lib/object-id.js';
import { sanitizeTitle } from '../utils/slug.js';

export const ARTICLE_COLLECTION = 'article';

/**
 * Collection that article author references point into.
 */
export const AUTHOR_COLLECTION: ReferenceCollection = 'user';

/**
 * Service for blog article persistence and slug derivation.
 *
 * Slugs are never accepted from callers: `add()` and `update()` always derive
 * `pretty` from the title with `sanitizeTitle()`. The author is stored as a
 * DBRef into the user collection and surfaced as an `IEntityReference`; the
 * service never looks the author up itself.
 *
 * Lookups collapse every failure (malformed id, unknown id, store fault) into
 * `NotFoundError('No article')`. Writes validate ids up front and raise
 * `InvalidIdError` for malformed ones.
 */
export class ArticleService implements IArticleService {
    private static instance: ArticleService | undefined;
    private readonly collection: Collection<IArticleDocument>;

    /**
     * Private constructor enforcing singleton pattern with dependency injection.
     *
     * @param database - Session provider and collection access
     * @param logger - Logger scoped to the articles module
     */
    private constructor(
        private readonly database: IDatabaseService,
        private readonly logger: ILogger
    ) {
        this.collection = database.getCollection<IArticleDocument>(ARTICLE_COLLECTION);
    }

    /**
     * Set the dependencies for the singleton instance.
     *
     * Must be called once during application bootstrap before getInstance().
     */
    public static setDependencies(database: IDatabaseService, logger: ILogger): void {
        if (!ArticleService.instance) {
            ArticleService.instance = new ArticleService(database, logger);
        }
    }

    /**
     * Get the singleton instance of ArticleService.
     *
     * @throws Error if setDependencies() was not called first
     */
    public static getInstance(): ArticleService {
        if (!ArticleService.instance) {
            throw new Error('ArticleService.setDependencies() must be called before getInstance()');
        }
        return ArticleService.instance;
    }

    /**
     * Reset singleton instance (for testing only).
     */
    public static resetInstance(): void {
        ArticleService.instance = undefined;
    }

    // ============================================================================
    // Lookups
    // ============================================================================

    async getById(id: string): Promise<IArticle> {
        const parsed = parseObjectId(id);
        if (!parsed.ok) {
            throw new NotFoundError('No article', { id });
        }
        const _id = parsed.value;

        return this.findOneOrFail({ _id }, { id });
    }

    async getByPretty(pretty: string): Promise<IArticle> {
        return this.findOneOrFail({ pretty }, { pretty });
    }

    async findByStatus(status: string): Promise<IArticle[]> {
        try {
            const docs = await this.database.withSession(session =>
                this.collection.find({ status }, { session }).toArray()
            );
            return docs.map(doc => this.toIArticle(doc));
        } catch (error) {
            this.logger.error({ error, status }, 'Failed to list articles by status');
            throw new QueryError('Error in FindByStatus', { cause: error });
        }
    }

    async findAll(): Promise<IArticle[]> {
        try {
            const docs = await this.database.withSession(session =>
                this.collection.find({}, { session }).toArray()
            );
            return docs.map(doc => this.toIArticle(doc));
        } catch (error) {
            this.logger.error({ error }, 'Failed to list articles');
            throw new QueryError('Error in FindAll', { cause: error });
        }
    }

    // ============================================================================
    // Writes
    // ============================================================================

    /**
     * Create an article.
     *
     * `modified` is initialised to `create` rather than to the insert time, so
     * a freshly created article reports no edits since creation.
     */
    async add(input: ICreateArticleInput): Promise<IArticle> {
        const author = this.toAuthorRef(input.authorId);
        const create = input.create ?? new Date();
        const _id = new ObjectId();
        const pretty = sanitizeTitle(input.title);

        const stored = await this.database.withSession(async session => {
            try {
                await this.collection.insertOne(
                    {
                        _id,
                        titre: input.title,
                        pretty,
                        texte: input.body,
                        tags: input.tags,
                        image: input.image,
                        vignette: input.thumbnail,
                        status: input.status,
                        create,
                        modified: create,
                        userref: author
                    },
                    { session }
                );
                return await this.collection.findOne({ _id }, { session });
            } catch (error) {
                this.logger.error({ error, pretty }, 'Failed to insert article');
                throw new NotPersistedError('Article not saved', { cause: error });
            }
        });

        if (!stored) {
            throw new NotPersistedError('Article not saved', { id: _id.toHexString() });
        }

        this.logger.info({ articleId: _id.toHexString(), pretty }, 'Article created');
        return this.toIArticle(stored);
    }

    /**
     * Delete the article matching both id and title.
     *
     * A malformed id, an unknown id, or a title that does not match the stored
     * one all leave the collection untouched and resolve normally.
     *
     * @throws NotPersistedError if the store rejects the delete
     */
    async delete(article: Pick<IArticle, 'id' | 'title'>): Promise<void> {
        const parsed = parseObjectId(article.id);
        if (!parsed.ok) {
            this.logger.debug({ id: article.id }, 'Delete skipped for malformed article id');
            return;
        }
        const _id = parsed.value;

        let result: DeleteResult;
        try {
            result = await this.database.withSession(session =>
                this.collection.deleteOne({ _id, titre: article.title }, { session })
            );
        } catch (error) {
            this.logger.error({ error, id: article.id }, 'Failed to delete article');
            throw new NotPersistedError('Article not deleted', { id: article.id, cause: error });
        }

        if (result.deletedCount === 0) {
            this.logger.debug({ id: article.id, title: article.title }, 'Delete matched no article');
            return;
        }

        this.logger.info({ articleId: article.id }, 'Article deleted');
    }

    /**
     * Overwrite an article and re-derive its slug from the new title.
     *
     * `modified` falls back to the current time when the caller omits it.
     *
     * @throws NotPersistedError if the store rejects the update
     */
    async update(id: string, input: IUpdateArticleInput): Promise<void> {
        const parsed = parseObjectId(id);
        if (!parsed.ok) {
            throw parsed.error;
        }
        const _id = parsed.value;
        const author = this.toAuthorRef(input.authorId);
        const pretty = sanitizeTitle(input.title);

        let result: UpdateResult;
        try {
            result = await this.database.withSession(session =>
                this.collection.updateOne(
                    { _id },
                    {
                        $set: {
                            titre: input.title,
                            pretty,
                            image: input.image,
                            vignette: input.thumbnail,
                            texte: input.body,
                            status: input.status,
                            modified: input.modified ?? new Date(),
                            tags: input.tags,
                            userref: author
                        }
                    },
                    { session }
                )
            );
        } catch (error) {
            this.logger.error({ error, id }, 'Failed to update article');
            throw new NotPersistedError('Article not updated', { id, cause: error });
        }

        if (result.matchedCount === 0) {
            throw new NotFoundError('No article', { id });
        }

        this.logger.info({ articleId: id, pretty }, 'Article updated');
    }

    // ============================================================================
    // Index Management
    // ============================================================================

    /**
     * Create database indexes for the article collection.
     */
    async createIndexes(): Promise<void> {
        await this.collection.createIndex({ pretty: 1 });
        await this.collection.createIndex({ status: 1 });

        this.logger.info('Article indexes created');
    }

    // ============================================================================
    // Private Helpers
    // ============================================================================

    private async findOneOrFail(
        filter: { _id: ObjectId } | { pretty: string },
        context: Record<string, string>
    ): Promise<IArticle> {
        let doc: IArticleDocument | null;
        try {
            doc = await this.database.withSession(session => this.collection.findOne(filter, { session }));
        } catch (error) {
            this.logger.warn({ error, ...context }, 'Article lookup failed');
            throw new NotFoundError('No article', { ...context, cause: error });
        }

        if (!doc) {
            throw new NotFoundError('No article', context);
        }
        return this.toIArticle(doc);
    }

    /**
     * Build the stored author reference.
     *
     * @throws InvalidIdError if the author id is malformed
     */
    private toAuthorRef(authorId: string): DBRef {
        const parsed = parseObjectId(authorId);
        if (!parsed.ok) {
            throw parsed.error;
        }
        return new DBRef(AUTHOR_COLLECTION, parsed.value);
    }

    /**
     * Convert MongoDB document to IArticle.
     */
    private toIArticle(doc: IArticleDocument): IArticle {
        return {
            id: doc._id.toHexString(),
            title: doc.titre,
            pretty: doc.pretty,
            body: doc.texte,
            tags: doc.tags,
            image: doc.image,
            thumbnail: doc.vignette,
            status: doc.status,
            create: doc.create,
            modified: doc.modified,
            author: {
                collection: AUTHOR_COLLECTION,
                id: doc.userref.oid.toHexString()
            }
        };
    }
}
