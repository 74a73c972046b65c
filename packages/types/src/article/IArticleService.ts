import type { IArticle, ICreateArticleInput, IUpdateArticleInput } from './IArticle.js';

/**
 * Persistence and slug derivation for blog articles.
 *
 * Lookups do not distinguish a malformed id from a missing article: both fail
 * with a `NOT_FOUND` error. Deletes that match nothing resolve silently.
 */
export interface IArticleService {
    /**
     * @throws NotFoundError if the id is malformed or unknown
     */
    getById(id: string): Promise<IArticle>;

    /**
     * Look up an article by its slug.
     *
     * @throws NotFoundError if no article has this slug
     */
    getByPretty(pretty: string): Promise<IArticle>;

    /**
     * Create an article. The slug is derived from the title and `modified`
     * starts equal to `create`.
     *
     * `authorId` must be a 24-hex-character account id; it is stored as a
     * reference into the user collection and never dereferenced here.
     *
     * @returns The article as read back from the store
     * @throws InvalidIdError if `authorId` is malformed
     * @throws NotPersistedError if the insert or the read-back fails
     */
    add(input: ICreateArticleInput): Promise<IArticle>;

    /**
     * @throws QueryError if the query fails
     */
    findByStatus(status: string): Promise<IArticle[]>;

    /**
     * @throws QueryError if the query fails
     */
    findAll(): Promise<IArticle[]>;

    /**
     * Delete the article matching both `article.id` and `article.title`.
     *
     * Matching nothing is not an error; the call resolves either way.
     *
     * @throws NotPersistedError if the store rejects the delete
     */
    delete(article: Pick<IArticle, 'id' | 'title'>): Promise<void>;

    /**
     * Overwrite an article, re-deriving its slug from the new title.
     *
     * @throws InvalidIdError if `id` or `input.authorId` is malformed
     * @throws NotFoundError if no article has this id
     * @throws NotPersistedError if the store rejects the update
     */
    update(id: string, input: IUpdateArticleInput): Promise<void>;
}
