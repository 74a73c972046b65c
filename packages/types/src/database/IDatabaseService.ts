import type { ClientSession, Collection, Document } from 'mongodb';

/**
 * Database service interface providing session-scoped access to MongoDB.
 *
 * Services never hold a session between calls. Every public operation asks
 * for a fresh session through `withSession()`, runs its single query or update
 * against a collection handle from `getCollection()`, and lets the database
 * service end the session on the way out.
 *
 * @example
 * ```typescript
 * const users = database.getCollection<IUserDocument>('user');
 * const doc = await database.withSession(session =>
 *     users.findOne({ username: 'ada' }, { session })
 * );
 * ```
 */
export interface IDatabaseService {
    /**
     * Get a MongoDB collection for direct access.
     *
     * @param name - Collection name
     * @returns MongoDB native collection
     */
    getCollection<T extends Document = Document>(name: string): Collection<T>;

    /**
     * Run work inside a fresh client session.
     *
     * The session is started before `work` is invoked and ended after the
     * returned promise settles, whether it resolved or rejected. Rejections
     * from `work` propagate to the caller unchanged.
     *
     * @param work - Callback receiving the session to pass to driver calls
     * @returns Whatever `work` resolves to
     */
    withSession<T>(work: (session: ClientSession) => Promise<T>): Promise<T>;
}
