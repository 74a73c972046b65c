import type { ClientSession, Collection, Document, MongoClient } from 'mongodb';
import type { IDatabaseService, ILogger } from '@quire/types';

/**
 * Parts of a connected MongoClient the database service relies on.
 *
 * Narrowed so tests can hand in a stand-in without a live server.
 */
export type DatabaseConnection = Pick<MongoClient, 'db' | 'startSession'>;

/**
 * Database service providing session-scoped MongoDB access.
 *
 * Wraps the client connected by the database loader:
 *
 * - `getCollection()` returns typed native collections
 * - `withSession()` starts a client session per operation and always ends it
 *
 * Sessions are never cached on the service; each call gets its own.
 *
 * @example
 * ```typescript
 * const client = await connectDatabase();
 * const database = new DatabaseService(logger.child({ module: 'database' }), client);
 *
 * const users = database.getCollection<IUserDocument>('user');
 * const count = await database.withSession(session => users.countDocuments({}, { session }));
 * ```
 */
export class DatabaseService implements IDatabaseService {
    /**
     * @param logger - Logger for session lifecycle problems
     * @param connection - Connected MongoDB client
     * @param databaseName - Database to use; defaults to the one named in the connection string
     */
    constructor(
        private readonly logger: ILogger,
        private readonly connection: DatabaseConnection,
        private readonly databaseName?: string
    ) {}

    /**
     * Get a MongoDB collection for direct access.
     *
     * @param name - Collection name
     * @returns MongoDB native collection
     * @throws Error if the name is empty
     */
    public getCollection<T extends Document = Document>(name: string): Collection<T> {
        if (!name || typeof name !== 'string') {
            throw new Error('Collection name must be a non-empty string');
        }

        return this.connection.db(this.databaseName).collection<T>(name);
    }

    /**
     * Run work inside a fresh client session and end the session afterwards.
     *
     * Errors thrown by `work` propagate unchanged. A failure to end the session
     * is logged as a warning and not rethrown.
     *
     * @param work - Callback receiving the session
     * @returns Whatever `work` resolves to
     */
    public async withSession<T>(work: (session: ClientSession) => Promise<T>): Promise<T> {
        const session = this.connection.startSession();
        try {
            return await work(session);
        } finally {
            try {
                await session.endSession();
            } catch (error) {
                this.logger.warn({ error }, 'Failed to end MongoDB session');
            }
        }
    }
}
