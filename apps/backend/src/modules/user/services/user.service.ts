import { ObjectId } from 'mongodb';
import type { Collection, DeleteResult, UpdateResult } from 'mongodb';
import type {
    ICreateUserInput,
    IDatabaseService,
    IEntityReference,
    ILogger,
    IPasswordService,
    IUpdateUserInput,
    IUser,
    IUserService
} from '@quire/types';
import type { IUserDocument } from '../database/index.js';
import {
    HashError,
    InvalidCredentialsError,
    NotFoundError,
    NotPersistedError,
    QueryError,
    SaltGenerationError,
    ValidationError
} from '../../../lib/errors.js';
import { parseObjectId } from '../../../lib/object-id.js';

export const USER_COLLECTION = 'user';

/**
 * Stored form of a credential: hex-encoded hash and the salt it was derived with.
 */
interface IStoredCredential {
    password: string;
    salt: string;
}

/**
 * Service for blog account persistence and credential verification.
 *
 * Each public method runs its single query or update inside a session obtained
 * from `IDatabaseService.withSession()`, which ends the session whether the
 * operation succeeds or throws. The service keeps no per-call state.
 *
 * ## Credential handling
 *
 * Plaintext passwords never reach the collection. `add()` and a password-bearing
 * `update()` generate a fresh salt, derive the hash through `IPasswordService`,
 * and store both as hex. `get()` recomputes the hash with the stored salt and
 * compares in constant time; a failed lookup, an unknown username and a wrong
 * password all produce the same `InvalidCredentialsError`.
 *
 * Store faults elsewhere surface as `QueryError` (reads) or
 * `NotPersistedError` (writes) with the driver error in `details.cause`.
 */
export class UserService implements IUserService {
    private static instance: UserService | undefined;
    private readonly collection: Collection<IUserDocument>;

    /**
     * Private constructor enforces singleton pattern. Use setDependencies()
     * and getInstance() for access.
     *
     * @param database - Session provider and collection access
     * @param passwordService - Salt generation and key derivation
     * @param logger - Logger scoped to the user module
     */
    private constructor(
        private readonly database: IDatabaseService,
        private readonly passwordService: IPasswordService,
        private readonly logger: ILogger
    ) {
        this.collection = database.getCollection<IUserDocument>(USER_COLLECTION);
    }

    /**
     * Initialize the singleton instance with dependencies.
     *
     * Must be called before getInstance(). Invoked by UserModule.init().
     */
    public static setDependencies(
        database: IDatabaseService,
        passwordService: IPasswordService,
        logger: ILogger
    ): void {
        if (!UserService.instance) {
            UserService.instance = new UserService(database, passwordService, logger);
        }
    }

    /**
     * Get the singleton user service instance.
     *
     * @throws Error if setDependencies() has not been called first
     */
    public static getInstance(): UserService {
        if (!UserService.instance) {
            throw new Error('UserService.setDependencies() must be called before getInstance()');
        }
        return UserService.instance;
    }

    /**
     * Reset singleton instance (for testing only).
     */
    public static resetInstance(): void {
        UserService.instance = undefined;
    }

    // ==================== Core CRUD Operations ====================

    async getById(id: string): Promise<IUser> {
        const parsed = parseObjectId(id);
        if (!parsed.ok) {
            this.logger.debug({ id }, 'Rejected malformed user id');
            throw parsed.error;
        }
        const _id = parsed.value;

        let doc: IUserDocument | null;
        try {
            doc = await this.database.withSession(session =>
                this.collection.findOne({ _id }, { session })
            );
        } catch (error) {
            this.logger.error({ error, id }, 'Failed to load user');
            throw new QueryError('Error in GetById', { id, cause: error });
        }
        if (!doc) {
            throw new NotFoundError('No user', { id });
        }

        return this.toPublicUser(doc);
    }

    async get(username: string, password: string): Promise<IUser> {
        let doc: IUserDocument | null;
        try {
            doc = await this.database.withSession(session =>
                this.collection.findOne({ username }, { session })
            );
        } catch (error) {
            this.logger.error({ error }, 'User lookup failed during login');
            throw new InvalidCredentialsError(undefined, { cause: error });
        }
        if (!doc) {
            this.logger.info({ username }, 'Login rejected');
            throw new InvalidCredentialsError();
        }

        let valid: boolean;
        try {
            valid = await this.passwordService.checkPassword(
                password,
                Buffer.from(doc.salt, 'hex'),
                Buffer.from(doc.password, 'hex')
            );
        } catch (error) {
            this.logger.error({ error, userId: doc._id.toHexString() }, 'Password verification failed');
            throw new HashError('Error when verifying password', { cause: error });
        }

        if (!valid) {
            this.logger.info({ username }, 'Login rejected');
            throw new InvalidCredentialsError();
        }

        return this.toPublicUser(doc);
    }

    async add(input: ICreateUserInput): Promise<IUser> {
        const credential = await this.deriveCredential(input.password);
        const _id = new ObjectId();

        const stored = await this.database.withSession(async session => {
            try {
                await this.collection.insertOne(
                    {
                        _id,
                        username: input.username,
                        password: credential.password,
                        salt: credential.salt,
                        email: input.email,
                        firstname: input.firstname,
                        lastname: input.lastname
                    },
                    { session }
                );
                return await this.collection.findOne({ _id }, { session });
            } catch (error) {
                this.logger.error({ error, username: input.username }, 'Failed to insert user');
                throw new NotPersistedError('User not saved', { cause: error });
            }
        });

        if (!stored) {
            throw new NotPersistedError('User not saved', { id: _id.toHexString() });
        }

        this.logger.info({ userId: _id.toHexString(), username: input.username }, 'User created');
        return this.toPublicUser(stored);
    }

    async findAll(): Promise<IUser[]> {
        try {
            const docs = await this.database.withSession(session =>
                this.collection.find({}, { session }).toArray()
            );
            return docs.map(doc => this.toPublicUser(doc));
        } catch (error) {
            this.logger.error({ error }, 'Failed to list users');
            throw new QueryError('Error in FindAll', { cause: error });
        }
    }

    /**
     * Delete the account matching both id and username.
     *
     * A malformed id, an unknown id, or a username that does not match the
     * stored one all leave the collection untouched and resolve normally.
     *
     * @throws NotPersistedError if the store rejects the delete
     */
    async delete(user: Pick<IUser, 'id' | 'username'>): Promise<void> {
        const parsed = parseObjectId(user.id);
        if (!parsed.ok) {
            this.logger.debug({ id: user.id }, 'Delete skipped for malformed user id');
            return;
        }
        const _id = parsed.value;

        let result: DeleteResult;
        try {
            result = await this.database.withSession(session =>
                this.collection.deleteOne({ _id, username: user.username }, { session })
            );
        } catch (error) {
            this.logger.error({ error, id: user.id }, 'Failed to delete user');
            throw new NotPersistedError('User not deleted', { id: user.id, cause: error });
        }

        if (result.deletedCount === 0) {
            this.logger.debug({ id: user.id, username: user.username }, 'Delete matched no user');
            return;
        }

        this.logger.info({ userId: user.id }, 'User deleted');
    }

    /**
     * Overwrite profile fields and, when a new password is given, the credential.
     *
     * Omitting `password` (or passing an empty string) keeps the stored hash
     * and salt. Otherwise both are regenerated and written in the same update.
     *
     * @throws NotPersistedError if the store rejects the update, e.g. a duplicate username
     */
    async update(id: string, input: IUpdateUserInput): Promise<void> {
        const parsed = parseObjectId(id);
        if (!parsed.ok) {
            this.logger.debug({ id }, 'Rejected malformed user id');
            throw parsed.error;
        }
        const _id = parsed.value;

        const fields: Partial<Omit<IUserDocument, '_id'>> = {
            username: input.username,
            lastname: input.lastname,
            firstname: input.firstname,
            email: input.email
        };
        if (input.password) {
            Object.assign(fields, await this.deriveCredential(input.password));
        }

        let result: UpdateResult;
        try {
            result = await this.database.withSession(session =>
                this.collection.updateOne({ _id }, { $set: fields }, { session })
            );
        } catch (error) {
            this.logger.error({ error, id }, 'Failed to update user');
            throw new NotPersistedError('User not updated', { id, cause: error });
        }

        if (result.matchedCount === 0) {
            throw new NotFoundError('No user', { id });
        }

        this.logger.info({ userId: id, credentialChanged: 'password' in fields }, 'User updated');
    }

    /**
     * Resolve a weak reference to the account it points at.
     *
     * @throws ValidationError if the reference targets another collection
     */
    async resolveReference(reference: IEntityReference): Promise<IUser> {
        if (reference.collection !== USER_COLLECTION) {
            throw new ValidationError('Reference does not point at a user', { reference });
        }
        return this.getById(reference.id);
    }

    // ==================== Index Management ====================

    /**
     * Create database indexes for the user collection.
     *
     * Called during module initialization. The unique username index is what
     * makes a duplicate `add()` fail with NotPersistedError.
     */
    async createIndexes(): Promise<void> {
        await this.collection.createIndex({ username: 1 }, { unique: true });

        this.logger.info('User indexes created');
    }

    // ==================== Private Helpers ====================

    /**
     * Generate a salt and derive the stored hash for a plaintext password.
     *
     * @throws SaltGenerationError if no salt could be produced
     * @throws HashError if key derivation fails
     */
    private async deriveCredential(plaintext: string): Promise<IStoredCredential> {
        let salt: Buffer;
        try {
            salt = await this.passwordService.generateSalt();
        } catch (error) {
            this.logger.error({ error }, 'Salt generation failed');
            throw new SaltGenerationError(undefined, { cause: error });
        }

        let hash: Buffer;
        try {
            hash = await this.passwordService.hashPassword(plaintext, salt);
        } catch (error) {
            this.logger.error({ error }, 'Password hashing failed');
            throw new HashError(undefined, { cause: error });
        }

        return { password: hash.toString('hex'), salt: salt.toString('hex') };
    }

    /**
     * Convert MongoDB document to public user representation.
     */
    private toPublicUser(doc: IUserDocument): IUser {
        return {
            id: doc._id.toHexString(),
            username: doc.username,
            password: doc.password,
            salt: doc.salt,
            email: doc.email,
            firstname: doc.firstname,
            lastname: doc.lastname
        };
    }
}
