import type { IEntityReference } from '../reference/IEntityReference.js';
import type { IUser, ICreateUserInput, IUpdateUserInput } from './IUser.js';

/**
 * Persistence and credential verification for blog accounts.
 *
 * Every method acquires its own database session and releases it before
 * settling. Failures are thrown as typed errors carrying a `code`:
 * `NOT_FOUND`, `INVALID_ID`, `INVALID_CREDENTIALS`, `SALT_GENERATION_FAILED`,
 * `HASH_FAILED`, `NOT_PERSISTED` or `QUERY_FAILED`. Raw driver errors never
 * reach the caller.
 */
export interface IUserService {
    /**
     * Look up an account by id.
     *
     * @param id - 24-hex-character document id
     * @throws InvalidIdError if `id` is malformed
     * @throws NotFoundError if no account has this id
     * @throws QueryError if the lookup fails
     */
    getById(id: string): Promise<IUser>;

    /**
     * Look up an account by username and verify the candidate password.
     *
     * A failed lookup, an unknown username and a wrong password fail identically.
     *
     * @throws InvalidCredentialsError if the lookup fails, the account is unknown or the password does not match
     * @throws HashError if the stored credential could not be recomputed
     */
    get(username: string, password: string): Promise<IUser>;

    /**
     * Create an account, hashing the plaintext password with a fresh salt.
     *
     * @returns The account as read back from the store
     * @throws SaltGenerationError | HashError if the credential cannot be derived
     * @throws NotPersistedError if the insert or the read-back fails
     */
    add(input: ICreateUserInput): Promise<IUser>;

    /**
     * List every account.
     *
     * @throws QueryError if the query fails
     */
    findAll(): Promise<IUser[]>;

    /**
     * Delete the account matching both `user.id` and `user.username`.
     *
     * Matching nothing is not an error; the call resolves either way.
     *
     * @throws NotPersistedError if the store rejects the delete
     */
    delete(user: Pick<IUser, 'id' | 'username'>): Promise<void>;

    /**
     * Overwrite the profile fields of an account, re-deriving the credential
     * when a new password is supplied.
     *
     * @throws InvalidIdError if `id` is malformed
     * @throws SaltGenerationError | HashError if a new password cannot be derived
     * @throws NotFoundError if no account has this id
     * @throws NotPersistedError if the store rejects the update
     */
    update(id: string, input: IUpdateUserInput): Promise<void>;

    /**
     * Resolve a weak reference (for example an article's author).
     *
     * @throws ValidationError if the reference targets another collection
     */
    resolveReference(reference: IEntityReference): Promise<IUser>;
}
