/**
 * Blog account as returned by the user service.
 *
 * `password` and `salt` hold the stored credential (hex-encoded hash and salt),
 * never the plaintext the account was created with. Callers that expose users
 * over a network boundary should strip both fields first.
 */
export interface IUser {
    /** 24-hex-character document id */
    id: string;
    /** Unique login name */
    username: string;
    /** Hex-encoded password hash */
    password: string;
    /** Hex-encoded per-user salt used to derive `password` */
    salt: string;
    email: string;
    firstname: string;
    lastname: string;
}

/**
 * Input for creating an account. `password` is the plaintext to hash.
 */
export interface ICreateUserInput {
    username: string;
    password: string;
    email: string;
    firstname: string;
    lastname: string;
}

/**
 * Input for updating an account.
 *
 * Every profile field is written. The credential is only re-derived when
 * `password` is a non-empty string; omitting it leaves the stored hash and
 * salt intact.
 */
export interface IUpdateUserInput {
    username: string;
    email: string;
    firstname: string;
    lastname: string;
    /** New plaintext password. Omit to keep the current credential. */
    password?: string;
}
