/**
 * Salt generation and key derivation for stored credentials.
 *
 * The user service never picks an algorithm or its parameters; it only
 * orchestrates "generate salt, hash, compare" through this contract.
 */
export interface IPasswordService {
    /**
     * Produce a fresh random salt.
     */
    generateSalt(): Promise<Buffer>;

    /**
     * Derive the stored hash for a plaintext password and salt.
     */
    hashPassword(plaintext: string, salt: Buffer): Promise<Buffer>;

    /**
     * Recompute the hash for `plaintext` and compare it with `hash` in
     * constant time.
     *
     * @returns True when the password matches
     */
    checkPassword(plaintext: string, salt: Buffer, hash: Buffer): Promise<boolean>;
}
