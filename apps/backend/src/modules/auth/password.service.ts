import { randomBytes, scrypt, timingSafeEqual } from 'node:crypto';
import type { IPasswordService } from '@quire/types';

export const SALT_LENGTH = 32;
export const HASH_LENGTH = 32;

export interface PasswordServiceOptions {
  /** scrypt CPU/memory cost (N), a power of two */
  cost?: number;
}

/**
 * scrypt-backed credential derivation.
 *
 * Salts and hashes are both 32 bytes. Verification recomputes the key with
 * the stored salt and compares with `timingSafeEqual`.
 */
export class PasswordService implements IPasswordService {
  private readonly cost: number;

  constructor(options: PasswordServiceOptions = {}) {
    this.cost = options.cost ?? 16384;
  }

  generateSalt(): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      randomBytes(SALT_LENGTH, (error, salt) => (error ? reject(error) : resolve(salt)));
    });
  }

  hashPassword(plaintext: string, salt: Buffer): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      // maxmem must cover 128 * N * r bytes or scrypt refuses larger costs
      scrypt(plaintext, salt, HASH_LENGTH, { N: this.cost, r: 8, p: 1, maxmem: 256 * this.cost * 8 }, (error, key) =>
        error ? reject(error) : resolve(key)
      );
    });
  }

  async checkPassword(plaintext: string, salt: Buffer, hash: Buffer): Promise<boolean> {
    const candidate = await this.hashPassword(plaintext, salt);
    if (candidate.length !== hash.length) {
      return false;
    }
    return timingSafeEqual(candidate, hash);
  }
}
