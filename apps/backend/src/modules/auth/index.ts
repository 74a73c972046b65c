export { PasswordService, SALT_LENGTH, HASH_LENGTH } from './password.service.js';
export type { PasswordServiceOptions } from './password.service.js';
