export { UserModule } from './UserModule.js';
export type { IUserModuleDependencies } from './UserModule.js';
export { UserService, USER_COLLECTION } from './services/index.js';
export type { IUserDocument } from './database/index.js';
