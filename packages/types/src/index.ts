export type { IArticle, ICreateArticleInput, IUpdateArticleInput, IArticleService } from './article/index.js';
export type { IDatabaseService } from './database/index.js';
export type { ILogger } from './logging/ILogger.js';
export type { IModule, IModuleMetadata } from './module/index.js';
export type { IEntityReference, ReferenceCollection } from './reference/index.js';
export type { IPasswordService } from './security/index.js';
export type { IUser, ICreateUserInput, IUpdateUserInput, IUserService } from './user/index.js';
