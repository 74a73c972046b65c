export type { IUser, ICreateUserInput, IUpdateUserInput } from './IUser.js';
export type { IUserService } from './IUserService.js';
