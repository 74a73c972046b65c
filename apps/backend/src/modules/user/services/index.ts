export { UserService, USER_COLLECTION } from './user.service.js';
