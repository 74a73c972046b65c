/**
 * User module implementation.
 *
 * Provides blog account persistence and credential verification. The module
 * follows the two-phase initialization pattern with dependency injection.
 */

import type { IDatabaseService, IModule, IModuleMetadata, IPasswordService } from '@quire/types';
import { logger } from '../../lib/logger.js';
import { UserService } from './services/user.service.js';

/**
 * User module dependencies for initialization.
 */
export interface IUserModuleDependencies {
    /**
     * Database service for MongoDB operations (user storage).
     */
    database: IDatabaseService;

    /**
     * Salt generation and key derivation for stored credentials.
     */
    passwordService: IPasswordService;
}

/**
 * User module for blog accounts.
 *
 * ## Lifecycle
 *
 * ### init() phase:
 * - Instantiates the UserService singleton
 * - Creates database indexes (unique username)
 *
 * ### run() phase:
 * - Nothing to mount; the service is ready for callers
 *
 * @example
 * ```typescript
 * const userModule = new UserModule();
 *
 * await userModule.init({
 *     database,
 *     passwordService: new PasswordService({ cost: env.PASSWORD_SCRYPT_COST })
 * });
 *
 * await userModule.run();
 * const users = userModule.getService();
 * ```
 */
export class UserModule implements IModule<IUserModuleDependencies> {
    readonly metadata: IModuleMetadata = {
        id: 'user',
        name: 'User',
        version: '1.0.0',
        description: 'Blog accounts and credential verification'
    };

    private userService: UserService | null = null;

    private readonly logger = logger.child({ module: 'user' });

    /**
     * Initialize the user module with injected dependencies.
     *
     * @throws {Error} If index creation fails (causes application shutdown)
     */
    async init(dependencies: IUserModuleDependencies): Promise<void> {
        this.logger.info('Initializing user module...');

        UserService.setDependencies(
            dependencies.database,
            dependencies.passwordService,
            this.logger
        );
        this.userService = UserService.getInstance();

        await this.userService.createIndexes();

        this.logger.info('User module initialized');
    }

    async run(): Promise<void> {
        this.getService();
        this.logger.info('User module running');
    }

    /**
     * Access the configured user service.
     *
     * @throws Error if init() has not completed
     */
    getService(): UserService {
        if (!this.userService) {
            throw new Error('UserModule.init() must be called before getService()');
        }
        return this.userService;
    }
}
