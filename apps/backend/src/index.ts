/**
 * @fileoverview Application entry point with two-phase lifecycle.
 *
 * Connects to MongoDB, then initializes every module before any module runs,
 * so a failing init() aborts startup before anything is activated.
 *
 * @module index
 */

import { env } from './config/env.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { logger } from './lib/logger.js';
import { DatabaseService } from './modules/database/index.js';
import { PasswordService } from './modules/auth/index.js';
import { UserModule } from './modules/user/index.js';
import { ArticlesModule } from './modules/articles/index.js';
import type { IDatabaseService } from '@quire/types';

// ─────────────────────────────────────────────────────────────────────────────
// Entry Point
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Main application entry point.
 *
 * Registers SIGINT/SIGTERM handlers that close the MongoDB client.
 *
 * @throws Logs error and exits with code 1 if bootstrap fails
 */
async function bootstrap(): Promise<void> {
    try {
        const ctx = await bootstrapInit();
        await bootstrapRun(ctx);

        const shutdown = (signal: NodeJS.Signals) => {
            logger.info({ signal }, 'Shutting down');
            disconnectDatabase()
                .then(() => process.exit(0))
                .catch(error => {
                    logger.error({ error }, 'Failed to close MongoDB client');
                    process.exit(1);
                });
        };
        process.once('SIGINT', shutdown);
        process.once('SIGTERM', shutdown);
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        await disconnectDatabase().catch(closeError =>
            logger.error({ error: closeError }, 'Failed to close MongoDB client')
        );
        process.exit(1);
    }
}

void bootstrap();

// ─────────────────────────────────────────────────────────────────────────────
// Two-Phase Lifecycle
// ─────────────────────────────────────────────────────────────────────────────

interface BootstrapContext {
    database: IDatabaseService;
    modules: {
        user: UserModule;
        articles: ArticlesModule;
    };
}

/**
 * Connect infrastructure and run init() on every module.
 */
async function bootstrapInit(): Promise<BootstrapContext> {
    const client = await connectDatabase();
    const database = new DatabaseService(logger.child({ module: 'database' }), client);
    const passwordService = new PasswordService({ cost: env.PASSWORD_SCRYPT_COST });

    const userModule = new UserModule();
    const articlesModule = new ArticlesModule();

    await userModule.init({ database, passwordService });
    await articlesModule.init({ database });

    return {
        database,
        modules: {
            user: userModule,
            articles: articlesModule
        }
    };
}

/**
 * Activate every module once all of them have initialized.
 */
async function bootstrapRun(ctx: BootstrapContext): Promise<void> {
    const { modules } = ctx;

    await modules.user.run();
    await modules.articles.run();

    logger.info({}, 'All modules initialized');
}
