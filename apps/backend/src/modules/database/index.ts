/**
 * Database module public API exports.
 */
export { DatabaseService } from './services/database.service.js';
export type { DatabaseConnection } from './services/database.service.js';
