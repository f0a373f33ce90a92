/**
 * Database Schema Migrations for the example store
 *
 * Uses better-sqlite3. All SQL uses parameterized queries via db.prepare().
 *
 * @module migrations
 */

export { MigrationError } from './types.js';

export { initializeDatabase, checkSchemaVersion, getCurrentSchemaVersion } from './operations.js';

export { configurePragmas } from './schema-helpers.js';

export { verifySchema } from './verification.js';

export { SCHEMA_VERSION } from './schema-definitions.js';
