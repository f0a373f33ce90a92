/**
 * Storage Service Module
 *
 * SQLite persistence for extraction examples and feedback.
 */

export {
  initializeDatabase,
  checkSchemaVersion,
  getCurrentSchemaVersion,
  verifySchema,
  MigrationError,
  SCHEMA_VERSION,
} from './migrations/index.js';

export {
  ExampleDatabase,
  DatabaseError,
  DatabaseErrorCode,
  DEFAULT_DATABASE_PATH,
  QUALITY_TIERS,
  type QualityStats,
  type FieldQualityStats,
  type CategoryQualityStats,
} from './database/index.js';
