/**
 * Example store persistence
 *
 * @module storage/database
 */

export { ExampleDatabase } from './service.js';
export {
  DatabaseError,
  DatabaseErrorCode,
  type QualityStats,
  type FieldQualityStats,
  type CategoryQualityStats,
} from './types.js';
export { DEFAULT_DATABASE_PATH } from './helpers.js';
export { embeddingToBuffer, bufferToEmbedding } from './converters.js';
export { QUALITY_TIERS } from './stats-operations.js';
