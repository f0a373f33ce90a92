/**
 * SQL Schema Definitions for the example store
 *
 * Contains all table creation SQL, indexes, and database configuration.
 * These are constants used by the migration system.
 *
 * @module migrations/schema-definitions
 */

/** Current schema version */
export const SCHEMA_VERSION = 1;

/**
 * WAL keeps readers unblocked while examples are appended.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -16000',
  'PRAGMA wal_autocheckpoint = 1000',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Schema version table - tracks migration state
 */
export const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)
`;

/**
 * Examples table. Counters are only written through compare-and-set on
 * `version`; the CHECK constraints hold the quality invariants.
 */
export const CREATE_EXAMPLES_TABLE = `
CREATE TABLE IF NOT EXISTS examples (
  id TEXT PRIMARY KEY,
  domain_category TEXT NOT NULL,
  variant TEXT NOT NULL,
  field_name TEXT NOT NULL,
  input_context TEXT NOT NULL,
  context_hash TEXT NOT NULL,
  expected_output TEXT NOT NULL,
  confidence_score REAL NOT NULL CHECK (confidence_score >= 0 AND confidence_score <= 1),
  usage_count INTEGER NOT NULL DEFAULT 0 CHECK (usage_count >= 0),
  success_count INTEGER NOT NULL DEFAULT 0 CHECK (success_count >= 0),
  source TEXT NOT NULL CHECK (source IN ('extraction', 'correction', 'seed', 'manual')),
  embedding BLOB,
  embedding_model TEXT,
  deprioritized INTEGER NOT NULL DEFAULT 0 CHECK (deprioritized IN (0, 1)),
  deprioritized_at TEXT,
  version INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  last_used_at TEXT,
  CHECK (success_count <= usage_count)
)
`;

/**
 * Feedback table - append-only record of user corrections and confirmations
 */
export const CREATE_FEEDBACK_TABLE = `
CREATE TABLE IF NOT EXISTS feedback (
  id TEXT PRIMARY KEY,
  field_name TEXT NOT NULL,
  domain_category TEXT,
  variant TEXT,
  context_hash TEXT,
  original_prediction TEXT NOT NULL,
  corrected_value TEXT NOT NULL,
  feedback_type TEXT NOT NULL CHECK (feedback_type IN ('correction', 'confirmation', 'rejection')),
  example_id TEXT,
  user_context TEXT,
  timestamp TEXT NOT NULL,
  FOREIGN KEY (example_id) REFERENCES examples(id)
)
`;

/**
 * All required indexes for query performance
 */
export const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_examples_lookup ON examples(domain_category, variant, field_name, deprioritized)',
  'CREATE INDEX IF NOT EXISTS idx_examples_context ON examples(field_name, context_hash)',
  'CREATE INDEX IF NOT EXISTS idx_examples_created_at ON examples(created_at)',
  'CREATE INDEX IF NOT EXISTS idx_feedback_field ON feedback(field_name)',
  'CREATE INDEX IF NOT EXISTS idx_feedback_example ON feedback(example_id)',
] as const;

/**
 * Table definitions in dependency order
 */
export const TABLE_DEFINITIONS: ReadonlyArray<{ name: string; sql: string }> = [
  { name: 'examples', sql: CREATE_EXAMPLES_TABLE },
  { name: 'feedback', sql: CREATE_FEEDBACK_TABLE },
];

/**
 * Tables that must exist for the schema to be considered valid
 */
export const REQUIRED_TABLES = ['schema_version', 'examples', 'feedback'] as const;

export const REQUIRED_INDEXES = [
  'idx_examples_lookup',
  'idx_examples_context',
  'idx_examples_created_at',
  'idx_feedback_field',
  'idx_feedback_example',
] as const;
