/**
 * Extraction pipeline exports
 */

export {
  ExtractionEngine,
  ExtractionRequestSchema,
  ExtractionConfigurationError,
  isPromotable,
  type ExtractionRequest,
  type ExtractionOptions,
  type ExtractionResult,
  type ExtractionEngineDeps,
  type BatchReport,
} from './engine.js';
export { ExtractorConfigSchema, loadExtractorConfig, type ExtractorConfig, type ExtractorConfigInput } from './config.js';
export { ExtractionClient, type BatchExtraction, type BatchStatus, type ExtractionClientConfig } from './extraction-client.js';
export { EvidenceVerifier, type EvidenceConfig, type VerificationResult } from './evidence-verifier.js';
export {
  applyPostProcessing,
  enforceExclusiveGroups,
  normalizeUnits,
  rebuildSummaries,
  checkDependencies,
  SUMMARY_SEPARATOR,
  type PostProcessingChange,
  type PostProcessingResult,
  type PostProcessingRule,
} from './post-processing.js';
export {
  buildExtractionPrompt,
  buildRepairPrompt,
  buildContextSnippet,
  selectSourceWindow,
  type PromptInput,
  type PromptLimits,
  type PromptViolation,
} from './prompt-assembler.js';
export { parseJsonObject, validateBatchResponse, coerceValue, type BatchValidation } from './response-validator.js';
export { partitionSchema, estimateFieldTokens, type Batch, type PartitionLimits } from './schema-partitioner.js';
export { CONFIDENCE, estimateConfidence, isPlaceholder } from './confidence.js';
export { TaskPool, type Task, type TaskOutcome } from './task-pool.js';
export { UNITS, findUnit, parseQuantities, parseSingleQuantity, type UnitDefinition, type Quantity } from './units.js';
