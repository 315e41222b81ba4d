/**
 * @tiered-context/core
 *
 * Incremental prompt assembly: a three-partition context cache,
 * size-budget profiles and the six-step context assembler.
 */

// Types and schemas
export * from './types/index.js';
export * from './schemas/index.js';
export * from './constants.js';

// Errors, logging and configuration
export {
  CollaboratorMissingError,
  ConfigValidationError,
  ConfigLoadError,
  InvalidRequestError,
  type RequiredCollaborator,
} from './errors/index.js';
export {
  Logger,
  createSilentLogger,
  type LogLevel,
  type LoggerOptions,
} from './logging/logger.js';
export {
  getEnv,
  readBuilderEnv,
  loadBuilderConfig,
  type RuntimeEnv,
} from './config/index.js';

// Cache
export {
  TieredCache,
  CACHE_PARTITIONS,
  isExpired,
  retrievalLookupKey,
  type CacheEntry,
  type RetrievalKey,
  type PartitionStats,
  type CacheStats,
} from './cache/index.js';

// Budget
export {
  estimateSize,
  countWideChars,
  countNarrowWords,
  BUDGET_PROFILES,
  PROMPT_MODES,
  getBudgetProfile,
  availableBudget,
  modeForMemoryCount,
  resolvePromptMode,
  proportionalLength,
  truncateProportionally,
  enforceBudget,
  type BudgetProfile,
  type MemoryThresholds,
  type ProfileSelection,
  type BudgetOutcome,
  type BudgetOptions,
  type BudgetResult,
} from './budget/index.js';

// Context assembly
export {
  ContextAssembler,
  ClockEnvironmentProbe,
  formatTimeOfDay,
  buildWorkingMemoryBlock,
  buildFactsSummary,
  buildCurrentEventBlock,
  assembleLayers,
  type ContextAssemblerDeps,
  type BuildInput,
  type BuildReport,
  type CacheLookup,
  type RetrievalLookup,
  type PromptLayers,
} from './context/index.js';
