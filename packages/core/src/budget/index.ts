/**
 * Budget Module
 *
 * Size estimation, budget profiles and enforcement.
 */

export {
  estimateSize,
  countWideChars,
  countNarrowWords,
} from './estimator.js';

export {
  type BudgetProfile,
  type MemoryThresholds,
  type ProfileSelection,
  BUDGET_PROFILES,
  PROMPT_MODES,
  getBudgetProfile,
  availableBudget,
  modeForMemoryCount,
  resolvePromptMode,
} from './profiles.js';

export {
  type BudgetOutcome,
  type BudgetOptions,
  type BudgetResult,
  proportionalLength,
  truncateProportionally,
  enforceBudget,
} from './compression.js';
