/**
 * Budget profiles
 *
 * Static table of size allotments per prompt mode, and the rule that
 * picks a mode from the number of stored memories.
 *
 * Component allotments are advisory. Only `total - reservedOutput` is
 * enforced as the ceiling for assembled content.
 */

import type { PromptMode } from '../types/index.js';

/**
 * Size allotments for one prompt mode
 */
export interface BudgetProfile {
  /** Character and user profile */
  identity: number;
  /** Recent conversation and live state */
  workingMemory: number;
  /** Time, weather and system state */
  environment: number;
  /** Facts summary */
  summary: number;
  /** Memory index list */
  index: number;
  /** Full text of high-priority memories */
  fulltext: number;
  /** System instructions */
  instructions: number;
  /** Space kept free for the model's output */
  reservedOutput: number;
  total: number;
}

export const BUDGET_PROFILES: Readonly<Record<PromptMode, BudgetProfile>> = {
  // New users, low-spec devices, fast responses
  lite: {
    identity: 1500,
    workingMemory: 4000,
    environment: 500,
    summary: 1500,
    index: 1500,
    fulltext: 1500,
    instructions: 500,
    reservedOutput: 5000,
    total: 16000,
  },
  // Default
  standard: {
    identity: 2500,
    workingMemory: 8000,
    environment: 1000,
    summary: 2500,
    index: 3000,
    fulltext: 5000,
    instructions: 1000,
    reservedOutput: 9000,
    total: 32000,
  },
  // Long-term users and complex conversations
  deep: {
    identity: 4000,
    workingMemory: 16000,
    environment: 2000,
    summary: 4000,
    index: 6000,
    fulltext: 10000,
    instructions: 2000,
    reservedOutput: 20000,
    total: 64000,
  },
};

export const PROMPT_MODES: readonly PromptMode[] = ['lite', 'standard', 'deep'];

export interface MemoryThresholds {
  lite: number;
  standard: number;
}

/**
 * Settings that decide which profile a build uses
 */
export interface ProfileSelection {
  mode: PromptMode;
  autoAdjustMode: boolean;
  memoryCountThresholdLite: number;
  memoryCountThresholdStandard: number;
}

export function getBudgetProfile(mode: PromptMode): BudgetProfile {
  return BUDGET_PROFILES[mode];
}

/**
 * Ceiling enforced on assembled content
 */
export function availableBudget(profile: BudgetProfile): number {
  return profile.total - profile.reservedOutput;
}

/**
 * Pick a mode from a memory count.
 * Each range includes its lower threshold.
 */
export function modeForMemoryCount(
  memoryCount: number,
  thresholds: MemoryThresholds
): PromptMode {
  if (memoryCount < thresholds.lite) return 'lite';
  if (memoryCount < thresholds.standard) return 'standard';
  return 'deep';
}

/**
 * Mode for a build. Without auto-adjust, or without a memory count,
 * the configured mode is used unconditionally.
 */
export function resolvePromptMode(
  selection: ProfileSelection,
  memoryCount?: number
): PromptMode {
  if (!selection.autoAdjustMode || memoryCount === undefined) {
    return selection.mode;
  }

  return modeForMemoryCount(memoryCount, {
    lite: selection.memoryCountThresholdLite,
    standard: selection.memoryCountThresholdStandard,
  });
}
