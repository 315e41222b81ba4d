/**
 * Budget enforcement
 *
 * When the estimated size of the assembled prompt exceeds the available
 * budget, the text is cut to `floor(length * available / estimate)`
 * characters. Length is measured in code points, so a cut never lands
 * inside a surrogate pair.
 */

import { estimateSize } from './estimator.js';
import { availableBudget, type BudgetProfile } from './profiles.js';

export type BudgetOutcome = 'unchecked' | 'within_budget' | 'truncated' | 'compressed';

export interface BudgetOptions {
  enableCompression: boolean;
  enableTokenCounting: boolean;
}

export interface BudgetResult {
  text: string;
  outcome: BudgetOutcome;
  /** Ceiling for assembled content */
  available: number;
  /** Estimate before enforcement; null when counting is disabled */
  estimateBefore: number | null;
  /** Estimate of the returned text; null when counting is disabled */
  estimateAfter: number | null;
}

/**
 * Number of characters kept for a given budget and estimate
 */
export function proportionalLength(
  length: number,
  available: number,
  estimate: number
): number {
  if (estimate <= 0) return length;
  return Math.max(0, Math.floor((length * available) / estimate));
}

/**
 * Cut text in proportion to how far its estimate exceeds the budget
 */
export function truncateProportionally(
  text: string,
  available: number,
  estimate: number
): string {
  const chars = Array.from(text);
  const keep = proportionalLength(chars.length, available, estimate);
  return chars.slice(0, keep).join('');
}

/**
 * Enforce a profile's budget on assembled text
 */
export function enforceBudget(
  text: string,
  profile: BudgetProfile,
  options: BudgetOptions
): BudgetResult {
  const available = availableBudget(profile);

  if (!options.enableTokenCounting) {
    return {
      text,
      outcome: 'unchecked',
      available,
      estimateBefore: null,
      estimateAfter: null,
    };
  }

  const estimate = estimateSize(text);
  if (estimate <= available) {
    return {
      text,
      outcome: 'within_budget',
      available,
      estimateBefore: estimate,
      estimateAfter: estimate,
    };
  }

  // Section-aware compression is not implemented; both settings cut
  // proportionally and differ only in the reported outcome.
  const cut = truncateProportionally(text, available, estimate);

  return {
    text: cut,
    outcome: options.enableCompression ? 'compressed' : 'truncated',
    available,
    estimateBefore: estimate,
    estimateAfter: estimateSize(cut),
  };
}
