/**
 * Facts Store
 *
 * In-process store of user preferences and behaviour patterns, the
 * semi-static facts layer. Entries are validated on write; listeners are
 * told about every change so the host can invalidate its facts summary.
 */

import {
  BehaviorPatternSchema,
  ConfigValidationError,
  UserPreferenceSchema,
  type BehaviorPattern,
  type BehaviorPatternInput,
  type FactsSource,
  type UserPreference,
  type UserPreferenceInput,
} from '@tiered-context/core';
import type { z } from 'zod';

export type FactsChangeListener = () => void;

function validate<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  source: string
): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      source,
      result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }
  return result.data;
}

export class FactsStore implements FactsSource {
  private readonly preferences = new Map<string, UserPreference>();
  private readonly patterns = new Map<string, BehaviorPattern>();
  private readonly listeners = new Set<FactsChangeListener>();

  /**
   * Insert or replace the preference for `category/key`
   *
   * @throws {ConfigValidationError} if the preference is invalid
   */
  upsertPreference(input: UserPreferenceInput): UserPreference {
    const preference = validate(UserPreferenceSchema, input, 'user preference');
    this.preferences.set(`${preference.category}/${preference.key}`, preference);
    this.notify();
    return preference;
  }

  /**
   * Count one more observation of a known preference. When the value
   * differs it is replaced and the evidence count restarts at 1.
   */
  recordPreferenceEvidence(category: string, key: string, value: string): UserPreference {
    const existing = this.preferences.get(`${category}/${key}`);
    if (existing && existing.value === value) {
      return this.upsertPreference({
        ...existing,
        evidenceCount: existing.evidenceCount + 1,
      });
    }
    return this.upsertPreference({
      category,
      key,
      value,
      source: 'conversation',
      confidence: existing?.confidence ?? 0.5,
    });
  }

  removePreference(category: string, key: string): boolean {
    const removed = this.preferences.delete(`${category}/${key}`);
    if (removed) this.notify();
    return removed;
  }

  /**
   * Insert or replace the pattern of the same type
   *
   * @throws {ConfigValidationError} if the pattern is invalid
   */
  upsertPattern(input: BehaviorPatternInput): BehaviorPattern {
    const pattern = validate(BehaviorPatternSchema, input, 'behaviour pattern');
    this.patterns.set(pattern.patternType, pattern);
    this.notify();
    return pattern;
  }

  removePattern(patternType: string): boolean {
    const removed = this.patterns.delete(patternType);
    if (removed) this.notify();
    return removed;
  }

  getPreferences(): UserPreference[] {
    return Array.from(this.preferences.values());
  }

  getBehaviorPatterns(): BehaviorPattern[] {
    return Array.from(this.patterns.values());
  }

  onChange(listener: FactsChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  clear(): void {
    this.preferences.clear();
    this.patterns.clear();
    this.notify();
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
