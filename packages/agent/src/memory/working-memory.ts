/**
 * Working Memory
 *
 * Bounded in-process conversation log plus a small key/value live state
 * (mood, energy, current activity). Supplies the dynamic prompt layer and
 * is never cached by the assembler.
 */

import type { WorkingStateSource } from '@tiered-context/core';

export type TurnRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: TurnRole;
  content: string;
  interactionType?: string;
  timestamp: string;
}

export type StateValue = string | number | boolean;

export const DEFAULT_MAX_TURNS = 50;
export const EMPTY_STATE_MARKER = '[no live state]';

export interface WorkingMemoryOptions {
  /** Oldest turns are dropped beyond this many */
  maxTurns?: number;
}

export class WorkingMemory implements WorkingStateSource {
  private turns: ConversationTurn[] = [];
  private readonly state = new Map<string, StateValue>();
  private readonly maxTurns: number;

  constructor(options: WorkingMemoryOptions = {}) {
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS);
  }

  addTurn(
    role: TurnRole,
    content: string,
    options: { interactionType?: string; timestamp?: string } = {}
  ): ConversationTurn {
    const turn: ConversationTurn = {
      role,
      content,
      interactionType: options.interactionType,
      timestamp: options.timestamp ?? new Date().toISOString(),
    };
    this.turns.push(turn);
    if (this.turns.length > this.maxTurns) {
      this.turns = this.turns.slice(this.turns.length - this.maxTurns);
    }
    return turn;
  }

  /**
   * Last `limit` turns, oldest first, as `role: content` lines
   */
  getRecentConversations(limit: number): string[] {
    if (limit <= 0) return [];
    return this.turns
      .slice(-limit)
      .map((turn) => `${turn.role}: ${turn.content}`);
  }

  getTurns(): ConversationTurn[] {
    return [...this.turns];
  }

  get turnCount(): number {
    return this.turns.length;
  }

  setState(key: string, value: StateValue): void {
    this.state.set(key, value);
  }

  removeState(key: string): boolean {
    return this.state.delete(key);
  }

  /**
   * Live state as `key: value` lines in insertion order
   */
  getStateSnapshot(): string {
    if (this.state.size === 0) return EMPTY_STATE_MARKER;
    return Array.from(this.state, ([key, value]) => `${key}: ${String(value)}`).join('\n');
  }

  clear(): void {
    this.turns = [];
    this.state.clear();
  }
}
