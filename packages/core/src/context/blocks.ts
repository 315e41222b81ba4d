/**
 * Prompt section blocks
 *
 * Pure formatting of each context layer, and the fixed-order assembly
 * of all layers into one prompt.
 */

import {
  NO_CONTENT_MARKER,
  PLACEHOLDERS,
  SECTION_HEADERS,
} from '../constants.js';
import type {
  BehaviorPattern,
  InteractionRequest,
  UserPreference,
} from '../types/index.js';

/**
 * Layers handed to the final assembly step
 */
export interface PromptLayers {
  identity: string;
  workingMemory: string;
  factsSummary: string;
  memories: string;
  instructions: string;
  request: InteractionRequest;
}

/**
 * Build the dynamic working-memory block
 */
export function buildWorkingMemoryBlock(
  conversations: string[],
  stateSnapshot: string,
  environment: string
): string {
  const parts: string[] = [SECTION_HEADERS.WORKING_MEMORY];

  if (conversations.length > 0) {
    parts.push(SECTION_HEADERS.CONVERSATION);
    for (const turn of conversations) {
      parts.push(`- ${turn}`);
    }
  }

  parts.push(SECTION_HEADERS.LIVE_STATE);
  parts.push(stateSnapshot);
  parts.push(SECTION_HEADERS.ENVIRONMENT);
  parts.push(environment);

  return parts.join('\n');
}

function formatConfidence(confidence: number): string {
  return confidence.toFixed(2);
}

/**
 * Build the facts summary from preferences and behaviour patterns.
 * Highest confidence first; ties keep their input order.
 */
export function buildFactsSummary(
  preferences: UserPreference[],
  patterns: BehaviorPattern[]
): string {
  if (preferences.length === 0 && patterns.length === 0) {
    return PLACEHOLDERS.NO_FACTS;
  }

  const parts: string[] = [];

  if (preferences.length > 0) {
    parts.push('Preferences:');
    const sorted = [...preferences].sort((a, b) => b.confidence - a.confidence);
    for (const pref of sorted) {
      parts.push(
        `- ${pref.category}/${pref.key}: ${pref.value} (confidence ${formatConfidence(pref.confidence)})`
      );
    }
  }

  if (patterns.length > 0) {
    parts.push('Behaviour patterns:');
    const sorted = [...patterns].sort((a, b) => b.confidence - a.confidence);
    for (const pattern of sorted) {
      const frequency = pattern.frequency ? `, ${pattern.frequency}` : '';
      parts.push(
        `- ${pattern.patternType}: ${pattern.description} (confidence ${formatConfidence(pattern.confidence)}${frequency})`
      );
    }
  }

  return parts.join('\n');
}

/**
 * Build the current-event block
 */
export function buildCurrentEventBlock(request: InteractionRequest): string {
  return [
    SECTION_HEADERS.CURRENT_EVENT,
    `Event: ${request.interactionType}`,
    `Input: ${request.content ? request.content : NO_CONTENT_MARKER}`,
  ].join('\n');
}

/**
 * Assemble all layers in their fixed order:
 * identity, working memory, facts summary, related memories,
 * instructions, current event. Empty facts or memories are omitted
 * together with their trailing blank line.
 */
export function assembleLayers(layers: PromptLayers): string {
  const parts: string[] = [];

  parts.push(layers.identity);
  parts.push('');

  parts.push(layers.workingMemory);
  parts.push('');

  if (layers.factsSummary) {
    parts.push(SECTION_HEADERS.FACTS);
    parts.push(layers.factsSummary);
    parts.push('');
  }

  if (layers.memories) {
    parts.push(layers.memories);
    parts.push('');
  }

  parts.push(SECTION_HEADERS.INSTRUCTIONS);
  parts.push(layers.instructions);
  parts.push('');

  parts.push(buildCurrentEventBlock(layers.request));

  return parts.join('\n');
}
