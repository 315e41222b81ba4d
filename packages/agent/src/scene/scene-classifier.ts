/**
 * Scene Classifier
 *
 * Decides how much context an interaction deserves. Simple scenes
 * (clicks, greetings, idle triggers) skip memory retrieval entirely;
 * medium and complex scenes retrieve, complex ones being those that
 * lean on the shared past or ask for judgement.
 */

import type { InteractionRequest, SceneComplexity } from '@tiered-context/core';

export interface SceneClassification {
  scene: SceneComplexity;
  confidence: number;
  reason: string;
}

/** Interaction types that never need long-term memory */
const SIMPLE_INTERACTION_TYPES = new Set([
  'click',
  'drag',
  'hover',
  'idle_trigger',
  'system_event',
  'feed',
  'pet',
]);

/**
 * Patterns checked in priority order. First match wins.
 */
const SCENE_PATTERNS: Array<{
  scene: SceneComplexity;
  patterns: RegExp[];
  description: string;
}> = [
  {
    scene: 'complex',
    patterns: [
      /\bremember\b/i,
      /\blast (time|week|month|year)\b/i,
      /\b(yesterday|the other day)\b/i,
      /\bwhat did (i|we) (say|do|talk)/i,
      /\bshould i\b/i,
      /\b(advice|advise|recommend)/i,
      /\bhow do you feel\b/i,
      /\bi('m| am) (sad|stressed|worried|anxious|lonely|upset)\b/i,
      /\bwhy (do|did|does|is|are)\b/i,
    ],
    description: 'Refers to shared history or asks for judgement',
  },
  {
    scene: 'simple',
    patterns: [
      /^(hi|hello|hey|yo|morning|good (morning|night|evening|afternoon))\b[\s!.?]*$/i,
      /^(thanks|thank you|ok(ay)?|bye|see you|lol|haha)\b[\s!.?]*$/i,
    ],
    description: 'Greeting or acknowledgement',
  },
];

/** Messages this short with no pattern match count as simple */
const SHORT_MESSAGE_WORDS = 3;

/**
 * Classify an interaction into a scene complexity tier
 */
export function classifyScene(request: InteractionRequest): SceneClassification {
  if (SIMPLE_INTERACTION_TYPES.has(request.interactionType)) {
    return {
      scene: 'simple',
      confidence: 1.0,
      reason: `Interaction type ${request.interactionType} needs no memory`,
    };
  }

  const content = request.content?.trim() ?? '';
  if (content === '') {
    return {
      scene: 'simple',
      confidence: 0.9,
      reason: 'No input content',
    };
  }

  for (const { scene, patterns, description } of SCENE_PATTERNS) {
    if (patterns.some((pattern) => pattern.test(content))) {
      return { scene, confidence: 0.85, reason: description };
    }
  }

  const wordCount = content.split(/\s+/).length;
  if (wordCount <= SHORT_MESSAGE_WORDS) {
    return {
      scene: 'simple',
      confidence: 0.6,
      reason: 'Short message',
    };
  }

  return {
    scene: 'medium',
    confidence: 0.7,
    reason: 'Ordinary conversation',
  };
}

/**
 * Words too common to be useful retrieval hints
 */
const STOPWORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'but', 'by', 'do', 'for',
  'from', 'have', 'how', 'i', 'in', 'is', 'it', 'me', 'my', 'of', 'on',
  'or', 'so', 'that', 'the', 'to', 'was', 'we', 'what', 'you', 'your',
]);

export const DEFAULT_MAX_HINTS = 5;

/**
 * Keywords for memory retrieval: distinct lowercase words longer than
 * two characters that are not stopwords, in order of first appearance
 */
export function extractMemoryHints(
  content: string | null | undefined,
  maxHints = DEFAULT_MAX_HINTS
): string[] {
  if (!content) return [];

  const hints: string[] = [];
  const words = content
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s']/gu, ' ')
    .split(/\s+/);

  for (const raw of words) {
    const word = raw.replace(/^'+|'+$/g, '');
    if (Array.from(word).length <= 2 || STOPWORDS.has(word) || hints.includes(word)) {
      continue;
    }
    hints.push(word);
    if (hints.length >= maxHints) break;
  }

  return hints;
}
