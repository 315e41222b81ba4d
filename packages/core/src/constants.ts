/**
 * Application constants
 */

/** Static entries never expire by time */
export const STATIC_CACHE_TTL_MS = 0;

/** Default semi-static TTL: 10 minutes */
export const DEFAULT_SEMI_STATIC_TTL_MS = 10 * 60 * 1000;

/** Default retrieval TTL: 5 minutes */
export const DEFAULT_RETRIEVAL_TTL_MS = 5 * 60 * 1000;

/** Default number of conversation turns pulled into the dynamic layer */
export const DEFAULT_RECENT_CONVERSATION_LIMIT = 10;

/** Memory-count thresholds for automatic profile selection */
export const DEFAULT_MEMORY_THRESHOLDS = {
  /** Below this count the lite profile is used */
  lite: 100,
  /** Below this count (and at or above lite) the standard profile is used */
  standard: 1000,
} as const;

/** Cache keys used by the assembler */
export const CACHE_KEYS = {
  IDENTITY: 'identity',
  FACTS_SUMMARY: 'facts_summary',
} as const;

/** Section headers of the assembled prompt */
export const SECTION_HEADERS = {
  IDENTITY: '## Identity',
  WORKING_MEMORY: '## Working Memory',
  CONVERSATION: '### Recent Conversation',
  LIVE_STATE: '### Live State',
  ENVIRONMENT: '### Environment',
  FACTS: '## Long-term Memory: Facts Summary',
  MEMORIES: '## Long-term Memory: Related Episodes',
  INSTRUCTIONS: '## Instructions',
  CURRENT_EVENT: '## Current Event',
} as const;

/** Fixed instruction block appended to every prompt */
export const DEFAULT_INSTRUCTIONS =
  'Reply to the current event using the context above. Keep the reply short, natural and in character.';

/** Marker used when the interaction carries no content */
export const NO_CONTENT_MARKER = '[none]';

/** Placeholders for sources that are not wired */
export const PLACEHOLDERS = {
  NO_FACTS: '[No user preferences recorded yet]',
  NOT_AVAILABLE: '[not available]',
} as const;
