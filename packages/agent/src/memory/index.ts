/**
 * Memory collaborators: identity, working memory, facts and the
 * in-process long-term store
 */

export {
  IdentityLayer,
  IDENTITY_FILE,
  SYSTEM_PROMPT_FILE,
  type IdentityLayerOptions,
  type IdentityChangeListener,
} from './identity-layer.js';
export {
  WorkingMemory,
  DEFAULT_MAX_TURNS,
  EMPTY_STATE_MARKER,
  type ConversationTurn,
  type TurnRole,
  type StateValue,
  type WorkingMemoryOptions,
} from './working-memory.js';
export { FactsStore, type FactsChangeListener } from './facts-store.js';
export {
  InMemoryStore,
  INDEX_PREVIEW_LENGTH,
  queryTerms,
  type MemoryRecord,
  type MemoryType,
  type MemoryChangeListener,
} from './memory-store.js';
