/**
 * @tiered-context/agent
 *
 * Concrete collaborators for the context assembler and the runtime that
 * wires them together.
 */

// Memory
export {
  IdentityLayer,
  IDENTITY_FILE,
  SYSTEM_PROMPT_FILE,
  WorkingMemory,
  DEFAULT_MAX_TURNS,
  EMPTY_STATE_MARKER,
  FactsStore,
  InMemoryStore,
  INDEX_PREVIEW_LENGTH,
  queryTerms,
  type IdentityLayerOptions,
  type IdentityChangeListener,
  type ConversationTurn,
  type TurnRole,
  type StateValue,
  type WorkingMemoryOptions,
  type FactsChangeListener,
  type MemoryRecord,
  type MemoryType,
  type MemoryChangeListener,
} from './memory/index.js';

// Scene
export {
  classifyScene,
  extractMemoryHints,
  DEFAULT_MAX_HINTS,
  type SceneClassification,
} from './scene/scene-classifier.js';

// Runtime
export {
  PromptRuntime,
  createPromptRuntime,
  type InteractionInput,
  type PreparedPrompt,
  type RuntimeStats,
  type PromptRuntimeDeps,
  type CreatePromptRuntimeOptions,
  type PromptRuntimeBundle,
} from './runtime/index.js';
