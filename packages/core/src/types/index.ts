/**
 * Core type definitions for tiered-context
 *
 * Collaborator contracts consumed by the assembler and the shared
 * value types that flow through the pipeline.
 */

// ============================================================================
// Primitive Types
// ============================================================================

/** Value that a collaborator may return directly or asynchronously */
export type MaybePromise<T> = T | Promise<T>;

/** Coarse complexity tier of an interaction */
export type SceneComplexity = 'simple' | 'medium' | 'complex';

/** Named budget profile */
export type PromptMode = 'lite' | 'standard' | 'deep';

/** Cache partition names */
export type CachePartition = 'static' | 'semiStatic' | 'retrieval';

// ============================================================================
// Interaction
// ============================================================================

/**
 * A single interaction handed to the assembler. Read-only to the core.
 */
export interface InteractionRequest {
  /** Interaction type tag, e.g. `conversation`, `click`, `idle_trigger` */
  interactionType: string;
  /** Raw user input, when the interaction carries any */
  content?: string | null;
  requestId?: string;
  timestamp?: string;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Source of the static identity context (character and user profile)
 */
export interface IdentitySource {
  getContext(): MaybePromise<string>;
}

/**
 * Source of fresh working state: conversation turns and live state
 */
export interface WorkingStateSource {
  /** Most recent turns, oldest first */
  getRecentConversations(limit: number): MaybePromise<string[]>;
  getStateSnapshot(): MaybePromise<string>;
}

/**
 * Query passed to the retrieval source
 */
export interface RetrievalQuery {
  scene: SceneComplexity;
  request: InteractionRequest;
  keywords: string[];
  /** Present results as a short index plus a few full texts */
  useIndex: boolean;
  /** Maximum entries in the index list */
  indexCount: number;
  /** Maximum memories quoted in full */
  fulltextCount: number;
}

/**
 * Long-term memory retrieval. The returned text is used as-is and may be empty.
 */
export interface RetrievalSource {
  retrieve(query: RetrievalQuery): Promise<string>;
}

/**
 * A preference fact about the user
 */
export interface UserPreference {
  category: string;
  key: string;
  value: string;
  /** 0.0 - 1.0 */
  confidence: number;
  evidenceCount: number;
  source?: 'conversation' | 'observation' | 'explicit';
}

/**
 * An observed behaviour pattern of the user
 */
export interface BehaviorPattern {
  patternType: string;
  description: string;
  frequency?: 'daily' | 'weekly' | 'monthly';
  /** 0.0 - 1.0 */
  confidence: number;
  sampleCount: number;
}

/**
 * Source of the semi-static facts (preferences and behaviour patterns)
 */
export interface FactsSource {
  getPreferences(): MaybePromise<UserPreference[]>;
  getBehaviorPatterns(): MaybePromise<BehaviorPattern[]>;
}

/**
 * Reports how many long-term memories exist, for profile auto-selection
 */
export interface MemoryVolumeSource {
  countMemories(): MaybePromise<number>;
}

/**
 * Produces the environment fragment of the dynamic layer
 */
export interface EnvironmentProbe {
  describe(): MaybePromise<string>;
}
