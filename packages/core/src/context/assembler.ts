/**
 * Context Assembler
 *
 * Builds the prompt for one interaction in six fixed steps:
 *
 * 1. Static layer: identity context, cached with no expiry
 * 2. Semi-static layer: facts summary, cached with a medium TTL
 * 3. Dynamic layer: conversation, live state and environment, never cached
 * 4. Retrieval layer: long-term memories, cached briefly per
 *    (interaction type, keywords); skipped entirely for simple scenes
 * 5. Assembly in fixed section order
 * 6. Budget enforcement against the selected profile
 *
 * Steps run strictly in order, each awaiting its collaborator. The only
 * fatal condition is a missing identity or working-state source; every
 * other unwired source degrades to a placeholder.
 */

import { enforceBudget, type BudgetResult } from '../budget/compression.js';
import {
  getBudgetProfile,
  resolvePromptMode,
} from '../budget/profiles.js';
import { TieredCache, type CacheStats } from '../cache/tiered-cache.js';
import { loadBuilderConfig } from '../config/index.js';
import {
  CACHE_KEYS,
  DEFAULT_INSTRUCTIONS,
  PLACEHOLDERS,
  STATIC_CACHE_TTL_MS,
} from '../constants.js';
import { CollaboratorMissingError } from '../errors/index.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { BuilderConfig, BuilderConfigInput } from '../schemas/index.js';
import type {
  EnvironmentProbe,
  FactsSource,
  IdentitySource,
  InteractionRequest,
  MemoryVolumeSource,
  PromptMode,
  RetrievalSource,
  SceneComplexity,
  WorkingStateSource,
} from '../types/index.js';
import { assembleLayers, buildFactsSummary, buildWorkingMemoryBlock } from './blocks.js';
import { ClockEnvironmentProbe } from './environment.js';

/**
 * Collaborators supplied at construction. The assembler holds
 * references only; it never owns their lifecycle.
 */
export interface ContextAssemblerDeps {
  identity?: IdentitySource;
  workingState?: WorkingStateSource;
  retrieval?: RetrievalSource;
  facts?: FactsSource;
  memoryVolume?: MemoryVolumeSource;
  environment?: EnvironmentProbe;
  logger?: Logger;
  /** Replaces the default instruction block */
  instructions?: string;
}

/**
 * Input for one build
 */
export interface BuildInput {
  scene: SceneComplexity;
  request: InteractionRequest;
  /** Keywords for memory retrieval */
  memoryHints?: string[];
}

export type CacheLookup = 'hit' | 'miss';
export type RetrievalLookup = CacheLookup | 'skipped' | 'uncached';

/**
 * Prompt plus what happened while building it
 */
export interface BuildReport {
  prompt: string;
  mode: PromptMode;
  budget: Omit<BudgetResult, 'text'>;
  layers: {
    identity: CacheLookup;
    facts: CacheLookup;
    retrieval: RetrievalLookup;
  };
}

interface LayerResult<L> {
  content: string;
  lookup: L;
}

export class ContextAssembler {
  readonly config: BuilderConfig;
  private readonly cache = new TieredCache();
  private readonly deps: ContextAssemblerDeps;
  private readonly environment: EnvironmentProbe;
  private readonly logger: Logger;

  /**
   * @param config - Validated against BuilderConfigSchema; missing fields take defaults
   * @throws {ConfigValidationError} if the configuration is invalid
   */
  constructor(deps: ContextAssemblerDeps, config: BuilderConfigInput = {}) {
    this.deps = deps;
    this.config = loadBuilderConfig(config, {});
    this.environment = deps.environment ?? new ClockEnvironmentProbe();
    this.logger = (deps.logger ?? createSilentLogger()).child({
      component: 'context-assembler',
    });
  }

  /**
   * Build the prompt for one interaction
   *
   * @throws {CollaboratorMissingError} if the identity or working-state source is absent
   */
  async build(input: BuildInput): Promise<string> {
    const report = await this.buildWithReport(input);
    return report.prompt;
  }

  /**
   * Build the prompt and report cache use and budget enforcement
   *
   * @throws {CollaboratorMissingError} if the identity or working-state source is absent
   */
  async buildWithReport(input: BuildInput): Promise<BuildReport> {
    const { identity, workingState } = this.deps;
    if (!identity) throw new CollaboratorMissingError('identity');
    if (!workingState) throw new CollaboratorMissingError('workingState');

    const log = this.logger.child({
      requestId: input.request.requestId,
      interactionType: input.request.interactionType,
      scene: input.scene,
    });

    // Step 1: static layer
    const identityLayer = await this.loadStaticContext(identity);

    // Step 2: semi-static layer
    const factsLayer = await this.loadSemiStaticContext();

    // Step 3: dynamic layer
    const workingMemory = await this.refreshDynamicContext(workingState);

    // Step 4: retrieval layer
    const retrievalLayer = await this.retrieveMemories(input);

    // Step 5: assembly
    const assembled = assembleLayers({
      identity: identityLayer.content,
      workingMemory,
      factsSummary: factsLayer.content,
      memories: retrievalLayer.content,
      instructions: this.deps.instructions ?? DEFAULT_INSTRUCTIONS,
      request: input.request,
    });

    // Step 6: budget enforcement
    const mode = await this.resolveMode();
    const { text, ...budget } = enforceBudget(assembled, getBudgetProfile(mode), {
      enableCompression: this.config.enableCompression,
      enableTokenCounting: this.config.enableTokenCounting,
    });

    if (budget.outcome === 'truncated' || budget.outcome === 'compressed') {
      log.warn('Prompt exceeded budget and was cut', {
        mode,
        available: budget.available,
        estimateBefore: budget.estimateBefore,
        estimateAfter: budget.estimateAfter,
        outcome: budget.outcome,
      });
    }

    log.debug('Prompt assembled', {
      mode,
      outcome: budget.outcome,
      identity: identityLayer.lookup,
      facts: factsLayer.lookup,
      retrieval: retrievalLayer.lookup,
    });

    return {
      prompt: text,
      mode,
      budget,
      layers: {
        identity: identityLayer.lookup,
        facts: factsLayer.lookup,
        retrieval: retrievalLayer.lookup,
      },
    };
  }

  // ─── Host-facing cache control ─────────────────────────────

  invalidateStatic(key: string): void {
    this.cache.invalidateStatic(key);
  }

  invalidateSemiStatic(key: string): void {
    this.cache.invalidateSemiStatic(key);
  }

  /**
   * Call when the identity files change on disk
   */
  invalidateIdentityCache(): void {
    this.cache.invalidateStatic(CACHE_KEYS.IDENTITY);
  }

  /**
   * Call when preferences or behaviour patterns change
   */
  invalidateFactsCache(): void {
    this.cache.invalidateSemiStatic(CACHE_KEYS.FACTS_SUMMARY);
  }

  clearRetrievalCache(): void {
    this.cache.clearRetrieval();
  }

  clearCache(): void {
    this.cache.clearAll();
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Mode the next build will use
   */
  async resolveMode(): Promise<PromptMode> {
    const memoryCount =
      this.config.autoAdjustMode && this.deps.memoryVolume
        ? await this.deps.memoryVolume.countMemories()
        : undefined;
    return resolvePromptMode(this.config, memoryCount);
  }

  // ─── Pipeline steps ────────────────────────────────────────

  private async loadStaticContext(
    identity: IdentitySource
  ): Promise<LayerResult<CacheLookup>> {
    const cached = this.cache.getStatic(CACHE_KEYS.IDENTITY);
    if (cached !== null) {
      return { content: cached, lookup: 'hit' };
    }

    const generation = this.cache.generation('static', CACHE_KEYS.IDENTITY);
    const content = await identity.getContext();
    // Invalidated while loading: serve this build, do not cache
    if (this.cache.generation('static', CACHE_KEYS.IDENTITY) === generation) {
      this.cache.setStatic(CACHE_KEYS.IDENTITY, content, STATIC_CACHE_TTL_MS);
    }
    return { content, lookup: 'miss' };
  }

  private async loadSemiStaticContext(): Promise<LayerResult<CacheLookup>> {
    const cached = this.cache.getSemiStatic(CACHE_KEYS.FACTS_SUMMARY);
    if (cached !== null) {
      return { content: cached, lookup: 'hit' };
    }

    const generation = this.cache.generation('semiStatic', CACHE_KEYS.FACTS_SUMMARY);
    const { facts } = this.deps;
    const content = facts
      ? buildFactsSummary(
          await facts.getPreferences(),
          await facts.getBehaviorPatterns()
        )
      : PLACEHOLDERS.NO_FACTS;

    if (this.cache.generation('semiStatic', CACHE_KEYS.FACTS_SUMMARY) === generation) {
      this.cache.setSemiStatic(
        CACHE_KEYS.FACTS_SUMMARY,
        content,
        this.config.semiStaticCacheTtlMs
      );
    }
    return { content, lookup: 'miss' };
  }

  private async refreshDynamicContext(
    workingState: WorkingStateSource
  ): Promise<string> {
    const conversations = await workingState.getRecentConversations(
      this.config.recentConversationLimit
    );
    const snapshot = await workingState.getStateSnapshot();
    const environment = await this.environment.describe();

    return buildWorkingMemoryBlock(conversations, snapshot, environment);
  }

  private async retrieveMemories(
    input: BuildInput
  ): Promise<LayerResult<RetrievalLookup>> {
    if (input.scene === 'simple') {
      return { content: '', lookup: 'skipped' };
    }

    const hints = input.memoryHints ?? [];
    const key = {
      eventType: input.request.interactionType,
      keywords: hints.join(' '),
    };

    if (this.config.enableCache) {
      const cached = this.cache.getRetrieval(key);
      if (cached !== null) {
        return { content: cached, lookup: 'hit' };
      }
    }

    const generation = this.cache.retrievalGeneration(key);
    const { retrieval } = this.deps;
    const content = retrieval
      ? await retrieval.retrieve({
          scene: input.scene,
          request: input.request,
          keywords: hints,
          useIndex: this.config.enableMemoryIndex,
          indexCount: this.config.memoryIndexCount,
          fulltextCount: this.config.memoryFulltextCount,
        })
      : '';

    if (!this.config.enableCache) {
      return { content, lookup: 'uncached' };
    }

    if (this.cache.retrievalGeneration(key) === generation) {
      this.cache.setRetrieval(key, content, this.config.retrievalCacheTtlMs);
    }
    return { content, lookup: 'miss' };
  }
}
