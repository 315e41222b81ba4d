/**
 * Prompt Runtime
 *
 * Per-interaction entry point. Validates the request, classifies the
 * scene, extracts memory hints, builds the prompt through the context
 * assembler and records the turn in working memory.
 *
 * The runtime also keeps the assembler's caches honest: identity reloads
 * invalidate the static layer, facts changes the semi-static layer, and
 * added or cleared long-term memories the retrieval layer.
 */

import {
  ContextAssembler,
  InteractionRequestSchema,
  InvalidRequestError,
  Logger,
  createSilentLogger,
  getEnv,
  loadBuilderConfig,
  type BuildReport,
  type BuilderConfigInput,
  type CacheStats,
  type EnvironmentProbe,
  type InteractionRequest,
} from '@tiered-context/core';
import { ulid } from 'ulid';
import { FactsStore } from '../memory/facts-store.js';
import { IdentityLayer } from '../memory/identity-layer.js';
import { InMemoryStore } from '../memory/memory-store.js';
import { WorkingMemory } from '../memory/working-memory.js';
import {
  classifyScene,
  extractMemoryHints,
  type SceneClassification,
} from '../scene/scene-classifier.js';

// ─── Request / Response Types ──────────────────────────────────

export interface InteractionInput {
  interactionType: string;
  content?: string | null;
}

export interface PreparedPrompt {
  requestId: string;
  request: InteractionRequest;
  scene: SceneClassification;
  memoryHints: string[];
  prompt: string;
  report: BuildReport;
}

export interface RuntimeStats {
  cache: CacheStats;
  turns: number;
  memories: number;
}

export interface PromptRuntimeDeps {
  identity: IdentityLayer;
  workingMemory: WorkingMemory;
  facts?: FactsStore;
  memory?: InMemoryStore;
  environment?: EnvironmentProbe;
  logger?: Logger;
  instructions?: string;
  config?: BuilderConfigInput;
}

// ─── Runtime ───────────────────────────────────────────────────

export class PromptRuntime {
  readonly assembler: ContextAssembler;
  private readonly deps: PromptRuntimeDeps;
  private readonly logger: Logger;
  private readonly unsubscribers: Array<() => void> = [];

  /**
   * @throws {ConfigValidationError} if the builder configuration is invalid
   */
  constructor(deps: PromptRuntimeDeps) {
    this.deps = deps;
    this.logger = (deps.logger ?? createSilentLogger()).child({
      component: 'prompt-runtime',
    });
    this.assembler = new ContextAssembler(
      {
        identity: deps.identity,
        workingState: deps.workingMemory,
        facts: deps.facts,
        retrieval: deps.memory,
        memoryVolume: deps.memory,
        environment: deps.environment,
        logger: deps.logger,
        instructions: deps.instructions,
      },
      deps.config
    );

    this.unsubscribers.push(
      deps.identity.onChange(() => this.assembler.invalidateIdentityCache())
    );
    if (deps.facts) {
      this.unsubscribers.push(
        deps.facts.onChange(() => this.assembler.invalidateFactsCache())
      );
    }
    if (deps.memory) {
      this.unsubscribers.push(
        deps.memory.onChange(() => this.assembler.clearRetrievalCache())
      );
    }
  }

  /**
   * Build the prompt for one interaction and record the user's turn
   *
   * @throws {InvalidRequestError} if the interaction fails validation
   * @throws {CollaboratorMissingError} propagated from the assembler
   */
  async prepare(input: InteractionInput): Promise<PreparedPrompt> {
    const result = InteractionRequestSchema.safeParse({
      ...input,
      requestId: ulid(),
      timestamp: new Date().toISOString(),
    });
    if (!result.success) {
      throw new InvalidRequestError(
        result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
      );
    }

    const request = result.data;
    const requestId = request.requestId ?? ulid();
    const scene = classifyScene(request);
    const memoryHints =
      scene.scene === 'simple' ? [] : extractMemoryHints(request.content);

    const report = await this.assembler.buildWithReport({
      scene: scene.scene,
      request,
      memoryHints,
    });

    if (request.content) {
      this.deps.workingMemory.addTurn('user', request.content, {
        interactionType: request.interactionType,
        timestamp: request.timestamp,
      });
    }

    this.logger.info('Prompt prepared', {
      requestId,
      interactionType: request.interactionType,
      scene: scene.scene,
      mode: report.mode,
      outcome: report.budget.outcome,
    });

    return {
      requestId,
      request,
      scene,
      memoryHints,
      prompt: report.prompt,
      report,
    };
  }

  /**
   * Record the model's reply so the next prompt sees it
   */
  recordReply(content: string): void {
    this.deps.workingMemory.addTurn('assistant', content);
  }

  stats(): RuntimeStats {
    return {
      cache: this.assembler.cacheStats(),
      turns: this.deps.workingMemory.turnCount,
      memories: this.deps.memory?.countMemories() ?? 0,
    };
  }

  /**
   * Detach from collaborator change notifications
   */
  dispose(): void {
    for (const unsubscribe of this.unsubscribers.splice(0)) {
      unsubscribe();
    }
  }
}

// ─── Factory ───────────────────────────────────────────────────

export interface CreatePromptRuntimeOptions {
  /** Defaults to CONFIG_DIR from the environment */
  configDir?: string;
  env?: Record<string, string | undefined>;
  config?: BuilderConfigInput;
  logger?: Logger;
  environment?: EnvironmentProbe;
}

export interface PromptRuntimeBundle {
  runtime: PromptRuntime;
  identity: IdentityLayer;
  workingMemory: WorkingMemory;
  facts: FactsStore;
  memory: InMemoryStore;
  /** Stops the identity watcher and detaches the runtime */
  shutdown(): void;
}

/**
 * Create a runtime with in-process collaborators, loading identity from
 * the config directory and builder settings from the environment
 *
 * @throws {ConfigLoadError} if the identity files cannot be read
 * @throws {ConfigValidationError} if identity or builder config is invalid
 */
export async function createPromptRuntime(
  options: CreatePromptRuntimeOptions = {}
): Promise<PromptRuntimeBundle> {
  const env = options.env ?? process.env;
  const runtimeEnv = getEnv(env);
  const logger =
    options.logger ??
    new Logger({ level: runtimeEnv.LOG_LEVEL, context: { service: 'tiered-context' } });

  const config = loadBuilderConfig(options.config, env);
  const identity = new IdentityLayer({
    configDir: options.configDir ?? runtimeEnv.CONFIG_DIR,
    logger,
  });
  await identity.initialize();

  const workingMemory = new WorkingMemory();
  const facts = new FactsStore();
  const memory = new InMemoryStore();

  const runtime = new PromptRuntime({
    identity,
    workingMemory,
    facts,
    memory,
    environment: options.environment,
    logger,
    config,
  });

  return {
    runtime,
    identity,
    workingMemory,
    facts,
    memory,
    shutdown: () => {
      runtime.dispose();
      identity.stop();
    },
  };
}
