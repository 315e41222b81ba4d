/**
 * Identity Layer
 *
 * Loads the character identity and user profile (`identity.json`) and the
 * character's system prompt (`system_prompt.txt`) from a config directory,
 * and formats them as the static identity context.
 *
 * When hot reload is enabled the files are polled for modification-time
 * changes. A detected change is debounced, the files are reloaded, and
 * change listeners are notified so the host can invalidate its cached
 * identity. A reload that fails is logged and the previous identity stays
 * in place.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import {
  ConfigLoadError,
  ConfigValidationError,
  IdentityProfileSchema,
  SECTION_HEADERS,
  createSilentLogger,
  type IdentityProfile,
  type IdentitySource,
  type Logger,
} from '@tiered-context/core';

export const IDENTITY_FILE = 'identity.json';
export const SYSTEM_PROMPT_FILE = 'system_prompt.txt';

export interface IdentityLayerOptions {
  /** Directory holding identity.json and system_prompt.txt */
  configDir: string;
  logger?: Logger;
}

export type IdentityChangeListener = () => void;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class IdentityLayer implements IdentitySource {
  private profile: IdentityProfile | null = null;
  private systemPrompt = '';
  private readonly lastModified = new Map<string, number>();
  private readonly listeners = new Set<IdentityChangeListener>();
  private readonly logger: Logger;
  private pollTimer: NodeJS.Timeout | null = null;
  private debounceTimer: NodeJS.Timeout | null = null;

  readonly identityPath: string;
  readonly systemPromptPath: string;

  constructor(options: IdentityLayerOptions) {
    this.identityPath = join(options.configDir, IDENTITY_FILE);
    this.systemPromptPath = join(options.configDir, SYSTEM_PROMPT_FILE);
    this.logger = (options.logger ?? createSilentLogger()).child({
      component: 'identity-layer',
    });
  }

  /**
   * Load both files and start watching them if hot reload is enabled
   *
   * @throws {ConfigLoadError} if a file is missing or not valid JSON
   * @throws {ConfigValidationError} if identity.json fails validation
   */
  async initialize(): Promise<void> {
    await this.load();

    if (this.profile?.hotReload.enabled) {
      this.startWatching();
    }
  }

  get isInitialized(): boolean {
    return this.profile !== null;
  }

  get isWatching(): boolean {
    return this.pollTimer !== null;
  }

  getProfile(): IdentityProfile | null {
    return this.profile;
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  /**
   * Formatted identity context for the static prompt layer
   */
  getContext(): string {
    const profile = this.profile;
    if (!profile) {
      return `${SECTION_HEADERS.IDENTITY}\n[not initialized]`;
    }

    const { character, userProfile } = profile;
    const characterName = character.nickname
      ? `${character.name} (${character.nickname})`
      : character.name;
    const birthday = userProfile.birthday
      ? `, birthday: ${userProfile.birthday}`
      : '';

    const parts = [
      SECTION_HEADERS.IDENTITY,
      `[Character] ${characterName}, ${character.personalityArchetype}, voice: ${character.voiceStyle}`,
      this.systemPrompt,
      `[User] nickname: ${userProfile.nickname}, relationship: ${userProfile.relationship}${birthday}`,
    ];

    if (userProfile.customFacts.length > 0) {
      parts.push(`[Important facts] ${userProfile.customFacts.join('; ')}`);
    }

    return parts.join('\n');
  }

  /**
   * Subscribe to successful reloads. Returns an unsubscribe function.
   */
  onChange(listener: IdentityChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Reload both files. On failure the previous identity is kept.
   *
   * @returns whether the reload succeeded
   */
  async reload(): Promise<boolean> {
    try {
      await this.load();
    } catch (error) {
      this.logger.error(
        'Identity reload failed, keeping previous identity',
        error instanceof Error ? error : new Error(String(error))
      );
      return false;
    }

    this.logger.info('Identity reloaded', {
      character: this.profile?.character.name,
    });
    for (const listener of this.listeners) {
      listener();
    }
    return true;
  }

  /**
   * Whether either file has a newer modification time than at last load.
   * A file that has disappeared is not a change.
   */
  async hasChanged(): Promise<boolean> {
    for (const path of [this.identityPath, this.systemPromptPath]) {
      let mtimeMs: number;
      try {
        ({ mtimeMs } = await stat(path));
      } catch (error) {
        this.logger.debug('Watched file unavailable', {
          path,
          reason: describeError(error),
        });
        continue;
      }

      if (mtimeMs > (this.lastModified.get(path) ?? 0)) {
        return true;
      }
    }
    return false;
  }

  /**
   * Stop polling and drop any pending reload
   */
  stop(): void {
    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  private startWatching(): void {
    if (this.pollTimer || !this.profile) return;

    const { pollIntervalMs } = this.profile.hotReload;
    this.pollTimer = setInterval(() => {
      this.poll().catch((error: unknown) => {
        this.logger.error(
          'Identity watch failed',
          error instanceof Error ? error : new Error(String(error))
        );
      });
    }, pollIntervalMs);
    this.pollTimer.unref();

    this.logger.debug('Watching identity files', { pollIntervalMs });
  }

  private async poll(): Promise<void> {
    if (this.debounceTimer || !(await this.hasChanged())) return;

    const debounceMs = this.profile?.hotReload.debounceMs ?? 0;
    this.debounceTimer = setTimeout(() => {
      this.reload()
        .catch((error: unknown) => {
          this.logger.error(
            'Identity reload crashed',
            error instanceof Error ? error : new Error(String(error))
          );
        })
        .finally(() => {
          this.debounceTimer = null;
        });
    }, debounceMs);
    this.debounceTimer.unref();
  }

  private async load(): Promise<void> {
    const identityRaw = await this.readConfigFile(this.identityPath);
    const systemPrompt = (await this.readConfigFile(this.systemPromptPath)).trim();

    let json: unknown;
    try {
      json = JSON.parse(identityRaw);
    } catch (error) {
      throw new ConfigLoadError(this.identityPath, describeError(error), {
        cause: error,
      });
    }

    const result = IdentityProfileSchema.safeParse(json);
    if (!result.success) {
      throw new ConfigValidationError(
        this.identityPath,
        result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
      );
    }

    this.profile = result.data;
    this.systemPrompt = systemPrompt;
  }

  private async readConfigFile(path: string): Promise<string> {
    try {
      const [content, stats] = await Promise.all([
        readFile(path, 'utf-8'),
        stat(path),
      ]);
      this.lastModified.set(path, stats.mtimeMs);
      return content;
    } catch (error) {
      throw new ConfigLoadError(path, describeError(error), { cause: error });
    }
  }
}
