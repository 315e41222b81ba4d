/**
 * Identity layer tests run against a temporary config directory.
 */

import { mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ConfigLoadError, ConfigValidationError } from '@tiered-context/core';
import { IdentityLayer } from '../memory/identity-layer.js';

const PROFILE = {
  character: { name: 'Mochi', nickname: 'Mo' },
  userProfile: {
    nickname: 'Sky',
    birthday: '10-05',
    customFacts: ['allergic to cats', 'works night shifts'],
  },
  hotReload: { enabled: false },
};

const EXPECTED_CONTEXT = [
  '## Identity',
  '[Character] Mochi (Mo), gentle_playful, voice: casual',
  'You are Mochi, a small desk companion.',
  '[User] nickname: Sky, relationship: friend, birthday: 10-05',
  '[Important facts] allergic to cats; works night shifts',
].join('\n');

describe('IdentityLayer', () => {
  let dir: string;
  let layer: IdentityLayer;

  async function writeProfile(profile: unknown): Promise<void> {
    await writeFile(join(dir, 'identity.json'), JSON.stringify(profile));
  }

  /** Write a file and push its mtime forward so the change is visible */
  async function touch(name: string, content: string): Promise<void> {
    const path = join(dir, name);
    await writeFile(path, content);
    const future = new Date(Date.now() + 60_000);
    await utimes(path, future, future);
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'identity-'));
    await writeProfile(PROFILE);
    await writeFile(join(dir, 'system_prompt.txt'), 'You are Mochi, a small desk companion.\n');
    layer = new IdentityLayer({ configDir: dir });
  });

  afterEach(async () => {
    layer.stop();
    await rm(dir, { recursive: true, force: true });
  });

  describe('loading', () => {
    it('formats the identity context', async () => {
      await layer.initialize();

      expect(layer.isInitialized).toBe(true);
      expect(layer.getContext()).toBe(EXPECTED_CONTEXT);
      expect(layer.getSystemPrompt()).toBe('You are Mochi, a small desk companion.');
    });

    it('marks an uninitialised layer', () => {
      expect(layer.getContext()).toBe('## Identity\n[not initialized]');
      expect(layer.getProfile()).toBeNull();
    });

    it('omits birthday and facts when absent', async () => {
      await writeProfile({ character: { name: 'Mochi' }, hotReload: { enabled: false } });
      await layer.initialize();

      expect(layer.getContext()).toBe(
        [
          '## Identity',
          '[Character] Mochi, gentle_playful, voice: casual',
          'You are Mochi, a small desk companion.',
          '[User] nickname: friend, relationship: friend',
        ].join('\n')
      );
    });

    it('fails when the system prompt is missing', async () => {
      await rm(join(dir, 'system_prompt.txt'));

      await expect(layer.initialize()).rejects.toBeInstanceOf(ConfigLoadError);
    });

    it('fails on malformed JSON', async () => {
      await writeFile(join(dir, 'identity.json'), '{ "character": ');

      await expect(layer.initialize()).rejects.toBeInstanceOf(ConfigLoadError);
    });

    it('reports schema violations', async () => {
      await writeProfile({ ...PROFILE, userProfile: { birthday: '5 Oct' } });

      const error = await layer.initialize().then(
        () => null,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(ConfigValidationError);
      if (error instanceof ConfigValidationError) {
        expect(error.issues).toEqual(['userProfile.birthday: birthday must use MM-DD']);
      }
    });
  });

  describe('reloading', () => {
    it('detects newer files', async () => {
      await layer.initialize();
      expect(await layer.hasChanged()).toBe(false);

      await touch('system_prompt.txt', 'You are Mochi, now sleepier.');

      expect(await layer.hasChanged()).toBe(true);
    });

    it('applies changes and notifies listeners', async () => {
      await layer.initialize();
      const listener = vi.fn();
      layer.onChange(listener);

      await touch('system_prompt.txt', 'You are Mochi, now sleepier.');

      expect(await layer.reload()).toBe(true);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(layer.getContext()).toContain('\nYou are Mochi, now sleepier.\n');
      expect(await layer.hasChanged()).toBe(false);
    });

    it('keeps the previous identity when a reload fails', async () => {
      await layer.initialize();
      const listener = vi.fn();
      layer.onChange(listener);

      await touch('identity.json', 'not json');

      expect(await layer.reload()).toBe(false);
      expect(listener).not.toHaveBeenCalled();
      expect(layer.getContext()).toBe(EXPECTED_CONTEXT);
    });

    it('stops notifying after unsubscribe', async () => {
      await layer.initialize();
      const listener = vi.fn();
      const unsubscribe = layer.onChange(listener);

      unsubscribe();
      await layer.reload();

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('watching', () => {
    it('does not watch when hot reload is disabled', async () => {
      await layer.initialize();
      expect(layer.isWatching).toBe(false);
    });

    it('reloads after a file changes on disk', async () => {
      await writeProfile({
        ...PROFILE,
        hotReload: { enabled: true, pollIntervalMs: 20, debounceMs: 10 },
      });
      await layer.initialize();
      const listener = vi.fn();
      layer.onChange(listener);
      expect(layer.isWatching).toBe(true);

      await touch('system_prompt.txt', 'You are Mochi, freshly reloaded.');

      await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1), {
        timeout: 3000,
        interval: 20,
      });
      expect(layer.getSystemPrompt()).toBe('You are Mochi, freshly reloaded.');

      layer.stop();
      expect(layer.isWatching).toBe(false);
    });
  });
});
