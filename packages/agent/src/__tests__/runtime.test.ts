import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InvalidRequestError } from '@tiered-context/core';
import { FactsStore } from '../memory/facts-store.js';
import { IdentityLayer } from '../memory/identity-layer.js';
import { InMemoryStore } from '../memory/memory-store.js';
import { WorkingMemory } from '../memory/working-memory.js';
import { PromptRuntime, createPromptRuntime } from '../runtime/index.js';

const environment = { describe: () => 'Time: 09:30 Monday' };

describe('PromptRuntime', () => {
  let dir: string;
  let identity: IdentityLayer;
  let workingMemory: WorkingMemory;
  let facts: FactsStore;
  let memory: InMemoryStore;
  let runtime: PromptRuntime;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runtime-'));
    await writeFile(
      join(dir, 'identity.json'),
      JSON.stringify({
        character: { name: 'Mochi' },
        userProfile: { nickname: 'Sky' },
        hotReload: { enabled: false },
      })
    );
    await writeFile(join(dir, 'system_prompt.txt'), 'You are Mochi.');

    identity = new IdentityLayer({ configDir: dir });
    await identity.initialize();
    workingMemory = new WorkingMemory();
    facts = new FactsStore();
    memory = new InMemoryStore();
    memory.addMemory('Went hiking with Sam at the lake', 'episode', '2026-02-10T10:00:00.000Z');

    runtime = new PromptRuntime({ identity, workingMemory, facts, memory, environment });
  });

  afterEach(async () => {
    runtime.dispose();
    identity.stop();
    await rm(dir, { recursive: true, force: true });
  });

  describe('prepare', () => {
    it('retrieves memories for complex scenes', async () => {
      const prepared = await runtime.prepare({
        interactionType: 'conversation',
        content: 'Do you remember the lake trip with Sam?',
      });

      expect(prepared.requestId).toHaveLength(26);
      expect(prepared.request.requestId).toBe(prepared.requestId);
      expect(prepared.scene.scene).toBe('complex');
      expect(prepared.memoryHints).toEqual(['remember', 'lake', 'trip', 'with', 'sam']);
      expect(prepared.report.layers.retrieval).toBe('miss');
      expect(prepared.prompt).toContain(
        '## Long-term Memory: Related Episodes\nIndex:\n1. [2026-02-10] Went hiking with Sam at the lake'
      );
      expect(prepared.prompt.endsWith(
        '## Current Event\nEvent: conversation\nInput: Do you remember the lake trip with Sam?'
      )).toBe(true);
      expect(workingMemory.getRecentConversations(10)).toEqual([
        'user: Do you remember the lake trip with Sam?',
      ]);
    });

    it('skips retrieval and records nothing for a click', async () => {
      const prepared = await runtime.prepare({ interactionType: 'click' });

      expect(prepared.memoryHints).toEqual([]);
      expect(prepared.report.layers.retrieval).toBe('skipped');
      expect(prepared.prompt).not.toContain('Related Episodes');
      expect(workingMemory.turnCount).toBe(0);
    });

    it('shows earlier turns in the next prompt', async () => {
      await runtime.prepare({ interactionType: 'conversation', content: 'Good morning!' });
      runtime.recordReply('Morning, Sky!');

      const prepared = await runtime.prepare({
        interactionType: 'conversation',
        content: 'I finished reading the book today',
      });

      expect(prepared.prompt).toContain(
        '### Recent Conversation\n- user: Good morning!\n- assistant: Morning, Sky!\n### Live State'
      );
    });

    it('rejects an empty interaction type', async () => {
      await expect(runtime.prepare({ interactionType: '' })).rejects.toBeInstanceOf(
        InvalidRequestError
      );
    });
  });

  describe('cache invalidation', () => {
    it('refreshes the facts summary when facts change', async () => {
      await runtime.prepare({ interactionType: 'click' });
      facts.upsertPreference({ category: 'food', key: 'drink', value: 'tea' });

      const prepared = await runtime.prepare({ interactionType: 'click' });

      expect(prepared.report.layers.facts).toBe('miss');
      expect(prepared.prompt).toContain('Preferences:\n- food/drink: tea (confidence 1.00)');
    });

    it('refreshes identity after a reload', async () => {
      await runtime.prepare({ interactionType: 'click' });
      await writeFile(join(dir, 'system_prompt.txt'), 'You are Mochi, the sleepy one.');
      await identity.reload();

      const prepared = await runtime.prepare({ interactionType: 'click' });

      expect(prepared.report.layers.identity).toBe('miss');
      expect(prepared.prompt).toContain('You are Mochi, the sleepy one.');
    });

    it('drops cached retrievals when a memory is added', async () => {
      const input = { interactionType: 'conversation', content: 'Do you remember Sam?' };

      await runtime.prepare(input);
      const cached = await runtime.prepare(input);
      memory.addMemory('Sam moved to Lisbon');
      const refreshed = await runtime.prepare(input);

      expect(cached.report.layers.retrieval).toBe('hit');
      expect(refreshed.report.layers.retrieval).toBe('miss');
      expect(refreshed.prompt).toContain('Sam moved to Lisbon');
    });

    it('stops quoting memories once the store is cleared', async () => {
      const input = {
        interactionType: 'conversation',
        content: 'Do you remember the lake trip with Sam?',
      };

      const before = await runtime.prepare(input);
      memory.clear();
      const after = await runtime.prepare(input);

      expect(before.prompt).toContain('Went hiking with Sam at the lake');
      expect(after.report.layers.retrieval).toBe('miss');
      expect(after.prompt).not.toContain('## Long-term Memory: Related Episodes');
      expect(runtime.stats().memories).toBe(0);
    });

    it('stops invalidating after dispose', async () => {
      await runtime.prepare({ interactionType: 'click' });
      runtime.dispose();
      facts.upsertPreference({ category: 'food', key: 'drink', value: 'tea' });

      const prepared = await runtime.prepare({ interactionType: 'click' });

      expect(prepared.report.layers.facts).toBe('hit');
    });
  });

  it('reports stats', async () => {
    await runtime.prepare({ interactionType: 'conversation', content: 'Good morning!' });

    const stats = runtime.stats();

    expect(stats.turns).toBe(1);
    expect(stats.memories).toBe(1);
    expect(stats.cache.static.entries).toBe(1);
    expect(stats.cache.semiStatic.entries).toBe(1);
  });
});

describe('createPromptRuntime', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'runtime-factory-'));
    await writeFile(
      join(dir, 'identity.json'),
      JSON.stringify({ character: { name: 'Mochi' }, hotReload: { enabled: false } })
    );
    await writeFile(join(dir, 'system_prompt.txt'), 'You are Mochi.');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reads builder settings and the config dir from the environment', async () => {
    const bundle = await createPromptRuntime({
      env: {
        CONFIG_DIR: dir,
        LOG_LEVEL: 'silent',
        TIERED_CONTEXT_MODE: 'deep',
        TIERED_CONTEXT_AUTO_ADJUST: 'false',
      },
      environment,
    });

    const prepared = await bundle.runtime.prepare({ interactionType: 'click' });
    bundle.shutdown();

    expect(prepared.report.mode).toBe('deep');
    expect(prepared.prompt.startsWith('## Identity\n[Character] Mochi, gentle_playful')).toBe(true);
  });

  it('fails when the config dir has no identity files', async () => {
    await expect(
      createPromptRuntime({ configDir: join(dir, 'missing'), env: { LOG_LEVEL: 'silent' } })
    ).rejects.toThrow(/^Failed to load /);
  });
});
