import { describe, it, expect } from 'vitest';
import {
  assembleLayers,
  buildCurrentEventBlock,
  buildFactsSummary,
  buildWorkingMemoryBlock,
} from '../blocks.js';
import { ClockEnvironmentProbe, formatTimeOfDay } from '../environment.js';

describe('buildWorkingMemoryBlock', () => {
  it('should list turns before live state and environment', () => {
    expect(buildWorkingMemoryBlock(['user: hi'], 'mood: calm', 'Time: 07:00 Friday')).toBe(
      [
        '## Working Memory',
        '### Recent Conversation',
        '- user: hi',
        '### Live State',
        'mood: calm',
        '### Environment',
        'Time: 07:00 Friday',
      ].join('\n')
    );
  });

  it('should leave out the conversation header with no turns', () => {
    expect(buildWorkingMemoryBlock([], 'idle', 'Time: 07:00 Friday')).toBe(
      '## Working Memory\n### Live State\nidle\n### Environment\nTime: 07:00 Friday'
    );
  });
});

describe('buildFactsSummary', () => {
  it('should return the placeholder when nothing is recorded', () => {
    expect(buildFactsSummary([], [])).toBe('[No user preferences recorded yet]');
  });

  it('should order preferences and patterns by confidence', () => {
    const summary = buildFactsSummary(
      [
        { category: 'food', key: 'snack', value: 'crackers', confidence: 0.4, evidenceCount: 1 },
        { category: 'music', key: 'genre', value: 'jazz', confidence: 0.85, evidenceCount: 4 },
      ],
      [
        {
          patternType: 'sleep',
          description: 'goes to bed after midnight',
          frequency: 'daily',
          confidence: 0.7,
          sampleCount: 12,
        },
        { patternType: 'work', description: 'long meetings', confidence: 0.75, sampleCount: 3 },
      ]
    );

    expect(summary).toBe(
      [
        'Preferences:',
        '- music/genre: jazz (confidence 0.85)',
        '- food/snack: crackers (confidence 0.40)',
        'Behaviour patterns:',
        '- work: long meetings (confidence 0.75)',
        '- sleep: goes to bed after midnight (confidence 0.70, daily)',
      ].join('\n')
    );
  });

  it('should skip the preferences heading when only patterns exist', () => {
    const summary = buildFactsSummary(
      [],
      [{ patternType: 'walk', description: 'evening walks', frequency: 'weekly', confidence: 1, sampleCount: 5 }]
    );

    expect(summary).toBe('Behaviour patterns:\n- walk: evening walks (confidence 1.00, weekly)');
  });
});

describe('buildCurrentEventBlock', () => {
  it('should render the event type and input', () => {
    expect(buildCurrentEventBlock({ interactionType: 'conversation', content: 'hello' })).toBe(
      '## Current Event\nEvent: conversation\nInput: hello'
    );
  });

  it('should mark empty content', () => {
    expect(buildCurrentEventBlock({ interactionType: 'idle_trigger', content: '' })).toBe(
      '## Current Event\nEvent: idle_trigger\nInput: [none]'
    );
  });
});

describe('assembleLayers', () => {
  const base = {
    identity: 'ID',
    workingMemory: 'WM',
    factsSummary: '',
    memories: '',
    instructions: 'INS',
    request: { interactionType: 'click' },
  };

  it('should drop empty facts and memories', () => {
    expect(assembleLayers(base)).toBe(
      'ID\n\nWM\n\n## Instructions\nINS\n\n## Current Event\nEvent: click\nInput: [none]'
    );
  });

  it('should place facts before memories', () => {
    expect(assembleLayers({ ...base, factsSummary: 'F', memories: 'M' })).toBe(
      'ID\n\nWM\n\n## Long-term Memory: Facts Summary\nF\n\nM\n\n## Instructions\nINS\n\n## Current Event\nEvent: click\nInput: [none]'
    );
  });
});

describe('clock environment', () => {
  it('should format local time with the weekday', () => {
    expect(formatTimeOfDay(new Date(2026, 0, 5, 9, 7))).toBe('09:07 Monday');
  });

  it('should describe time and mark unavailable sources', () => {
    const environment = new ClockEnvironmentProbe(() => new Date(2026, 0, 10, 23, 45));

    expect(environment.describe()).toBe(
      'Time: 23:45 Saturday\nWeather: [not available]\nSystem: [not available]'
    );
  });
});
