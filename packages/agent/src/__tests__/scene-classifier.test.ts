import { describe, it, expect } from 'vitest';
import { classifyScene, extractMemoryHints } from '../scene/scene-classifier.js';

describe('classifyScene', () => {
  const conversation = (content: string) => ({ interactionType: 'conversation', content });

  describe('interaction types', () => {
    it.each(['click', 'drag', 'idle_trigger', 'system_event'])(
      'classifies "%s" as simple',
      (interactionType) => {
        const result = classifyScene({ interactionType, content: 'remember me?' });
        expect(result.scene).toBe('simple');
        expect(result.confidence).toBe(1.0);
      }
    );

    it('classifies a conversation without content as simple', () => {
      const result = classifyScene({ interactionType: 'conversation', content: null });
      expect(result).toEqual({ scene: 'simple', confidence: 0.9, reason: 'No input content' });
    });
  });

  describe('complex scenes', () => {
    it.each([
      "Do you remember my sister's name?",
      'What did we talk about last week?',
      'Should I take the new job?',
      "I'm stressed about the exams",
      'Why is the sky blue today?',
      'hi, remember me?',
    ])('classifies "%s" as complex', (content) => {
      expect(classifyScene(conversation(content)).scene).toBe('complex');
    });
  });

  describe('simple scenes', () => {
    it.each(['Good morning!', 'thanks!!', 'hey', 'nice weather', 'cats are great'])(
      'classifies "%s" as simple',
      (content) => {
        expect(classifyScene(conversation(content)).scene).toBe('simple');
      }
    );
  });

  it('classifies ordinary longer messages as medium', () => {
    expect(classifyScene(conversation('I finished reading the book today'))).toEqual({
      scene: 'medium',
      confidence: 0.7,
      reason: 'Ordinary conversation',
    });
  });
});

describe('extractMemoryHints', () => {
  it('keeps distinct meaningful words in order', () => {
    expect(extractMemoryHints('I finished reading the BOOK about whales, the book!')).toEqual([
      'finished',
      'reading',
      'book',
      'about',
      'whales',
    ]);
  });

  it('respects the hint limit', () => {
    expect(extractMemoryHints('work stress and work deadlines', 2)).toEqual(['work', 'stress']);
  });

  it('returns nothing for empty content', () => {
    expect(extractMemoryHints(null)).toEqual([]);
    expect(extractMemoryHints('')).toEqual([]);
  });
});
