import { describe, it, expect } from 'vitest';
import { detectEmotionalStates, EMOTION_KEYWORDS, EMOTION_NAMES } from '../emotions.js';
import { EMOTIONAL_STATES } from '../types.js';

describe('detectEmotionalStates', () => {
  it('reports each state once', () => {
    expect(detectEmotionalStates('злость, злится, грусть')).toEqual(['angry', 'sad']);
  });

  it('orders states by first occurrence in the text', () => {
    expect(detectEmotionalStates('sad, then angry')).toEqual(['sad', 'angry']);
  });

  it('matches case-insensitively', () => {
    expect(detectEmotionalStates('ANXIOUS')).toEqual(['anxious']);
  });

  it('matches Russian stems in inflected forms', () => {
    expect(detectEmotionalStates('Подросток раздражён и встревожен')).toEqual(['frustrated', 'anxious']);
  });

  it('defaults to confused', () => {
    expect(detectEmotionalStates('xyz')).toEqual(['confused']);
    expect(detectEmotionalStates('')).toEqual(['confused']);
  });

  it('matches keywords inside longer words', () => {
    expect(detectEmotionalStates('crusade')).toEqual(['sad']);
  });
});

describe('keyword table', () => {
  it('covers every state with a Russian name', () => {
    for (const state of EMOTIONAL_STATES) {
      expect(EMOTION_KEYWORDS[state].length).toBeGreaterThan(0);
      expect(EMOTION_NAMES[state]).toBeTruthy();
    }
  });

  it('assigns each keyword to a single state', () => {
    const all = EMOTIONAL_STATES.flatMap((state) => EMOTION_KEYWORDS[state]);

    expect(new Set(all).size).toBe(all.length);
  });
});
