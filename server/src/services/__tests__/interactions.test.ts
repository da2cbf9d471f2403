import { describe, it, expect } from 'vitest';
import { InteractionLog } from '../interactions.js';

describe('InteractionLog', () => {
  it('records interactions with a timestamp', () => {
    const log = new InteractionLog(() => new Date('2024-05-01T10:00:00Z'));

    const interaction = log.record(1, 'Отстань!');

    expect(interaction).toEqual({
      userId: 1,
      phrase: 'Отстань!',
      analysis: null,
      timestamp: new Date('2024-05-01T10:00:00Z'),
    });
    expect(log.size).toBe(1);
  });

  it('filters interactions by user in insertion order', () => {
    const log = new InteractionLog();
    log.record(1, 'первая');
    log.record(2, 'чужая');
    log.record(1, 'вторая');

    expect(log.getUserInteractions(1).map((entry) => entry.phrase)).toEqual(['первая', 'вторая']);
    expect(log.getUserInteractions(3)).toEqual([]);
  });

  it('returns the latest interaction of a user', () => {
    const log = new InteractionLog();
    log.record(1, 'первая');
    log.record(1, 'вторая');
    log.record(2, 'чужая');

    expect(log.getLatest(1)?.phrase).toBe('вторая');
    expect(log.getLatest(5)).toBeUndefined();
  });

  it('attaches feedback to the latest interaction only', () => {
    const log = new InteractionLog();
    log.record(1, 'первая');
    log.record(1, 'вторая');

    expect(log.addFeedback(1, 'positive')).toBe(true);

    const [first, second] = log.getUserInteractions(1);
    expect(first.feedback).toBeUndefined();
    expect(second.feedback).toBe('positive');
  });

  it('reports feedback without an interaction', () => {
    expect(new InteractionLog().addFeedback(1, 'negative')).toBe(false);
  });
});
