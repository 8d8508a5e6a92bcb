import { describe, it, expect } from 'vitest';
import { UserPreferences } from './user-preferences.js';
import { createLogger } from '../logging/logger.js';

function clock(start = 1000) {
  let t = start;
  return () => t++;
}

describe('UserPreferences', () => {
  it('raises confidence monotonically and activates at the threshold', () => {
    const prefs = new UserPreferences({ promotionThreshold: 3, now: clock() });
    const first = prefs.learn('explanation_style', 'use_examples', true);
    const second = prefs.learn('explanation_style', 'use_examples', true);
    const third = prefs.learn('explanation_style', 'use_examples', true);
    const fourth = prefs.learn('explanation_style', 'use_examples', true);

    expect([first, second, third, fourth].map((r) => r.observationCount)).toEqual([1, 2, 3, 4]);
    expect(first.confidence).toBeCloseTo(1 / 3, 10);
    expect(second.confidence).toBeCloseTo(2 / 3, 10);
    expect(third.confidence).toBe(1);
    expect(fourth.confidence).toBe(1);
    expect([first, second, third, fourth].map((r) => r.active)).toEqual([false, false, true, true]);
  });

  it('counts each value separately', () => {
    const prefs = new UserPreferences({ promotionThreshold: 2, now: clock() });
    prefs.learn('difficulty', 'level', 'hard');
    prefs.learn('difficulty', 'level', 'easy');
    expect(prefs.getActive()).toEqual([]);
    expect(prefs.records().map((r) => [r.value, r.observationCount])).toEqual([
      ['hard', 1],
      ['easy', 1],
    ]);
  });

  it('distinguishes values of different types', () => {
    const prefs = new UserPreferences({ promotionThreshold: 2, now: clock() });
    prefs.learn('display', 'columns', 2);
    prefs.learn('display', 'columns', '2');
    expect(prefs.records()).toHaveLength(2);
  });

  it('surfaces one active value per key: highest count, newest on ties', () => {
    const prefs = new UserPreferences({ promotionThreshold: 1, now: clock() });
    prefs.learn('difficulty', 'level', 'hard');
    prefs.learn('difficulty', 'level', 'easy');
    prefs.learn('explanation_style', 'concise', true);

    expect(prefs.getActive().map((r) => [r.key, r.value])).toEqual([
      ['level', 'easy'],
      ['concise', true],
    ]);

    prefs.learn('difficulty', 'level', 'hard');
    expect(prefs.get('difficulty', 'level')?.value).toBe('hard');
  });

  it('returns null for an unknown preference', () => {
    expect(new UserPreferences().get('difficulty', 'level')).toBeNull();
  });

  it('tracks the most common intent, earliest first on ties', () => {
    const prefs = new UserPreferences();
    expect(prefs.mostCommonIntent()).toBeNull();
    prefs.recordInteraction('fetch');
    prefs.recordInteraction('math');
    expect(prefs.mostCommonIntent()).toBe('fetch');
    prefs.recordInteraction('math');
    expect(prefs.mostCommonIntent()).toBe('math');
    expect(prefs.interactionCounts()).toEqual({ fetch: 1, math: 2 });
  });

  it('round-trips through snapshot and restore', () => {
    const prefs = new UserPreferences({ promotionThreshold: 2, now: clock() });
    prefs.learn('explanation_style', 'detailed', true);
    prefs.learn('explanation_style', 'detailed', true);
    prefs.recordInteraction('code');

    const restored = new UserPreferences({ promotionThreshold: 2 });
    expect(restored.restore(JSON.parse(JSON.stringify(prefs.snapshot())))).toBe(true);
    expect(restored.getActive()).toEqual(prefs.getActive());
    expect(restored.mostCommonIntent()).toBe('code');
  });

  it('recomputes activation against its own threshold on restore', () => {
    const source = new UserPreferences({ promotionThreshold: 1, now: clock() });
    source.learn('explanation_style', 'concise', true);

    const stricter = new UserPreferences({ promotionThreshold: 4 });
    stricter.restore(source.snapshot());
    expect(stricter.getActive()).toEqual([]);
    expect(stricter.records()[0].confidence).toBe(0.25);
  });

  it('rejects an invalid snapshot and keeps its state', () => {
    const lines: string[] = [];
    const prefs = new UserPreferences({
      promotionThreshold: 1,
      logger: createLogger('prefs', { write: (line) => lines.push(line) }),
    });
    prefs.learn('difficulty', 'level', 'easy');
    lines.length = 0;

    expect(prefs.restore({ version: 2 })).toBe(false);
    expect(prefs.records()).toHaveLength(1);
    expect(lines).toHaveLength(1);
    expect(lines[0].startsWith('[prefs] WARN ignoring invalid preferences snapshot')).toBe(true);
  });

  it('merges only what was observed since the last restore', () => {
    const earlier = new UserPreferences({ promotionThreshold: 2, now: clock() });
    earlier.learn('explanation_style', 'use_examples', true);

    const prefs = new UserPreferences({ promotionThreshold: 2, now: clock(2000) });
    prefs.restore(earlier.snapshot());
    prefs.learn('explanation_style', 'use_examples', true);
    prefs.recordInteraction('code');

    const elsewhere = new UserPreferences({ promotionThreshold: 2, now: clock(3000) });
    elsewhere.learn('explanation_style', 'use_examples', true);
    elsewhere.learn('explanation_style', 'use_examples', true);
    elsewhere.learn('explanation_style', 'use_examples', true);
    elsewhere.recordInteraction('code');

    const merged = prefs.mergeInto(elsewhere.snapshot());
    expect(merged.observations.map((r) => [r.key, r.observationCount, r.active])).toEqual([['use_examples', 4, true]]);
    expect(merged.interactions).toEqual([['code', 2]]);

    prefs.markPersisted();
    expect(prefs.mergeInto(merged)).toEqual(merged);
    expect(prefs.records()[0].observationCount).toBe(2);
  });

  it('merges into nothing when the stored snapshot is missing or invalid', () => {
    const lines: string[] = [];
    const prefs = new UserPreferences({
      promotionThreshold: 2,
      logger: createLogger('prefs', { write: (line) => lines.push(line) }),
    });
    prefs.learn('difficulty', 'level', 'easy');
    lines.length = 0;

    expect(prefs.mergeInto(undefined)).toEqual(prefs.snapshot());
    expect(lines).toEqual([]);
    expect(prefs.mergeInto({ version: 2 })).toEqual(prefs.snapshot());
    expect(lines).toHaveLength(1);
  });

  it('logs activation once', () => {
    const lines: string[] = [];
    const prefs = new UserPreferences({
      promotionThreshold: 2,
      logger: createLogger('prefs', { write: (line) => lines.push(line) }),
    });
    prefs.learn('explanation_style', 'use_examples', true);
    prefs.learn('explanation_style', 'use_examples', true);
    prefs.learn('explanation_style', 'use_examples', true);
    expect(lines).toEqual([
      '[prefs] INFO preference activated {"category":"explanation_style","key":"use_examples","value":true}',
    ]);
  });

  it('rejects a non-positive threshold', () => {
    expect(() => new UserPreferences({ promotionThreshold: 0 })).toThrow(RangeError);
  });
});
