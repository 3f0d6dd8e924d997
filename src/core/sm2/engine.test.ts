/**
 * SM2Engine Unit Tests
 *
 * These tests verify the core SM-2 scheduling rules:
 * - Initial state creation for newly introduced topics
 * - Easiness factor updates and the 1.3 floor
 * - The 1 / 6 / EF-scaled interval ladder
 * - Lapse handling and input clamping
 * - Due checks and days-overdue calculation
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { SM2Engine, roundHalfEven, easinessDelta } from './engine';
import { QUALITY_GRADES, isQuality } from './types';
import type { Quality, SM2State } from './types';

describe('SM2Engine', () => {
  let engine: SM2Engine;

  beforeEach(() => {
    engine = new SM2Engine();
  });

  describe('initialize', () => {
    it('returns the initial memory state due the day after the reference date', () => {
      const state = engine.initialize('2024-01-01');

      expect(state).toEqual({
        easinessFactor: 2.5,
        interval: 1,
        repetitions: 0,
        lastReviewed: null,
        nextReview: '2024-01-02',
      });
    });

    it('crosses month and leap-day boundaries', () => {
      expect(engine.initialize('2024-02-28').nextReview).toBe('2024-02-29');
      expect(engine.initialize('2023-12-31').nextReview).toBe('2024-01-01');
    });
  });

  describe('recompute', () => {
    const initial: SM2State = {
      easinessFactor: 2.5,
      interval: 1,
      repetitions: 0,
      lastReviewed: null,
      nextReview: '2024-01-02',
    };

    it('keeps the easiness factor unchanged at quality 4', () => {
      expect(easinessDelta(4)).toBe(0);
      expect(engine.recompute(initial, 4, '2024-01-02').easinessFactor).toBe(2.5);
    });

    it('raises the easiness factor by 0.1 at quality 5', () => {
      const next = engine.recompute(initial, 5, '2024-01-02');

      expect(next.easinessFactor).toBe(2.6);
      expect(next.repetitions).toBe(1);
      expect(next.interval).toBe(1);
      expect(next.nextReview).toBe('2024-01-03');
    });

    it('climbs the interval ladder 1, 6, 15, 38, 95, 238, 595, 1488 at quality 4', () => {
      let state: Pick<SM2State, 'easinessFactor' | 'interval' | 'repetitions'> = initial;
      let date = '2024-01-02';
      const intervals: number[] = [];

      for (let i = 0; i < 8; i++) {
        const next = engine.recompute(state, 4, date);
        intervals.push(next.interval);
        state = next;
        date = next.nextReview;
      }

      expect(intervals).toEqual([1, 6, 15, 38, 95, 238, 595, 1488]);
    });

    it('sets nextReview to the reference date plus the new interval', () => {
      const next = engine.recompute(
        { easinessFactor: 2.5, interval: 6, repetitions: 2 },
        4,
        '2024-01-10'
      );

      expect(next.interval).toBe(15);
      expect(next.nextReview).toBe('2024-01-25');
    });

    it('resets repetitions and interval on a lapse while still updating the easiness factor', () => {
      const next = engine.recompute(
        { easinessFactor: 2.5, interval: 15, repetitions: 3 },
        2,
        '2024-03-01'
      );

      expect(next.repetitions).toBe(0);
      expect(next.interval).toBe(1);
      expect(next.nextReview).toBe('2024-03-02');
      expect(next.easinessFactor).toBeCloseTo(2.18, 10);
    });

    it.each([0, 1, 2] as const)('treats quality %i as a lapse', (quality) => {
      const next = engine.recompute(
        { easinessFactor: 2.0, interval: 40, repetitions: 5 },
        quality,
        '2024-05-01'
      );

      expect(next.repetitions).toBe(0);
      expect(next.interval).toBe(1);
    });

    it('never lets the easiness factor fall below 1.3', () => {
      for (const quality of QUALITY_GRADES) {
        const next = engine.recompute(
          { easinessFactor: 1.3, interval: 10, repetitions: 4 },
          quality,
          '2024-01-01'
        );
        expect(next.easinessFactor).toBeGreaterThanOrEqual(1.3);
      }
      expect(
        engine.recompute({ easinessFactor: 1.4, interval: 1, repetitions: 0 }, 0, '2024-01-01')
          .easinessFactor
      ).toBe(1.3);
    });

    it('rounds exact halves to the even neighbour', () => {
      // 5 * 2.5 = 12.5
      const next = engine.recompute(
        { easinessFactor: 2.5, interval: 5, repetitions: 2 },
        4,
        '2024-01-01'
      );

      expect(next.interval).toBe(12);
      expect(next.nextReview).toBe('2024-01-13');
    });

    it('clamps out-of-range stored values instead of rejecting them', () => {
      const next = engine.recompute(
        { easinessFactor: 0.5, interval: 0, repetitions: -3 },
        4,
        '2024-01-01'
      );

      expect(next.easinessFactor).toBe(1.3);
      expect(next.repetitions).toBe(1);
      expect(next.interval).toBe(1);
    });

    it('uses an interval of at least one day when scaling', () => {
      // interval 0 is read as 1, so 1 * 2.5 = 2.5 rounds to 2
      const next = engine.recompute(
        { easinessFactor: 2.5, interval: 0, repetitions: 2 },
        4,
        '2024-01-01'
      );

      expect(next.interval).toBe(2);
    });

    it('does not mutate its input', () => {
      const state = { easinessFactor: 2.5, interval: 6, repetitions: 2 };
      engine.recompute(state, 5, '2024-01-01');

      expect(state).toEqual({ easinessFactor: 2.5, interval: 6, repetitions: 2 });
    });
  });

  describe('isDue and daysOverdue', () => {
    const state = { nextReview: '2024-01-10' };

    it('is due on and after the next review date', () => {
      expect(engine.isDue(state, '2024-01-09')).toBe(false);
      expect(engine.isDue(state, '2024-01-10')).toBe(true);
      expect(engine.isDue(state, '2024-02-01')).toBe(true);
    });

    it('counts whole days past due and never goes negative', () => {
      expect(engine.daysOverdue(state, '2024-01-05')).toBe(0);
      expect(engine.daysOverdue(state, '2024-01-10')).toBe(0);
      expect(engine.daysOverdue(state, '2024-01-13')).toBe(3);
    });
  });
});

describe('roundHalfEven', () => {
  it('rounds non-ties to the nearest integer', () => {
    expect(roundHalfEven(37.4)).toBe(37);
    expect(roundHalfEven(37.6)).toBe(38);
  });

  it('sends ties to the even integer', () => {
    expect(roundHalfEven(0.5)).toBe(0);
    expect(roundHalfEven(1.5)).toBe(2);
    expect(roundHalfEven(2.5)).toBe(2);
    expect(roundHalfEven(37.5)).toBe(38);
    expect(roundHalfEven(1487.5)).toBe(1488);
  });
});

describe('isQuality', () => {
  it('accepts only the integers 0 through 5', () => {
    const accepted: Quality[] = [];
    for (const candidate of [-1, 0, 1, 2, 3, 4, 5, 6, 4.5, Number.NaN]) {
      if (isQuality(candidate)) {
        accepted.push(candidate);
      }
    }

    expect(accepted).toEqual([0, 1, 2, 3, 4, 5]);
    expect(isQuality('4')).toBe(false);
    expect(isQuality(null)).toBe(false);
  });
});
