import { describe, it, expect } from 'vitest';
import {
  SleepDebtEstimator,
  classifyDebt,
  recoveryPlan,
  withDebtChange,
  DEFAULT_SLEEP_DEBT_OPTIONS,
} from '../../core/sleep/SleepDebtEstimator.js';
import { createSleepDebtResult, type SleepDebtResult } from '../../core/sleep/types.js';
import { recencyDominantWeighting, uniformWeighting } from '../../core/sleep/weighting.js';
import { ConfigError, InsufficientDataError, OutOfRangeError } from '../../utils/errors.js';
import { night, nightsEnding, repeat } from '../fixtures.js';

const AS_OF = '2024-06-30';

describe('SleepDebtEstimator', () => {
  const estimator = new SleepDebtEstimator();

  describe('estimateSleepNeed', () => {
    it('takes the robust median of the lookback', () => {
      const history = nightsEnding(AS_OF, [...repeat(480, 77), ...repeat(360, 14)]);
      const need = estimator.estimateSleepNeed(history, AS_OF);

      expect(need.valueMinutes).toBe(480);
      expect(need.sampleSize).toBe(77);
      expect(need.validRange).toEqual([360, 600]);
    });

    it('clips the need into the valid range', () => {
      const history = nightsEnding(AS_OF, repeat(300, 10));
      expect(estimator.estimateSleepNeed(history, AS_OF).valueMinutes).toBe(360);
    });

    it('names the actual count when the lookback is too short', () => {
      const history = [night('2024-01-01', 480), ...nightsEnding(AS_OF, repeat(480, 4))];

      let caught: unknown;
      try {
        estimator.estimateSleepNeed(history, AS_OF);
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(InsufficientDataError);
      expect(caught).toMatchObject({ required: 5, found: 4, window: 'sleep need lookback' });
    });

    it('ignores nights after the anchor date', () => {
      const history = [...nightsEnding(AS_OF, repeat(420, 5)), night('2024-07-01', 600)];
      expect(estimator.estimateSleepNeed(history, AS_OF).valueMinutes).toBe(420);
    });

    it('rejects a malformed anchor date', () => {
      expect(() => estimator.estimateSleepNeed([], '2024-13-01')).toThrow(OutOfRangeError);
    });
  });

  describe('estimateDebt', () => {
    it('reports no debt when every night meets the need', () => {
      const result = estimator.estimateDebt(nightsEnding(AS_OF, repeat(480, 14)), AS_OF);

      expect(result.debtHours).toBe(0);
      expect(result.category).toBe('None');
      expect(result.recoveryDays).toBe(0);
      expect(result.dataPoints).toBe(14);
    });

    it('reports the constant deficit regardless of weights', () => {
      const history = nightsEnding(AS_OF, [...repeat(480, 77), ...repeat(360, 14)]);
      const result = estimator.estimateDebt(history, AS_OF);

      expect(result.debtHours).toBe(2);
      expect(result.category).toBe('Moderate');
      expect(result.recoveryDays).toBe(7);
      expect(result.sleepNeedHours).toBe(8);
      expect(result.avgSleepHours).toBe(6);
      expect(result.dailyDeficits).toEqual(repeat(120, 14));
    });

    it('weighs a recent deficit more than an early one', () => {
      const recent = estimator.estimateDebt(nightsEnding(AS_OF, [...repeat(480, 10), ...repeat(300, 4)]), AS_OF);
      const early = estimator.estimateDebt(nightsEnding(AS_OF, [...repeat(300, 4), ...repeat(480, 10)]), AS_OF);

      expect(recent.debtHours).toBe(1.08);
      expect(early.debtHours).toBe(0.64);
      expect(recent.debtHours).toBeGreaterThan(early.debtHours);
      expect(recent.avgSleepHours).toBe(7.14);
    });

    it('does not decrease when the latest night gets worse', () => {
      const better = estimator.estimateDebt(nightsEnding(AS_OF, [...repeat(480, 13), 420]), AS_OF);
      const worse = estimator.estimateDebt(nightsEnding(AS_OF, [...repeat(480, 13), 300]), AS_OF);

      expect(better.debtHours).toBe(0.1);
      expect(worse.debtHours).toBe(0.29);
      expect(worse.debtHours).toBeGreaterThanOrEqual(better.debtHours);
    });

    it('never reports negative debt for surplus nights', () => {
      const history = nightsEnding(AS_OF, [...repeat(480, 77), ...repeat(540, 14)]);
      const result = estimator.estimateDebt(history, AS_OF);

      expect(result.debtHours).toBe(0);
      expect(result.dailyDeficits[0]).toBe(-60);
    });

    it('returns identical results for identical input', () => {
      const history = nightsEnding(AS_OF, [...repeat(450, 20), 390, 500, 410, 365, 430]);
      expect(estimator.estimateDebt(history, AS_OF)).toStrictEqual(estimator.estimateDebt(history, AS_OF));
    });

    it('fails when the window holds too few nights', () => {
      const history = [...nightsEnding('2024-06-01', repeat(480, 10)), ...nightsEnding(AS_OF, repeat(480, 3))];

      expect(() => estimator.estimateDebt(history, AS_OF)).toThrow(
        'sleep debt window needs at least 5 data points (found 3)'
      );
    });

    it('applies an injected weighting strategy', () => {
      const history = nightsEnding(AS_OF, [...repeat(480, 10), ...repeat(300, 4)]);
      const uniform = new SleepDebtEstimator({ weighting: uniformWeighting() });
      const recency = new SleepDebtEstimator({ weighting: recencyDominantWeighting(0.15) });

      // 4 × 180 / 14
      expect(uniform.estimateDebt(history, AS_OF).debtHours).toBe(0.86);
      // 180 × (3 × 0.85 / 13 + 0.15)
      expect(recency.estimateDebt(history, AS_OF).debtHours).toBe(1.04);
    });

    it('rejects invalid options', () => {
      expect(() => new SleepDebtEstimator({ windowDays: 0 })).toThrow(ConfigError);
      expect(() => new SleepDebtEstimator({ recoveryRateHoursPerDay: 0 })).toThrow(ConfigError);
      expect(
        () => new SleepDebtEstimator({ thresholds: { moderateFromHours: 5, highAboveHours: 2 } })
      ).toThrow(ConfigError);
    });
  });

  describe('debtHistory', () => {
    it('skips days without enough data', () => {
      const history = nightsEnding('2024-03-10', repeat(480, 10));
      const results = [...estimator.debtHistory(history, '2024-03-01', '2024-03-10')];

      expect(results.map((r) => r.date)).toEqual([
        '2024-03-05',
        '2024-03-06',
        '2024-03-07',
        '2024-03-08',
        '2024-03-09',
        '2024-03-10',
      ]);
      expect(results.every((r) => r.debtHours === 0)).toBe(true);
    });

    it('anchors each day on its own window', () => {
      const history = nightsEnding('2024-03-10', [...repeat(480, 9), 300]);
      const results = [...estimator.debtHistory(history, '2024-03-09', '2024-03-10')];

      expect(results.map((r) => r.dataPoints)).toEqual([9, 10]);
      expect(results[0].debtHours).toBe(0);
    });
  });

  it('yields nothing for an empty history', () => {
    const iterator = estimator.debtHistory([], '2024-03-01', '2024-03-03');
    expect(iterator.next().done).toBe(true);
  });
});

describe('classifyDebt', () => {
  const thresholds = DEFAULT_SLEEP_DEBT_OPTIONS.thresholds;

  it('puts both boundaries in Moderate', () => {
    expect(classifyDebt(0, thresholds)).toBe('None');
    expect(classifyDebt(0.01, thresholds)).toBe('Low');
    expect(classifyDebt(1.99, thresholds)).toBe('Low');
    expect(classifyDebt(2, thresholds)).toBe('Moderate');
    expect(classifyDebt(5, thresholds)).toBe('Moderate');
    expect(classifyDebt(5.01, thresholds)).toBe('High');
  });
});

describe('recoveryPlan', () => {
  function result(debtHours: number, recoveryDays: number): SleepDebtResult {
    return createSleepDebtResult({
      date: AS_OF,
      debtHours,
      category: classifyDebt(debtHours, DEFAULT_SLEEP_DEBT_OPTIONS.thresholds),
      sleepNeedHours: 8,
      avgSleepHours: 6,
      dataPoints: 1,
      recoveryDays,
      dailyDeficits: [120],
    });
  }

  it('spreads the debt over the recovery days', () => {
    expect(recoveryPlan(result(2, 7))).toEqual({ days: 7, extraHoursPerNight: 0.29, suggestedNightlyHours: 8.29 });
  });

  it('suggests the plain need when there is no debt', () => {
    expect(recoveryPlan(result(0, 0))).toEqual({ days: 0, extraHoursPerNight: 0, suggestedNightlyHours: 8 });
  });
});

describe('withDebtChange', () => {
  it('adds the day-over-day change', () => {
    const base = {
      category: 'Low' as const,
      sleepNeedHours: 8,
      avgSleepHours: 7,
      dataPoints: 1,
      recoveryDays: 4,
      dailyDeficits: [60],
    };
    const points = withDebtChange([
      createSleepDebtResult({ ...base, date: '2024-03-01', debtHours: 1 }),
      createSleepDebtResult({ ...base, date: '2024-03-02', debtHours: 1.5 }),
      createSleepDebtResult({ ...base, date: '2024-03-03', debtHours: 1.25 }),
    ]);

    expect(points.map((p) => p.debtChangeHours)).toEqual([null, 0.5, -0.25]);
  });
});
