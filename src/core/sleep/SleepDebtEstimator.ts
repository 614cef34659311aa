import type { SleepRecord } from '../../ports/SleepDataPort.js';
import { ConfigError, InsufficientDataError, OutOfRangeError } from '../../utils/errors.js';
import { addDays, eachDay, isIsoDate } from '../../utils/dates.js';
import { mean, robustCenter, roundTo } from '../baseline/statistics.js';
import { linearWeighting, type WeightingStrategy } from './weighting.js';
import {
  createSleepDebtResult,
  createSleepNeedEstimate,
  type DebtCategory,
  type SleepDebtResult,
  type SleepNeedEstimate,
} from './types.js';

export interface DebtThresholds {
  /** Debt below this (and above zero) is Low. */
  moderateFromHours: number;
  /** Debt above this is High; the bound itself is still Moderate. */
  highAboveHours: number;
}

export interface SleepDebtOptions {
  lookbackDays: number;
  windowDays: number;
  minNeedSamples: number;
  minWindowNights: number;
  weighting: WeightingStrategy;
  thresholds: DebtThresholds;
  recoveryRateHoursPerDay: number;
  needRangeMinutes: readonly [number, number];
}

export const DEFAULT_SLEEP_DEBT_OPTIONS: Readonly<SleepDebtOptions> = {
  lookbackDays: 90,
  windowDays: 14,
  minNeedSamples: 5,
  minWindowNights: 5,
  weighting: linearWeighting(),
  thresholds: { moderateFromHours: 2, highAboveHours: 5 },
  recoveryRateHoursPerDay: 0.3,
  needRangeMinutes: [360, 600],
};

export interface SleepDebtTrendPoint extends SleepDebtResult {
  /** Change from the previous emitted day; null for the first. */
  debtChangeHours: number | null;
}

export interface RecoveryPlan {
  days: number;
  extraHoursPerNight: number;
  suggestedNightlyHours: number;
}

export function classifyDebt(debtHours: number, thresholds: DebtThresholds): DebtCategory {
  if (debtHours === 0) return 'None';
  if (debtHours < thresholds.moderateFromHours) return 'Low';
  if (debtHours <= thresholds.highAboveHours) return 'Moderate';
  return 'High';
}

function validateOptions(options: SleepDebtOptions): void {
  const counts: Array<[string, number]> = [
    ['lookbackDays', options.lookbackDays],
    ['windowDays', options.windowDays],
    ['minNeedSamples', options.minNeedSamples],
    ['minWindowNights', options.minWindowNights],
  ];
  for (const [name, value] of counts) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${name} must be a positive integer, got ${value}`);
    }
  }
  if (!(options.recoveryRateHoursPerDay > 0)) {
    throw new ConfigError(`recoveryRateHoursPerDay must be positive, got ${options.recoveryRateHoursPerDay}`);
  }
  const { moderateFromHours, highAboveHours } = options.thresholds;
  if (!(moderateFromHours > 0 && highAboveHours >= moderateFromHours)) {
    throw new ConfigError(`Invalid debt thresholds: ${moderateFromHours}/${highAboveHours}`);
  }
  const [low, high] = options.needRangeMinutes;
  if (!(low > 0 && high > low)) {
    throw new ConfigError(`Invalid sleep need range: [${low}, ${high}]`);
  }
}

function requireDate(field: string, value: string): void {
  if (!isIsoDate(value)) {
    throw new OutOfRangeError(field, value, 'must be an ISO calendar date (YYYY-MM-DD)');
  }
}

function nightsBetween(history: readonly SleepRecord[], start: string, end: string): SleepRecord[] {
  return history
    .filter((record) => record.date >= start && record.date <= end)
    .sort((a, b) => a.date.localeCompare(b.date));
}

/**
 * Personal sleep need from a long lookback, and a recency-weighted deficit
 * against it over a short trailing window. Stateless: every call recomputes
 * from the history it is given.
 */
export class SleepDebtEstimator {
  readonly options: Readonly<SleepDebtOptions>;

  constructor(options: Partial<SleepDebtOptions> = {}) {
    const merged: SleepDebtOptions = { ...DEFAULT_SLEEP_DEBT_OPTIONS, ...options };
    validateOptions(merged);
    this.options = Object.freeze(merged);
  }

  estimateSleepNeed(
    history: readonly SleepRecord[],
    asOfDate: string,
    lookbackDays: number = this.options.lookbackDays
  ): SleepNeedEstimate {
    requireDate('asOfDate', asOfDate);
    const nights = nightsBetween(history, addDays(asOfDate, -lookbackDays), asOfDate);
    if (nights.length < this.options.minNeedSamples) {
      throw new InsufficientDataError('sleep need lookback', this.options.minNeedSamples, nights.length);
    }

    const [low, high] = this.options.needRangeMinutes;
    const { center, usedCount } = robustCenter(
      nights.map((n) => n.minutesAsleep),
      low,
      high
    );

    return createSleepNeedEstimate({
      valueMinutes: center,
      validRange: this.options.needRangeMinutes,
      sampleSize: usedCount,
    });
  }

  estimateDebt(
    history: readonly SleepRecord[],
    asOfDate: string,
    windowDays: number = this.options.windowDays
  ): SleepDebtResult {
    const need = this.estimateSleepNeed(history, asOfDate);
    return this.estimateDebtWithNeed(history, asOfDate, need, windowDays);
  }

  /** The window step alone, against a need the caller already holds. */
  estimateDebtWithNeed(
    history: readonly SleepRecord[],
    asOfDate: string,
    need: SleepNeedEstimate,
    windowDays: number = this.options.windowDays
  ): SleepDebtResult {
    requireDate('asOfDate', asOfDate);
    const nights = nightsBetween(history, addDays(asOfDate, -(windowDays - 1)), asOfDate);
    const n = nights.length;
    if (n < this.options.minWindowNights) {
      throw new InsufficientDataError('sleep debt window', this.options.minWindowNights, n);
    }

    const slept = nights.map((night) => night.minutesAsleep);
    const deficits = slept.map((minutes) => need.valueMinutes - minutes);
    const weights = this.options.weighting.weights(n);
    if (weights.length !== n) {
      throw new ConfigError(
        `Weighting '${this.options.weighting.name}' returned ${weights.length} weights for ${n} nights`
      );
    }

    let weightedSum = 0;
    let weightTotal = 0;
    for (let i = 0; i < n; i++) {
      weightedSum += deficits[i] * weights[i];
      weightTotal += weights[i];
    }

    // Surplus nights pay debt down but never below zero
    const debtMinutes = Math.max(0, weightedSum / weightTotal);
    const debtHours = roundTo(debtMinutes / 60, 2);

    return createSleepDebtResult({
      date: asOfDate,
      debtHours,
      category: classifyDebt(debtHours, this.options.thresholds),
      sleepNeedHours: roundTo(need.valueMinutes / 60, 2),
      avgSleepHours: roundTo(mean(slept) / 60, 2),
      dataPoints: n,
      recoveryDays: this.recoveryDays(debtHours),
      dailyDeficits: deficits,
    });
  }

  /**
   * One result per calendar day in [startDate, endDate], each anchored on its
   * own day. Days without enough data are skipped.
   */
  *debtHistory(history: readonly SleepRecord[], startDate: string, endDate: string): Generator<SleepDebtResult> {
    requireDate('startDate', startDate);
    requireDate('endDate', endDate);
    const sorted = [...history].sort((a, b) => a.date.localeCompare(b.date));

    for (const day of eachDay(startDate, endDate)) {
      let result: SleepDebtResult;
      try {
        result = this.estimateDebt(sorted, day);
      } catch (error) {
        if (error instanceof InsufficientDataError) continue;
        throw error;
      }
      yield result;
    }
  }

  recoveryDays(debtHours: number): number {
    if (debtHours === 0) return 0;
    // Rounded first so 0.9 / 0.3 stays 3 rather than 3.0000000000000004
    return Math.ceil(roundTo(debtHours / this.options.recoveryRateHoursPerDay, 9));
  }
}

export function withDebtChange(results: Iterable<SleepDebtResult>): SleepDebtTrendPoint[] {
  const points: SleepDebtTrendPoint[] = [];
  let previous: SleepDebtResult | undefined;
  for (const result of results) {
    points.push({
      ...result,
      debtChangeHours: previous ? roundTo(result.debtHours - previous.debtHours, 2) : null,
    });
    previous = result;
  }
  return points;
}

/** Nightly target that clears the debt in `recoveryDays` nights. */
export function recoveryPlan(result: SleepDebtResult): RecoveryPlan {
  if (result.debtHours === 0 || result.recoveryDays === 0) {
    return { days: 0, extraHoursPerNight: 0, suggestedNightlyHours: result.sleepNeedHours };
  }
  const extra = result.debtHours / result.recoveryDays;
  return {
    days: result.recoveryDays,
    extraHoursPerNight: roundTo(extra, 2),
    suggestedNightlyHours: roundTo(result.sleepNeedHours + extra, 2),
  };
}
