import { OutOfRangeError } from '../../utils/errors.js';

export const DEBT_CATEGORIES = ['None', 'Low', 'Moderate', 'High'] as const;
export type DebtCategory = (typeof DEBT_CATEGORIES)[number];

export interface SleepNeedEstimate {
  valueMinutes: number;
  validRange: readonly [number, number];
  /** Nights left after outlier rejection. */
  sampleSize: number;
}

export interface SleepDebtResult {
  date: string;
  debtHours: number;
  category: DebtCategory;
  sleepNeedHours: number;
  avgSleepHours: number;
  dataPoints: number;
  recoveryDays: number;
  /** Need minus sleep per night in minutes, oldest first. Negative means surplus. */
  dailyDeficits: number[];
}

function requireFinite(field: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new OutOfRangeError(field, value, 'must be a finite number');
  }
}

function requireCount(field: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new OutOfRangeError(field, value, `must be an integer >= ${min}`);
  }
}

export function createSleepNeedEstimate(fields: SleepNeedEstimate): SleepNeedEstimate {
  const [low, high] = fields.validRange;
  requireFinite('sleepNeed.valueMinutes', fields.valueMinutes);
  if (fields.valueMinutes < low || fields.valueMinutes > high) {
    throw new OutOfRangeError('sleepNeed.valueMinutes', fields.valueMinutes, `must lie in [${low}, ${high}]`);
  }
  requireCount('sleepNeed.sampleSize', fields.sampleSize, 1);
  return Object.freeze({ ...fields });
}

export function createSleepDebtResult(fields: SleepDebtResult): SleepDebtResult {
  requireFinite('sleepDebt.debtHours', fields.debtHours);
  if (fields.debtHours < 0) {
    throw new OutOfRangeError('sleepDebt.debtHours', fields.debtHours, 'must not be negative');
  }
  if (!DEBT_CATEGORIES.includes(fields.category)) {
    throw new OutOfRangeError('sleepDebt.category', fields.category, 'unknown category');
  }
  requireFinite('sleepDebt.sleepNeedHours', fields.sleepNeedHours);
  requireFinite('sleepDebt.avgSleepHours', fields.avgSleepHours);
  requireCount('sleepDebt.dataPoints', fields.dataPoints, 1);
  requireCount('sleepDebt.recoveryDays', fields.recoveryDays, 0);
  if (fields.dailyDeficits.length !== fields.dataPoints) {
    throw new OutOfRangeError('sleepDebt.dailyDeficits', fields.dailyDeficits.length, 'must have one entry per night');
  }
  return Object.freeze({ ...fields, dailyDeficits: [...fields.dailyDeficits] });
}
