import type { SleepRecord } from '../ports/SleepDataPort.js';
import type { HeartRateSample } from '../ports/HeartRatePort.js';
import { addDays } from '../utils/dates.js';

export function night(date: string, minutesAsleep: number, overrides: Partial<SleepRecord> = {}): SleepRecord {
  return {
    date,
    minutesAsleep,
    minutesAwake: 30,
    efficiencyPct: 90,
    stageMinutes: { deep: 0, light: minutesAsleep, rem: 0, wake: 30 },
    ...overrides,
  };
}

/** Consecutive nights ending on `endDate`, one per entry of `minutes`. */
export function nightsEnding(endDate: string, minutes: readonly number[]): SleepRecord[] {
  return minutes.map((m, i) => night(addDays(endDate, i - (minutes.length - 1)), m));
}

export function repeat(value: number, times: number): number[] {
  return Array.from({ length: times }, () => value);
}

export function sample(iso: string, bpm: number, overrides: Partial<HeartRateSample> = {}): HeartRateSample {
  return {
    timestamp: new Date(iso),
    bpm,
    signalConfidence: 'high',
    motionLevel: 'still',
    ...overrides,
  };
}

/** `mesor + amplitude·sin(2πt/24)` at every hour of the day. */
export function sinusoid(mesor: number, amplitude: number): number[] {
  return Array.from({ length: 24 }, (_, t) => mesor + amplitude * Math.sin((2 * Math.PI * t) / 24));
}
