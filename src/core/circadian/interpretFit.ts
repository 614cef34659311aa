import type { CircadianFitResult } from './CircadianRhythmFitter.js';
import { DAY_HOURS } from './harmonicModels.js';

export type AmplitudeStatus = 'low' | 'typical' | 'high';
export type FitQuality = 'excellent' | 'good' | 'poor';

export interface CircadianInterpretation {
  amplitudeStatus: AmplitudeStatus;
  fitQuality: FitQuality;
  /** A₂/A₁; null for single-harmonic fits or a flat first harmonic. */
  ultradianRatio: number | null;
  ultradianDominant: boolean;
  /** Hours from the heart-rate minimum to the habitual wake time. */
  bathyphaseToWakeHours: number | null;
  /** Hours from the heart-rate maximum to the habitual bedtime. */
  acrophaseToBedHours: number | null;
}

export interface InterpretOptions {
  wakeHour?: number;
  bedHour?: number;
  /** Reference band for the combined amplitude in bpm. */
  amplitudeBand?: readonly [number, number];
}

const DEFAULT_AMPLITUDE_BAND: readonly [number, number] = [5, 10];

/** `7.5` → `"07:30"`. */
export function formatClockTime(hour: number): string {
  const totalMinutes = Math.floor((((hour % DAY_HOURS) + DAY_HOURS) % DAY_HOURS) * 60);
  const h = Math.floor(totalMinutes / 60);
  const m = totalMinutes % 60;
  return `${String(h).padStart(2, '0')}:${String(m).padStart(2, '0')}`;
}

/** Mean hour of day on the 24 h circle, so 23:00 and 01:00 average to 00:00. Null for no input. */
export function circularMeanHour(hours: readonly number[]): number | null {
  if (hours.length === 0) return null;
  let x = 0;
  let y = 0;
  for (const hour of hours) {
    const angle = (2 * Math.PI * hour) / DAY_HOURS;
    x += Math.cos(angle);
    y += Math.sin(angle);
  }
  if (Math.hypot(x, y) < 1e-9) return null;
  const mean = (Math.atan2(y, x) * DAY_HOURS) / (2 * Math.PI);
  const wrapped = mean < 0 ? mean + DAY_HOURS : mean;
  return wrapped >= DAY_HOURS ? 0 : wrapped;
}

function hoursUntil(from: number, to: number): number {
  const diff = (to - from) % DAY_HOURS;
  return diff < 0 ? diff + DAY_HOURS : diff;
}

function gradeFit(rSquared: number): FitQuality {
  if (rSquared >= 0.95) return 'excellent';
  if (rSquared >= 0.85) return 'good';
  return 'poor';
}

export function interpretCircadianFit(fit: CircadianFitResult, options: InterpretOptions = {}): CircadianInterpretation {
  const [low, high] = options.amplitudeBand ?? DEFAULT_AMPLITUDE_BAND;
  const amplitude = fit.combinedAmplitude;
  const amplitudeStatus: AmplitudeStatus = amplitude < low ? 'low' : amplitude > high ? 'high' : 'typical';

  const [first, second] = fit.components;
  const ultradianRatio =
    first !== undefined && second !== undefined && first.amplitude > 0 ? second.amplitude / first.amplitude : null;

  return {
    amplitudeStatus,
    fitQuality: gradeFit(fit.rSquared),
    ultradianRatio,
    ultradianDominant: ultradianRatio !== null && ultradianRatio > 1,
    bathyphaseToWakeHours: options.wakeHour === undefined ? null : hoursUntil(fit.bathyphase, options.wakeHour),
    acrophaseToBedHours: options.bedHour === undefined ? null : hoursUntil(fit.acrophase, options.bedHour),
  };
}
