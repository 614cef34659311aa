import { ConfigError, InsufficientDataError, OutOfRangeError } from '../../utils/errors.js';
import {
  DAY_HOURS,
  componentPeakHour,
  cosinorModel,
  evaluateHarmonics,
  twoHarmonicModel,
  type HarmonicComponent,
  type HarmonicModel,
  type HourlyPoint,
} from './harmonicModels.js';

export type HarmonicCount = 1 | 2;

/** 24 hourly means indexed by hour of day; null, undefined or NaN marks a missing hour. */
export type HourlyMeans = ReadonlyArray<number | null | undefined>;

export interface CircadianComponent extends HarmonicComponent {
  /** Hour within the component's period at which it peaks. */
  peakHour: number;
  /** Share of the total variance this component explains, 0..1. */
  varianceShare: number;
}

export interface CircadianFitResult {
  harmonics: HarmonicCount;
  /** Rhythm-adjusted 24 h mean, bpm. */
  mesor: number;
  components: CircadianComponent[];
  /** √(A₁² + A₂²) */
  combinedAmplitude: number;
  /** Hour of day of the fitted minimum. */
  bathyphase: number;
  /** Hour of day of the fitted maximum. */
  acrophase: number;
  rSquared: number;
  hoursUsed: number[];
  /** Fitted curve at hours 0..23. */
  curve: number[];
  iterations: number;
}

export interface CircadianOptions {
  /** Half a day of populated hours by default. */
  minPopulatedBins: number;
  models: Readonly<Record<HarmonicCount, HarmonicModel>>;
}

export const DEFAULT_CIRCADIAN_OPTIONS: Readonly<CircadianOptions> = {
  minPopulatedBins: 12,
  models: { 1: cosinorModel, 2: twoHarmonicModel },
};

function coefficientOfDetermination(points: readonly HourlyPoint[], predict: (hour: number) => number): number {
  const meanBpm = points.reduce((sum, p) => sum + p.bpm, 0) / points.length;
  let ssTotal = 0;
  let ssResidual = 0;
  for (const p of points) {
    ssTotal += (p.bpm - meanBpm) ** 2;
    ssResidual += (p.bpm - predict(p.hour)) ** 2;
  }
  if (ssTotal === 0) return 1;
  return 1 - ssResidual / ssTotal;
}

function argExtreme(values: readonly number[], better: (candidate: number, best: number) => boolean): number {
  let index = 0;
  for (let i = 1; i < values.length; i++) {
    if (better(values[i], values[index])) index = i;
  }
  return index;
}

/**
 * Harmonic regression of hourly heart-rate means. Missing hours are left out
 * of the fit, never imputed.
 */
export class CircadianRhythmFitter {
  readonly options: Readonly<CircadianOptions>;

  constructor(options: Partial<CircadianOptions> = {}) {
    const merged: CircadianOptions = { ...DEFAULT_CIRCADIAN_OPTIONS, ...options };
    if (!Number.isInteger(merged.minPopulatedBins) || merged.minPopulatedBins < 1 || merged.minPopulatedBins > DAY_HOURS) {
      throw new ConfigError(`minPopulatedBins must be an integer in [1, ${DAY_HOURS}], got ${merged.minPopulatedBins}`);
    }
    this.options = Object.freeze(merged);
  }

  fit(hourlyMeans: HourlyMeans, harmonics: HarmonicCount = 2): CircadianFitResult {
    const points = this.toPoints(hourlyMeans);
    const model = this.options.models[harmonics];

    if (points.length < this.options.minPopulatedBins) {
      throw new InsufficientDataError('circadian hourly bins', this.options.minPopulatedBins, points.length);
    }
    if (points.length < model.parameterCount) {
      throw new InsufficientDataError(`${harmonics}-harmonic fit`, model.parameterCount, points.length);
    }

    const fitted = model.fit(points);
    const predict = (hour: number) => evaluateHarmonics(fitted.mesor, fitted.components, hour);
    const curve = Array.from({ length: DAY_HOURS }, (_, hour) => predict(hour));
    const rSquared = coefficientOfDetermination(points, predict);

    const shares = this.varianceShares(points, harmonics, rSquared);

    return createCircadianFitResult({
      harmonics,
      mesor: fitted.mesor,
      components: fitted.components.map((component, i) => ({
        ...component,
        peakHour: componentPeakHour(component),
        varianceShare: shares[i] ?? 0,
      })),
      combinedAmplitude: Math.sqrt(fitted.components.reduce((sum, c) => sum + c.amplitude ** 2, 0)),
      bathyphase: argExtreme(curve, (candidate, best) => candidate < best),
      acrophase: argExtreme(curve, (candidate, best) => candidate > best),
      rSquared,
      hoursUsed: points.map((p) => p.hour),
      curve,
      iterations: fitted.iterations,
    });
  }

  private toPoints(hourlyMeans: HourlyMeans): HourlyPoint[] {
    if (hourlyMeans.length !== DAY_HOURS) {
      throw new OutOfRangeError('hourlyMeans', hourlyMeans.length, `must have ${DAY_HOURS} entries`);
    }
    const points: HourlyPoint[] = [];
    hourlyMeans.forEach((value, hour) => {
      if (value === null || value === undefined || Number.isNaN(value)) return;
      if (!Number.isFinite(value) || value <= 0) {
        throw new OutOfRangeError(`hourlyMeans[${hour}]`, value, 'must be a positive heart rate');
      }
      points.push({ hour, bpm: value });
    });
    return points;
  }

  /**
   * For one harmonic the whole R². For two, the first harmonic's share comes
   * from a separate single-harmonic fit and the second takes the remainder.
   */
  private varianceShares(points: readonly HourlyPoint[], harmonics: HarmonicCount, rSquared: number): number[] {
    if (harmonics === 1) return [rSquared];
    const first = this.options.models[1].fit(points);
    const firstShare = coefficientOfDetermination(points, (hour) =>
      evaluateHarmonics(first.mesor, first.components, hour)
    );
    return [firstShare, Math.max(0, rSquared - firstShare)];
  }
}

export function createCircadianFitResult(fields: CircadianFitResult): CircadianFitResult {
  for (const [name, hour] of [
    ['bathyphase', fields.bathyphase],
    ['acrophase', fields.acrophase],
  ] as const) {
    if (!Number.isFinite(hour) || hour < 0 || hour >= DAY_HOURS) {
      throw new OutOfRangeError(`circadian.${name}`, hour, `must lie in [0, ${DAY_HOURS})`);
    }
  }
  if (!Number.isFinite(fields.mesor) || !Number.isFinite(fields.rSquared)) {
    throw new OutOfRangeError('circadian.mesor', fields.mesor, 'fit produced non-finite values');
  }
  for (const component of fields.components) {
    if (!(component.amplitude >= 0) || component.peakHour < 0 || component.peakHour >= component.periodHours) {
      throw new OutOfRangeError('circadian.components', component, 'amplitude or peak hour out of range');
    }
  }
  if (fields.components.length !== fields.harmonics) {
    throw new OutOfRangeError('circadian.components', fields.components.length, 'must match the harmonic count');
  }
  return Object.freeze({ ...fields });
}
