import type { SleepRecord } from '../../ports/SleepDataPort.js';
import { ConfigError, OutOfRangeError } from '../../utils/errors.js';
import { clip, mean, median, robustCenter, roundTo } from '../baseline/statistics.js';

export type Confidence = 'low' | 'medium' | 'high';

export type OsdMethod = 'recommended' | 'weekendFree' | 'highEfficiency' | 'highHrv' | 'habitual';

export interface OsdMethodEstimate {
  method: OsdMethod;
  valueHours: number;
  weight: number;
  confidence: Confidence;
  /** Nights behind the value; 0 for the population prior. */
  sampleSize: number;
  note: string;
}

export type OsdAssessment = 'undersleeping' | 'adequate' | 'oversleeping';

export interface OsdEstimate {
  osdHours: number;
  estimates: Partial<Record<OsdMethod, OsdMethodEstimate>>;
  /** Robust median of the habitual history; null when it was empty. */
  habitualSleepHours: number | null;
  /** OSD minus habitual. Negative when habitual sleep already exceeds the estimate. */
  potentialDebtHours: number | null;
  overallConfidence: Confidence;
  assessment: OsdAssessment | null;
}

/** Pre-filtered night subsets; choosing them is the caller's job. */
export interface OsdEvidence {
  weekendFreeNights?: readonly SleepRecord[];
  highEfficiencyNights?: readonly SleepRecord[];
  highHrvNights?: readonly SleepRecord[];
}

export interface OsdWeights {
  recommended: number;
  weekendFree: number;
  highEfficiency: number;
  highHrv: number;
  habitualInRange: number;
  habitualOutOfRange: number;
}

export interface OsdOptions {
  recommendedHours: number;
  validRangeHours: readonly [number, number];
  weights: OsdWeights;
  minWeekendFreeNights: number;
  minHighEfficiencyNights: number;
  minHighHrvNights: number;
  /** Gap between OSD and habitual sleep that counts as under- or oversleeping. */
  assessmentMarginHours: number;
  /** Habitual history shorter than this keeps overall confidence low. */
  minNightsForConfidence: number;
}

export const DEFAULT_OSD_OPTIONS: Readonly<OsdOptions> = {
  recommendedHours: 8.0,
  validRangeHours: [7.0, 9.0],
  weights: {
    recommended: 4.0,
    weekendFree: 3.0,
    highEfficiency: 2.0,
    highHrv: 1.0,
    habitualInRange: 2.0,
    habitualOutOfRange: 0.5,
  },
  minWeekendFreeNights: 3,
  minHighEfficiencyNights: 5,
  minHighHrvNights: 10,
  assessmentMarginHours: 0.5,
  minNightsForConfidence: 30,
};

function hoursOf(nights: readonly SleepRecord[]): number[] {
  return nights.map((night) => night.minutesAsleep / 60);
}

function confidenceForSample(size: number): Confidence {
  if (size >= 10) return 'high';
  if (size >= 5) return 'medium';
  return 'low';
}

/**
 * Individual optimal sleep duration as a weighted fusion of a population prior
 * and whatever behavioural evidence the caller supplies. Every estimate that
 * contributes is returned alongside the fused value.
 */
export class OptimalSleepEstimator {
  readonly options: Readonly<OsdOptions>;

  constructor(options: Partial<OsdOptions> = {}) {
    const merged: OsdOptions = { ...DEFAULT_OSD_OPTIONS, ...options };
    const [low, high] = merged.validRangeHours;
    if (!(low > 0 && high >= low)) {
      throw new ConfigError(`Invalid OSD range: [${low}, ${high}]`);
    }
    for (const [name, weight] of Object.entries(merged.weights)) {
      if (!(weight > 0)) {
        throw new ConfigError(`OSD weight '${name}' must be positive, got ${weight}`);
      }
    }
    this.options = Object.freeze(merged);
  }

  estimate(habitualHistory: readonly SleepRecord[], evidence: OsdEvidence = {}): OsdEstimate {
    const { weights, validRangeHours } = this.options;
    const [rangeLow, rangeHigh] = validRangeHours;
    const included: OsdMethodEstimate[] = [];

    included.push({
      method: 'recommended',
      valueHours: this.options.recommendedHours,
      weight: weights.recommended,
      confidence: 'high',
      sampleSize: 0,
      note: 'Population guidance for adults.',
    });

    const weekend = evidence.weekendFreeNights ?? [];
    if (weekend.length >= this.options.minWeekendFreeNights) {
      included.push({
        method: 'weekendFree',
        valueHours: mean(hoursOf(weekend)),
        weight: weights.weekendFree,
        confidence: confidenceForSample(weekend.length),
        sampleSize: weekend.length,
        note: 'Mean of weekend nights without an alarm.',
      });
    }

    const efficient = evidence.highEfficiencyNights ?? [];
    if (efficient.length >= this.options.minHighEfficiencyNights) {
      included.push({
        method: 'highEfficiency',
        valueHours: median(hoursOf(efficient)),
        weight: weights.highEfficiency,
        confidence: confidenceForSample(efficient.length),
        sampleSize: efficient.length,
        note: 'Median of high-efficiency nights.',
      });
    }

    const hrv = evidence.highHrvNights ?? [];
    if (hrv.length >= this.options.minHighHrvNights) {
      included.push({
        method: 'highHrv',
        valueHours: median(hoursOf(hrv)),
        weight: weights.highHrv,
        // HRV tracks sleep duration only weakly
        confidence: 'low',
        sampleSize: hrv.length,
        note: 'Median of high-HRV nights; weak correlate of sleep need.',
      });
    }

    let habitualHours: number | null = null;
    if (habitualHistory.length > 0) {
      const { center, usedCount } = robustCenter(
        habitualHistory.map((night) => night.minutesAsleep / 60)
      );
      habitualHours = center;
      const inRange = center >= rangeLow && center <= rangeHigh;
      included.push({
        method: 'habitual',
        valueHours: center,
        weight: inRange ? weights.habitualInRange : weights.habitualOutOfRange,
        confidence: inRange ? 'high' : center > rangeHigh ? 'medium' : 'low',
        sampleSize: usedCount,
        note: inRange
          ? 'Habitual sleep within the recommended range.'
          : center < rangeLow
            ? 'Habitual sleep below the recommended range; possible chronic restriction.'
            : 'Habitual sleep above the recommended range.',
      });
    }

    let weightedSum = 0;
    let weightTotal = 0;
    for (const est of included) {
      weightedSum += est.valueHours * est.weight;
      weightTotal += est.weight;
    }
    const osdHours = roundTo(clip(weightedSum / weightTotal, rangeLow, rangeHigh), 2);

    const estimates: Partial<Record<OsdMethod, OsdMethodEstimate>> = {};
    for (const est of included) {
      estimates[est.method] = { ...est, valueHours: roundTo(est.valueHours, 2) };
    }

    const potentialDebtHours = habitualHours === null ? null : roundTo(osdHours - habitualHours, 2);

    return createOsdEstimate(
      {
        osdHours,
        estimates,
        habitualSleepHours: habitualHours === null ? null : roundTo(habitualHours, 2),
        potentialDebtHours,
        overallConfidence: this.overallConfidence(habitualHistory.length, habitualHours),
        assessment: this.assess(potentialDebtHours),
      },
      validRangeHours
    );
  }

  private overallConfidence(nights: number, habitualHours: number | null): Confidence {
    if (habitualHours === null || nights < this.options.minNightsForConfidence) return 'low';
    return habitualHours >= this.options.validRangeHours[0] ? 'high' : 'medium';
  }

  private assess(potentialDebtHours: number | null): OsdAssessment | null {
    if (potentialDebtHours === null) return null;
    const margin = this.options.assessmentMarginHours;
    if (potentialDebtHours > margin) return 'undersleeping';
    if (potentialDebtHours < -margin) return 'oversleeping';
    return 'adequate';
  }
}

export function createOsdEstimate(fields: OsdEstimate, validRangeHours: readonly [number, number]): OsdEstimate {
  const [low, high] = validRangeHours;
  if (!Number.isFinite(fields.osdHours) || fields.osdHours < low || fields.osdHours > high) {
    throw new OutOfRangeError('osd.osdHours', fields.osdHours, `must lie in [${low}, ${high}]`);
  }
  if (!fields.estimates.recommended) {
    throw new OutOfRangeError('osd.estimates', Object.keys(fields.estimates), 'must include the recommended prior');
  }
  for (const est of Object.values(fields.estimates)) {
    if (!est) continue;
    if (!(est.weight > 0) || !Number.isFinite(est.valueHours)) {
      throw new OutOfRangeError(`osd.estimates.${est.method}`, est, 'needs a finite value and positive weight');
    }
  }
  if ((fields.habitualSleepHours === null) !== (fields.potentialDebtHours === null)) {
    throw new OutOfRangeError('osd.potentialDebtHours', fields.potentialDebtHours, 'must be set exactly when habitual sleep is');
  }
  return Object.freeze({ ...fields, estimates: { ...fields.estimates } });
}
