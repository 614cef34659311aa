import {
  MOTION_LEVELS,
  SIGNAL_CONFIDENCE_LEVELS,
  type HeartRateSample,
  type MotionLevel,
  type SignalConfidence,
  type TimeInterval,
} from '../../ports/HeartRatePort.js';
import { DAY_HOURS } from './harmonicModels.js';

export interface HourlyMeansOptions {
  /** Lowest confidence tier kept. */
  minConfidence: SignalConfidence;
  /** Highest motion level kept. */
  maxMotion: MotionLevel;
  /** Fixed offset from UTC used to assign hours of day. */
  timezoneOffsetMinutes: number;
  /** Further exclusions such as logged workouts, half-open like sleep intervals. */
  activityIntervals: readonly TimeInterval[];
}

export const DEFAULT_HOURLY_MEANS_OPTIONS: Readonly<HourlyMeansOptions> = {
  minConfidence: 'high',
  maxMotion: 'still',
  timezoneOffsetMinutes: 0,
  activityIntervals: [],
};

export interface HourlyMeansSummary {
  means: Array<number | null>;
  /** Samples that fell into each hour. */
  counts: number[];
  kept: number;
  dropped: number;
}

function insideAny(ms: number, intervals: readonly TimeInterval[]): boolean {
  return intervals.some((interval) => ms >= interval.start.getTime() && ms < interval.end.getTime());
}

/** Fractional local clock hour in [0, 24) at a fixed UTC offset. */
export function clockHour(timestamp: Date, timezoneOffsetMinutes: number): number {
  const minuteOfDay = timestamp.getTime() / 60_000 + timezoneOffsetMinutes;
  const wrapped = ((minuteOfDay % 1440) + 1440) % 1440;
  return wrapped / 60;
}

export function hourOfDay(timestamp: Date, timezoneOffsetMinutes: number): number {
  return Math.min(DAY_HOURS - 1, Math.floor(clockHour(timestamp, timezoneOffsetMinutes)));
}

/**
 * Average awake, resting, high-quality heart-rate samples by hour of day.
 * Hours with no qualifying sample come back as null.
 */
export function summarizeHourlyMeans(
  samples: readonly HeartRateSample[],
  sleepIntervals: readonly TimeInterval[],
  options: Partial<HourlyMeansOptions> = {}
): HourlyMeansSummary {
  const { minConfidence, maxMotion, timezoneOffsetMinutes, activityIntervals } = {
    ...DEFAULT_HOURLY_MEANS_OPTIONS,
    ...options,
  };
  const minConfidenceRank = SIGNAL_CONFIDENCE_LEVELS.indexOf(minConfidence);
  const maxMotionRank = MOTION_LEVELS.indexOf(maxMotion);

  const sums = new Array<number>(DAY_HOURS).fill(0);
  const counts = new Array<number>(DAY_HOURS).fill(0);
  let kept = 0;

  for (const sample of samples) {
    if (SIGNAL_CONFIDENCE_LEVELS.indexOf(sample.signalConfidence) < minConfidenceRank) continue;
    if (MOTION_LEVELS.indexOf(sample.motionLevel) > maxMotionRank) continue;
    const ms = sample.timestamp.getTime();
    if (insideAny(ms, sleepIntervals) || insideAny(ms, activityIntervals)) continue;

    const hour = hourOfDay(sample.timestamp, timezoneOffsetMinutes);
    sums[hour] += sample.bpm;
    counts[hour] += 1;
    kept++;
  }

  return {
    means: sums.map((sum, hour) => (counts[hour] > 0 ? sum / counts[hour] : null)),
    counts,
    kept,
    dropped: samples.length - kept,
  };
}

export function buildHourlyMeans(
  samples: readonly HeartRateSample[],
  sleepIntervals: readonly TimeInterval[],
  options: Partial<HourlyMeansOptions> = {}
): Array<number | null> {
  return summarizeHourlyMeans(samples, sleepIntervals, options).means;
}
