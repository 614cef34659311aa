export const SIGNAL_CONFIDENCE_LEVELS = ['low', 'medium', 'high'] as const;
export type SignalConfidence = (typeof SIGNAL_CONFIDENCE_LEVELS)[number];

export const MOTION_LEVELS = ['still', 'light', 'moderate', 'active'] as const;
export type MotionLevel = (typeof MOTION_LEVELS)[number];

export interface HeartRateSample {
  readonly timestamp: Date;
  readonly bpm: number;
  readonly signalConfidence: SignalConfidence;
  readonly motionLevel: MotionLevel;
}

/** Half-open [start, end). */
export interface TimeInterval {
  readonly start: Date;
  readonly end: Date;
}

export interface HeartRatePort {
  getSamples(userId: string, from: Date, to: Date): Promise<HeartRateSample[]>;
  getSleepIntervals(userId: string, from: Date, to: Date): Promise<TimeInterval[]>;
}
