import { z } from 'zod';
import {
  MOTION_LEVELS,
  SIGNAL_CONFIDENCE_LEVELS,
  type HeartRateSample,
  type TimeInterval,
} from '../../ports/HeartRatePort.js';
import { parseOrThrow } from '../../utils/validation.js';

const MAX_PLAUSIBLE_BPM = 250;

const heartRateSampleSchema = z.object({
  timestamp: z.coerce.date(),
  bpm: z.number().positive().max(MAX_PLAUSIBLE_BPM),
  signalConfidence: z.enum(SIGNAL_CONFIDENCE_LEVELS),
  motionLevel: z.enum(MOTION_LEVELS),
});

const timeIntervalSchema = z
  .object({
    start: z.coerce.date(),
    end: z.coerce.date(),
  })
  .refine((interval) => interval.end.getTime() > interval.start.getTime(), {
    message: 'end must be after start',
    path: ['end'],
  });

export function parseHeartRateSample(input: unknown): HeartRateSample {
  return parseOrThrow(heartRateSampleSchema, input, 'heartRateSample');
}

export function parseTimeInterval(input: unknown): TimeInterval {
  return parseOrThrow(timeIntervalSchema, input, 'timeInterval');
}
