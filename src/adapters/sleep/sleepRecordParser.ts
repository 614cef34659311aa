import { z } from 'zod';
import type { SleepRecord } from '../../ports/SleepDataPort.js';
import { OutOfRangeError } from '../../utils/errors.js';
import { isIsoDate } from '../../utils/dates.js';
import { parseOrThrow } from '../../utils/validation.js';

const minutes = z.number().finite().nonnegative();

const sleepRecordSchema = z
  .object({
    date: z.string().refine(isIsoDate, 'must be an ISO calendar date (YYYY-MM-DD)'),
    minutesAsleep: z.number().int().nonnegative(),
    minutesAwake: minutes,
    efficiencyPct: z.number().min(0).max(100),
    stageMinutes: z.object({
      deep: minutes,
      light: minutes,
      rem: minutes,
      wake: minutes,
    }),
    hrvMs: z.number().finite().positive().optional(),
  })
  .superRefine((record, ctx) => {
    const { deep, light, rem, wake } = record.stageMinutes;
    const staged = deep + light + rem + wake;
    if (staged > record.minutesAsleep + record.minutesAwake) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['stageMinutes'],
        message: `stage minutes (${staged}) exceed asleep + awake (${record.minutesAsleep + record.minutesAwake})`,
      });
    }
  });

/**
 * Validate one night at ingestion. Implausible values are rejected, never clamped.
 */
export function parseSleepRecord(input: unknown): SleepRecord {
  return parseOrThrow(sleepRecordSchema, input, 'sleepRecord');
}

/**
 * Validate a batch and return it sorted by date. Dates are the record key, so a
 * repeated date is rejected.
 */
export function parseSleepRecords(inputs: readonly unknown[]): SleepRecord[] {
  const records = inputs.map(parseSleepRecord);
  records.sort((a, b) => a.date.localeCompare(b.date));
  for (let i = 1; i < records.length; i++) {
    const date = records[i].date;
    if (date === records[i - 1].date) {
      throw new OutOfRangeError('sleepRecord.date', date, 'duplicate night');
    }
  }
  return records;
}
