import type { SleepRecord } from '../../ports/SleepDataPort.js';
import { dayOfWeek } from '../../utils/dates.js';
import { quantile } from '../baseline/statistics.js';

/**
 * Nights that ended on a Saturday or Sunday. When `alarmFreeDates` is given,
 * only those dates are kept.
 */
export function selectWeekendNights(
  records: readonly SleepRecord[],
  alarmFreeDates?: ReadonlySet<string>
): SleepRecord[] {
  return records.filter((record) => {
    const day = dayOfWeek(record.date);
    if (day !== 0 && day !== 6) return false;
    return alarmFreeDates ? alarmFreeDates.has(record.date) : true;
  });
}

/**
 * Nights whose metric is at or above the given quantile of that metric.
 * Nights where the accessor yields undefined are ignored.
 */
export function selectTopQuantileNights(
  records: readonly SleepRecord[],
  accessor: (record: SleepRecord) => number | undefined,
  q: number
): SleepRecord[] {
  const measured = records.flatMap((record) => {
    const value = accessor(record);
    return value === undefined || !Number.isFinite(value) ? [] : [{ record, value }];
  });
  if (measured.length === 0) return [];

  const threshold = quantile(
    measured.map((m) => m.value),
    q
  );
  return measured.filter((m) => m.value >= threshold).map((m) => m.record);
}
