import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { SleepRecord } from '../../ports/SleepDataPort.js';
import { parseSleepRecord } from '../../adapters/sleep/sleepRecordParser.js';

type SleepRecordRow = {
  user_id: string;
  date: string;
  minutes_asleep: number;
  minutes_awake: number;
  efficiency_pct: number;
  deep_minutes: number;
  light_minutes: number;
  rem_minutes: number;
  wake_minutes: number;
  hrv_ms: number | null;
};

function rowToRecord(row: SleepRecordRow): SleepRecord {
  const record: {
    date: string;
    minutesAsleep: number;
    minutesAwake: number;
    efficiencyPct: number;
    stageMinutes: SleepRecord['stageMinutes'];
    hrvMs?: number;
  } = {
    date: row.date,
    minutesAsleep: row.minutes_asleep,
    minutesAwake: row.minutes_awake,
    efficiencyPct: row.efficiency_pct,
    stageMinutes: {
      deep: row.deep_minutes,
      light: row.light_minutes,
      rem: row.rem_minutes,
      wake: row.wake_minutes,
    },
  };
  if (row.hrv_ms != null) record.hrvMs = row.hrv_ms;
  return record;
}

export class SleepRecordRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Validate and store one night, replacing any earlier record for that date. */
  upsert(userId: string, input: unknown): SleepRecord {
    const record = parseSleepRecord(input);
    this.db
      .prepare(
        `INSERT INTO sleep_records (
           user_id, date, minutes_asleep, minutes_awake, efficiency_pct,
           deep_minutes, light_minutes, rem_minutes, wake_minutes, hrv_ms
         ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(user_id, date) DO UPDATE SET
           minutes_asleep = excluded.minutes_asleep,
           minutes_awake = excluded.minutes_awake,
           efficiency_pct = excluded.efficiency_pct,
           deep_minutes = excluded.deep_minutes,
           light_minutes = excluded.light_minutes,
           rem_minutes = excluded.rem_minutes,
           wake_minutes = excluded.wake_minutes,
           hrv_ms = excluded.hrv_ms`
      )
      .run(
        userId,
        record.date,
        record.minutesAsleep,
        record.minutesAwake,
        record.efficiencyPct,
        record.stageMinutes.deep,
        record.stageMinutes.light,
        record.stageMinutes.rem,
        record.stageMinutes.wake,
        record.hrvMs ?? null
      );
    return record;
  }

  /** Store a batch in one transaction; nothing is written if any record is invalid. */
  upsertMany(userId: string, inputs: readonly unknown[]): SleepRecord[] {
    const insertAll = this.db.transaction((items: readonly unknown[]) => items.map((item) => this.upsert(userId, item)));
    return insertAll(inputs);
  }

  getRange(userId: string, startDate: string, endDate: string): SleepRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM sleep_records
         WHERE user_id = ? AND date >= ? AND date <= ? ORDER BY date ASC`
      )
      .all(userId, startDate, endDate) as SleepRecordRow[];
    return rows.map(rowToRecord);
  }

  getLatestDate(userId: string): string | null {
    const row = this.db
      .prepare('SELECT MAX(date) AS latest FROM sleep_records WHERE user_id = ?')
      .get(userId) as { latest: string | null } | undefined;
    return row?.latest ?? null;
  }

  count(userId: string): number {
    const row = this.db
      .prepare('SELECT COUNT(*) AS total FROM sleep_records WHERE user_id = ?')
      .get(userId) as { total: number };
    return row.total;
  }

  delete(userId: string, date: string): boolean {
    const result = this.db.prepare('DELETE FROM sleep_records WHERE user_id = ? AND date = ?').run(userId, date);
    return result.changes > 0;
  }
}
