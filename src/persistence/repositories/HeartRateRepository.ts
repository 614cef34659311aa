import type { Database } from 'better-sqlite3';
import { getDatabase } from '../database.js';
import type { HeartRateSample, TimeInterval } from '../../ports/HeartRatePort.js';
import { parseHeartRateSample, parseTimeInterval } from '../../adapters/heartRate/heartRateParser.js';

type HeartRateRow = {
  timestamp_ms: number;
  bpm: number;
  signal_confidence: string;
  motion_level: string;
};

type SleepIntervalRow = {
  start_ms: number;
  end_ms: number;
};

export class HeartRateRepository {
  private readonly db: Database;

  constructor(db?: Database) {
    this.db = db ?? getDatabase();
  }

  /** Validate and store samples in one transaction. Returns how many were written. */
  insertSamples(userId: string, inputs: readonly unknown[]): number {
    const samples = inputs.map(parseHeartRateSample);
    const stmt = this.db.prepare(
      `INSERT INTO heart_rate_samples (user_id, timestamp_ms, bpm, signal_confidence, motion_level)
       VALUES (?, ?, ?, ?, ?)`
    );
    const insertAll = this.db.transaction((rows: HeartRateSample[]) => {
      for (const s of rows) {
        stmt.run(userId, s.timestamp.getTime(), s.bpm, s.signalConfidence, s.motionLevel);
      }
    });
    insertAll(samples);
    return samples.length;
  }

  /** Samples in [from, to), oldest first. Rows are re-validated on the way out. */
  getSamples(userId: string, from: Date, to: Date): HeartRateSample[] {
    const rows = this.db
      .prepare(
        `SELECT timestamp_ms, bpm, signal_confidence, motion_level FROM heart_rate_samples
         WHERE user_id = ? AND timestamp_ms >= ? AND timestamp_ms < ? ORDER BY timestamp_ms ASC`
      )
      .all(userId, from.getTime(), to.getTime()) as HeartRateRow[];
    return rows.map((row) =>
      parseHeartRateSample({
        timestamp: new Date(row.timestamp_ms),
        bpm: row.bpm,
        signalConfidence: row.signal_confidence,
        motionLevel: row.motion_level,
      })
    );
  }

  addSleepInterval(userId: string, input: unknown): TimeInterval {
    const interval = parseTimeInterval(input);
    this.db
      .prepare('INSERT INTO sleep_intervals (user_id, start_ms, end_ms) VALUES (?, ?, ?)')
      .run(userId, interval.start.getTime(), interval.end.getTime());
    return interval;
  }

  /** Intervals overlapping [from, to). */
  getSleepIntervals(userId: string, from: Date, to: Date): TimeInterval[] {
    const rows = this.db
      .prepare(
        `SELECT start_ms, end_ms FROM sleep_intervals
         WHERE user_id = ? AND end_ms > ? AND start_ms < ? ORDER BY start_ms ASC`
      )
      .all(userId, from.getTime(), to.getTime()) as SleepIntervalRow[];
    return rows.map((row) => ({ start: new Date(row.start_ms), end: new Date(row.end_ms) }));
  }
}
