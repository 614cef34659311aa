export interface SleepStageMinutes {
  deep: number;
  light: number;
  rem: number;
  wake: number;
}

/** One night, keyed by the calendar day the sleep ended on. */
export interface SleepRecord {
  readonly date: string; // ISO date
  readonly minutesAsleep: number;
  readonly minutesAwake: number;
  readonly efficiencyPct: number; // 0-100
  readonly stageMinutes: Readonly<SleepStageMinutes>;
  readonly hrvMs?: number; // Nightly RMSSD, when the device reports one
}

export interface SleepDataPort {
  /** Records whose date falls in [startDate, endDate], oldest first. */
  getSleepRecords(userId: string, startDate: string, endDate: string): Promise<SleepRecord[]>;
  getLatestDate(userId: string): Promise<string | null>;
}
