/**
 * Fill the configured database with a synthetic user so the report has something to show.
 * Run with: npm run seed [-- YYYY-MM-DD]
 */
import 'dotenv/config';
import { config, parseAnchorArg } from '../src/config/index.js';
import { closeDatabase, getDatabase } from '../src/persistence/database.js';
import { SleepRecordRepository } from '../src/persistence/repositories/SleepRecordRepository.js';
import { HeartRateRepository } from '../src/persistence/repositories/HeartRateRepository.js';
import { addDays, dayOfWeek } from '../src/utils/dates.js';

const NIGHTS = 90;
const HEART_RATE_DAYS = 30;
const SAMPLE_STEP_MINUTES = 5;

// Small deterministic generator so repeated seeds produce the same data
function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 2 ** 32;
  };
}

function main(): void {
  const endDate = parseAnchorArg(process.argv.slice(2)) ?? new Date().toISOString().slice(0, 10);
  const random = createRandom(42);
  const db = getDatabase(config.databasePath);
  const sleepRecords = new SleepRecordRepository(db);
  const heartRate = new HeartRateRepository(db);

  const nights = [];
  for (let i = NIGHTS - 1; i >= 0; i--) {
    const date = addDays(endDate, -i);
    const weekend = dayOfWeek(date) === 0 || dayOfWeek(date) === 6;
    const asleep = Math.round((weekend ? 480 : 405) + (random() - 0.5) * 60);
    const awake = Math.round(30 + random() * 30);
    const deep = Math.round(asleep * 0.18);
    const rem = Math.round(asleep * 0.22);
    nights.push({
      date,
      minutesAsleep: asleep,
      minutesAwake: awake,
      efficiencyPct: Math.round((asleep / (asleep + awake)) * 1000) / 10,
      stageMinutes: { deep, rem, light: asleep - deep - rem, wake: awake },
      hrvMs: Math.round(35 + random() * 30),
    });
  }
  sleepRecords.upsertMany(config.userId, nights);

  const offsetMs = config.timezoneOffsetMinutes * 60_000;
  let samples = 0;
  for (let i = HEART_RATE_DAYS - 1; i >= 0; i--) {
    const dayStart = Date.parse(`${addDays(endDate, -i)}T00:00:00Z`) - offsetMs;
    // Asleep 23:00 the previous evening until 07:00
    heartRate.addSleepInterval(config.userId, {
      start: new Date(dayStart - 60 * 60_000),
      end: new Date(dayStart + 7 * 60 * 60_000),
    });

    const batch = [];
    for (let minute = 0; minute < 24 * 60; minute += SAMPLE_STEP_MINUTES) {
      const hour = minute / 60;
      const bpm =
        64 +
        7 * Math.cos((2 * Math.PI * (hour - 16)) / 24) +
        2 * Math.cos((2 * Math.PI * (hour - 14)) / 12) +
        (random() - 0.5) * 4;
      batch.push({
        timestamp: new Date(dayStart + minute * 60_000),
        bpm: Math.round(bpm * 10) / 10,
        signalConfidence: random() < 0.85 ? 'high' : 'medium',
        motionLevel: random() < 0.8 ? 'still' : 'light',
      });
    }
    samples += heartRate.insertSamples(config.userId, batch);
  }

  closeDatabase();
  console.log(`Seeded ${nights.length} nights and ${samples} heart-rate samples for ${config.userId} ending ${endDate}`);
}

main();
