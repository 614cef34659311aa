import { describe, it, expect } from 'vitest';
import { parseSleepRecord, parseSleepRecords } from '../../adapters/sleep/sleepRecordParser.js';
import { parseHeartRateSample, parseTimeInterval } from '../../adapters/heartRate/heartRateParser.js';
import { OutOfRangeError } from '../../utils/errors.js';

const validNight = {
  date: '2024-03-01',
  minutesAsleep: 420,
  minutesAwake: 35,
  efficiencyPct: 92.3,
  stageMinutes: { deep: 80, light: 240, rem: 100, wake: 35 },
  hrvMs: 48,
};

function caught(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a failure');
}

describe('parseSleepRecord', () => {
  it('accepts a plausible night', () => {
    expect(parseSleepRecord(validNight)).toEqual(validNight);
  });

  it('rejects negative minutes without clamping', () => {
    const error = caught(() => parseSleepRecord({ ...validNight, minutesAsleep: -10 }));

    expect(error).toBeInstanceOf(OutOfRangeError);
    expect(error).toMatchObject({ field: 'sleepRecord.minutesAsleep', value: -10, code: 'OUT_OF_RANGE' });
  });

  it('rejects impossible calendar dates', () => {
    expect(caught(() => parseSleepRecord({ ...validNight, date: '2024-02-30' }))).toMatchObject({
      field: 'sleepRecord.date',
      value: '2024-02-30',
    });
  });

  it('rejects efficiency above 100', () => {
    expect(caught(() => parseSleepRecord({ ...validNight, efficiencyPct: 101 }))).toMatchObject({
      field: 'sleepRecord.efficiencyPct',
    });
  });

  it('rejects stage minutes that exceed time in bed', () => {
    const input = { ...validNight, stageMinutes: { deep: 200, light: 240, rem: 100, wake: 35 } };
    expect(caught(() => parseSleepRecord(input))).toMatchObject({ field: 'sleepRecord.stageMinutes' });
  });
});

describe('parseSleepRecords', () => {
  it('sorts a batch by date', () => {
    const records = parseSleepRecords([{ ...validNight, date: '2024-03-02' }, validNight]);
    expect(records.map((r) => r.date)).toEqual(['2024-03-01', '2024-03-02']);
  });

  it('rejects a repeated night', () => {
    expect(() => parseSleepRecords([validNight, validNight])).toThrow('sleepRecord.date: duplicate night');
  });
});

describe('parseHeartRateSample', () => {
  it('coerces ISO timestamps to dates', () => {
    const sample = parseHeartRateSample({
      timestamp: '2024-03-01T08:15:00Z',
      bpm: 62,
      signalConfidence: 'high',
      motionLevel: 'still',
    });

    expect(sample.timestamp.toISOString()).toBe('2024-03-01T08:15:00.000Z');
    expect(sample.bpm).toBe(62);
  });

  it('rejects implausible heart rates and unknown levels', () => {
    const base = { timestamp: '2024-03-01T08:15:00Z', bpm: 62, signalConfidence: 'high', motionLevel: 'still' };

    expect(caught(() => parseHeartRateSample({ ...base, bpm: 300 }))).toMatchObject({ field: 'heartRateSample.bpm' });
    expect(caught(() => parseHeartRateSample({ ...base, signalConfidence: 'great' }))).toMatchObject({
      field: 'heartRateSample.signalConfidence',
      value: 'great',
    });
  });
});

describe('parseTimeInterval', () => {
  it('requires the end after the start', () => {
    const input = { start: '2024-03-01T07:00:00Z', end: '2024-03-01T06:00:00Z' };
    expect(caught(() => parseTimeInterval(input))).toMatchObject({
      field: 'timeInterval.end',
      value: '2024-03-01T06:00:00Z',
    });
  });
});
