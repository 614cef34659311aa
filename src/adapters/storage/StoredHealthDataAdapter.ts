import type { SleepDataPort, SleepRecord } from '../../ports/SleepDataPort.js';
import type { HeartRatePort, HeartRateSample, TimeInterval } from '../../ports/HeartRatePort.js';
import type { SleepRecordRepository } from '../../persistence/repositories/SleepRecordRepository.js';
import type { HeartRateRepository } from '../../persistence/repositories/HeartRateRepository.js';
import { StorageError } from '../../utils/errors.js';

function wrapStorage<T>(operation: string, fn: () => T): Promise<T> {
  try {
    return Promise.resolve(fn());
  } catch (error) {
    return Promise.reject(new StorageError(`Failed to ${operation}`, { cause: error }));
  }
}

export class StoredHealthDataAdapter implements SleepDataPort, HeartRatePort {
  constructor(
    private readonly sleepRecordRepository: SleepRecordRepository,
    private readonly heartRateRepository: HeartRateRepository
  ) {}

  async getSleepRecords(userId: string, startDate: string, endDate: string): Promise<SleepRecord[]> {
    return wrapStorage('load sleep records', () => this.sleepRecordRepository.getRange(userId, startDate, endDate));
  }

  async getLatestDate(userId: string): Promise<string | null> {
    return wrapStorage('load latest sleep date', () => this.sleepRecordRepository.getLatestDate(userId));
  }

  async getSamples(userId: string, from: Date, to: Date): Promise<HeartRateSample[]> {
    return wrapStorage('load heart rate samples', () => this.heartRateRepository.getSamples(userId, from, to));
  }

  async getSleepIntervals(userId: string, from: Date, to: Date): Promise<TimeInterval[]> {
    return wrapStorage('load sleep intervals', () => this.heartRateRepository.getSleepIntervals(userId, from, to));
  }
}
