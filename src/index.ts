#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { config, parseAnchorArg, toAnalyticsOptions } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { closeDatabase, getDatabase } from './persistence/database.js';
import { SleepRecordRepository } from './persistence/repositories/SleepRecordRepository.js';
import { HeartRateRepository } from './persistence/repositories/HeartRateRepository.js';
import { StoredHealthDataAdapter } from './adapters/storage/StoredHealthDataAdapter.js';
import { HealthMetricsService } from './core/report/HealthMetricsService.js';
import { formatReport } from './core/report/formatReport.js';

const logger = createLogger({ component: 'index' });

async function main(): Promise<void> {
  const db = getDatabase(config.databasePath);
  try {
    const adapter = new StoredHealthDataAdapter(new SleepRecordRepository(db), new HeartRateRepository(db));
    const service = new HealthMetricsService(adapter, adapter, toAnalyticsOptions(config));

    const asOfDate = parseAnchorArg(process.argv.slice(2)) ?? (await adapter.getLatestDate(config.userId));
    if (asOfDate === null) {
      logger.warn({ userId: config.userId }, 'No sleep records stored; nothing to report');
      process.exitCode = 1;
      return;
    }

    const report = await service.buildReport(config.userId, asOfDate);
    process.stdout.write(`${formatReport(report)}\n`);
  } finally {
    closeDatabase();
  }
}

main().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to build report');
  process.exitCode = 1;
});
