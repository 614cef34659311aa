import { z } from 'zod';
import { ConfigError } from '../utils/errors.js';
import { isIsoDate } from '../utils/dates.js';
import { weightingByName } from '../core/sleep/weighting.js';
import type { HealthMetricsOptions } from '../core/report/HealthMetricsService.js';

const configSchema = z.object({
  // Storage
  databasePath: z.string().min(1).default('./data/sleep-metrics.db'),

  // Logging
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // Report subject
  userId: z.string().min(1).default('default'),
  timezoneOffsetMinutes: z.coerce.number().int().min(-720).max(840).default(0),

  // Analytics
  sleepLookbackDays: z.coerce.number().int().positive().default(90),
  debtWindowDays: z.coerce.number().int().positive().default(14),
  debtWeighting: z.enum(['linear', 'exponential', 'recency', 'uniform']).default('linear'),
  circadianLookbackDays: z.coerce.number().int().positive().default(30),
  circadianHarmonics: z.coerce
    .number()
    .int()
    .refine((n): n is 1 | 2 => n === 1 || n === 2, 'must be 1 or 2')
    .default(2),
});

export type Config = z.infer<typeof configSchema>;

export function loadConfig(source: NodeJS.ProcessEnv = process.env): Config {
  // Empty strings count as unset
  const env = (key: string): string | undefined => {
    const value = source[key];
    return value === '' ? undefined : value;
  };

  const raw = {
    databasePath: env('DATABASE_PATH'),
    logLevel: env('LOG_LEVEL'),
    userId: env('USER_ID'),
    timezoneOffsetMinutes: env('TIMEZONE_OFFSET_MINUTES'),
    sleepLookbackDays: env('SLEEP_LOOKBACK_DAYS'),
    debtWindowDays: env('DEBT_WINDOW_DAYS'),
    debtWeighting: env('DEBT_WEIGHTING'),
    circadianLookbackDays: env('CIRCADIAN_LOOKBACK_DAYS'),
    circadianHarmonics: env('CIRCADIAN_HARMONICS'),
  };

  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Configuration validation failed:\n${issues.join('\n')}`, { cause: result.error });
  }
  return result.data;
}

/** Option structures for the analytics, derived from the environment once at startup. */
export function toAnalyticsOptions(config: Config): Partial<HealthMetricsOptions> {
  return {
    sleepDebt: {
      lookbackDays: config.sleepLookbackDays,
      windowDays: config.debtWindowDays,
      weighting: weightingByName(config.debtWeighting),
    },
    hourly: { timezoneOffsetMinutes: config.timezoneOffsetMinutes },
    circadianLookbackDays: config.circadianLookbackDays,
    circadianHarmonics: config.circadianHarmonics,
  };
}

/** Anchor date from the command line, or null when none was given. */
export function parseAnchorArg(argv: readonly string[]): string | null {
  const [arg] = argv;
  if (arg === undefined) return null;
  if (!isIsoDate(arg)) {
    throw new ConfigError(`Anchor date must be YYYY-MM-DD, got "${arg}"`);
  }
  return arg;
}

export const config = loadConfig();
