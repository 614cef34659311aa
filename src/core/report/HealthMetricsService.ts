import type { SleepDataPort } from '../../ports/SleepDataPort.js';
import type { HeartRatePort } from '../../ports/HeartRatePort.js';
import { FitConvergenceError, MetricsError } from '../../utils/errors.js';
import { addDays } from '../../utils/dates.js';
import { createLogger } from '../../utils/logger.js';
import {
  SleepDebtEstimator,
  recoveryPlan,
  withDebtChange,
  type RecoveryPlan,
  type SleepDebtOptions,
  type SleepDebtTrendPoint,
} from '../sleep/SleepDebtEstimator.js';
import { OptimalSleepEstimator, type OsdEstimate, type OsdOptions } from '../sleep/OptimalSleepEstimator.js';
import { selectTopQuantileNights, selectWeekendNights } from '../sleep/nightSelectors.js';
import type { SleepDebtResult, SleepNeedEstimate } from '../sleep/types.js';
import {
  CircadianRhythmFitter,
  type CircadianFitResult,
  type CircadianOptions,
  type HarmonicCount,
} from '../circadian/CircadianRhythmFitter.js';
import { clockHour, summarizeHourlyMeans, type HourlyMeansOptions } from '../circadian/hourlyMeans.js';
import {
  circularMeanHour,
  interpretCircadianFit,
  type CircadianInterpretation,
} from '../circadian/interpretFit.js';

export type SectionOutcome<T> = { status: 'ok'; value: T } | { status: 'failed'; error: MetricsError };

export interface SleepDebtSection {
  result: SleepDebtResult;
  plan: RecoveryPlan;
}

export interface CircadianSection {
  fit: CircadianFitResult;
  interpretation: CircadianInterpretation;
  /** Samples behind each hourly mean. */
  hourlyCounts: number[];
  /** True when the requested model failed to converge and one harmonic was used instead. */
  fellBack: boolean;
}

export interface HealthMetricsReport {
  userId: string;
  asOfDate: string;
  nights: number;
  sleepNeed: SectionOutcome<SleepNeedEstimate>;
  sleepDebt: SectionOutcome<SleepDebtSection>;
  debtTrend: SleepDebtTrendPoint[];
  optimalSleep: SectionOutcome<OsdEstimate>;
  circadian: SectionOutcome<CircadianSection>;
}

export interface HealthMetricsOptions {
  sleepDebt: Partial<SleepDebtOptions>;
  osd: Partial<OsdOptions>;
  circadian: Partial<CircadianOptions>;
  hourly: Partial<HourlyMeansOptions>;
  circadianLookbackDays: number;
  circadianHarmonics: HarmonicCount;
  trendDays: number;
  /** Quantile a night's efficiency must reach to count as high-efficiency evidence. */
  efficiencyQuantile: number;
  hrvQuantile: number;
}

export const DEFAULT_HEALTH_METRICS_OPTIONS: Readonly<HealthMetricsOptions> = {
  sleepDebt: {},
  osd: {},
  circadian: {},
  hourly: {},
  circadianLookbackDays: 30,
  circadianHarmonics: 2,
  trendDays: 7,
  efficiencyQuantile: 0.85,
  hrvQuantile: 0.75,
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Pulls one user's history through the data ports and runs every analytic for
 * an anchor date. A section that cannot be computed is reported as failed
 * instead of aborting the others.
 */
export class HealthMetricsService {
  private readonly logger = createLogger({ service: 'HealthMetricsService' });
  private readonly options: Readonly<HealthMetricsOptions>;
  private readonly debtEstimator: SleepDebtEstimator;
  private readonly osdEstimator: OptimalSleepEstimator;
  private readonly circadianFitter: CircadianRhythmFitter;

  constructor(
    private readonly sleepPort: SleepDataPort,
    private readonly heartRatePort: HeartRatePort,
    options: Partial<HealthMetricsOptions> = {}
  ) {
    this.options = Object.freeze({ ...DEFAULT_HEALTH_METRICS_OPTIONS, ...options });
    this.debtEstimator = new SleepDebtEstimator(this.options.sleepDebt);
    this.osdEstimator = new OptimalSleepEstimator(this.options.osd);
    this.circadianFitter = new CircadianRhythmFitter(this.options.circadian);
  }

  async buildReport(userId: string, asOfDate: string): Promise<HealthMetricsReport> {
    const logger = this.logger.child({ userId, asOfDate });
    const { lookbackDays } = this.debtEstimator.options;
    const { trendDays } = this.options;

    const history = await this.sleepPort.getSleepRecords(
      userId,
      addDays(asOfDate, -(lookbackDays + trendDays)),
      asOfDate
    );
    const lookbackStart = addDays(asOfDate, -lookbackDays);
    const recent = history.filter((night) => night.date >= lookbackStart);
    logger.debug({ nights: history.length, recent: recent.length }, 'Loaded sleep history');

    const sleepNeed = this.section(logger, 'sleepNeed', () =>
      this.debtEstimator.estimateSleepNeed(history, asOfDate)
    );

    const sleepDebt: SectionOutcome<SleepDebtSection> =
      sleepNeed.status === 'ok'
        ? this.section(logger, 'sleepDebt', () => {
            const result = this.debtEstimator.estimateDebtWithNeed(history, asOfDate, sleepNeed.value);
            return { result, plan: recoveryPlan(result) };
          })
        : sleepNeed;

    const debtTrend = withDebtChange(
      this.debtEstimator.debtHistory(history, addDays(asOfDate, -(trendDays - 1)), asOfDate)
    );

    const optimalSleep = this.section(logger, 'optimalSleep', () =>
      this.osdEstimator.estimate(recent, {
        weekendFreeNights: selectWeekendNights(recent),
        highEfficiencyNights: selectTopQuantileNights(recent, (n) => n.efficiencyPct, this.options.efficiencyQuantile),
        highHrvNights: selectTopQuantileNights(recent, (n) => n.hrvMs, this.options.hrvQuantile),
      })
    );

    const circadian = await this.circadianSection(logger, userId, asOfDate);

    logger.info(
      {
        sleepNeed: sleepNeed.status,
        sleepDebt: sleepDebt.status,
        optimalSleep: optimalSleep.status,
        circadian: circadian.status,
      },
      'Built health metrics report'
    );

    return {
      userId,
      asOfDate,
      nights: recent.length,
      sleepNeed,
      sleepDebt,
      debtTrend,
      optimalSleep,
      circadian,
    };
  }

  private async circadianSection(
    logger: ReturnType<typeof createLogger>,
    userId: string,
    asOfDate: string
  ): Promise<SectionOutcome<CircadianSection>> {
    const offsetMinutes = this.options.hourly.timezoneOffsetMinutes ?? 0;
    // Local midnight at the end of the anchor day
    const to = new Date(Date.parse(`${addDays(asOfDate, 1)}T00:00:00Z`) - offsetMinutes * 60_000);
    const from = new Date(to.getTime() - this.options.circadianLookbackDays * MS_PER_DAY);

    const [samples, sleepIntervals] = await Promise.all([
      this.heartRatePort.getSamples(userId, from, to),
      this.heartRatePort.getSleepIntervals(userId, from, to),
    ]);
    const hourly = summarizeHourlyMeans(samples, sleepIntervals, this.options.hourly);
    logger.debug({ kept: hourly.kept, dropped: hourly.dropped }, 'Aggregated hourly heart rate');

    return this.section(logger, 'circadian', () => {
      const requested = this.options.circadianHarmonics;
      let fit: CircadianFitResult;
      let fellBack = false;
      try {
        fit = this.circadianFitter.fit(hourly.means, requested);
      } catch (error) {
        if (!(error instanceof FitConvergenceError) || requested === 1) throw error;
        logger.warn({ error, iterations: error.iterations }, 'Two-harmonic fit did not converge, retrying with one');
        fit = this.circadianFitter.fit(hourly.means, 1);
        fellBack = true;
      }

      return {
        fit,
        interpretation: interpretCircadianFit(fit, {
          wakeHour: circularMeanHour(sleepIntervals.map((s) => clockHour(s.end, offsetMinutes))) ?? undefined,
          bedHour: circularMeanHour(sleepIntervals.map((s) => clockHour(s.start, offsetMinutes))) ?? undefined,
        }),
        hourlyCounts: hourly.counts,
        fellBack,
      };
    });
  }

  private section<T>(logger: ReturnType<typeof createLogger>, name: string, compute: () => T): SectionOutcome<T> {
    try {
      return { status: 'ok', value: compute() };
    } catch (error) {
      if (error instanceof MetricsError) {
        logger.warn({ section: name, code: error.code, message: error.message }, 'Report section unavailable');
        return { status: 'failed', error };
      }
      throw error;
    }
  }
}
