import type { HealthMetricsReport } from './HealthMetricsService.js';
import type { MetricsError } from '../../utils/errors.js';
import { formatClockTime } from '../circadian/interpretFit.js';
import type { OsdMethod } from '../sleep/OptimalSleepEstimator.js';

const METHOD_LABELS: Record<OsdMethod, string> = {
  recommended: 'Population recommendation',
  weekendFree: 'Weekend / alarm-free nights',
  highEfficiency: 'High-efficiency nights',
  highHrv: 'High-HRV nights',
  habitual: 'Habitual sleep',
};

function hours(value: number): string {
  return `${value.toFixed(2)} h`;
}

function unavailable(error: MetricsError): string {
  return `Unavailable: ${error.message}`;
}

export function formatReport(report: HealthMetricsReport): string {
  const lines: string[] = [];
  lines.push(`Sleep metrics for ${report.userId} as of ${report.asOfDate} (${report.nights} nights)`);

  lines.push('');
  lines.push('SLEEP DEBT');
  if (report.sleepDebt.status === 'ok') {
    const { result, plan } = report.sleepDebt.value;
    lines.push(`Debt: ${hours(result.debtHours)} (${result.category}) over ${result.dataPoints} nights`);
    lines.push(`Need: ${hours(result.sleepNeedHours)}, average slept: ${hours(result.avgSleepHours)}`);
    if (plan.days > 0) {
      lines.push(`Recovery: ${plan.days} days at ${hours(plan.suggestedNightlyHours)} a night`);
    }
  } else {
    lines.push(unavailable(report.sleepDebt.error));
  }
  if (report.debtTrend.length > 0) {
    const trend = report.debtTrend
      .map((point) => `${point.date.slice(5)} ${point.debtHours.toFixed(1)}`)
      .join(', ');
    lines.push(`Trend: ${trend}`);
  }

  lines.push('');
  lines.push('OPTIMAL SLEEP DURATION');
  if (report.optimalSleep.status === 'ok') {
    const osd = report.optimalSleep.value;
    lines.push(`Estimate: ${hours(osd.osdHours)} (confidence ${osd.overallConfidence})`);
    for (const estimate of Object.values(osd.estimates)) {
      if (!estimate) continue;
      lines.push(`- ${METHOD_LABELS[estimate.method]}: ${hours(estimate.valueHours)} [${estimate.confidence}]`);
    }
    if (osd.potentialDebtHours !== null && osd.assessment !== null) {
      lines.push(`Assessment: ${osd.assessment} (${osd.potentialDebtHours.toFixed(2)} h vs habitual)`);
    }
  } else {
    lines.push(unavailable(report.optimalSleep.error));
  }

  lines.push('');
  lines.push('CIRCADIAN RHYTHM');
  if (report.circadian.status === 'ok') {
    const { fit, interpretation, fellBack } = report.circadian.value;
    lines.push(
      `MESOR ${fit.mesor.toFixed(1)} bpm, amplitude ${fit.combinedAmplitude.toFixed(1)} bpm (${interpretation.amplitudeStatus})`
    );
    lines.push(
      `Lowest at ${formatClockTime(fit.bathyphase)}, highest at ${formatClockTime(fit.acrophase)}`
    );
    lines.push(
      `Fit: R² ${fit.rSquared.toFixed(3)} (${interpretation.fitQuality}), ${fit.harmonics} harmonic${fit.harmonics === 1 ? '' : 's'}, ${fit.hoursUsed.length} hours`
    );
    if (fellBack) {
      lines.push('Two-harmonic fit did not converge; single harmonic shown.');
    }
    if (interpretation.ultradianDominant) {
      lines.push('12 h component is stronger than the 24 h rhythm.');
    }
  } else {
    lines.push(unavailable(report.circadian.error));
  }

  return lines.join('\n');
}
