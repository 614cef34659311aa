import { describe, it, expect } from 'vitest';
import { CircadianRhythmFitter } from '../../core/circadian/CircadianRhythmFitter.js';
import {
  componentPeakHour,
  cosinorModel,
  createTwoHarmonicModel,
  normalizeComponent,
} from '../../core/circadian/harmonicModels.js';
import { FitConvergenceError, InsufficientDataError, OutOfRangeError } from '../../utils/errors.js';
import { sinusoid } from '../fixtures.js';

const W1 = (2 * Math.PI) / 24;
const W2 = (2 * Math.PI) / 12;

function twoHarmonicSignal(): number[] {
  return Array.from({ length: 24 }, (_, t) => 70 + 5 * Math.sin(W1 * t) + 2 * Math.sin(W2 * t + 1));
}

describe('CircadianRhythmFitter', () => {
  const fitter = new CircadianRhythmFitter();

  describe('single harmonic', () => {
    it('recovers a perfect sinusoid', () => {
      const fit = fitter.fit(sinusoid(70, 5), 1);

      expect(fit.harmonics).toBe(1);
      expect(fit.mesor).toBeCloseTo(70, 9);
      expect(fit.combinedAmplitude).toBeCloseTo(5, 9);
      expect(fit.rSquared).toBeCloseTo(1, 9);
      expect(fit.acrophase).toBe(6);
      expect(fit.bathyphase).toBe(18);
      expect(Math.abs(fit.acrophase - fit.bathyphase)).toBe(12);
      expect(fit.components[0].peakHour).toBeCloseTo(6, 9);
      expect(fit.components[0].varianceShare).toBeCloseTo(1, 9);
      expect(fit.hoursUsed).toHaveLength(24);
      expect(fit.curve[6]).toBeCloseTo(75, 9);
    });

    it('excludes missing hours instead of imputing them', () => {
      const means: Array<number | null> = sinusoid(70, 5);
      for (const hour of [0, 3, 9, 15, 21]) means[hour] = null;

      const fit = fitter.fit(means, 1);

      expect(fit.hoursUsed).not.toContain(3);
      expect(fit.hoursUsed).toHaveLength(19);
      expect(fit.combinedAmplitude).toBeCloseTo(5, 9);
      expect(fit.curve[3]).toBeCloseTo(70 + 5 * Math.sin(W1 * 3), 9);
    });

    it('treats a flat signal as fully explained', () => {
      const fit = fitter.fit(Array.from({ length: 24 }, () => 60), 1);

      expect(fit.rSquared).toBe(1);
      expect(fit.combinedAmplitude).toBeCloseTo(0, 9);
    });
  });

  describe('two harmonics', () => {
    it('recovers both components', () => {
      const fit = fitter.fit(twoHarmonicSignal(), 2);

      expect(fit.harmonics).toBe(2);
      expect(fit.mesor).toBeCloseTo(70, 6);
      expect(fit.components[0].amplitude).toBeCloseTo(5, 6);
      expect(fit.components[1].amplitude).toBeCloseTo(2, 6);
      expect(fit.components[1].phase).toBeCloseTo(1, 6);
      expect(fit.combinedAmplitude).toBeCloseTo(Math.sqrt(29), 6);
      expect(fit.rSquared).toBeGreaterThan(0.999999);
      expect(fit.acrophase).toBe(3);
      expect(fit.bathyphase).toBe(19);
    });

    it('reports the share of variance the first harmonic explains alone', () => {
      const fit = fitter.fit(twoHarmonicSignal(), 2);

      // Variance 12.5 + 2 over a full day of hours
      expect(fit.components[0].varianceShare).toBeCloseTo(12.5 / 14.5, 6);
      expect(fit.components[1].varianceShare).toBeCloseTo(2 / 14.5, 6);
    });

    it('defaults to two harmonics', () => {
      expect(fitter.fit(twoHarmonicSignal()).harmonics).toBe(2);
    });

    it('raises FitConvergenceError when the solver runs out of iterations', () => {
      const impatient = new CircadianRhythmFitter({
        models: { 1: cosinorModel, 2: createTwoHarmonicModel({ maxIterations: 1 }) },
      });

      expect(() => impatient.fit(twoHarmonicSignal(), 2)).toThrow(FitConvergenceError);
      expect(impatient.fit(twoHarmonicSignal(), 1).harmonics).toBe(1);
    });
  });

  describe('input validation', () => {
    it('requires half a day of populated hours', () => {
      const means: Array<number | null> = sinusoid(70, 5).map((v, hour) => (hour < 8 ? v : null));

      let error: unknown;
      try {
        fitter.fit(means, 1);
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(InsufficientDataError);
      expect(error).toMatchObject({ required: 12, found: 8 });
    });

    it('requires at least as many hours as parameters', () => {
      const lenient = new CircadianRhythmFitter({ minPopulatedBins: 1 });
      const means: Array<number | null> = sinusoid(70, 5).map((v, hour) => (hour < 4 ? v : null));

      expect(() => lenient.fit(means, 2)).toThrow('2-harmonic fit needs at least 5 data points (found 4)');
    });

    it('rejects arrays that are not 24 long and non-positive rates', () => {
      expect(() => fitter.fit([60, 61, 62], 1)).toThrow(OutOfRangeError);

      const means = sinusoid(70, 5);
      means[4] = -1;
      expect(() => fitter.fit(means, 1)).toThrow('hourlyMeans[4]: must be a positive heart rate');
    });
  });
});

describe('harmonic helpers', () => {
  it('folds a negative amplitude into the phase', () => {
    const component = normalizeComponent(24, -3, 0);

    expect(component.amplitude).toBe(3);
    expect(component.phase).toBeCloseTo(Math.PI, 12);
  });

  it('locates the peak of a component', () => {
    expect(componentPeakHour({ periodHours: 24, amplitude: 1, phase: 0 })).toBe(6);
    expect(componentPeakHour({ periodHours: 24, amplitude: 1, phase: Math.PI })).toBeCloseTo(18, 12);
    expect(componentPeakHour({ periodHours: 12, amplitude: 1, phase: 1 })).toBeCloseTo(3 - 6 / Math.PI, 12);
  });
});
