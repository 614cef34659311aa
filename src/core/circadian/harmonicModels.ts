import { FitConvergenceError } from '../../utils/errors.js';
import {
  levenbergMarquardt,
  linearLeastSquares,
  type LevenbergMarquardtOptions,
} from './leastSquares.js';

export interface HourlyPoint {
  hour: number;
  bpm: number;
}

/** One sinusoidal component `amplitude · sin(2πt/periodHours + phase)`. */
export interface HarmonicComponent {
  periodHours: number;
  amplitude: number;
  /** Radians in [0, 2π). */
  phase: number;
}

export interface HarmonicFit {
  mesor: number;
  components: HarmonicComponent[];
  iterations: number;
}

/** A harmonic regression model; the fitter stays agnostic of how it is solved. */
export interface HarmonicModel {
  readonly harmonics: number;
  readonly parameterCount: number;
  fit(points: readonly HourlyPoint[]): HarmonicFit;
}

const TWO_PI = 2 * Math.PI;
export const DAY_HOURS = 24;

function wrapPhase(phase: number): number {
  const wrapped = phase % TWO_PI;
  return wrapped < 0 ? wrapped + TWO_PI : wrapped;
}

/** Flip negative amplitudes into a phase shift so amplitude is always ≥ 0. */
export function normalizeComponent(periodHours: number, amplitude: number, phase: number): HarmonicComponent {
  if (amplitude < 0) {
    return { periodHours, amplitude: -amplitude, phase: wrapPhase(phase + Math.PI) };
  }
  return { periodHours, amplitude, phase: wrapPhase(phase) };
}

export function evaluateHarmonics(mesor: number, components: readonly HarmonicComponent[], hour: number): number {
  let value = mesor;
  for (const c of components) {
    value += c.amplitude * Math.sin((TWO_PI * hour) / c.periodHours + c.phase);
  }
  return value;
}

/**
 * Single-harmonic cosinor. `A·sin(ωt + φ) = b·sin(ωt) + c·cos(ωt)` with
 * `b = A·cos φ`, `c = A·sin φ`, so the fit is linear in (μ, b, c).
 */
export const cosinorModel: HarmonicModel = {
  harmonics: 1,
  parameterCount: 3,
  fit(points) {
    const omega = TWO_PI / DAY_HOURS;
    const design = points.map((p) => [1, Math.sin(omega * p.hour), Math.cos(omega * p.hour)]);
    const coefficients = linearLeastSquares(
      design,
      points.map((p) => p.bpm)
    );
    if (coefficients === null) {
      throw new FitConvergenceError('Cosinor design matrix is singular', 0);
    }
    const [mesor, b, c] = coefficients;
    return {
      mesor,
      components: [normalizeComponent(DAY_HOURS, Math.hypot(b, c), Math.atan2(c, b))],
      iterations: 1,
    };
  },
};

/**
 * `μ + A₁·sin(2πt/24 + φ₁) + A₂·sin(2πt/12 + φ₂)` by Levenberg–Marquardt, seeded
 * with μ = mean, A₁ = half the range, φ₁ = 0, A₂ = A₁/4, φ₂ = 0.
 */
export function createTwoHarmonicModel(solver: Partial<LevenbergMarquardtOptions> = {}): HarmonicModel {
  return {
    harmonics: 2,
    parameterCount: 5,
    fit(points) {
      const hours = points.map((p) => p.hour);
      const bpm = points.map((p) => p.bpm);
      const w1 = TWO_PI / DAY_HOURS;
      const w2 = TWO_PI / (DAY_HOURS / 2);

      const mean = bpm.reduce((sum, v) => sum + v, 0) / bpm.length;
      const a1 = (Math.max(...bpm) - Math.min(...bpm)) / 2;
      const seed = [mean, a1, 0, a1 / 4, 0];

      const result = levenbergMarquardt(
        {
          evaluate: ([mu, amp1, phi1, amp2, phi2]) =>
            hours.map((t) => mu + amp1 * Math.sin(w1 * t + phi1) + amp2 * Math.sin(w2 * t + phi2)),
          jacobian: ([, amp1, phi1, amp2, phi2]) =>
            hours.map((t) => [
              1,
              Math.sin(w1 * t + phi1),
              amp1 * Math.cos(w1 * t + phi1),
              Math.sin(w2 * t + phi2),
              amp2 * Math.cos(w2 * t + phi2),
            ]),
        },
        bpm,
        seed,
        solver
      );

      const [mesor, amp1, phi1, amp2, phi2] = result.params;
      return {
        mesor,
        components: [
          normalizeComponent(DAY_HOURS, amp1, phi1),
          normalizeComponent(DAY_HOURS / 2, amp2, phi2),
        ],
        iterations: result.iterations,
      };
    },
  };
}

export const twoHarmonicModel: HarmonicModel = createTwoHarmonicModel();

/** Hour in [0, period) at which a component peaks. */
export function componentPeakHour(component: HarmonicComponent): number {
  const { periodHours, phase } = component;
  const peak = (periodHours / 4 - (phase * periodHours) / TWO_PI) % periodHours;
  const wrapped = peak < 0 ? peak + periodHours : peak;
  return wrapped >= periodHours ? 0 : wrapped;
}
