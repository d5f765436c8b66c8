/**
 * Binomial Distribution - closed-form statistics
 *
 * Number of successes in n independent Bernoulli(p) trials.
 */

import { binomialCoefficient, logBinomialCoefficient } from '../math/special';
import { ParameterValidator } from '../../domain/validation/ParameterValidator';

function validateParameters(n: number, p: number): void {
  ParameterValidator.validateTrialCount(n);
  ParameterValidator.validateProbability(p, { allowZero: true });
}

/**
 * Mean: n * p
 */
export function meanBinomial(n: number, p: number): number {
  validateParameters(n, p);
  return n * p;
}

/**
 * Variance: n * p * (1 - p)
 */
export function varianceBinomial(n: number, p: number): number {
  validateParameters(n, p);
  return n * p * (1 - p);
}

/**
 * Log probability mass function:
 * log C(n,k) + k*log(p) + (n-k)*log(1-p)
 */
export function logPmfBinomial(n: number, p: number, k: number): number {
  validateParameters(n, p);
  ParameterValidator.validateSuccesses(k, n);

  // Degenerate p: all mass on k = 0 or k = n
  if (p === 0) return k === 0 ? 0 : -Infinity;
  if (p === 1) return k === n ? 0 : -Infinity;

  return logBinomialCoefficient(n, k) + k * Math.log(p) + (n - k) * Math.log1p(-p);
}

/**
 * C(n,k) * p^k * (1-p)^(n-k) in double precision, or undefined when the
 * coefficient overflows or the powers underflow a nonzero mass to 0
 */
function exactMass(n: number, p: number, k: number): number | undefined {
  const coefficient = binomialCoefficient(n, k);
  if (!isFinite(coefficient)) return undefined;

  // Math.pow(0, 0) === 1 covers the degenerate p = 0 and p = 1 cases
  const mass = coefficient * Math.pow(p, k) * Math.pow(1 - p, n - k);
  if (mass === 0 && p > 0 && p < 1) return undefined;

  return mass;
}

function warnLogSpace(caller: string, n: number, k: number): void {
  console.warn(
    `${caller}: C(${n}, ${k}) * p^k * (1-p)^(n-k) leaves double range - evaluating in log space`
  );
}

/**
 * Probability mass function P(X = k) = C(n,k) * p^k * (1-p)^(n-k)
 */
export function pmfBinomial(n: number, p: number, k: number): number {
  validateParameters(n, p);
  ParameterValidator.validateSuccesses(k, n);

  const exact = exactMass(n, p, k);
  if (exact !== undefined) return exact;

  warnLogSpace('pmfBinomial', n, k);
  return Math.exp(logPmfBinomial(n, p, k));
}

/**
 * Cumulative distribution function P(X <= k), summed from the lower tail
 * so small probabilities keep their relative precision
 */
export function cdfBinomial(n: number, p: number, k: number): number {
  validateParameters(n, p);
  ParameterValidator.validateSuccesses(k, n);

  if (k === n) return 1;

  let total = 0;
  let overflowAt: number | undefined;

  for (let i = 0; i <= k; i++) {
    const exact = exactMass(n, p, i);
    if (exact === undefined) {
      if (overflowAt === undefined) overflowAt = i;
      total += Math.exp(logPmfBinomial(n, p, i));
    } else {
      total += exact;
    }
  }

  if (overflowAt !== undefined) {
    warnLogSpace('cdfBinomial', n, overflowAt);
  }

  return Math.min(1, total);
}

/**
 * Mode: floor((n + 1) * p), clamped to n for p = 1
 */
export function modeBinomial(n: number, p: number): number {
  validateParameters(n, p);
  return Math.min(n, Math.floor((n + 1) * p));
}
