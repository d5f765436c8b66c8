/**
 * Geometric Distribution - closed-form statistics
 *
 * Number of independent Bernoulli(p) trials needed for the first success
 * (Support.TrialsToSuccess, k = 1, 2, ...) or the number of failures before
 * it (Support.FailuresBeforeSuccess, k = 0, 1, ...).
 */

import { DEFAULT_SUPPORT, Support, supportMinimum } from '../../domain/types/support';
import { ParameterValidator } from '../../domain/validation/ParameterValidator';

/**
 * Shared precondition chain of the PMF-style functions, in order:
 * p, k is an integer, support flag, k inside the convention's domain.
 * Returns the narrowed support.
 */
function validateOutcomeArgs(p: number, k: number, support: Support): Support {
  ParameterValidator.validateProbability(p);
  ParameterValidator.validateInteger('k', k);
  const checked = ParameterValidator.validateSupport(support);
  ParameterValidator.validateOutcome(k, checked);
  return checked;
}

/**
 * Mean: 1/p for trials to success, (1-p)/p for failures before success
 */
export function meanGeometric(p: number, support: Support = DEFAULT_SUPPORT): number {
  ParameterValidator.validateProbability(p);
  const checked = ParameterValidator.validateSupport(support);

  return checked === Support.TrialsToSuccess ? 1 / p : (1 - p) / p;
}

/**
 * Variance: (1-p)/p², identical under both conventions
 */
export function varianceGeometric(p: number, support: Support = DEFAULT_SUPPORT): number {
  ParameterValidator.validateProbability(p);
  ParameterValidator.validateSupport(support);

  return (1 - p) / (p * p);
}

/**
 * Probability mass function P(X = k)
 */
export function pmfGeometric(p: number, k: number, support: Support = DEFAULT_SUPPORT): number {
  const checked = validateOutcomeArgs(p, k, support);

  // (1-p)^(k-1) * p  or  (1-p)^k * p
  return Math.pow(1 - p, k - supportMinimum(checked)) * p;
}

/**
 * Log probability mass function log P(X = k)
 */
export function logPmfGeometric(
  p: number,
  k: number,
  support: Support = DEFAULT_SUPPORT
): number {
  const checked = validateOutcomeArgs(p, k, support);
  const failures = k - supportMinimum(checked);

  // Point mass at the domain minimum
  if (p === 1) {
    return failures === 0 ? 0 : -Infinity;
  }

  return failures * Math.log1p(-p) + Math.log(p);
}

/**
 * Cumulative distribution function P(X <= k)
 */
export function cdfGeometric(p: number, k: number, support: Support = DEFAULT_SUPPORT): number {
  const checked = validateOutcomeArgs(p, k, support);

  // 1 - (1-p)^k  or  1 - (1-p)^(k+1)
  return 1 - Math.pow(1 - p, k + 1 - supportMinimum(checked));
}

/**
 * Survival function P(X > k)
 */
export function survivalGeometric(
  p: number,
  k: number,
  support: Support = DEFAULT_SUPPORT
): number {
  const checked = validateOutcomeArgs(p, k, support);

  return Math.pow(1 - p, k + 1 - supportMinimum(checked));
}

/**
 * Mode: the smallest outcome of the domain, for every p
 */
export function modeGeometric(support: Support = DEFAULT_SUPPORT): number {
  return supportMinimum(ParameterValidator.validateSupport(support));
}
