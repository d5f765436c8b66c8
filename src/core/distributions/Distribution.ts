/**
 * Base interface for discrete probability distributions
 */
export interface DiscreteDistribution {
  /**
   * Probability mass function P(X = k)
   */
  pmf(k: number): number;

  /**
   * Log probability mass function
   */
  logPmf(k: number): number;

  /**
   * Cumulative distribution function P(X <= k)
   */
  cdf(k: number): number;

  /**
   * Expected value of the distribution
   */
  mean(): number;

  /**
   * Variance of the distribution
   */
  variance(): number;

  /**
   * Most likely outcome
   */
  mode(): number;

  /**
   * Support of the distribution (where PMF > 0)
   */
  support(): { min: number; max: number };
}
