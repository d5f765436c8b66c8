/**
 * Discreta - closed-form statistics for discrete distributions
 *
 * Mean, variance, PMF and CDF of the geometric and binomial families, with
 * every input checked against its domain before evaluation.
 */

// Errors, distributions and special functions
export * from './core';

// Support conventions and parameter validation
export * from './domain';

// Version
export const VERSION = '0.1.0';
