/**
 * Core Discreta module exports
 */

// Error handling system
export { DiscretaError, ErrorCode, isDiscretaError, wrapError } from './errors';

// Distributions
export * from './distributions';

// Special functions
export {
  binomialCoefficient,
  logBinomialCoefficient,
  logFactorial,
  logGamma,
} from './math/special';
