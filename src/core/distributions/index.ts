/**
 * Discrete Distribution Module
 *
 * Closed-form statistics for the geometric and binomial families, as plain
 * functions and as distribution objects.
 */

export type { DiscreteDistribution } from './Distribution';

export {
  meanGeometric,
  varianceGeometric,
  pmfGeometric,
  logPmfGeometric,
  cdfGeometric,
  survivalGeometric,
  modeGeometric,
} from './geometric';

export {
  meanBinomial,
  varianceBinomial,
  pmfBinomial,
  logPmfBinomial,
  cdfBinomial,
  modeBinomial,
} from './binomial';

export { GeometricDistribution } from './GeometricDistribution';
export { BinomialDistribution } from './BinomialDistribution';
