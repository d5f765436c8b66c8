/**
 * Binomial distribution object over the functional API
 */

import { DiscreteDistribution } from './Distribution';
import {
  cdfBinomial,
  logPmfBinomial,
  meanBinomial,
  modeBinomial,
  pmfBinomial,
  varianceBinomial,
} from './binomial';
import { ParameterValidator } from '../../domain/validation/ParameterValidator';

export class BinomialDistribution implements DiscreteDistribution {
  constructor(
    private readonly n: number,
    private readonly p: number
  ) {
    ParameterValidator.validateTrialCount(n);
    ParameterValidator.validateProbability(p, { allowZero: true });
  }

  pmf(k: number): number {
    return pmfBinomial(this.n, this.p, k);
  }

  logPmf(k: number): number {
    return logPmfBinomial(this.n, this.p, k);
  }

  cdf(k: number): number {
    return cdfBinomial(this.n, this.p, k);
  }

  /**
   * Mean: n * p
   */
  mean(): number {
    return meanBinomial(this.n, this.p);
  }

  /**
   * Variance: n * p * (1 - p)
   */
  variance(): number {
    return varianceBinomial(this.n, this.p);
  }

  /**
   * Mode: floor((n+1)*p)
   */
  mode(): number {
    return modeBinomial(this.n, this.p);
  }

  support(): { min: number; max: number } {
    return { min: 0, max: this.n };
  }

  getParameters(): { n: number; p: number } {
    return { n: this.n, p: this.p };
  }
}
