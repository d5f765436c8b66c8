/**
 * Geometric distribution object over the functional API
 */

import { DiscreteDistribution } from './Distribution';
import {
  cdfGeometric,
  logPmfGeometric,
  meanGeometric,
  modeGeometric,
  pmfGeometric,
  survivalGeometric,
  varianceGeometric,
} from './geometric';
import { DEFAULT_SUPPORT, Support, supportMinimum } from '../../domain/types/support';
import { ParameterValidator } from '../../domain/validation/ParameterValidator';

export class GeometricDistribution implements DiscreteDistribution {
  private readonly convention: Support;

  constructor(
    private readonly p: number,
    support: Support = DEFAULT_SUPPORT
  ) {
    ParameterValidator.validateProbability(p);
    this.convention = ParameterValidator.validateSupport(support);
  }

  pmf(k: number): number {
    return pmfGeometric(this.p, k, this.convention);
  }

  logPmf(k: number): number {
    return logPmfGeometric(this.p, k, this.convention);
  }

  cdf(k: number): number {
    return cdfGeometric(this.p, k, this.convention);
  }

  /**
   * Survival function P(X > k)
   */
  survival(k: number): number {
    return survivalGeometric(this.p, k, this.convention);
  }

  mean(): number {
    return meanGeometric(this.p, this.convention);
  }

  variance(): number {
    return varianceGeometric(this.p, this.convention);
  }

  mode(): number {
    return modeGeometric(this.convention);
  }

  support(): { min: number; max: number } {
    return { min: supportMinimum(this.convention), max: Infinity };
  }

  getParameters(): { p: number; support: Support } {
    return { p: this.p, support: this.convention };
  }
}
