/**
 * Parameter Validator
 *
 * Precondition checks shared by the distribution functions. Each guard throws
 * a DiscretaError whose code names the violated domain; nothing is clamped or
 * defaulted.
 */

import { DiscretaError, ErrorCode } from '../../core/errors';
import { Support } from '../types/support';

export interface ProbabilityOptions {
  /** Accept p = 0 (binomial) instead of requiring p > 0 (geometric) */
  allowZero?: boolean;
}

export class ParameterValidator {
  /**
   * Validate a success probability: 0 < p <= 1, or 0 <= p <= 1 with allowZero
   */
  static validateProbability(p: number, options: ProbabilityOptions = {}): void {
    const allowZero = options.allowZero ?? false;
    // Negated comparisons so NaN is rejected too
    const inRange = allowZero ? p >= 0 && p <= 1 : p > 0 && p <= 1;

    if (typeof p !== 'number' || !inRange) {
      throw new DiscretaError(
        ErrorCode.INVALID_PROBABILITY,
        allowZero ? 'p must satisfy 0 <= p <= 1' : 'p must satisfy 0 < p <= 1',
        { p }
      );
    }
  }

  /**
   * Validate that a count argument is a whole number
   */
  static validateInteger(name: string, value: number): void {
    if (!Number.isInteger(value)) {
      throw new DiscretaError(ErrorCode.INVALID_COUNT_TYPE, `${name} must be an integer`, {
        [name]: value,
      });
    }
  }

  /**
   * Validate a support flag and narrow it to the Support enum.
   * Anything other than the two conventions is rejected explicitly.
   */
  static validateSupport(support: unknown): Support {
    if (support === Support.TrialsToSuccess || support === Support.FailuresBeforeSuccess) {
      return support;
    }

    throw new DiscretaError(
      ErrorCode.INVALID_SUPPORT,
      'support must be TrialsToSuccess (0) or FailuresBeforeSuccess (1)',
      { support }
    );
  }

  /**
   * Validate that k lies in the outcome domain of a geometric convention
   */
  static validateOutcome(k: number, support: Support): void {
    if (support === Support.TrialsToSuccess && k < 1) {
      throw new DiscretaError(
        ErrorCode.INVALID_COUNT_RANGE,
        'k must be a positive integer when support is TrialsToSuccess',
        { k, support }
      );
    }

    if (support === Support.FailuresBeforeSuccess && k < 0) {
      throw new DiscretaError(
        ErrorCode.INVALID_COUNT_RANGE,
        'k must be a non-negative integer when support is FailuresBeforeSuccess',
        { k, support }
      );
    }
  }

  /**
   * Validate a binomial trial count: a safe integer greater than zero
   */
  static validateTrialCount(n: number): void {
    if (!Number.isInteger(n)) {
      throw new DiscretaError(ErrorCode.INVALID_COUNT_TYPE, 'n must be a positive integer', { n });
    }

    if (n <= 0) {
      throw new DiscretaError(ErrorCode.INVALID_COUNT_RANGE, 'n must be a positive integer', {
        n,
      });
    }

    // Past 2^53 neighbouring counts are no longer distinct doubles
    if (!Number.isSafeInteger(n)) {
      throw new DiscretaError(
        ErrorCode.INVALID_COUNT_RANGE,
        'n must not exceed Number.MAX_SAFE_INTEGER',
        { n }
      );
    }
  }

  /**
   * Validate a number of successes against the trial count: 0 <= k <= n
   */
  static validateSuccesses(k: number, n: number): void {
    this.validateInteger('k', k);

    if (k < 0) {
      throw new DiscretaError(ErrorCode.INVALID_COUNT_RANGE, 'k must be a non-negative integer', {
        k,
      });
    }

    if (k > n) {
      throw new DiscretaError(
        ErrorCode.INVALID_COUNT_RANGE,
        'k cannot exceed the number of trials n',
        { k, n }
      );
    }
  }
}
