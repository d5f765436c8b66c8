/**
 * ParameterValidator Tests
 */

import { describe, it, expect } from 'vitest';
import { ParameterValidator } from '../../domain/validation';
import { Support } from '../../domain/types';
import { ErrorCode } from '../../core/errors';
import { catchDiscretaError } from '../utilities/errors';

describe('ParameterValidator', () => {
  describe('validateProbability', () => {
    it('should accept 0 < p <= 1 by default', () => {
      expect(() => ParameterValidator.validateProbability(0.5)).not.toThrow();
      expect(() => ParameterValidator.validateProbability(1)).not.toThrow();
    });

    it('should reject p = 0 unless allowed', () => {
      const error = catchDiscretaError(() => ParameterValidator.validateProbability(0));
      expect(error.code).toBe(ErrorCode.INVALID_PROBABILITY);
      expect(error.message).toBe('p must satisfy 0 < p <= 1');

      expect(() =>
        ParameterValidator.validateProbability(0, { allowZero: true })
      ).not.toThrow();
    });

    it('should reject values outside the unit interval', () => {
      for (const p of [-0.01, 1.0001, 1.5, NaN, Infinity]) {
        const error = catchDiscretaError(() =>
          ParameterValidator.validateProbability(p, { allowZero: true })
        );
        expect(error.code).toBe(ErrorCode.INVALID_PROBABILITY);
        expect(error.message).toBe('p must satisfy 0 <= p <= 1');
      }
    });

    it('should reject non-numeric input', () => {
      const p: number = JSON.parse('"0.5"');
      expect(catchDiscretaError(() => ParameterValidator.validateProbability(p)).code).toBe(
        ErrorCode.INVALID_PROBABILITY
      );
    });
  });

  describe('validateInteger', () => {
    it('should accept whole numbers', () => {
      expect(() => ParameterValidator.validateInteger('k', 0)).not.toThrow();
      expect(() => ParameterValidator.validateInteger('k', -4)).not.toThrow();
      expect(() => ParameterValidator.validateInteger('k', 3.0)).not.toThrow();
    });

    it('should reject fractional and non-finite values', () => {
      for (const value of [0.5, NaN, Infinity]) {
        const error = catchDiscretaError(() => ParameterValidator.validateInteger('k', value));
        expect(error.code).toBe(ErrorCode.INVALID_COUNT_TYPE);
      }
    });

    it('should name the argument in message and context', () => {
      const error = catchDiscretaError(() => ParameterValidator.validateInteger('n', 2.5));
      expect(error.message).toBe('n must be an integer');
      expect(error.context).toEqual({ n: 2.5 });
    });
  });

  describe('validateSupport', () => {
    it('should return both conventions unchanged', () => {
      expect(ParameterValidator.validateSupport(0)).toBe(Support.TrialsToSuccess);
      expect(ParameterValidator.validateSupport(1)).toBe(Support.FailuresBeforeSuccess);
    });

    it('should reject any other value', () => {
      for (const value of [2, -1, '0', 'trials', null]) {
        expect(catchDiscretaError(() => ParameterValidator.validateSupport(value)).code).toBe(
          ErrorCode.INVALID_SUPPORT
        );
      }
    });
  });

  describe('validateOutcome', () => {
    it('should start trials at one', () => {
      expect(() => ParameterValidator.validateOutcome(1, Support.TrialsToSuccess)).not.toThrow();

      const error = catchDiscretaError(() =>
        ParameterValidator.validateOutcome(0, Support.TrialsToSuccess)
      );
      expect(error.code).toBe(ErrorCode.INVALID_COUNT_RANGE);
      expect(error.message).toBe('k must be a positive integer when support is TrialsToSuccess');
    });

    it('should start failures at zero', () => {
      expect(() =>
        ParameterValidator.validateOutcome(0, Support.FailuresBeforeSuccess)
      ).not.toThrow();
      expect(
        catchDiscretaError(() =>
          ParameterValidator.validateOutcome(-1, Support.FailuresBeforeSuccess)
        ).code
      ).toBe(ErrorCode.INVALID_COUNT_RANGE);
    });
  });

  describe('validateTrialCount', () => {
    it('should accept positive integers', () => {
      expect(() => ParameterValidator.validateTrialCount(1)).not.toThrow();
      expect(() => ParameterValidator.validateTrialCount(500)).not.toThrow();
    });

    it('should separate type and range failures', () => {
      expect(catchDiscretaError(() => ParameterValidator.validateTrialCount(1.5)).code).toBe(
        ErrorCode.INVALID_COUNT_TYPE
      );
      expect(catchDiscretaError(() => ParameterValidator.validateTrialCount(0)).code).toBe(
        ErrorCode.INVALID_COUNT_RANGE
      );
    });
  });

  describe('validateTrialCount beyond 2^53', () => {
    it('should accept the largest safe integer', () => {
      expect(() => ParameterValidator.validateTrialCount(Number.MAX_SAFE_INTEGER)).not.toThrow();
    });

    it('should reject 2^53 and above', () => {
      for (const n of [2 ** 53, 2 ** 60]) {
        const error = catchDiscretaError(() => ParameterValidator.validateTrialCount(n));
        expect(error.code).toBe(ErrorCode.INVALID_COUNT_RANGE);
        expect(error.message).toBe('n must not exceed Number.MAX_SAFE_INTEGER');
        expect(error.context).toEqual({ n });
      }
    });
  });

  describe('validateSuccesses', () => {
    it('should accept 0 <= k <= n', () => {
      expect(() => ParameterValidator.validateSuccesses(0, 4)).not.toThrow();
      expect(() => ParameterValidator.validateSuccesses(4, 4)).not.toThrow();
    });

    it('should reject k outside 0..n', () => {
      expect(catchDiscretaError(() => ParameterValidator.validateSuccesses(-1, 4)).code).toBe(
        ErrorCode.INVALID_COUNT_RANGE
      );
      expect(catchDiscretaError(() => ParameterValidator.validateSuccesses(5, 4)).code).toBe(
        ErrorCode.INVALID_COUNT_RANGE
      );
      expect(catchDiscretaError(() => ParameterValidator.validateSuccesses(2.5, 4)).code).toBe(
        ErrorCode.INVALID_COUNT_TYPE
      );
    });
  });
});
