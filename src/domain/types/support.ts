/**
 * Support conventions of the geometric distribution
 */

import { DiscretaError, ErrorCode } from '../../core/errors';

/**
 * Which of the two equivalent outcome domains a geometric distribution uses
 */
export enum Support {
  /** Number of trials up to and including the first success: k = 1, 2, 3, ... */
  TrialsToSuccess = 0,
  /** Number of failures before the first success: k = 0, 1, 2, ... */
  FailuresBeforeSuccess = 1,
}

export const DEFAULT_SUPPORT = Support.TrialsToSuccess;

const SUPPORT_ALIASES: Readonly<Record<string, Support>> = {
  TrialsToSuccess: Support.TrialsToSuccess,
  FailuresBeforeSuccess: Support.FailuresBeforeSuccess,
  trials: Support.TrialsToSuccess,
  failures: Support.FailuresBeforeSuccess,
};

/**
 * Smallest outcome in the domain of the given convention
 */
export function supportMinimum(support: Support): 0 | 1 {
  return support === Support.TrialsToSuccess ? 1 : 0;
}

/**
 * Convert external input (a raw flag, an enum member name or an alias)
 * into a Support value.
 */
export function parseSupport(value: unknown): Support {
  if (value === Support.TrialsToSuccess || value === Support.FailuresBeforeSuccess) {
    return value;
  }

  if (typeof value === 'string' && Object.prototype.hasOwnProperty.call(SUPPORT_ALIASES, value)) {
    return SUPPORT_ALIASES[value];
  }

  throw new DiscretaError(
    ErrorCode.INVALID_SUPPORT,
    'support must be TrialsToSuccess (0) or FailuresBeforeSuccess (1)',
    { support: value }
  );
}
