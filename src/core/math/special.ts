/**
 * Special mathematical functions - standalone implementations
 */

const LOG_SQRT_TWO_PI = 0.91893853320467274178;

// Stirling series after shifting x above 10
export function logGamma(x: number): number {
  if (x <= 0) return NaN;

  let result = 0;
  while (x < 10) {
    result -= Math.log(x);
    x += 1;
  }

  const xInv2 = 1 / (x * x);
  const series = (1 / 12 - xInv2 * (1 / 360 - xInv2 * (1 / 1260 - xInv2 / 1680))) / x;
  return result + (x - 0.5) * Math.log(x) - x + LOG_SQRT_TWO_PI + series;
}

export function logFactorial(n: number): number {
  if (n < 0) return -Infinity;
  if (n <= 1) return 0;

  if (n < 20) {
    let result = 0;
    for (let i = 2; i <= n; i++) {
      result += Math.log(i);
    }
    return result;
  }

  return logGamma(n + 1);
}

/**
 * Binomial coefficient C(n, k) by the multiplicative formula.
 *
 * After step i the running value equals C(n - k + i, i), so every
 * intermediate is an integer and the result is exact below 2^53. Values past
 * the double range come back as Infinity.
 */
export function binomialCoefficient(n: number, k: number): number {
  if (k < 0 || k > n) return 0;
  if (k === 0 || k === n) return 1;

  // Symmetry: C(n, k) = C(n, n - k)
  const m = Math.min(k, n - k);

  let result = 1;
  for (let i = 1; i <= m; i++) {
    result = (result * (n - m + i)) / i;
    if (!isFinite(result)) return Infinity;
  }

  return result;
}

/**
 * log C(n, k): summed term by term for small n, through log factorials above
 */
export function logBinomialCoefficient(n: number, k: number): number {
  if (k < 0 || k > n || n < 0) return -Infinity;
  if (k === 0 || k === n) return 0;

  if (n < 20) {
    const m = Math.min(k, n - k);
    let result = 0;
    for (let i = 1; i <= m; i++) {
      result += Math.log(n - m + i) - Math.log(i);
    }
    return result;
  }

  return logFactorial(n) - logFactorial(k) - logFactorial(n - k);
}
