/**
 * Two-sample Kolmogorov-Smirnov test
 *
 * p-values come from the asymptotic Kolmogorov distribution with Stephens'
 * correction for the effective sample size.
 */

/**
 * Returns a significance value in [0, 1]; small means the samples
 * are unlikely to share a distribution.
 */
export type TwoSampleTest = (a: readonly number[], b: readonly number[]) => number;

/**
 * Largest vertical gap between the two empirical CDFs. Non-finite values
 * (missing features) are left out of both samples.
 */
export function ksStatistic(a: readonly number[], b: readonly number[]): number {
  const x = finiteSorted(a);
  const y = finiteSorted(b);
  let i = 0;
  let j = 0;
  let d = 0;

  while (i < x.length && j < y.length) {
    const value = Math.min(x[i], y[j]);
    while (i < x.length && x[i] === value) i++;
    while (j < y.length && y[j] === value) j++;
    d = Math.max(d, Math.abs(i / x.length - j / y.length));
  }
  return d;
}

function finiteSorted(values: readonly number[]): number[] {
  return values.filter((value) => Number.isFinite(value)).sort((p, q) => p - q);
}

/**
 * Survival function of the Kolmogorov distribution, Q(lambda)
 */
export function kolmogorovSurvival(lambda: number): number {
  if (lambda < 0.2) {
    return 1;
  }
  let sum = 0;
  for (let k = 1; k <= 100; k++) {
    const term = 2 * (k % 2 === 1 ? 1 : -1) * Math.exp(-2 * k * k * lambda * lambda);
    sum += term;
    if (Math.abs(term) < 1e-12) {
      break;
    }
  }
  return Math.min(1, Math.max(0, sum));
}

export const kolmogorovSmirnovTest: TwoSampleTest = (a, b) => {
  const n = countFinite(a);
  const m = countFinite(b);
  if (n === 0 || m === 0) {
    return 1;
  }
  const d = ksStatistic(a, b);
  const effective = Math.sqrt((n * m) / (n + m));
  return kolmogorovSurvival((effective + 0.12 + 0.11 / effective) * d);
};

function countFinite(values: readonly number[]): number {
  return values.reduce((count, value) => (Number.isFinite(value) ? count + 1 : count), 0);
}
