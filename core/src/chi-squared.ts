/**
 * Chi-squared distribution via the regularized incomplete gamma function
 * (series expansion below a + 1, Lentz continued fraction above).
 */

const MAX_ITERATIONS = 500;
const EPSILON = 1e-15;
const FP_MIN = 1e-300;
const BISECTION_STEPS = 200;

const LANCZOS = [
  76.18009172947146, -86.50532032941677, 24.01409824083091, -1.231739572450155,
  0.1208650973866179e-2, -0.5395239384953e-5,
] as const;

export const lnGamma = (x: number): number => {
  let y = x;
  let tmp = x + 5.5;
  tmp -= (x + 0.5) * Math.log(tmp);
  let series = 1.000000000190015;
  for (const coefficient of LANCZOS) {
    y += 1;
    series += coefficient / y;
  }
  return -tmp + Math.log((2.5066282746310005 * series) / x);
};

const lowerSeries = (a: number, x: number): number => {
  let ap = a;
  let delta = 1 / a;
  let sum = delta;
  for (let n = 0; n < MAX_ITERATIONS; n += 1) {
    ap += 1;
    delta *= x / ap;
    sum += delta;
    if (Math.abs(delta) < Math.abs(sum) * EPSILON) {
      break;
    }
  }
  return sum * Math.exp(-x + a * Math.log(x) - lnGamma(a));
};

const upperContinuedFraction = (a: number, x: number): number => {
  let b = x + 1 - a;
  let c = 1 / FP_MIN;
  let d = 1 / b;
  let h = d;
  for (let i = 1; i <= MAX_ITERATIONS; i += 1) {
    const an = -i * (i - a);
    b += 2;
    d = an * d + b;
    if (Math.abs(d) < FP_MIN) {
      d = FP_MIN;
    }
    c = b + an / c;
    if (Math.abs(c) < FP_MIN) {
      c = FP_MIN;
    }
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < EPSILON) {
      break;
    }
  }
  return Math.exp(-x + a * Math.log(x) - lnGamma(a)) * h;
};

/** P(a, x) */
export const regularizedGammaP = (a: number, x: number): number => {
  if (x <= 0) {
    return 0;
  }
  return x < a + 1 ? lowerSeries(a, x) : 1 - upperContinuedFraction(a, x);
};

/** Q(a, x) = 1 - P(a, x) */
export const regularizedGammaQ = (a: number, x: number): number => {
  if (x <= 0) {
    return 1;
  }
  return x < a + 1 ? 1 - lowerSeries(a, x) : upperContinuedFraction(a, x);
};

export const chiSquaredCdf = (x: number, df: number): number => {
  return regularizedGammaP(df / 2, x / 2);
};

/** Upper-tail probability, P(X > x). */
export const chiSquaredSurvival = (x: number, df: number): number => {
  return regularizedGammaQ(df / 2, x / 2);
};

/** The x whose upper-tail probability equals `upperTail`. */
export const chiSquaredCriticalValue = (upperTail: number, df: number): number => {
  if (!(upperTail > 0 && upperTail < 1)) {
    throw new RangeError(`upperTail must be in (0, 1), received ${upperTail}`);
  }
  if (!(df > 0)) {
    throw new RangeError(`df must be positive, received ${df}`);
  }

  let lo = 0;
  let hi = Math.max(1, df);
  while (chiSquaredSurvival(hi, df) > upperTail) {
    lo = hi;
    hi *= 2;
  }

  for (let step = 0; step < BISECTION_STEPS && hi - lo > EPSILON * hi; step += 1) {
    const mid = (lo + hi) / 2;
    if (chiSquaredSurvival(mid, df) > upperTail) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return (lo + hi) / 2;
};
