export const clamp = (value: number, lo: number, hi: number): number => {
  return Math.min(hi, Math.max(lo, value));
};

/** Rounds to a fixed number of decimals for reporting. */
export const roundTo = (value: number, digits: number): number => {
  return Number(value.toFixed(digits));
};

/** Rounds to the nearest integer, ties to the even neighbour (2.5 -> 2, 3.5 -> 4). */
export const roundHalfEven = (value: number): number => {
  const floor = Math.floor(value);
  const fraction = value - floor;

  if (fraction > 0.5) {
    return floor + 1;
  }
  if (fraction < 0.5) {
    return floor;
  }
  return floor % 2 === 0 ? floor : floor + 1;
};

export const mean = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((acc, value) => acc + value, 0) / values.length;
};

/** Population variance (divides by n). */
export const populationVariance = (values: readonly number[]): number => {
  if (values.length === 0) {
    return 0;
  }
  const m = mean(values);
  return values.reduce((acc, value) => acc + (value - m) * (value - m), 0) / values.length;
};

export const populationStd = (values: readonly number[]): number => {
  return Math.sqrt(populationVariance(values));
};

/**
 * Pearson correlation of two equal-length series.
 * Returns null when either series has zero variance.
 */
export const pearsonCorrelation = (xs: readonly number[], ys: readonly number[]): number | null => {
  if (xs.length !== ys.length) {
    throw new Error("pearsonCorrelation requires series of equal length");
  }
  if (xs.length < 2) {
    return null;
  }

  const mx = mean(xs);
  const my = mean(ys);
  let sxy = 0;
  let sxx = 0;
  let syy = 0;

  xs.forEach((x, index) => {
    const dx = x - mx;
    const dy = (ys[index] ?? my) - my;
    sxy += dx * dy;
    sxx += dx * dx;
    syy += dy * dy;
  });

  if (sxx === 0 || syy === 0) {
    return null;
  }

  return clamp(sxy / Math.sqrt(sxx * syy), -1, 1);
};

/** Column means of a row-major matrix. */
export const columnMeans = (rows: readonly (readonly number[])[]): number[] => {
  const width = rows[0]?.length ?? 0;
  const sums = new Array<number>(width).fill(0);

  for (const row of rows) {
    row.forEach((value, column) => {
      sums[column] = (sums[column] ?? 0) + value;
    });
  }

  return sums.map((sum) => sum / rows.length);
};

/** Sample covariance (divides by n - 1) of the columns of a row-major matrix. */
export const covarianceMatrix = (rows: readonly (readonly number[])[]): number[][] => {
  const means = columnMeans(rows);
  const width = means.length;
  const cov = Array.from({ length: width }, () => new Array<number>(width).fill(0));
  const centered = rows.map((row) => row.map((value, column) => value - (means[column] ?? 0)));

  for (let i = 0; i < width; i += 1) {
    for (let j = i; j < width; j += 1) {
      let sum = 0;
      for (const row of centered) {
        sum += (row[i] ?? 0) * (row[j] ?? 0);
      }
      const value = sum / (rows.length - 1);
      cov[i][j] = value;
      cov[j][i] = value;
    }
  }

  return cov;
};
