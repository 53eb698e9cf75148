export type Matrix = number[][];

const MAX_JACOBI_SWEEPS = 100;

const identity = (n: number): Matrix => {
  return Array.from({ length: n }, (_, i) =>
    Array.from({ length: n }, (_, j) => (i === j ? 1 : 0))
  );
};

const maxAbsEntry = (m: readonly (readonly number[])[]): number => {
  let max = 0;
  for (const row of m) {
    for (const value of row) {
      max = Math.max(max, Math.abs(value));
    }
  }
  return max;
};

/**
 * Gauss-Jordan inversion with partial pivoting.
 * Returns null when a pivot vanishes relative to the matrix scale.
 */
export const invertMatrix = (m: readonly (readonly number[])[]): Matrix | null => {
  const n = m.length;
  if (n === 0) {
    return [];
  }
  if (m.some((row) => row.length !== n)) {
    throw new Error("invertMatrix requires a square matrix");
  }

  const scale = maxAbsEntry(m);
  if (scale === 0) {
    return null;
  }
  const tolerance = scale * n * Number.EPSILON;

  const a = m.map((row) => [...row]);
  const inv = identity(n);

  for (let col = 0; col < n; col += 1) {
    let pivotRow = col;
    let pivotValue = Math.abs(a[col][col]);
    for (let r = col + 1; r < n; r += 1) {
      const candidate = Math.abs(a[r][col]);
      if (candidate > pivotValue) {
        pivotValue = candidate;
        pivotRow = r;
      }
    }

    if (pivotValue <= tolerance) {
      return null;
    }

    if (pivotRow !== col) {
      [a[col], a[pivotRow]] = [a[pivotRow], a[col]];
      [inv[col], inv[pivotRow]] = [inv[pivotRow], inv[col]];
    }

    const pivot = a[col][col];
    for (let c = 0; c < n; c += 1) {
      a[col][c] /= pivot;
      inv[col][c] /= pivot;
    }

    for (let r = 0; r < n; r += 1) {
      if (r === col) {
        continue;
      }
      const factor = a[r][col];
      if (factor === 0) {
        continue;
      }
      for (let c = 0; c < n; c += 1) {
        a[r][c] -= factor * a[col][c];
        inv[r][c] -= factor * inv[col][c];
      }
    }
  }

  return inv;
};

export type SymmetricEigen = {
  readonly values: number[];
  /** Eigenvectors are the columns. */
  readonly vectors: Matrix;
};

/** Cyclic Jacobi eigendecomposition of a symmetric matrix. */
export const symmetricEigen = (m: readonly (readonly number[])[]): SymmetricEigen => {
  const n = m.length;
  const a = m.map((row) => [...row]);
  const v = identity(n);
  const norm = Math.sqrt(a.reduce((acc, row) => acc + row.reduce((s, x) => s + x * x, 0), 0));

  for (let sweep = 0; sweep < MAX_JACOBI_SWEEPS; sweep += 1) {
    let offDiagonal = 0;
    for (let p = 0; p < n; p += 1) {
      for (let q = p + 1; q < n; q += 1) {
        offDiagonal += a[p][q] * a[p][q];
      }
    }
    if (offDiagonal === 0 || Math.sqrt(offDiagonal) <= norm * Number.EPSILON) {
      break;
    }

    for (let p = 0; p < n; p += 1) {
      for (let q = p + 1; q < n; q += 1) {
        const apq = a[p][q];
        if (apq === 0) {
          continue;
        }

        const theta = (a[q][q] - a[p][p]) / (2 * apq);
        const t = (theta >= 0 ? 1 : -1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < n; k += 1) {
          const akp = a[k][p];
          const akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < n; k += 1) {
          const apk = a[p][k];
          const aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        for (let k = 0; k < n; k += 1) {
          const vkp = v[k][p];
          const vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  return {
    values: a.map((row, i) => row[i]),
    vectors: v,
  };
};

/**
 * Moore-Penrose pseudo-inverse of a symmetric matrix. Eigenvalues at or
 * below n * eps * max|lambda| are treated as zero.
 */
export const pseudoInverseSymmetric = (m: readonly (readonly number[])[]): Matrix => {
  const n = m.length;
  const { values, vectors } = symmetricEigen(m);
  const largest = values.reduce((acc, value) => Math.max(acc, Math.abs(value)), 0);
  const cutoff = largest * n * Number.EPSILON;
  const result = Array.from({ length: n }, () => new Array<number>(n).fill(0));

  values.forEach((lambda, k) => {
    if (Math.abs(lambda) <= cutoff) {
      return;
    }
    const inverse = 1 / lambda;
    for (let i = 0; i < n; i += 1) {
      const vik = vectors[i][k] * inverse;
      for (let j = 0; j < n; j += 1) {
        result[i][j] += vik * vectors[j][k];
      }
    }
  });

  return result;
};

/** x^T M x */
export const quadraticForm = (x: readonly number[], m: readonly (readonly number[])[]): number => {
  let total = 0;
  m.forEach((row, i) => {
    let rowDot = 0;
    row.forEach((value, j) => {
      rowDot += value * (x[j] ?? 0);
    });
    total += (x[i] ?? 0) * rowDot;
  });
  return total;
};
