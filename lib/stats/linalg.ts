/**
 * Solve A x = b by Gauss-Jordan elimination with partial pivoting.
 * Returns null when a pivot vanishes relative to the largest diagonal entry.
 */
export function solveLinearSystem(A: readonly (readonly number[])[], b: readonly number[]): number[] | null {
  const n = A.length;
  const augmented = A.map((row, i) => [...row, b[i]]);
  const scale = Math.max(...A.map((row, i) => Math.abs(row[i])), 1e-300);

  for (let i = 0; i < n; i++) {
    let maxRow = i;
    for (let k = i + 1; k < n; k++) {
      if (Math.abs(augmented[k][i]) > Math.abs(augmented[maxRow][i])) {
        maxRow = k;
      }
    }
    [augmented[i], augmented[maxRow]] = [augmented[maxRow], augmented[i]];

    const pivot = augmented[i][i];
    if (Math.abs(pivot) < 1e-13 * scale) {
      return null;
    }

    for (let j = i; j <= n; j++) {
      augmented[i][j] /= pivot;
    }

    for (let k = 0; k < n; k++) {
      if (k !== i) {
        const factor = augmented[k][i];
        if (factor === 0) continue;
        for (let j = i; j <= n; j++) {
          augmented[k][j] -= factor * augmented[i][j];
        }
      }
    }
  }

  return augmented.map((row) => row[n]);
}

/** Penalised normal equations: (X'X + diag(penalty)) beta = X'y. */
export function solveRidge(
  X: readonly (readonly number[])[],
  y: readonly number[],
  penalty: readonly number[]
): number[] | null {
  const k = penalty.length;
  const XtX: number[][] = Array.from({ length: k }, () => Array<number>(k).fill(0));
  const Xty: number[] = Array<number>(k).fill(0);

  for (let t = 0; t < X.length; t++) {
    const row = X[t];
    for (let i = 0; i < k; i++) {
      const xi = row[i];
      if (xi === 0) continue;
      Xty[i] += xi * y[t];
      for (let j = i; j < k; j++) {
        XtX[i][j] += xi * row[j];
      }
    }
  }
  for (let i = 0; i < k; i++) {
    XtX[i][i] += penalty[i];
    for (let j = 0; j < i; j++) {
      XtX[i][j] = XtX[j][i];
    }
  }

  return solveLinearSystem(XtX, Xty);
}
