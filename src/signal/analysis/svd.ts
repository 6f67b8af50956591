/**
 * Singular values of small dense matrices.
 *
 * The singular values of A are the square roots of the eigenvalues of the
 * symmetric Gram matrix AᵀA, which mathjs diagonalises for us.
 *
 * @module signal/analysis/svd
 */

import { eigs, isMatrix } from 'mathjs';
import type { LogTarget } from '../../utils/logger';
import { createLogger, toError } from '../../utils/logger';

const defaultLog = createLogger('signal:svd');

/**
 * AᵀA for a row-major matrix
 */
export function gramMatrix(matrix: readonly (readonly number[])[]): number[][] {
  const cols = matrix[0]?.length ?? 0;
  const gram: number[][] = Array.from({ length: cols }, () => new Array<number>(cols).fill(0));

  for (const row of matrix) {
    for (let i = 0; i < cols; i++) {
      for (let j = i; j < cols; j++) {
        gram[i][j] += row[i] * row[j];
      }
    }
  }
  for (let i = 0; i < cols; i++) {
    for (let j = 0; j < i; j++) {
      gram[i][j] = gram[j][i];
    }
  }
  return gram;
}

function collectNumbers(value: unknown, out: number[]): void {
  if (typeof value === 'number') {
    out.push(value);
  } else if (isMatrix(value)) {
    collectNumbers(value.toArray(), out);
  } else if (Array.isArray(value)) {
    for (const item of value) collectNumbers(item, out);
  }
}

/**
 * Singular values in descending order, or `null` when the matrix is empty
 * or the eigen decomposition fails.
 */
export function singularValues(
  matrix: readonly (readonly number[])[],
  logger: LogTarget = defaultLog
): number[] | null {
  if (matrix.length === 0 || (matrix[0]?.length ?? 0) === 0) return null;

  try {
    const { values } = eigs(gramMatrix(matrix));
    const eigenvalues: number[] = [];
    collectNumbers(values, eigenvalues);

    if (eigenvalues.length === 0 || eigenvalues.some((v) => !Number.isFinite(v))) {
      logger.warn('Eigen decomposition returned no usable values', { count: eigenvalues.length });
      return null;
    }

    // Rounding can leave rank-deficient eigenvalues slightly negative
    return eigenvalues.map((v) => Math.sqrt(Math.max(0, v))).sort((a, b) => b - a);
  } catch (err) {
    logger.warn('Singular value decomposition failed', { error: toError(err).message });
    return null;
  }
}
