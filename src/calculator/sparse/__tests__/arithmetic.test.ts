/**
 * Tests for sparse addition, subtraction and multiplication.
 */

import { add, multiply, negate, scale, subtract, transpose } from '../arithmetic';
import { DimensionMismatchError } from '../errors';
import { parseMatrix } from '../coordinate-parser';
import { SparseMatrix } from '../SparseMatrix';
import { denseMultiply, randomSparseMatrix, setSeed } from '../../../tests/random-matrix';

function hasNoStoredZeros(m: SparseMatrix): boolean {
  return Array.from(m.nonZeroEntries()).every(({ value }) => value !== 0);
}

describe('Sparse arithmetic', () => {
  // A = diag(1, 2), B = anti-diagonal (3 above, 4 below)
  const A = parseMatrix('rows=2\ncols=2\n(0,0,1)\n(1,1,2)\n');
  const B = parseMatrix('rows=2\ncols=2\n(0,1,3)\n(1,0,4)\n');

  describe('add', () => {
    it('adds the worked 2x2 example', () => {
      expect(Array.from(add(A, B).nonZeroEntries())).toEqual([
        { row: 0, col: 0, value: 1 },
        { row: 0, col: 1, value: 3 },
        { row: 1, col: 0, value: 4 },
        { row: 1, col: 1, value: 2 },
      ]);
    });

    it('drops positions that cancel', () => {
      const a = SparseMatrix.fromTriplets(2, 2, [
        { row: 0, col: 0, value: 5 },
        { row: 1, col: 1, value: 1 },
      ]);
      const b = SparseMatrix.fromTriplets(2, 2, [{ row: 0, col: 0, value: -5 }]);

      const sum = add(a, b);
      expect(sum.nonZeroCount).toBe(1);
      expect(sum.has(0, 0)).toBe(false);
      expect(sum.get(1, 1)).toBe(1);
    });

    it('keeps the operands unchanged', () => {
      const a = A.clone();
      const b = B.clone();
      add(A, B);

      expect(A.equals(a)).toBe(true);
      expect(B.equals(b)).toBe(true);
    });

    it('throws DimensionMismatchError for different shapes', () => {
      expect(() => add(SparseMatrix.create(2, 3), SparseMatrix.create(3, 2))).toThrow(
        DimensionMismatchError
      );
    });

    it('describes the mismatch', () => {
      expect(() => add(SparseMatrix.create(2, 3), SparseMatrix.create(3, 2))).toThrow(
        'Cannot add 2x3 and 3x2: dimensions must match'
      );
    });
  });

  describe('subtract', () => {
    it('subtracts entrywise', () => {
      const diff = subtract(A, B);

      expect(diff.toDense()).toEqual([
        [1, -3],
        [-4, 2],
      ]);
    });

    it('a - a is empty', () => {
      const diff = subtract(B, B);
      expect(diff.nonZeroCount).toBe(0);
      expect(diff.dimensions()).toEqual([2, 2]);
    });

    it('throws DimensionMismatchError for different shapes', () => {
      expect(() => subtract(SparseMatrix.create(1, 2), SparseMatrix.create(2, 2))).toThrow(
        DimensionMismatchError
      );
    });
  });

  describe('multiply', () => {
    it('multiplies the worked 2x2 example', () => {
      expect(Array.from(multiply(A, B).nonZeroEntries())).toEqual([
        { row: 0, col: 1, value: 3 },
        { row: 1, col: 0, value: 8 },
      ]);
    });

    it('has shape (a.rows, b.cols)', () => {
      const product = multiply(SparseMatrix.create(2, 3), SparseMatrix.create(3, 4));
      expect(product.dimensions()).toEqual([2, 4]);
    });

    it('throws DimensionMismatchError when inner dimensions differ', () => {
      expect(() => multiply(SparseMatrix.create(2, 3), SparseMatrix.create(2, 3))).toThrow(
        'Cannot multiply 2x3 and 2x3: columns of A (3) must equal rows of B (2)'
      );
    });

    it('drops products that sum to zero', () => {
      // [1 1] * [ 2]  = [0]
      //         [-2]
      const a = SparseMatrix.fromDense([[1, 1]]);
      const b = SparseMatrix.fromDense([[2], [-2]]);

      const product = multiply(a, b);
      expect(product.dimensions()).toEqual([1, 1]);
      expect(product.nonZeroCount).toBe(0);
    });

    it('produces fill-in denser than either operand', () => {
      // Column vector times row vector: 3 + 3 entries -> 9
      const col = SparseMatrix.fromDense([[1], [2], [3]]);
      const row = SparseMatrix.fromDense([[4, 5, 6]]);

      const outer = multiply(col, row);
      expect(outer.nonZeroCount).toBe(9);
      expect(outer.get(2, 1)).toBe(15);
    });

    it('identity is neutral', () => {
      const m = SparseMatrix.fromDense([
        [0, 2, 0],
        [1, 0, 3],
      ]);

      expect(multiply(m, SparseMatrix.identity(3)).equals(m)).toBe(true);
      expect(multiply(SparseMatrix.identity(2), m).equals(m)).toBe(true);
    });

    it('handles empty inner dimension', () => {
      const product = multiply(SparseMatrix.create(2, 0), SparseMatrix.create(0, 3));
      expect(product.dimensions()).toEqual([2, 3]);
      expect(product.nonZeroCount).toBe(0);
    });

    it('matches dense multiplication on random matrices', () => {
      setSeed(7);
      for (let trial = 0; trial < 20; trial++) {
        const a = randomSparseMatrix(5, 4, 0.3);
        const b = randomSparseMatrix(4, 6, 0.3);

        const expected = denseMultiply(a.toDense(), b.toDense(), 4, 6);
        expect(multiply(a, b).toDense()).toEqual(expected);
      }
    });
  });

  describe('scale / negate / transpose', () => {
    it('scales every entry', () => {
      expect(scale(A, 3).toDense()).toEqual([
        [3, 0],
        [0, 6],
      ]);
    });

    it('scaling by zero empties the matrix', () => {
      const zero = scale(B, 0);
      expect(zero.nonZeroCount).toBe(0);
      expect(zero.dimensions()).toEqual([2, 2]);
    });

    it('negates every entry', () => {
      expect(negate(B).get(1, 0)).toBe(-4);
    });

    it('transposes shape and positions', () => {
      const m = SparseMatrix.fromDense([[0, 7, 0]]);
      const t = transpose(m);

      expect(t.dimensions()).toEqual([3, 1]);
      expect(t.get(1, 0)).toBe(7);
    });
  });

  describe('properties', () => {
    beforeEach(() => setSeed(42));

    it('addition is commutative', () => {
      for (let trial = 0; trial < 25; trial++) {
        const a = randomSparseMatrix(6, 5);
        const b = randomSparseMatrix(6, 5);
        expect(add(a, b).equals(add(b, a))).toBe(true);
      }
    });

    it('subtract(a, b) equals add(a, negate(b))', () => {
      for (let trial = 0; trial < 25; trial++) {
        const a = randomSparseMatrix(4, 7);
        const b = randomSparseMatrix(4, 7);
        expect(subtract(a, b).equals(add(a, negate(b)))).toBe(true);
      }
    });

    it('the zero matrix is the additive identity', () => {
      for (let trial = 0; trial < 10; trial++) {
        const a = randomSparseMatrix(5, 5, 0.4);
        expect(add(a, SparseMatrix.create(5, 5)).equals(a)).toBe(true);
      }
    });

    it('no operation stores a zero', () => {
      for (let trial = 0; trial < 25; trial++) {
        // Narrow value range so cancellations happen
        const a = randomSparseMatrix(4, 4, 0.5, 2);
        const b = randomSparseMatrix(4, 4, 0.5, 2);

        expect(hasNoStoredZeros(add(a, b))).toBe(true);
        expect(hasNoStoredZeros(subtract(a, b))).toBe(true);
        expect(hasNoStoredZeros(multiply(a, b))).toBe(true);
      }
    });
  });
});
