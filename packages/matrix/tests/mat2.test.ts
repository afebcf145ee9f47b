import { describe, it, expect } from "vitest";
import { SingularMatrixError } from "@vecmat/core";
import { vec2, vec2Equals } from "@vecmat/vector";
import {
  mat2,
  mat2FromRows,
  MAT2_IDENTITY,
  MAT2_ZERO,
  mat2Default,
  mat2Add,
  mat2Sub,
  mat2Neg,
  mat2Mul,
  mat2Div,
  mat2Determinant,
  mat2Inverse,
  mat2TryInverse,
  mat2Transpose,
  mat2Trace,
  mat2Equals,
  mat2ApproxEquals,
  mat2PartialCompare,
  mat2ToArray,
  mat2ToRows,
  mat2Display,
  mat2Debug,
} from "../src/index.js";

describe("Mat2", () => {
  const m = mat2(1, 2, 3, 4);
  const n = mat2(5, 6, 7, 8);

  describe("constructors", () => {
    it("stores entries row-major", () => {
      expect(m).toEqual({ a: 1, b: 2, c: 3, d: 4 });
      expect(mat2ToArray(m)).toEqual([1, 2, 3, 4]);
      expect(mat2ToRows(m)).toEqual([
        [1, 2],
        [3, 4],
      ]);
    });

    it("builds from rows", () => {
      expect(mat2FromRows([
        [1, 2],
        [3, 4],
      ])).toEqual(m);
    });

    it("rejects rows of the wrong shape", () => {
      expect(() => mat2FromRows([[1, 2]])).toThrow(RangeError);
      expect(() => mat2FromRows([[1, 2], [3]])).toThrow(RangeError);
    });

    it("exposes identity and zero", () => {
      expect(MAT2_IDENTITY).toEqual(mat2(1, 0, 0, 1));
      expect(MAT2_ZERO).toEqual(mat2(0, 0, 0, 0));
      expect(Object.isFrozen(MAT2_IDENTITY)).toBe(true);
      expect(mat2Default()).toBe(MAT2_ZERO);
    });
  });

  describe("arithmetic", () => {
    it("adds, subtracts and negates entry-wise", () => {
      expect(mat2Add(m, n)).toEqual(mat2(6, 8, 10, 12));
      expect(mat2Sub(n, m)).toEqual(mat2(4, 4, 4, 4));
      expect(mat2Neg(m)).toEqual(mat2(-1, -2, -3, -4));
    });

    it("scales by a scalar on either side", () => {
      expect(mat2Mul(m, 2)).toEqual(mat2(2, 4, 6, 8));
      expect(mat2Mul(2, m)).toEqual(mat2(2, 4, 6, 8));
      expect(mat2Div(m, 2)).toEqual(mat2(0.5, 1, 1.5, 2));
    });

    it("transforms a vector", () => {
      expect(mat2Mul(m, vec2(1, 1))).toEqual(vec2(3, 7));
      expect(vec2Equals(mat2Mul(MAT2_IDENTITY, vec2(3, -2)), vec2(3, -2))).toBe(true);
    });

    it("multiplies matrices (not commutatively)", () => {
      expect(mat2Mul(m, n)).toEqual(mat2(19, 22, 43, 50));
      expect(mat2Mul(n, m)).toEqual(mat2(23, 34, 31, 46));
    });

    it("has the identity as neutral element", () => {
      expect(mat2Equals(mat2Mul(m, MAT2_IDENTITY), m)).toBe(true);
      expect(mat2Equals(mat2Mul(MAT2_IDENTITY, m), m)).toBe(true);
    });
  });

  describe("square matrix operations", () => {
    it("computes the determinant", () => {
      expect(mat2Determinant(m)).toBe(-2);
      expect(mat2Determinant(MAT2_IDENTITY)).toBe(1);
      expect(mat2Determinant(mat2(7, 2, 6, 2))).toBe(2);
    });

    it("inverts", () => {
      expect(mat2Inverse(mat2(7, 2, 6, 2))).toEqual(mat2(1, -1, -3, 3.5));
      expect(mat2Inverse(m)).toEqual(mat2(-2, 1, 1.5, -0.5));
    });

    it("gives the identity when multiplied by its inverse", () => {
      expect(mat2Equals(mat2Mul(m, mat2Inverse(m)), MAT2_IDENTITY)).toBe(true);
    });

    it("throws on a singular matrix", () => {
      const singular = mat2(1, 2, 2, 4);
      expect(() => mat2Inverse(singular)).toThrow(SingularMatrixError);
      expect(() => mat2Inverse(singular)).toThrow(
        "Mat2 is singular (determinant 0) and cannot be inverted"
      );
      expect(() => mat2Inverse(MAT2_ZERO)).toThrow(SingularMatrixError);
    });

    it("reports singularity without throwing", () => {
      const result = mat2TryInverse(mat2(1, 2, 2, 4));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.matrixType).toBe("Mat2");
        expect(result.error.determinant).toBe(0);
      }

      const ok = mat2TryInverse(mat2(7, 2, 6, 2));
      expect(ok).toEqual({ ok: true, value: mat2(1, -1, -3, 3.5) });
      expect(mat2TryInverse(m)).toEqual({ ok: true, value: mat2Inverse(m) });
    });

    it("transposes and traces", () => {
      expect(mat2Transpose(m)).toEqual(mat2(1, 3, 2, 4));
      expect(mat2Trace(m)).toBe(5);
    });
  });

  describe("comparison", () => {
    it("compares exactly", () => {
      expect(mat2Equals(m, mat2(1, 2, 3, 4))).toBe(true);
      expect(mat2Equals(m, mat2(1, 2, 3, 4 + 1e-12))).toBe(false);
    });

    it("compares within a tolerance", () => {
      expect(mat2ApproxEquals(m, mat2(1, 2, 3, 4 + 1e-12))).toBe(true);
      expect(mat2ApproxEquals(m, mat2(1, 2, 3, 4.1))).toBe(false);
      expect(mat2ApproxEquals(m, mat2(1, 2, 3, 4.1), 0.2)).toBe(true);
    });

    it("orders lexicographically", () => {
      expect(mat2PartialCompare(m, mat2(1, 2, 3, 5))).toBe(-1);
      expect(mat2PartialCompare(n, m)).toBe(1);
      expect(mat2PartialCompare(m, mat2(1, 2, 3, 4))).toBe(0);
      expect(mat2PartialCompare(m, mat2(1, NaN, 3, 4))).toBeUndefined();
    });
  });

  describe("formatting", () => {
    it("displays as nested rows", () => {
      expect(mat2Display(m)).toBe("[[1, 2], [3, 4]]");
      expect(mat2Display(mat2(0.5, -1, 0, 2))).toBe("[[0.5, -1], [0, 2]]");
    });

    it("debug-prints field names", () => {
      expect(mat2Debug(m)).toBe("Mat2 { a: 1, b: 2, c: 3, d: 4 }");
    });
  });
});
