import { describe, it, expect } from "vitest";
import { ZeroVectorError } from "@vecmat/core";
import {
  vec2,
  point2d,
  asPoint2D,
  VEC2_ZERO,
  VEC2_ONE,
  VEC2_UNIT_X,
  VEC2_UNIT_Y,
  vec2Default,
  vec2Add,
  vec2Sub,
  vec2Neg,
  vec2Mul,
  vec2Div,
  vec2Dot,
  vec2Cross,
  vec2Mag,
  vec2MagSq,
  vec2Map,
  vec2Normalize,
  point2dDist,
  point2dDistSq,
  vec2Equals,
  vec2ApproxEquals,
  vec2PartialCompare,
  vec2Display,
  vec2Debug,
} from "../src/index.js";

describe("Vec2", () => {
  describe("constructors", () => {
    it("builds plain records", () => {
      expect(vec2(1, 2)).toEqual({ x: 1, y: 2 });
      expect(point2d(3, 4)).toEqual({ x: 3, y: 4 });
      expect(asPoint2D(vec2(5, 6))).toEqual({ x: 5, y: 6 });
    });

    it("exposes frozen constants", () => {
      expect(VEC2_ZERO).toEqual({ x: 0, y: 0 });
      expect(VEC2_ONE).toEqual({ x: 1, y: 1 });
      expect(VEC2_UNIT_X).toEqual({ x: 1, y: 0 });
      expect(VEC2_UNIT_Y).toEqual({ x: 0, y: 1 });
      expect(Object.isFrozen(VEC2_ZERO)).toBe(true);
      expect(vec2Default()).toBe(VEC2_ZERO);
    });
  });

  describe("arithmetic", () => {
    const a = vec2(1, 2);
    const b = vec2(3, 4);

    it("adds and subtracts component-wise", () => {
      expect(vec2Add(a, b)).toEqual(vec2(4, 6));
      expect(vec2Sub(b, a)).toEqual(vec2(2, 2));
      expect(vec2Neg(a)).toEqual(vec2(-1, -2));
    });

    it("leaves its operands untouched", () => {
      vec2Add(a, b);
      expect(a).toEqual(vec2(1, 2));
      expect(b).toEqual(vec2(3, 4));
    });

    it("scales by a scalar on either side", () => {
      expect(vec2Mul(a, 3)).toEqual(vec2(3, 6));
      expect(vec2Mul(3, a)).toEqual(vec2(3, 6));
    });

    it("multiplies two vectors component-wise", () => {
      expect(vec2Mul(vec2(2, 3), vec2(4, 5))).toEqual(vec2(8, 15));
    });

    it("divides in all three forms", () => {
      expect(vec2Div(vec2(2, 4), 2)).toEqual(vec2(1, 2));
      expect(vec2Div(8, vec2(2, 4))).toEqual(vec2(4, 2));
      expect(vec2Div(vec2(6, 8), vec2(2, 4))).toEqual(vec2(3, 2));
    });

    it("follows IEEE rules when dividing by zero", () => {
      expect(vec2Div(vec2(1, -1), 0)).toEqual(vec2(Infinity, -Infinity));
      expect(Number.isNaN(vec2Div(vec2(0, 1), 0).x)).toBe(true);
    });

    it("maps a function over components", () => {
      expect(vec2Map(vec2(1, 4), Math.sqrt)).toEqual(vec2(1, 2));
    });
  });

  describe("products & norms", () => {
    it("computes the dot product", () => {
      expect(vec2Dot(vec2(1, 2), vec2(3, 4))).toBe(11);
    });

    it("computes the scalar cross product", () => {
      expect(vec2Cross(VEC2_UNIT_X, VEC2_UNIT_Y)).toBe(1);
      expect(vec2Cross(VEC2_UNIT_Y, VEC2_UNIT_X)).toBe(-1);
      expect(vec2Cross(vec2(2, 3), vec2(2, 3))).toBe(0);
    });

    it("computes magnitude", () => {
      expect(vec2Mag(vec2(3, 4))).toBe(5);
      expect(vec2MagSq(vec2(3, 4))).toBe(25);
    });

    it("relates magnitude to the dot product", () => {
      for (const v of [vec2(0.3, -7), vec2(1e3, 2.5), vec2(-1, -1), VEC2_ZERO]) {
        expect(vec2MagSq(v)).toBe(vec2Dot(v, v));
        expect(vec2Mag(v)).toBe(Math.sqrt(vec2MagSq(v)));
      }
    });

    it("normalizes to unit length", () => {
      expect(vec2Normalize(vec2(3, 4))).toEqual(vec2(0.6, 0.8));
      expect(vec2Mag(vec2Normalize(vec2(5, -12)))).toBeCloseTo(1, 12);
    });

    it("refuses to normalize the zero vector", () => {
      expect(() => vec2Normalize(VEC2_ZERO)).toThrow(ZeroVectorError);
      expect(() => vec2Normalize(vec2(0, 0))).toThrow("Cannot normalize a zero-length Vec2");
    });

    it("propagates NaN through normalize", () => {
      const n = vec2Normalize(vec2(NaN, 1));
      expect(Number.isNaN(n.x)).toBe(true);
      expect(Number.isNaN(n.y)).toBe(true);
    });
  });

  describe("points", () => {
    it("measures distance between points", () => {
      const p = point2d(1, 2);
      const q = point2d(4, 6);
      expect(point2dDist(p, q)).toBe(5);
      expect(point2dDist(q, p)).toBe(5);
      expect(point2dDistSq(p, q)).toBe(25);
    });

    it("measures along a single axis", () => {
      expect(point2dDist(point2d(1, 2), point2d(1, 0))).toBe(2);
      expect(point2dDistSq(point2d(1, 2), point2d(1, 0))).toBe(4);
    });

    it("accepts points in vector operations", () => {
      expect(vec2Add(point2d(1, 1), vec2(2, 3))).toEqual(vec2(3, 4));
    });
  });

  describe("comparison", () => {
    it("compares exactly", () => {
      expect(vec2Equals(vec2(1, 2), vec2(1, 2))).toBe(true);
      expect(vec2Equals(vec2(1, 2), vec2(1, 2 + 1e-12))).toBe(false);
      expect(vec2Equals(vec2(NaN, 0), vec2(NaN, 0))).toBe(false);
    });

    it("compares within a tolerance", () => {
      expect(vec2ApproxEquals(vec2(1, 2), vec2(1 + 1e-11, 2))).toBe(true);
      expect(vec2ApproxEquals(vec2(1, 2), vec2(1.001, 2))).toBe(false);
      expect(vec2ApproxEquals(vec2(1, 2), vec2(1.001, 2), 0.01)).toBe(true);
    });

    it("orders lexicographically", () => {
      expect(vec2PartialCompare(vec2(1, 2), vec2(1, 3))).toBe(-1);
      expect(vec2PartialCompare(vec2(2, 0), vec2(1, 5))).toBe(1);
      expect(vec2PartialCompare(vec2(1, 2), vec2(1, 2))).toBe(0);
      expect(vec2PartialCompare(vec2(NaN, 2), vec2(1, 2))).toBeUndefined();
    });
  });

  describe("formatting", () => {
    it("displays as a tuple", () => {
      expect(vec2Display(vec2(1, 0.5))).toBe("(1, 0.5)");
      expect(vec2Display(vec2(-0, 2))).toBe("(-0, 2)");
    });

    it("debug-prints field names", () => {
      expect(vec2Debug(vec2(1, 2))).toBe("Vec2 { x: 1, y: 2 }");
    });
  });
});
