/**
 * vecmat typeclasses
 *
 * Dictionary-passing interfaces shared by the vector and matrix packages.
 * Each value family (Vec2, Vec3, Mat2, Mat3) provides instances of these so
 * generic code can work over any of them.
 */

// ============================================================================
// Eq — structural equality
// ============================================================================

/**
 * Equality comparison.
 *
 * Laws (for exact instances):
 * - Reflexivity: `equals(x, x) === true` (NaN components excepted)
 * - Symmetry: `equals(x, y) === equals(y, x)`
 *
 * Tolerance-based instances are reflexive and symmetric but not transitive.
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

/**
 * Create an Eq instance from an equality function.
 */
export function makeEq<A>(eq: (a: A, b: A) => boolean): Eq<A> {
  return {
    equals: eq,
    notEquals: (a, b) => !eq(a, b),
  };
}

// ============================================================================
// PartialOrd — ordering that may be undefined (NaN)
// ============================================================================

export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Partial ordering. `partialCompare` returns `undefined` when the two values
 * are incomparable, which for floating-point data means a NaN is involved.
 *
 * @typeclass
 */
export interface PartialOrd<A> extends Eq<A> {
  partialCompare(a: A, b: A): Ordering | undefined;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/** Compare two numbers; `undefined` if either is NaN. */
export function compareNumbers(a: number, b: number): Ordering | undefined {
  if (a < b) return LT;
  if (a > b) return GT;
  if (a === b) return EQ_ORD;
  return undefined;
}

/**
 * Lexicographic comparison of two equal-length component lists. The first
 * component that differs decides; an incomparable component short-circuits.
 */
export function compareLexicographic(
  a: readonly number[],
  b: readonly number[]
): Ordering | undefined {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const ord = compareNumbers(a[i], b[i]);
    if (ord !== EQ_ORD) return ord;
  }
  return compareNumbers(a.length, b.length);
}

/**
 * Create a PartialOrd instance from a compare function.
 */
export function makePartialOrd<A>(
  partialCompare: (a: A, b: A) => Ordering | undefined
): PartialOrd<A> {
  return {
    equals: (a, b) => partialCompare(a, b) === EQ_ORD,
    notEquals: (a, b) => partialCompare(a, b) !== EQ_ORD,
    partialCompare,
    lessThan: (a, b) => partialCompare(a, b) === LT,
    lessThanOrEqual: (a, b) => {
      const ord = partialCompare(a, b);
      return ord === LT || ord === EQ_ORD;
    },
    greaterThan: (a, b) => partialCompare(a, b) === GT,
    greaterThanOrEqual: (a, b) => {
      const ord = partialCompare(a, b);
      return ord === GT || ord === EQ_ORD;
    },
  };
}

// ============================================================================
// Printable / Defaultable
// ============================================================================

/** Human-readable string representation. */
export interface Printable<A> {
  display(a: A): string;
}

/** Types with a sensible default value. */
export interface Defaultable<A> {
  defaultValue(): A;
}

// ============================================================================
// Linear algebra
// ============================================================================

/**
 * Vector space over a field F.
 *
 * Laws:
 * - vAdd is associative and commutative
 * - vZero is the identity for vAdd
 * - vScale distributes over vAdd
 * - vScale(1, v) = v
 *
 * @typeclass
 */
export interface VectorSpace<V, F> {
  /** Vector addition */
  readonly vAdd: (a: V, b: V) => V;

  /** Scalar multiplication */
  readonly vScale: (scalar: F, v: V) => V;

  /** Zero vector (additive identity) */
  readonly vZero: () => V;
}

/**
 * Inner product space - a vector space equipped with a dot product.
 *
 * @typeclass
 */
export interface InnerProduct<V, F> extends VectorSpace<V, F> {
  readonly dot: (a: V, b: V) => F;
}

/**
 * Normed space - anything with a notion of length.
 *
 * Laws:
 * - norm(v) >= 0
 * - norm(vScale(k, v)) = |k| * norm(v)
 *
 * @typeclass
 */
export interface Normed<V, F> {
  readonly norm: (v: V) => F;
}

/**
 * A family of square matrices M acting on vectors V.
 *
 * Laws:
 * - apply(identity(), v) = v
 * - apply(compose(a, b), v) = apply(a, apply(b, v))
 *
 * @typeclass
 */
export interface LinearMap<M, V> {
  /** Transform a vector by a matrix: `m * v` */
  readonly apply: (m: M, v: V) => V;

  /** Matrix product `a * b`, i.e. apply `b` first, then `a` */
  readonly compose: (a: M, b: M) => M;

  /** Multiplicative identity */
  readonly identity: () => M;
}

// ============================================================================
// Derived operations
// ============================================================================

/**
 * Subtract two vectors: a - b = a + scale(-1, b)
 */
export function vSub<V>(VS: VectorSpace<V, number>): (a: V, b: V) => V {
  return (a, b) => VS.vAdd(a, VS.vScale(-1, b));
}

/**
 * Squared norm from an inner product; skips the square root.
 */
export function normSquared<V, F>(IP: InnerProduct<V, F>): (v: V) => F {
  return (v) => IP.dot(v, v);
}

/**
 * Euclidean distance between two vectors of any inner product space over
 * the reals.
 */
export function distanceBy<V>(IP: InnerProduct<V, number>): (a: V, b: V) => number {
  const sub = vSub(IP);
  return (a, b) => {
    const diff = sub(a, b);
    return Math.sqrt(IP.dot(diff, diff));
  };
}

/**
 * Check if two vectors are orthogonal (perpendicular) within a tolerance.
 */
export function isOrthogonal<V>(
  IP: InnerProduct<V, number>,
  tolerance = 0
): (a: V, b: V) => boolean {
  return (a, b) => Math.abs(IP.dot(a, b)) <= tolerance;
}
