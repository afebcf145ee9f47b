/**
 * Scalar type used throughout vector and matrix operations (IEEE-754 double).
 */
export type Scalar = number;

/** Render a scalar the way `display()` does: shortest round-trip form. */
export function formatScalar(s: Scalar): string {
  return Object.is(s, -0) ? "-0" : String(s);
}
