/**
 * @vecmat/core — shared foundations for the vecmat packages
 *
 * This package provides:
 * - **Typeclasses**: Eq, PartialOrd, Printable, Defaultable, VectorSpace,
 *   InnerProduct, Normed, LinearMap
 * - **Errors**: SingularMatrixError, ZeroVectorError
 * - **Configuration**: cosmiconfig-backed tolerances and debug flag
 * - **Logging**: `[vecmat]`-prefixed console logger
 *
 * @packageDocumentation
 */

// ============================================================================
// Typeclasses
// ============================================================================

export {
  type Eq,
  type Ordering,
  type PartialOrd,
  type Printable,
  type Defaultable,
  type VectorSpace,
  type InnerProduct,
  type Normed,
  type LinearMap,
  LT,
  EQ_ORD,
  GT,
  eqNumber,
  makeEq,
  makePartialOrd,
  compareNumbers,
  compareLexicographic,
  vSub,
  normSquared,
  distanceBy,
  isOrthogonal,
} from "./typeclasses.js";

// ============================================================================
// Errors
// ============================================================================

export {
  type LinalgErrorKind,
  LinalgError,
  SingularMatrixError,
  ZeroVectorError,
  isLinalgError,
} from "./errors.js";

// ============================================================================
// Configuration & logging
// ============================================================================

export {
  type VecmatConfig,
  type ToleranceConfig,
  type ResolvedConfig,
  type ConfigValues,
  type ConfigPath,
  DEFAULT_CONFIG,
  config,
  defineConfig,
} from "./config.js";

export { logger, reportError } from "./logger.js";
