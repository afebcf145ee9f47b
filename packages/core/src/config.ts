/**
 * Configuration
 *
 * vecmat reads a small set of options that tune equality tolerances and
 * diagnostics. Values are resolved from (lowest to highest priority):
 *
 * 1. Defaults
 * 2. Config files: `"vecmat"` key in package.json, .vecmatrc, .vecmatrc.json,
 *    .vecmatrc.yaml, .vecmatrc.yml, .vecmatrc.js, .vecmatrc.cjs,
 *    vecmat.config.js, vecmat.config.cjs
 * 3. Environment variables: VECMAT_* (for CI overrides)
 * 4. Programmatic: config.set() calls
 *
 * @example
 * ```typescript
 * import { config } from "@vecmat/core";
 *
 * config.get("tolerance.mat3");      // → 1e-9
 * config.set({ debug: true });
 * config.get("debug");               // → true
 * ```
 *
 * @example Config file (.vecmatrc.json)
 * ```json
 * { "debug": true, "tolerance": { "mat3": 1e-6 } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { writeLog } from "./sink.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Tolerances used by approximate comparisons.
 */
export interface ToleranceConfig {
  /** Default tolerance of `approxEquals` for every vector and matrix type */
  default?: number;
  /** Epsilon of Mat3 equality (`|a - b| < epsilon` per entry); must be positive */
  mat3?: number;
}

/**
 * Full vecmat configuration schema, as written in config files.
 */
export interface VecmatConfig {
  /** Emit debug-level log lines */
  debug?: boolean;
  tolerance?: ToleranceConfig;
}

/** Configuration after defaults have been applied. */
export interface ResolvedConfig {
  readonly debug: boolean;
  readonly tolerance: {
    readonly default: number;
    readonly mat3: number;
  };
}

/** Value type for every readable configuration path. */
export interface ConfigValues {
  debug: boolean;
  "tolerance.default": number;
  "tolerance.mat3": number;
}

export type ConfigPath = keyof ConfigValues;

export const DEFAULT_CONFIG: ResolvedConfig = {
  debug: false,
  tolerance: {
    default: 1e-10,
    mat3: 1e-9,
  },
};

// ============================================================================
// Global State
// ============================================================================

let fileLayer: VecmatConfig = {};
let envLayer: VecmatConfig = {};
let programmaticLayer: VecmatConfig = {};
let configStore: ResolvedConfig = DEFAULT_CONFIG;
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "vecmat";
const ENV_PREFIX = "VECMAT_";

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function warnInvalid(source: string, path: string, value: unknown): void {
  writeLog("warn", `Ignoring invalid ${path} from ${source}:`, [value]);
}

/**
 * A tolerance must be finite and non-negative. Mat3 equality compares with a
 * strict `<`, so its epsilon must also be positive or nothing would equal
 * itself.
 */
function readTolerance(
  source: string,
  path: string,
  value: unknown,
  allowZero: boolean
): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number" && Number.isFinite(value) && (allowZero ? value >= 0 : value > 0)) {
    return value;
  }
  warnInvalid(source, path, value);
  return undefined;
}

/**
 * Narrow an untyped config object (file contents, env) to the schema.
 * Unknown keys are ignored; invalid values are dropped with a warning.
 */
function toConfig(raw: unknown, source: string): VecmatConfig {
  if (raw === undefined || raw === null) return {};
  if (!isRecord(raw)) {
    warnInvalid(source, "configuration", raw);
    return {};
  }

  const result: VecmatConfig = {};

  if (raw.debug !== undefined) {
    if (typeof raw.debug === "boolean") {
      result.debug = raw.debug;
    } else {
      warnInvalid(source, "debug", raw.debug);
    }
  }

  if (raw.tolerance !== undefined) {
    if (isRecord(raw.tolerance)) {
      const tolerance: ToleranceConfig = {};
      const defaultTolerance = readTolerance(
        source,
        "tolerance.default",
        raw.tolerance.default,
        true
      );
      if (defaultTolerance !== undefined) tolerance.default = defaultTolerance;
      const mat3Tolerance = readTolerance(source, "tolerance.mat3", raw.tolerance.mat3, false);
      if (mat3Tolerance !== undefined) tolerance.mat3 = mat3Tolerance;
      result.tolerance = tolerance;
    } else {
      warnInvalid(source, "tolerance", raw.tolerance);
    }
  }

  return result;
}

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(searchFrom?: string): VecmatConfig {
  try {
    const explorer = cosmiconfigSync(MODULE_NAME, {
      searchPlaces: [
        "package.json",
        `.${MODULE_NAME}rc`,
        `.${MODULE_NAME}rc.json`,
        `.${MODULE_NAME}rc.yaml`,
        `.${MODULE_NAME}rc.yml`,
        `.${MODULE_NAME}rc.js`,
        `.${MODULE_NAME}rc.cjs`,
        `${MODULE_NAME}.config.js`,
        `${MODULE_NAME}.config.cjs`,
      ],
    });

    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty) {
      configFilePath = result.filepath;
      return toConfig(result.config, result.filepath);
    }
  } catch (error) {
    // A broken config file falls back to defaults
    writeLog("warn", "Failed to load config file:", [error]);
  }

  return {};
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const NUMERIC = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Coerce an environment value for the config path it targets: `debug` takes
 * `1`/`0`/`true`/`false`, every other path a numeric literal (`1`, `1e-6`).
 * Anything else is passed through as a string and rejected by validation.
 */
function parseEnvValue(configPath: string, value: string): unknown {
  const trimmed = value.trim();
  if (configPath === "debug") {
    if (trimmed === "1" || trimmed === "true") return true;
    if (trimmed === "0" || trimmed === "false" || trimmed === "") return false;
    return value;
  }
  return NUMERIC.test(trimmed) ? Number(trimmed) : value;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   VECMAT_DEBUG=1                → { debug: true }
 *   VECMAT_TOLERANCE_MAT3=1e-6    → { tolerance: { mat3: 1e-6 } }
 */
function loadConfigFromEnv(): VecmatConfig {
  const raw: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // VECMAT_TOLERANCE_MAT3 → tolerance.mat3
    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(raw, configPath, parseEnvValue(configPath, value));
  }

  return toConfig(raw, "environment");
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Apply partial layers over a resolved config (later layers win).
 */
function resolve(base: ResolvedConfig, ...layers: VecmatConfig[]): ResolvedConfig {
  let out = base;
  for (const layer of layers) {
    out = {
      debug: layer.debug ?? out.debug,
      tolerance: {
        default: layer.tolerance?.default ?? out.tolerance.default,
        mat3: layer.tolerance?.mat3 ?? out.tolerance.mat3,
      },
    };
  }
  return out;
}

function mergeLayers(a: VecmatConfig, b: VecmatConfig): VecmatConfig {
  return {
    ...a,
    ...b,
    tolerance: { ...a.tolerance, ...b.tolerance },
  };
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(searchFrom?: string): void {
  if (configLoaded) return;

  fileLayer = loadConfigFromFiles(searchFrom);
  envLayer = loadConfigFromEnv();
  configStore = resolve(DEFAULT_CONFIG, fileLayer, envLayer, programmaticLayer);

  configLoaded = true;
}

const readers: { [P in ConfigPath]: (c: ResolvedConfig) => ConfigValues[P] } = {
  debug: (c) => c.debug,
  "tolerance.default": (c) => c.tolerance.default,
  "tolerance.mat3": (c) => c.tolerance.mat3,
};

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 *
 * @example
 * config.get("debug")            // → false
 * config.get("tolerance.mat3")   // → 1e-9
 */
function get<P extends ConfigPath>(path: P): ConfigValues[P] {
  initializeConfig();
  return readers[path](configStore);
}

/**
 * Set configuration values programmatically. Merges with earlier calls and
 * takes precedence over files and environment.
 *
 * @example
 * config.set({ tolerance: { mat3: 1e-6 } });
 */
function set(values: VecmatConfig): void {
  initializeConfig();
  programmaticLayer = mergeLayers(programmaticLayer, toConfig(values, "config.set()"));
  configStore = resolve(DEFAULT_CONFIG, fileLayer, envLayer, programmaticLayer);
}

/**
 * Get all resolved configuration values.
 */
function getAll(): ResolvedConfig {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing). The next read
 * reloads files and environment.
 */
function reset(): void {
  fileLayer = {};
  envLayer = {};
  programmaticLayer = {};
  configStore = DEFAULT_CONFIG;
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Discard programmatic overrides and reload files and environment,
 * searching for a config file starting at `searchFrom` (default: cwd).
 */
function reload(searchFrom?: string): void {
  reset();
  initializeConfig(searchFrom);
}

export const config = {
  get,
  set,
  getAll,
  getConfigFilePath,
  reset,
  reload,
};

/**
 * Identity helper that type-checks a config object, for use in
 * vecmat.config.js files.
 */
export function defineConfig(cfg: VecmatConfig): VecmatConfig {
  return cfg;
}
