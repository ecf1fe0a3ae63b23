/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for the numeris packages.
 * Configuration is loaded lazily from (in priority order):
 *
 * 1. Environment variables: NUMERIS_* (highest priority, for CI overrides)
 * 2. Config files: .numerisrc, numeris.config.cjs, a "numeris" key in package.json
 * 3. Defaults (lowest priority)
 *
 * config.set() calls are merged on top of whatever was loaded.
 *
 * @example
 * ```typescript
 * import { config } from "@numeris/core";
 *
 * config.get("debug")                 // → boolean
 * config.get("format.floatDigits")    // → 6
 *
 * config.set({ format: { doubleDigits: 10 } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { writeLine } from "./writer.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Scalar formatting used by the debug rendering of angles.
 */
export interface FormatConfig {
  /** Significant digits for single-precision values (default: 6) */
  floatDigits?: number;
  /** Significant digits for double-precision values (default: 15) */
  doubleDigits?: number;
}

export interface NumerisConfig {
  /** Enable debug logging */
  debug?: boolean;
  format?: FormatConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from NUMERIS_* environment variables.
 *
 * `__` separates nesting levels and `_` inside a level becomes camelCase:
 * NUMERIS_FORMAT__FLOAT_DIGITS → format.floatDigits
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "NUMERIS_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase()))
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

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

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge two plain objects. Arrays and scalars from `source` replace.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "numeris";

function loadConfigFromFiles(): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });

  try {
    const result = explorer.search();
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (error) {
    writeLine(
      "config",
      "warn",
      `ignoring config file: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

export const DEFAULT_CONFIG: Readonly<NumerisConfig> = {
  debug: false,
  format: {
    floatDigits: 6,
    doubleDigits: 15,
  },
};

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge({ ...DEFAULT_CONFIG }, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a config value by dot-separated path.
 *
 * @example
 * config.get("format.doubleDigits")  // → 15
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/** Get a numeric config value, or `fallback` when unset or not a number. */
function getNumber(path: string, fallback: number): number {
  const value = get(path);
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

/**
 * Set config values programmatically. Deep-merges with the existing config.
 */
function set(values: Partial<NumerisConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/** Check whether a config path is set to a truthy value. */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/** Path of the config file that was loaded, if any. */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset config state. The next access reloads from files and environment.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  getNumber,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: NumerisConfig): NumerisConfig {
  return cfg;
}
