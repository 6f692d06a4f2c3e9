/**
 * Unified Configuration System
 *
 * Configuration is loaded once from (in priority order):
 *
 * 1. Environment variables: PULLSTREAM_* (highest priority, for CI overrides)
 * 2. Config files: pullstream.config.js, .pullstreamrc, .pullstreamrc.json, etc.
 *    or the "pullstream" key in package.json
 * 3. Defaults (lowest priority)
 *
 * Programmatic config.set() calls are merged over the loaded values.
 *
 * @example
 * ```typescript
 * import { config } from "@pullstream/core";
 *
 * config.get("debug")             // → boolean
 * config.get("print.delimiter")   // → " "
 * config.set({ print: { delimiter: ", " } });
 * ```
 *
 * @example Config file (.pullstreamrc.json)
 * ```json
 * { "debug": true, "print": { "delimiter": "_" } }
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the print terminal operation.
 */
export interface PrintConfig {
  /** Text written between two rendered values (default: a single space) */
  delimiter?: string;
}

/**
 * Full pullstream configuration schema.
 */
export interface PullstreamConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Print terminal defaults */
  print?: PrintConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: PullstreamConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchDirectory: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with PULLSTREAM_ are parsed into the config object.
 *
 * Examples:
 *   PULLSTREAM_DEBUG=1                → { debug: true }
 *   PULLSTREAM_PRINT_DELIMITER=_      → { print: { delimiter: "_" } }
 */
// Settings whose env value is taken verbatim, never coerced
const STRING_PATHS: ReadonlySet<string> = new Set(["print.delimiter"]);

function loadConfigFromEnv(): PullstreamConfig {
  const envConfig: PullstreamConfig = {};
  const PREFIX = "PULLSTREAM_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    // Double underscore __ becomes nested object separator as well
    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

    setNestedValue(
      envConfig,
      configPath,
      STRING_PATHS.has(configPath) ? value : parseEnvValue(value)
    );
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

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
 * Get a nested value using dot notation.
 */
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
 * Deep merge objects (right takes precedence).
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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "pullstream";

/**
 * Load configuration synchronously from files.
 * Uses cosmiconfig to search for config in standard locations.
 */
function loadConfigFromFiles(searchFrom: string | undefined): PullstreamConfig {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search(searchFrom);
  } catch (cause) {
    throw new ConfigError(
      `Failed to load ${MODULE_NAME} configuration: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }

  if (!result || result.isEmpty) return {};

  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(`Configuration in ${result.filepath} must be an object`);
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

function defaults(): PullstreamConfig {
  return {
    debug: false,
    print: {
      delimiter: " ",
    },
  };
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchDirectory);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults(), fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<PullstreamConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<PullstreamConfig> {
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
 * Reset configuration so the next read loads every source again.
 * `searchFrom` changes the directory cosmiconfig looks in (default: cwd).
 */
function reset(searchFrom?: string): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  searchDirectory = searchFrom;
}

/** Whether debug logging is enabled. */
function isDebug(): boolean {
  return get("debug") === true;
}

/** Default delimiter for the print terminal. */
function printDelimiter(): string {
  const delimiter = get("print.delimiter");
  return typeof delimiter === "string" ? delimiter : " ";
}

/**
 * Helper for typed config files.
 *
 * @example
 * ```typescript
 * // pullstream.config.js
 * export default defineConfig({ debug: true });
 * ```
 */
export function defineConfig(cfg: PullstreamConfig): PullstreamConfig {
  return cfg;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  isDebug,
  printDelimiter,
} as const;
