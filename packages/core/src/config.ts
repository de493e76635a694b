/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PEGFORGE_* (for CI overrides)
 * 3. Config files: .pegforgerc, pegforge.config.js, package.json#pegforge
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@pegforge/core";
 *
 * config.get("memoization.mode")          // → "all" | "non-trivial" | "hinted"
 * config.set({ codegen: { className: "ExprParser" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Which rules get a memo table entry.
 *
 * Left-recursive rules are memoized under every mode.
 */
export type MemoizationMode = "all" | "non-trivial" | "hinted";

export interface MemoizationConfig {
  mode?: MemoizationMode;
}

export interface TokenizerConfig {
  /** Column width of a tab when measuring indentation */
  tabSize?: number;
}

export interface CodegenConfig {
  /** Class name used when the grammar has no @class directive */
  className?: string;
  /** Module generated parsers import the runtime from */
  runtimeModule?: string;
}

/**
 * Full pegforge configuration schema.
 */
export interface PegforgeConfig {
  /** Print debug logs from every pass */
  debug?: boolean;
  verbose?: boolean;
  memoization?: MemoizationConfig;
  tokenizer?: TokenizerConfig;
  codegen?: CodegenConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: PegforgeConfig = {};
let programmaticConfig: PegforgeConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

const DEFAULTS: PegforgeConfig = {
  debug: false,
  verbose: false,
  memoization: { mode: "all" },
  tokenizer: { tabSize: 8 },
  codegen: { runtimeModule: "@pegforge/runtime" },
};

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

  for (const part of parts.slice(0, -1)) {
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
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "PEGFORGE_";

/** Variables that are not config keys. */
const ENV_IGNORED = new Set(["NO_COLOR"]);

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   PEGFORGE_DEBUG=1                    → { debug: true }
 *   PEGFORGE_MEMOIZATION_MODE=hinted    → { memoization: { mode: "hinted" } }
 *   PEGFORGE_TOKENIZER_TABSIZE=4        → { tokenizer: { tabsize: 4 } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PegforgeConfig {
  const envConfig: PegforgeConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const rawPath = key.slice(ENV_PREFIX.length);
    if (ENV_IGNORED.has(rawPath)) continue;

    const configPath = rawPath.toLowerCase().replace(/__?/g, ".");

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

  // Env keys arrive lower-cased; map the camelCase ones back.
  for (const [section, key] of CAMEL_CASE_KEYS) {
    const group = envConfig[section];
    const lower = key.toLowerCase();
    if (isRecord(group) && lower in group) {
      group[key] = group[lower];
      delete group[lower];
    }
  }

  return envConfig;
}

const CAMEL_CASE_KEYS: ReadonlyArray<[section: string, key: string]> = [
  ["tokenizer", "tabSize"],
  ["codegen", "className"],
  ["codegen", "runtimeModule"],
];

// ============================================================================
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "pegforge";

/**
 * Search for a config file starting at `from` (default: cwd).
 */
function loadConfigFromFiles(from?: string): PegforgeConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(from);
  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  configFilePath = undefined;
  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig < programmatic
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig), programmaticConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<PegforgeConfig>): void {
  initializeConfig();
  programmaticConfig = deepMerge(programmaticConfig, values);
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<PegforgeConfig> {
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
 * Re-read config files, searching upward from `from`.
 */
function load(from?: string): Readonly<PegforgeConfig> {
  searchFrom = from;
  configLoaded = false;
  return getAll();
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  programmaticConfig = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = undefined;
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
  load,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: PegforgeConfig): PegforgeConfig {
  return cfg;
}
