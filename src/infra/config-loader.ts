/**
 * ConfigLoader — Load configuration from YAML files with env var support.
 *
 * Features:
 * - Load from metaskill.config.yaml (base) + metaskill.config.local.yaml (override)
 * - Support ${ENV_VAR} interpolation in strings
 * - Environment variables override all file configs
 * - Fallback to env-only mode if no config file found
 * - Custom config path via METASKILL_CONFIG env var
 */
import { existsSync, readFileSync } from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { ConfigError, errorToString } from "./errors.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type ConfigRecord = Record<string, unknown>;
type Env = Record<string, string | undefined>;

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(config: ConfigRecord, key: string): ConfigRecord {
  const value = config[key];
  return isRecord(value) ? value : {};
}

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 * Supports bash-style default value syntax:
 * - ${VAR:-default}  Use default if VAR is unset or empty
 * - ${VAR:=default}  Use and assign default if VAR is unset or empty
 * - ${VAR:?error}    Error if VAR is unset or empty
 * - ${VAR:+alternate} Use alternate if VAR is set
 */
export function interpolateEnvVars(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string") {
    const replaced = value.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
      const operatorMatch = content.match(/^([^:]+)(:-|:=|:\?|:\+)(.*)$/);
      if (!operatorMatch) {
        return env[content] ?? "";
      }

      const [, varName = "", operator, fallback = ""] = operatorMatch;
      const envValue = env[varName] ?? "";
      const isEmpty = envValue === "";

      switch (operator) {
        case ":-":
          return isEmpty ? fallback : envValue;
        case ":=":
          if (isEmpty) {
            env[varName] = fallback;
            return fallback;
          }
          return envValue;
        case ":?":
          if (isEmpty) {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${fallback || "missing value"}`,
            );
          }
          return envValue;
        case ":+":
          return isEmpty ? "" : fallback;
        default:
          return envValue;
      }
    });
    return replaced === "" ? undefined : replaced; // empty string becomes undefined
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: ConfigRecord = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return value;
}

/** Load and parse a config file (JSON or YAML), returning the raw structure. */
function loadConfigFile(filePath: string, env: Env): ConfigRecord {
  let parsed: unknown;
  try {
    const content = readFileSync(filePath, "utf-8");
    const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${filePath}: ${errorToString(err)}`);
  }

  if (parsed === undefined || parsed === null) return {};
  const interpolated = interpolateEnvVars(parsed, env);
  if (!isRecord(interpolated)) {
    throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
  }
  return interpolated;
}

/** Deep merge two objects, with source overriding target. */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function pickSingle(dir: string, names: string[], label: string): string | null {
  const found = names.map((n) => path.join(dir, n)).filter((p) => existsSync(p));
  if (found.length > 1) {
    throw new ConfigError(
      `Multiple ${label} config files found: ${found.join(", ")}. ` +
        `Please keep only one (${names.join(" or ")}).`,
    );
  }
  return found[0] ?? null;
}

/**
 * Find and load config files with layered merging.
 * Priority: metaskill.config.local.yml/yaml overrides metaskill.config.yml/yaml
 */
function findAndMergeConfigs(cwd: string, env: Env): ConfigRecord | null {
  const customPath = env["METASKILL_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`METASKILL_CONFIG points to a missing file: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath, env);
  }

  const basePath = pickSingle(cwd, ["metaskill.config.yaml", "metaskill.config.yml"], "base");
  const localPath = pickSingle(cwd, ["metaskill.config.local.yaml", "metaskill.config.local.yml"], "local");

  let baseConfig: ConfigRecord | null = null;
  if (basePath) {
    logger.info({ path: basePath }, "loading_base_config");
    baseConfig = loadConfigFile(basePath, env);
  }

  let localConfig: ConfigRecord | null = null;
  if (localPath) {
    logger.info({ path: localPath }, "loading_local_config_override");
    localConfig = loadConfigFile(localPath, env);
  }

  if (baseConfig && localConfig) {
    logger.info("merging_base_and_local_configs");
    return deepMerge(baseConfig, localConfig);
  }
  return localConfig ?? baseConfig;
}

/** Convert a raw config structure to Settings, applying env var overrides. */
export function configToSettings(config: ConfigRecord, env: Env = process.env): Settings {
  const paths = section(config, "paths");
  const scaffold = section(config, "scaffold");
  const system = section(config, "system");

  return SettingsSchema.parse({
    paths: {
      projectDir: env["METASKILL_PROJECT_DIR"] || paths["projectDir"],
      userDir: env["METASKILL_USER_DIR"] || paths["userDir"],
    },
    scaffold: {
      ...scaffold,
      defaultModel: env["METASKILL_DEFAULT_MODEL"] || scaffold["defaultModel"],
    },
    lint: section(config, "lint"),
    prompt: section(config, "prompt"),
    logLevel: env["METASKILL_LOG_LEVEL"] || system["logLevel"],
    dataDir: env["METASKILL_DATA_DIR"] || system["dataDir"],
    logConsoleEnabled: env["METASKILL_LOG_CONSOLE_ENABLED"] || system["logConsoleEnabled"],
    logFileEnabled: env["METASKILL_LOG_FILE_ENABLED"] || system["logFileEnabled"],
    nodeEnv: env["NODE_ENV"] || system["nodeEnv"],
  });
}

/** Load from env vars only (fallback when no config file). */
export function loadFromEnv(env: Env = process.env): Settings {
  return configToSettings({}, env);
}

/**
 * Load settings from config file or env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. metaskill.config.local.yml/yaml
 * 3. metaskill.config.yml/yaml
 * 4. Schema defaults
 */
export function loadSettings(cwd = process.cwd(), env: Env = process.env): Settings {
  const merged = findAndMergeConfigs(cwd, env);
  if (merged) {
    return configToSettings(merged, env);
  }

  logger.info("loading_config_from_env");
  return loadFromEnv(env);
}
