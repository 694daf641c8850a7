export {
  MetaskillError,
  ConfigError,
  DocumentError,
  DocumentParseError,
  DocumentValidationError,
  McpConfigError,
  UnknownCommandError,
  errorToString,
} from "./errors.ts";
export { getLogger, reinitLogger, resolveTransports, cleanupOldLogs, defaultLogFile, rootLogger } from "./logger.ts";
export { getSettings, setSettings, resetSettings, getHostRoots, expandHome } from "./config.ts";
export { loadSettings } from "./config-loader.ts";
export { SettingsSchema } from "./config-schema.ts";
export type { Settings } from "./config-schema.ts";
