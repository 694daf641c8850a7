/**
 * Structured logger — thin pino wrapper with file output support.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601).
 * CLI output meant for the user goes through console; this logger is for
 * diagnostics only.
 */
import pino from "pino";
import type { TransportSingleOptions, TransportMultiOptions } from "pino";
import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { dirname, join, basename } from "node:path";
import { expandHome } from "./paths.ts";

// Bootstrap phase: read env before config is available.
// Overridden when reinitLogger() is called with loaded settings.
const level = process.env["METASKILL_LOG_LEVEL"] ?? "info";

export interface ResolvedTransport {
  transport: TransportSingleOptions | TransportMultiOptions;
  isMultiTarget: boolean;
}

/**
 * NOTE: pino disallows `formatters` with multi-target transports,
 * so they are applied only for single-target mode.
 */
function createLoggerOptions(resolved: ResolvedTransport | null, logLevel: string): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level: logLevel,
    base: undefined, // drop pid and hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (!resolved) {
    opts.enabled = false;
    return opts;
  }

  opts.transport = resolved.transport;
  if (!resolved.isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }
  return opts;
}

/** Remove rotated log files (metaskill.log.*) older than the retention period. */
export function cleanupOldLogs(logFile: string, retentionDays = 30, now = Date.now()): number {
  const logDir = dirname(logFile);
  if (!existsSync(logDir)) return 0;

  const retentionMs = retentionDays * 24 * 60 * 60 * 1000;
  const rotatedLogPattern = new RegExp(`^${basename(logFile).replace(/\./g, "\\.")}\\.`);
  let removed = 0;

  for (const file of readdirSync(logDir)) {
    if (!rotatedLogPattern.test(file)) continue;

    const filePath = join(logDir, file);
    try {
      if (now - statSync(filePath).mtimeMs > retentionMs) {
        unlinkSync(filePath);
        removed++;
      }
    } catch {
      // Another process may have rotated it away already.
      continue;
    }
  }
  return removed;
}

/**
 * Resolve transports from settings.
 *
 * Returns null when neither file nor console output is enabled;
 * the logger is then created disabled.
 */
export function resolveTransports(
  nodeEnv: string | undefined,
  logFile: string | null,
  logConsoleEnabled?: boolean,
): ResolvedTransport | null {
  const transports: TransportSingleOptions[] = [];

  if (logConsoleEnabled) {
    if (nodeEnv !== "production") {
      transports.push({
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      });
    } else {
      transports.push({
        target: "pino/file",
        options: { destination: 2 }, // stderr, stdout belongs to CLI output
      });
    }
  }

  if (logFile) {
    const logDir = dirname(logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    cleanupOldLogs(logFile, 30);

    transports.push({
      target: "pino-roll",
      options: {
        file: logFile,
        frequency: "daily",
        size: "10m",
        mkdir: true,
      },
    });
  }

  const [first] = transports;
  if (!first) return null;
  if (transports.length === 1) {
    return { transport: first, isMultiTarget: false };
  }
  return { transport: { targets: transports }, isMultiTarget: true };
}

/** Default log file location under the data directory. */
export function defaultLogFile(dataDir: string): string {
  return join(dataDir, "logs", "metaskill.log");
}

/**
 * Bootstrap phase: config is not yet loaded, so env vars are read directly.
 */
function initRootLogger(): pino.Logger {
  const dataDir = expandHome(process.env["METASKILL_DATA_DIR"] || "~/.metaskill");
  const fileEnabled = process.env["METASKILL_LOG_FILE_ENABLED"] !== "false";
  const consoleEnabled = process.env["METASKILL_LOG_CONSOLE_ENABLED"] === "true";

  const resolved = resolveTransports(
    process.env["NODE_ENV"],
    fileEnabled ? defaultLogFile(dataDir) : null,
    consoleEnabled,
  );
  return pino(createLoggerOptions(resolved, level));
}

const rootLogger = initRootLogger();

/** Get a child logger with a module name. */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

/**
 * Reinitialize logger with loaded settings (called by config.ts once they are ready).
 */
export function reinitLogger(options: {
  logLevel: string;
  logFile: string | null;
  logConsoleEnabled?: boolean;
  nodeEnv?: string;
}): void {
  const resolved = resolveTransports(options.nodeEnv, options.logFile, options.logConsoleEnabled);
  const newLogger = pino(createLoggerOptions(resolved, options.logLevel));

  // Children created via getLogger() keep a reference to rootLogger.
  Object.assign(rootLogger, newLogger);
}

export { rootLogger };
