/**
 * Settings singleton and path helpers.
 */
import path from "node:path";
import { loadSettings } from "./config-loader.ts";
import type { Settings } from "./config-schema.ts";
import { defaultLogFile, reinitLogger } from "./logger.ts";
import { expandHome } from "./paths.ts";

let _settings: Settings | null = null;

export { expandHome };

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
    reinitLogger({
      logLevel: _settings.logLevel,
      logFile: _settings.logFileEnabled ? defaultLogFile(expandHome(_settings.dataDir)) : null,
      logConsoleEnabled: _settings.logConsoleEnabled,
      nodeEnv: _settings.nodeEnv,
    });
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads (for testing) */
export function resetSettings(): void {
  _settings = null;
}

/** Resolved host configuration roots (project-level and user-level). */
export function getHostRoots(settings: Settings, cwd = process.cwd()): { project: string; user: string } {
  return {
    project: path.resolve(cwd, expandHome(settings.paths.projectDir)),
    user: path.resolve(cwd, expandHome(settings.paths.userDir)),
  };
}
