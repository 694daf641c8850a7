/**
 * Tests for logger transport resolution and log retention.
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { cleanupOldLogs, defaultLogFile, getLogger, resolveTransports } from "../../src/infra/logger.ts";

describe("logger", () => {
  let testDir: string;

  beforeEach(() => {
    testDir = mkdtempSync(path.join(tmpdir(), "metaskill-logger-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  test("defaultLogFile lives under logs/", () => {
    expect(defaultLogFile("/data")).toBe(path.join("/data", "logs", "metaskill.log"));
  });

  test("getLogger returns a child carrying the module name", () => {
    const logger = getLogger("test_module");
    expect(logger.bindings()).toEqual({ module: "test_module" });
  });

  describe("resolveTransports", () => {
    test("nothing enabled resolves to null", () => {
      expect(resolveTransports("development", null, false)).toBeNull();
    });

    test("console in development uses pino-pretty on stderr", () => {
      expect(resolveTransports("development", null, true)).toEqual({
        transport: { target: "pino-pretty", options: { colorize: true, destination: 2 } },
        isMultiTarget: false,
      });
    });

    test("console in production writes JSON to stderr", () => {
      expect(resolveTransports("production", null, true)).toEqual({
        transport: { target: "pino/file", options: { destination: 2 } },
        isMultiTarget: false,
      });
    });

    test("file output uses pino-roll and creates the directory", () => {
      const logFile = path.join(testDir, "logs", "metaskill.log");
      expect(resolveTransports("development", logFile, false)).toEqual({
        transport: {
          target: "pino-roll",
          options: { file: logFile, frequency: "daily", size: "10m", mkdir: true },
        },
        isMultiTarget: false,
      });
      expect(existsSync(path.join(testDir, "logs"))).toBe(true);
    });

    test("console and file together are multi-target", () => {
      const logFile = path.join(testDir, "metaskill.log");
      expect(resolveTransports("production", logFile, true)).toEqual({
        transport: {
          targets: [
            { target: "pino/file", options: { destination: 2 } },
            {
              target: "pino-roll",
              options: { file: logFile, frequency: "daily", size: "10m", mkdir: true },
            },
          ],
        },
        isMultiTarget: true,
      });
    });
  });

  describe("cleanupOldLogs", () => {
    const DAY_MS = 24 * 60 * 60 * 1000;

    function touch(name: string, ageDays: number, now: number): string {
      const filePath = path.join(testDir, name);
      writeFileSync(filePath, "{}\n");
      const mtime = new Date(now - ageDays * DAY_MS);
      utimesSync(filePath, mtime, mtime);
      return filePath;
    }

    test("removes rotated files past retention and keeps the rest", () => {
      const now = Date.now();
      const logFile = path.join(testDir, "metaskill.log");
      const current = touch("metaskill.log", 90, now);
      const stale = touch("metaskill.log.1", 45, now);
      const recent = touch("metaskill.log.2", 3, now);
      const unrelated = touch("other.log.1", 90, now);

      expect(cleanupOldLogs(logFile, 30, now)).toBe(1);
      expect(existsSync(stale)).toBe(false);
      expect(existsSync(current)).toBe(true);
      expect(existsSync(recent)).toBe(true);
      expect(existsSync(unrelated)).toBe(true);
    });

    test("missing directory removes nothing", () => {
      expect(cleanupOldLogs(path.join(testDir, "absent", "metaskill.log"))).toBe(0);
    });

    test("ignores names that only share the prefix", () => {
      mkdirSync(path.join(testDir, "metaskill.logs"));
      expect(cleanupOldLogs(path.join(testDir, "metaskill.log"), 0, Date.now() + DAY_MS)).toBe(0);
    });
  });
});
