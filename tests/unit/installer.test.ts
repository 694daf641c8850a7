/**
 * Tests for installing the bundled prompt library.
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import {
  BUNDLED_SKILLS_DIR,
  defaultInstallDir,
  formatInstallBanner,
  installSkills,
  listBundledSkills,
} from "../../src/installer/index.ts";
import { DocumentValidationError } from "../../src/infra/errors.ts";

let tmp: string;

beforeEach(() => {
  tmp = mkdtempSync(path.join(tmpdir(), "metaskill-install-"));
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

describe("listBundledSkills", () => {
  test("ships the three entry-point skills", () => {
    expect(listBundledSkills().map((s) => s.name)).toEqual(["create-agent", "create-skill", "metaskill"]);
    expect(listBundledSkills().every((s) => s.source === "builtin")).toBe(true);
  });
});

describe("installSkills", () => {
  test("copies every bundled SKILL.md", async () => {
    const summary = await installSkills({ targetDir: tmp });

    expect(summary.written.map((f) => path.relative(tmp, f))).toEqual([
      path.join("create-agent", "SKILL.md"),
      path.join("create-skill", "SKILL.md"),
      path.join("metaskill", "SKILL.md"),
    ]);
    expect(readFileSync(path.join(tmp, "metaskill", "SKILL.md"), "utf-8")).toBe(
      readFileSync(path.join(BUNDLED_SKILLS_DIR, "metaskill", "SKILL.md"), "utf-8"),
    );
  });

  test("installs only the named skills", async () => {
    const summary = await installSkills({ targetDir: tmp, skills: ["metaskill"] });
    expect(summary.written).toEqual([path.join(tmp, "metaskill", "SKILL.md")]);
  });

  test("unknown names are rejected before anything is written", async () => {
    await expect(installSkills({ targetDir: tmp, skills: ["metaskill", "nope"] })).rejects.toThrow(
      DocumentValidationError,
    );
    await expect(installSkills({ targetDir: tmp, skills: ["nope"] })).rejects.toThrow("Unknown bundled skill: nope");
  });

  test("existing files follow the overwrite discipline", async () => {
    mkdirSync(path.join(tmp, "metaskill"));
    writeFileSync(path.join(tmp, "metaskill", "SKILL.md"), "customized");

    const kept = await installSkills({ targetDir: tmp, skills: ["metaskill"] });
    expect(kept.skipped).toEqual([path.join(tmp, "metaskill", "SKILL.md")]);
    expect(readFileSync(path.join(tmp, "metaskill", "SKILL.md"), "utf-8")).toBe("customized");

    const forced = await installSkills({ targetDir: tmp, skills: ["metaskill"], force: true });
    expect(forced.overwritten).toEqual([path.join(tmp, "metaskill", "SKILL.md")]);
  });

  test("a custom bundled directory", async () => {
    const bundledDir = path.join(tmp, "bundle");
    mkdirSync(path.join(bundledDir, "hello"), { recursive: true });
    writeFileSync(path.join(bundledDir, "hello", "SKILL.md"), "---\nname: hello\n---\nSay hello.\n");
    const targetDir = path.join(tmp, "target");

    const summary = await installSkills({ targetDir, bundledDir });
    expect(summary.written).toEqual([path.join(targetDir, "hello", "SKILL.md")]);
  });
});

describe("defaultInstallDir / formatInstallBanner", () => {
  test("defaults to the user skills directory", () => {
    expect(defaultInstallDir("/home/tester")).toBe(path.join("/home/tester", ".claude", "skills"));
  });

  test("banner lists example invocations", () => {
    expect(formatInstallBanner("/opt/skills")).toBe(
      [
        "Metaskill installed to /opt/skills",
        "",
        "Usage: open your coding assistant and type:",
        "  /metaskill fullstack web app",
        "  /metaskill ios app with SwiftUI",
        "  /metaskill data science pipeline",
      ].join("\n"),
    );
  });
});
