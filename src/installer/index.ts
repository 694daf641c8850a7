/**
 * Installer — copy the bundled prompt library into a host skills directory.
 *
 * Default target is ~/.claude/skills, so /metaskill, /create-agent and
 * /create-skill become available in every project.
 */
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { DocumentValidationError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { scanSkillDir, SKILL_FILE } from "../skills/loader.ts";
import type { SkillDefinition } from "../skills/types.ts";
import { writeGuarded } from "../scaffold/writer.ts";
import { emptySummary, type ConfirmOverwrite, type ScaffoldSummary } from "../scaffold/types.ts";

const logger = getLogger("installer");

export const BUNDLED_SKILLS_DIR = fileURLToPath(new URL("../../skills", import.meta.url));

export function defaultInstallDir(home = homedir()): string {
  return path.join(home, ".claude", "skills");
}

export function listBundledSkills(bundledDir = BUNDLED_SKILLS_DIR): SkillDefinition[] {
  return scanSkillDir(bundledDir, "builtin");
}

export interface InstallOptions {
  targetDir?: string;
  skills?: string[];          // names to install; all bundled skills when omitted
  bundledDir?: string;
  force?: boolean;
  confirmOverwrite?: ConfirmOverwrite;
}

export async function installSkills(options: InstallOptions = {}): Promise<ScaffoldSummary> {
  const targetDir = options.targetDir ?? defaultInstallDir();
  const bundled = listBundledSkills(options.bundledDir);

  let selected = bundled;
  if (options.skills && options.skills.length > 0) {
    const known = new Set(bundled.map((s) => s.name));
    const unknown = options.skills.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new DocumentValidationError("Unknown bundled skill", unknown);
    }
    const wanted = new Set(options.skills);
    selected = bundled.filter((s) => wanted.has(s.name));
  }

  const summary = emptySummary();
  for (const skill of selected) {
    const content = await readFile(skill.bodyPath, "utf-8");
    await writeGuarded(path.join(targetDir, skill.name, SKILL_FILE), content, options, summary);
  }

  logger.info(
    { targetDir, installed: summary.written.length + summary.overwritten.length, skipped: summary.skipped.length },
    "skills_installed",
  );
  return summary;
}

/** Usage hints printed after a successful install. */
export function formatInstallBanner(targetDir: string): string {
  return [
    `Metaskill installed to ${targetDir}`,
    "",
    "Usage: open your coding assistant and type:",
    "  /metaskill fullstack web app",
    "  /metaskill ios app with SwiftUI",
    "  /metaskill data science pipeline",
  ].join("\n");
}
