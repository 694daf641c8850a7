/**
 * Tests for the create-agent / create-skill / create-rule flows.
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { createAgent, createRule, createSkill, normalizeName } from "../../../src/scaffold/create.ts";
import { parseSubagentFile } from "../../../src/subagents/loader.ts";
import { parseSkillFile } from "../../../src/skills/loader.ts";
import { parseRuleFile } from "../../../src/rules/loader.ts";
import { DocumentValidationError } from "../../../src/infra/errors.ts";

let tmp: string;
let root: string;

beforeEach(() => {
  tmp = mkdtempSync(path.join(tmpdir(), "metaskill-create-"));
  root = path.join(tmp, ".claude");
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

describe("normalizeName", () => {
  test("kebab-cases free text", () => {
    expect(normalizeName("Security Reviewer")).toBe("security-reviewer");
  });

  test("throws when nothing usable remains", () => {
    expect(() => normalizeName("***")).toThrow(DocumentValidationError);
    expect(() => normalizeName("***")).toThrow('Invalid name "***": use letters, numbers and hyphens');
  });
});

describe("createAgent", () => {
  test("writes a loadable agent under agents/", async () => {
    const summary = await createAgent(
      {
        name: "Security Reviewer",
        description: 'Audits changes, e.g. "check this PR for secrets"',
        tools: ["Read", "Grep"],
        persona: "You are a security reviewer.",
        responsibilities: ["Flag hard-coded credentials"],
      },
      { root, defaultModel: "sonnet" },
    );

    const filePath = path.join(root, "agents", "security-reviewer.md");
    expect(summary.written).toEqual([filePath]);

    const def = parseSubagentFile(filePath, "security-reviewer", "project");
    expect(def?.name).toBe("security-reviewer");
    expect(def?.tools).toEqual(["Read", "Grep"]);
    expect(def?.model).toBe("sonnet");
    expect(def?.prompt).toBe("You are a security reviewer.\n\n## Responsibilities\n\n- Flag hard-coded credentials");
  });

  test("an explicit model beats the default", async () => {
    await createAgent(
      { name: "lead", description: "Use when planning.", model: "opus", persona: "You plan." },
      { root, defaultModel: "sonnet" },
    );
    expect(parseSubagentFile(path.join(root, "agents", "lead.md"), "lead", "project")?.model).toBe("opus");
  });

  test("an invalid draft throws and writes nothing", async () => {
    await expect(
      createAgent({ name: "lead", description: "Use when planning.", persona: "You plan.", maxTurns: -1 }, { root }),
    ).rejects.toThrow(/^Invalid agent draft: maxTurns: /);
    expect(existsSync(path.join(root, "agents", "lead.md"))).toBe(false);
  });

  test("a rendered document with lint errors is not written", async () => {
    await expect(createAgent({ name: "lead", description: "  ", persona: "You plan." }, { root })).rejects.toThrow(
      'Generated agent "lead" is invalid: missing-description: frontmatter has no non-empty `description`',
    );
    expect(existsSync(path.join(root, "agents", "lead.md"))).toBe(false);
  });

  test("existing file is skipped when declined and overwritten when confirmed", async () => {
    const draft = { name: "lead", description: "Use when planning.", persona: "You plan." };
    await createAgent(draft, { root });

    const declined = await createAgent({ ...draft, persona: "Changed." }, { root, confirmOverwrite: async () => false });
    expect(declined.skipped).toEqual([path.join(root, "agents", "lead.md")]);
    expect(readFileSync(path.join(root, "agents", "lead.md"), "utf-8")).toContain("You plan.");

    const confirmed = await createAgent({ ...draft, persona: "Changed." }, { root, confirmOverwrite: async () => true });
    expect(confirmed.overwritten).toEqual([path.join(root, "agents", "lead.md")]);
    expect(readFileSync(path.join(root, "agents", "lead.md"), "utf-8")).toContain("Changed.");
  });
});

describe("createSkill", () => {
  test("writes skills/<name>/SKILL.md", async () => {
    const summary = await createSkill(
      {
        name: "deployPreview",
        description: 'Deploy a preview, e.g. "deploy preview for main"',
        argumentHint: "[branch]",
        disableModelInvocation: true,
        steps: ["Build", "Deploy $ARGUMENTS"],
      },
      { root },
    );

    const filePath = path.join(root, "skills", "deploy-preview", "SKILL.md");
    expect(summary.written).toEqual([filePath]);
    const skill = parseSkillFile(filePath, "deploy-preview", "project");
    expect(skill?.argumentHint).toBe("[branch]");
    expect(skill?.disableModelInvocation).toBe(true);
    expect(skill?.userInvocable).toBe(true);
  });

  test("a skill needs at least one step", async () => {
    await expect(createSkill({ name: "empty", description: "Use when idle.", steps: [] }, { root })).rejects.toThrow(
      DocumentValidationError,
    );
  });

  test("summaries accumulate across calls", async () => {
    const first = await createSkill({ name: "one", description: "Use when one.", steps: ["1"] }, { root });
    const both = await createSkill({ name: "two", description: "Use when two.", steps: ["2"] }, { root }, first);
    expect(both).toBe(first);
    expect(both.written).toHaveLength(2);
  });
});

describe("createRule", () => {
  test("writes rules/<name>.md with its scope", async () => {
    await createRule(
      { name: "Swift Conventions", title: "Swift", paths: ["**/*.swift"], conventions: ["Prefer structs"] },
      { root },
    );

    const filePath = path.join(root, "rules", "swift-conventions.md");
    const rule = parseRuleFile(filePath, "swift-conventions", "project");
    expect(rule?.title).toBe("Swift");
    expect(rule?.paths).toEqual(["**/*.swift"]);
  });
});
