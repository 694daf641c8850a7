/**
 * Tests for rule loading and prompt rendering.
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { mkdtempSync, mkdirSync, writeFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { parseRuleFile, scanRuleDir, renderRulesForPrompt } from "../../src/rules/loader.ts";
import type { RuleDefinition } from "../../src/rules/types.ts";

let tmp: string;

function writeRule(rel: string, content: string): string {
  const filePath = path.join(tmp, rel);
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, content, "utf-8");
  return filePath;
}

beforeEach(() => {
  tmp = mkdtempSync(path.join(tmpdir(), "metaskill-rules-"));
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

describe("parseRuleFile", () => {
  test("reads title and body without frontmatter", () => {
    const filePath = writeRule("style.md", "# Code Style\n\n- Use tabs\n");
    expect(parseRuleFile(filePath, "style", "project")).toEqual({
      name: "style",
      title: "Code Style",
      paths: undefined,
      body: "# Code Style\n\n- Use tabs",
      filePath,
      source: "project",
    });
  });

  test("reads paths from frontmatter", () => {
    const filePath = writeRule("swift.md", '---\npaths: "**/*.swift"\n---\n# Swift\n\n- Prefer structs\n');
    expect(parseRuleFile(filePath, "swift", "project")?.paths).toEqual(["**/*.swift"]);
  });

  test("falls back to the file name for the title", () => {
    const filePath = writeRule("frontend/react.md", "- Use hooks\n");
    expect(parseRuleFile(filePath, "frontend/react", "project")?.title).toBe("react");
  });

  test("returns null on a bad paths value", () => {
    const filePath = writeRule("bad.md", "---\npaths: 3\n---\n# Bad\n");
    expect(parseRuleFile(filePath, "bad", "project")).toBeNull();
  });
});

describe("scanRuleDir", () => {
  test("walks subdirectories and names rules by relative path", () => {
    writeRule("testing.md", "# Testing\n");
    writeRule("frontend/react.md", "# React\n");
    writeRule("frontend/notes.txt", "ignored");

    const rules = scanRuleDir(tmp, "user");
    expect(rules.map((r) => r.name)).toEqual(["frontend/react", "testing"]);
  });

  test("missing directory yields nothing", () => {
    expect(scanRuleDir(path.join(tmp, "missing"), "user")).toEqual([]);
  });
});

describe("renderRulesForPrompt", () => {
  function rule(overrides: Partial<RuleDefinition> & { name: string; title: string; body: string }): RuleDefinition {
    return { filePath: `/tmp/${overrides.name}.md`, source: "project", ...overrides };
  }

  test("renders title, scope and body without its heading", () => {
    const text = renderRulesForPrompt([
      rule({ name: "style", title: "Style", body: "# Style\n\n- Use tabs" }),
      rule({ name: "swift", title: "Swift", paths: ["**/*.swift", "Package.swift"], body: "- Prefer structs" }),
    ]);
    expect(text).toBe(
      "## Style\n\n- Use tabs\n\n## Swift\n(Applies to: **/*.swift, Package.swift)\n\n- Prefer structs",
    );
  });

  test("the title heading is dropped even after a preamble", () => {
    const text = renderRulesForPrompt([
      rule({ name: "style", title: "Style", body: "Intro line\n\n# Style\n\n- a\n\n# Other\n\n- b" }),
    ]);
    expect(text).toBe("## Style\n\nIntro line\n\n- a\n\n# Other\n\n- b");
  });

  test("no rules renders nothing", () => {
    expect(renderRulesForPrompt([])).toBe("");
  });
});
