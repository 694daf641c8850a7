import { describe, expect, test } from "vitest";
import { renderAgent, renderRule, renderSkill, titleFromName } from "../../../src/scaffold/render.ts";
import { parseDocument } from "../../../src/documents/frontmatter.ts";

describe("titleFromName", () => {
  test("capitalizes each word", () => {
    expect(titleFromName("build-and-test")).toBe("Build And Test");
    expect(titleFromName("ios")).toBe("Ios");
  });
});

describe("renderAgent", () => {
  test("writes frontmatter in order and a sectioned body", () => {
    const text = renderAgent({
      name: "code-reviewer",
      description: "Use proactively after edits.",
      tools: ["Read", "Grep"],
      model: "sonnet",
      persona: "You review code.",
      responsibilities: ["Check tests"],
      rules: [],
    });

    expect(text).toBe(
      [
        "---",
        "name: code-reviewer",
        "description: Use proactively after edits.",
        "tools: Read, Grep",
        "model: sonnet",
        "---",
        "",
        "You review code.",
        "",
        "## Responsibilities",
        "",
        "- Check tests",
        "",
      ].join("\n"),
    );
  });

  test("optional fields round-trip through the parser", () => {
    const { data, body } = parseDocument(
      renderAgent({
        name: "ops",
        description: 'Deploys, e.g. "ship it"',
        disallowedTools: ["Write", "Edit"],
        permissionMode: "acceptEdits",
        maxTurns: 5,
        memory: "project",
        skills: ["deploy"],
        persona: "You run deploys.",
        responsibilities: [],
        rules: ["Never force-push"],
      }),
    );

    expect(data).toEqual({
      name: "ops",
      description: 'Deploys, e.g. "ship it"',
      disallowedTools: "Write, Edit",
      permissionMode: "acceptEdits",
      maxTurns: 5,
      memory: "project",
      skills: ["deploy"],
    });
    expect(body).toBe("You run deploys.\n\n## Rules\n\n- Never force-push");
  });
});

describe("renderSkill", () => {
  test("writes only non-default flags", () => {
    const { data, body } = parseDocument(
      renderSkill({
        name: "deploy-preview",
        description: "Use when shipping a branch.",
        argumentHint: "[branch]",
        allowedTools: ["Bash"],
        userInvocable: true,
        disableModelInvocation: true,
        context: "inline",
        agent: "ops",
        steps: ["Build", "Deploy"],
        onFailure: "Stop.",
      }),
    );

    expect(data).toEqual({
      name: "deploy-preview",
      description: "Use when shipping a branch.",
      "argument-hint": "[branch]",
      "allowed-tools": "Bash",
      "disable-model-invocation": true,
    });
    expect(body).toBe(
      "# Deploy Preview\n\nArguments: $ARGUMENTS\n\n## Steps\n\n1. Build\n2. Deploy\n\n## On failure\n\nStop.",
    );
  });

  test("fork context carries the agent; hidden skills say so", () => {
    const { data, body } = parseDocument(
      renderSkill({
        name: "audit",
        description: "Use when auditing.",
        userInvocable: false,
        context: "fork",
        agent: "security-reviewer",
        model: "opus",
        steps: ["Audit"],
      }),
    );

    expect(data).toEqual({
      name: "audit",
      description: "Use when auditing.",
      "user-invocable": false,
      context: "fork",
      agent: "security-reviewer",
      model: "opus",
    });
    expect(body).toBe("# Audit\n\n## Steps\n\n1. Audit");
  });
});

describe("renderRule", () => {
  test("plain rule has no frontmatter", () => {
    expect(renderRule({ name: "web", title: "Web", conventions: ["Use TypeScript", "Test it"] })).toBe(
      "# Web\n\n- Use TypeScript\n- Test it\n",
    );
  });

  test("scoped rule carries paths", () => {
    const { data, body } = parseDocument(
      renderRule({ name: "swift", title: "Swift", paths: ["**/*.swift"], conventions: ["Prefer structs"] }),
    );
    expect(data).toEqual({ paths: ["**/*.swift"] });
    expect(body).toBe("# Swift\n\n- Prefer structs");
  });
});
