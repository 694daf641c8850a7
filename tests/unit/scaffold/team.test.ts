/**
 * Tests for blueprint selection and the build-team flow.
 */
import { describe, expect, test, beforeEach, afterEach } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { buildTeam, loadTeamCatalog, selectBlueprint } from "../../../src/scaffold/team.ts";
import type { TeamCatalog } from "../../../src/scaffold/types.ts";
import { lintProject } from "../../../src/lint/project.ts";
import { loadMcpConfig } from "../../../src/mcp/config.ts";
import { ConfigError } from "../../../src/infra/errors.ts";

let tmp: string;
let root: string;

beforeEach(() => {
  tmp = mkdtempSync(path.join(tmpdir(), "metaskill-team-"));
  root = path.join(tmp, ".claude");
});

afterEach(() => {
  rmSync(tmp, { recursive: true, force: true });
});

describe("loadTeamCatalog", () => {
  test("the bundled catalog loads", () => {
    const catalog = loadTeamCatalog();
    expect(catalog.fallback).toBe("generic");
    expect(catalog.blueprints.map((b) => b.id)).toEqual(["fullstack-web", "ios", "data-science", "generic"]);
  });

  test("unreadable catalog raises ConfigError", () => {
    const filePath = path.join(tmp, "teams.json");
    writeFileSync(filePath, "{");
    expect(() => loadTeamCatalog(filePath)).toThrow(ConfigError);
    expect(() => loadTeamCatalog(filePath)).toThrow(/^Failed to read team catalog /);
  });

  test("fallback must name a blueprint", () => {
    const filePath = path.join(tmp, "teams.json");
    writeFileSync(filePath, JSON.stringify({ fallback: "nope", blueprints: [{ id: "a", title: "A" }] }));
    expect(() => loadTeamCatalog(filePath)).toThrow('Team catalog fallback "nope" is not a blueprint id');
  });
});

describe("selectBlueprint", () => {
  const catalog = loadTeamCatalog();

  test.each([
    ["fullstack web app with react", "fullstack-web", 3],
    ["ios app with SwiftUI", "ios", 2],
    ["data science pipeline", "data-science", 3],
    ["a game in rust", "generic", 0],
  ])("%s -> %s", (request, id, score) => {
    const selected = selectBlueprint(request, catalog);
    expect(selected.blueprint.id).toBe(id);
    expect(selected.score).toBe(score);
  });

  test("ties go to the earlier blueprint", () => {
    const tied: TeamCatalog = {
      fallback: "b",
      blueprints: [
        { id: "a", title: "A", keywords: ["alpha"], agents: [], skills: [], rules: [], mcpServers: {} },
        { id: "b", title: "B", keywords: ["beta"], agents: [], skills: [], rules: [], mcpServers: {} },
      ],
    };
    expect(selectBlueprint("alpha beta", tied).blueprint.id).toBe("a");
    expect(selectBlueprint("beta", tied).blueprint.id).toBe("b");
  });
});

describe("buildTeam", () => {
  test("writes every document of the blueprint and they lint clean", async () => {
    const { blueprint, summary, mcpServersAdded } = await buildTeam("ios app with SwiftUI", { root });

    expect(blueprint.id).toBe("ios");
    expect(mcpServersAdded).toEqual([]);
    expect(summary.written.map((f) => path.relative(root, f))).toEqual([
      path.join("agents", "tech-lead.md"),
      path.join("agents", "ios-engineer.md"),
      path.join("agents", "code-reviewer.md"),
      path.join("skills", "build-and-test", "SKILL.md"),
      path.join("skills", "run-simulator", "SKILL.md"),
      path.join("rules", "swift-conventions.md"),
    ]);
    expect(lintProject(root).issues).toEqual([]);
  });

  test("merges blueprint MCP servers into the project .mcp.json", async () => {
    const mcpPath = path.join(tmp, ".mcp.json");
    writeFileSync(mcpPath, JSON.stringify({ mcpServers: { mine: { command: "my-server" } } }));

    const { mcpServersAdded, summary } = await buildTeam("fullstack web app", { root });

    expect(mcpServersAdded).toEqual(["playwright"]);
    expect(summary.overwritten).toEqual([mcpPath]);
    expect(Object.keys(loadMcpConfig(mcpPath).mcpServers)).toEqual(["mine", "playwright"]);
  });

  test("a second run skips existing files and leaves .mcp.json alone", async () => {
    await buildTeam("fullstack web app", { root });
    const mcpPath = path.join(tmp, ".mcp.json");
    const before = readFileSync(mcpPath, "utf-8");

    const { summary, mcpServersAdded } = await buildTeam("fullstack web app", { root });

    expect(summary.written).toEqual([]);
    expect(summary.skipped).toHaveLength(7);
    expect(mcpServersAdded).toEqual([]);
    expect(readFileSync(mcpPath, "utf-8")).toBe(before);
  });

  test("projectDir places .mcp.json explicitly", async () => {
    const projectDir = path.join(tmp, "elsewhere");
    await buildTeam("react web app", { root, projectDir });
    expect(existsSync(path.join(projectDir, ".mcp.json"))).toBe(true);
    expect(existsSync(path.join(tmp, ".mcp.json"))).toBe(false);
  });
});
