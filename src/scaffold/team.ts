/**
 * Build-team flow: pick a blueprint for the project description and write
 * its agents, skills, rules and MCP servers.
 */
import { readFileSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigError, errorToString } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import { findKeywords } from "../intent/classifier.ts";
import {
  loadMcpConfig,
  mergeMcpConfigs,
  serializeMcpConfig,
  MCP_CONFIG_FILE,
} from "../mcp/config.ts";
import { createAgent, createRule, createSkill } from "./create.ts";
import { writeGuarded } from "./writer.ts";
import {
  TeamCatalogSchema,
  emptySummary,
  type ScaffoldOptions,
  type ScaffoldSummary,
  type TeamBlueprint,
  type TeamCatalog,
} from "./types.ts";

const logger = getLogger("team_builder");

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../../templates/teams.json", import.meta.url));

export function loadTeamCatalog(filePath = DEFAULT_CATALOG_PATH): TeamCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    throw new ConfigError(`Failed to read team catalog ${filePath}: ${errorToString(err)}`);
  }

  const result = TeamCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid team catalog ${filePath}: ${result.error.issues.map((i) => i.message).join("; ")}`);
  }
  const catalog = result.data;
  if (!catalog.blueprints.some((b) => b.id === catalog.fallback)) {
    throw new ConfigError(`Team catalog fallback "${catalog.fallback}" is not a blueprint id`);
  }
  return catalog;
}

/**
 * Pick the blueprint whose keywords best match the request.
 * Ties go to the earlier blueprint; no match at all uses the fallback.
 */
export function selectBlueprint(request: string, catalog: TeamCatalog): { blueprint: TeamBlueprint; score: number } {
  let best: { blueprint: TeamBlueprint; score: number } | null = null;
  for (const blueprint of catalog.blueprints) {
    const score = findKeywords(request, blueprint.keywords).length;
    if (score > 0 && (!best || score > best.score)) {
      best = { blueprint, score };
    }
  }
  if (best) return best;

  const fallback = catalog.blueprints.find((b) => b.id === catalog.fallback);
  if (!fallback) {
    throw new ConfigError(`Team catalog fallback "${catalog.fallback}" is not a blueprint id`);
  }
  return { blueprint: fallback, score: 0 };
}

export interface BuildTeamOptions extends ScaffoldOptions {
  /** Directory holding .mcp.json; the project root, one level above `root` by default. */
  projectDir?: string;
  catalog?: TeamCatalog;
}

export interface BuildTeamResult {
  blueprint: TeamBlueprint;
  summary: ScaffoldSummary;
  mcpServersAdded: string[];
}

export async function buildTeam(request: string, options: BuildTeamOptions): Promise<BuildTeamResult> {
  const catalog = options.catalog ?? loadTeamCatalog();
  const { blueprint, score } = selectBlueprint(request, catalog);
  logger.info({ blueprint: blueprint.id, score }, "team_blueprint_selected");

  const summary = emptySummary();
  for (const agent of blueprint.agents) {
    await createAgent(agent, options, summary);
  }
  for (const skill of blueprint.skills) {
    await createSkill(skill, options, summary);
  }
  for (const rule of blueprint.rules) {
    await createRule(rule, options, summary);
  }

  let mcpServersAdded: string[] = [];
  if (Object.keys(blueprint.mcpServers).length > 0) {
    const projectDir = options.projectDir ?? path.dirname(path.resolve(options.root));
    const mcpPath = path.join(projectDir, MCP_CONFIG_FILE);
    const { config, added } = mergeMcpConfigs(loadMcpConfig(mcpPath), { mcpServers: blueprint.mcpServers });
    if (added.length > 0) {
      // mergeMcpConfigs keeps every existing entry
      await writeGuarded(mcpPath, serializeMcpConfig(config), { force: true }, summary);
      mcpServersAdded = added;
    }
  }

  return { blueprint, summary, mcpServersAdded };
}
