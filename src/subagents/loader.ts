/**
 * SubagentLoader — scan directories and parse agent definition files.
 *
 * Discovers subagents from:
 *   ~/.claude/agents/   (user)
 *   .claude/agents/     (project)
 *
 * Each subagent is a single <name>.md file with YAML frontmatter + persona body.
 */
import { existsSync, readdirSync, readFileSync } from "node:fs";
import path from "node:path";
import { getLogger } from "../infra/logger.ts";
import { errorToString } from "../infra/errors.ts";
import { parseDocument } from "../documents/frontmatter.ts";
import { isKebabCase } from "../documents/naming.ts";
import { AgentFrontmatterSchema, describeIssues } from "../documents/schemas.ts";
import type { DocumentSource } from "../documents/source.ts";
import type { SubagentDefinition } from "./types.ts";

const logger = getLogger("subagent_loader");

/** Parse an agent markdown file into a SubagentDefinition. */
export function parseSubagentFile(
  filePath: string,
  fileStem: string,
  source: DocumentSource,
): SubagentDefinition | null {
  try {
    const content = readFileSync(filePath, "utf-8");
    const { data, body } = parseDocument(content);

    const parsed = AgentFrontmatterSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn({ filePath, issues: describeIssues(parsed.error) }, "subagent_frontmatter_invalid");
      return null;
    }
    const fm = parsed.data;
    const name = fm.name ?? fileStem;

    if (!isKebabCase(name)) {
      logger.warn({ name, filePath }, "invalid_subagent_name");
      return null;
    }

    if (!fm.description) {
      logger.warn({ name, filePath }, "subagent_missing_description");
    }

    // No tools key (or "*") inherits everything
    const tools = !fm.tools || fm.tools.length === 0 || fm.tools.includes("*") ? ["*"] : fm.tools;

    // mcpServers may be a list of names or an inline server mapping
    const mcpServers = Array.isArray(fm.mcpServers)
      ? fm.mcpServers
      : fm.mcpServers
        ? Object.keys(fm.mcpServers)
        : undefined;

    return {
      name,
      description: fm.description ?? "",
      tools,
      disallowedTools: fm.disallowedTools ?? [],
      prompt: body,
      source,
      filePath,
      model: fm.model,
      permissionMode: fm.permissionMode,
      maxTurns: fm.maxTurns,
      memory: fm.memory,
      mcpServers,
      skills: fm.skills,
    };
  } catch (err) {
    logger.warn({ filePath, error: errorToString(err) }, "subagent_parse_error");
    return null;
  }
}

/** Scan a directory for *.md agent files. */
export function scanSubagentDir(dir: string, source: DocumentSource): SubagentDefinition[] {
  if (!existsSync(dir)) return [];

  const defs: SubagentDefinition[] = [];
  try {
    const entries = readdirSync(dir, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(".md")) continue;
      const def = parseSubagentFile(path.join(dir, entry.name), path.basename(entry.name, ".md"), source);
      if (def) {
        defs.push(def);
        logger.debug({ name: def.name, source }, "subagent_discovered");
      }
    }
  } catch (err) {
    logger.warn({ dir, error: errorToString(err) }, "subagent_dir_scan_error");
  }
  return defs.sort((a, b) => a.name.localeCompare(b.name));
}

/** Load subagents from every source, lowest priority first. */
export function loadAllSubagents(dirs: Partial<Record<DocumentSource, string>>): SubagentDefinition[] {
  const order: DocumentSource[] = ["builtin", "user", "project"];
  return order.flatMap((source) => {
    const dir = dirs[source];
    return dir ? scanSubagentDir(dir, source) : [];
  });
}
