/**
 * CLI command handlers.
 *
 * Each handler takes a CommandContext and returns a process exit code.
 * Interactive questions go through ctx.prompter; output through ctx.out.
 */
import path from "node:path";
import type { Settings } from "../infra/config-schema.ts";
import { getHostRoots } from "../infra/config.ts";
import { MetaskillError, McpConfigError } from "../infra/errors.ts";
import { toKebabCase } from "../documents/naming.ts";
import {
  classifyIntent,
  resolveClarification,
  AGENT_KEYWORDS,
  SKILL_KEYWORDS,
  type CreationMode,
  type IntentResult,
} from "../intent/classifier.ts";
import { parseSlashCommand, routeCommand } from "../intent/router.ts";
import { lintProject, formatReport } from "../lint/project.ts";
import {
  addMcpServer,
  loadMcpConfig,
  removeMcpServer,
  writeMcpConfig,
  isRemoteServer,
  MCP_CONFIG_FILE,
  type McpServer,
} from "../mcp/config.ts";
import { createAgent, createSkill } from "../scaffold/create.ts";
import { buildTeam } from "../scaffold/team.ts";
import { formatSummary } from "../scaffold/summary.ts";
import type { ScaffoldOptions } from "../scaffold/types.ts";
import { loadAllSkills } from "../skills/loader.ts";
import { SkillRegistry } from "../skills/registry.ts";
import { loadAllSubagents } from "../subagents/loader.ts";
import { SubagentRegistry } from "../subagents/registry.ts";
import { renderRulesForPrompt, scanRuleDir } from "../rules/loader.ts";
import { BUNDLED_SKILLS_DIR, formatInstallBanner, installSkills } from "../installer/index.ts";
import type { Prompter } from "./prompter.ts";

export interface CommandContext {
  settings: Settings;
  cwd: string;
  prompter: Prompter;
  out: (text: string) => void;
  err: (text: string) => void;
}

interface TargetFlags {
  user?: boolean;
  force?: boolean;
}

function scaffoldOptions(ctx: CommandContext, flags: TargetFlags): ScaffoldOptions {
  const roots = getHostRoots(ctx.settings, ctx.cwd);
  return {
    root: flags.user ? roots.user : roots.project,
    force: flags.force ?? ctx.settings.scaffold.force,
    confirmOverwrite: (filePath) =>
      ctx.prompter.confirm(`${path.relative(ctx.cwd, filePath) || filePath} already exists. Overwrite?`, false),
    defaultModel: ctx.settings.scaffold.defaultModel,
    lint: ctx.settings.lint,
  };
}

function splitList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  const items = value.split(",").map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : undefined;
}

const FILLER_WORDS = new Set([
  "a", "an", "the", "new", "create", "make", "add", "build", "me", "please", "for", "that", "which", "to",
  ...AGENT_KEYWORDS.filter((k) => ["agent", "agents", "subagent", "subagents", "sub-agent"].includes(k)),
  ...SKILL_KEYWORDS.filter((k) => !k.includes(" ")),
]);

/** Suggest a document name from a free-text request ("create a security reviewer agent" -> "security-reviewer"). */
export function suggestName(request: string): string {
  const words = request
    .toLowerCase()
    .split(/[^a-z0-9-]+/)
    .filter((w) => w && !FILLER_WORDS.has(w));
  return toKebabCase(words.slice(0, 4).join(" "));
}

/** Ask for list items one per line until an empty answer. */
async function askLines(prompter: Prompter, question: string): Promise<string[]> {
  const items: string[] = [];
  for (;;) {
    const answer = await prompter.ask(`${question} #${items.length + 1} (empty to finish)`);
    if (!answer) return items;
    items.push(answer);
  }
}

// ── lint / list / classify / render ─────────────────────────────

export function runLint(ctx: CommandContext, root?: string): number {
  const lintRoot = root ? path.resolve(ctx.cwd, root) : getHostRoots(ctx.settings, ctx.cwd).project;
  const mcpConfigPath = path.join(root ? path.dirname(lintRoot) : ctx.cwd, MCP_CONFIG_FILE);
  const report = lintProject(lintRoot, { lint: ctx.settings.lint, mcpConfigPath });
  ctx.out(formatReport(report, ctx.cwd));
  return report.errorCount > 0 ? 1 : 0;
}

function resolveRoots(ctx: CommandContext, root?: string): { project: string; user: string } {
  const roots = getHostRoots(ctx.settings, ctx.cwd);
  return root ? { ...roots, project: path.resolve(ctx.cwd, root) } : roots;
}

function loadRegistries(roots: { project: string; user: string }): { skills: SkillRegistry; agents: SubagentRegistry } {
  const skills = new SkillRegistry();
  skills.registerMany(
    loadAllSkills({
      builtin: BUNDLED_SKILLS_DIR,
      user: path.join(roots.user, "skills"),
      project: path.join(roots.project, "skills"),
    }),
  );
  const agents = new SubagentRegistry();
  agents.registerMany(
    loadAllSubagents({ user: path.join(roots.user, "agents"), project: path.join(roots.project, "agents") }),
  );
  return { skills, agents };
}

export function runList(ctx: CommandContext, root?: string): number {
  const roots = resolveRoots(ctx, root);
  const { skills, agents } = loadRegistries(roots);
  const rules = scanRuleDir(path.join(roots.project, "rules"), "project");

  const lines: string[] = ["Skills:"];
  for (const skill of skills.listAll()) {
    const flag = skill.userInvocable ? `/${skill.name}` : skill.name;
    lines.push(`  ${flag} [${skill.source}] ${skill.description}`);
  }
  lines.push("", "Agents:");
  for (const agent of agents.listAll()) {
    lines.push(`  ${agent.name} [${agent.source}${agent.model ? `, ${agent.model}` : ""}] ${agent.description}`);
  }
  lines.push("", "Rules:");
  for (const rule of rules) {
    lines.push(`  ${rule.name}: ${rule.title}`);
  }
  ctx.out(lines.join("\n"));
  return 0;
}

export function formatIntent(result: IntentResult): string {
  if (result.kind === "ambiguous") {
    return `ambiguous (matched: ${result.matched.join(", ")})\n${result.question}`;
  }
  const matched = result.matched.length > 0 ? ` (matched: ${result.matched.join(", ")})` : "";
  return `${result.mode}${matched}`;
}

export function runClassify(ctx: CommandContext, text: string): number {
  ctx.out(formatIntent(classifyIntent(text)));
  return 0;
}

/** The context block a host would inject: skill listing, subagent listing and rules. */
export function runContext(ctx: CommandContext, root?: string): number {
  const roots = resolveRoots(ctx, root);
  const { skills, agents } = loadRegistries(roots);
  const rules = scanRuleDir(path.join(roots.project, "rules"), "project");

  const blocks = [
    skills.getMetadataForPrompt(ctx.settings.prompt.skillBudgetChars),
    agents.getMetadataForPrompt(),
    renderRulesForPrompt(rules),
  ].filter((block) => block !== "");
  ctx.out(blocks.join("\n\n"));
  return 0;
}

export function runRender(ctx: CommandContext, name: string, args: string): number {
  const { skills } = loadRegistries(resolveRoots(ctx));
  const body = skills.loadBody(name, args || undefined);
  if (body === null) {
    throw new MetaskillError(`Skill not found: ${name}`);
  }
  ctx.out(body);
  return 0;
}

// ── new agent / new skill / team ────────────────────────────────

export interface NewAgentFlags extends TargetFlags {
  description?: string;
  model?: string;
  tools?: string;
  persona?: string;
}

export async function runNewAgent(ctx: CommandContext, nameArg: string | undefined, flags: NewAgentFlags): Promise<number> {
  const { prompter } = ctx;
  const name = nameArg || (await prompter.ask("Agent name (kebab-case)"));
  const description =
    flags.description ||
    (await prompter.ask('When should this agent be used? Include an example, e.g. "review my last commit"'));
  const persona =
    flags.persona || (await prompter.ask("Persona (one sentence)", `You are a ${name.replace(/-/g, " ")}.`));
  const tools = splitList(flags.tools ?? (await prompter.ask("Tools, comma-separated (empty inherits all)")));
  const responsibilities = await askLines(prompter, "Responsibility");

  const summary = await createAgent(
    { name, description, persona, tools, model: flags.model, responsibilities },
    scaffoldOptions(ctx, flags),
  );
  ctx.out(formatSummary(summary, ctx.cwd));
  return 0;
}

export interface NewSkillFlags extends TargetFlags {
  description?: string;
  argumentHint?: string;
  tools?: string;
  manual?: boolean;
}

export async function runNewSkill(ctx: CommandContext, nameArg: string | undefined, flags: NewSkillFlags): Promise<number> {
  const { prompter } = ctx;
  const name = nameArg || (await prompter.ask("Skill name (kebab-case)"));
  const description =
    flags.description ||
    (await prompter.ask('What does the skill do? Include a trigger, e.g. "build and test"'));
  const steps = await askLines(prompter, "Step");
  if (steps.length === 0) {
    throw new MetaskillError("A skill needs at least one step");
  }

  const summary = await createSkill(
    {
      name,
      description,
      steps,
      argumentHint: flags.argumentHint,
      allowedTools: splitList(flags.tools),
      disableModelInvocation: flags.manual ? true : undefined,
      onFailure: "If a step fails, report the full error output and stop.",
    },
    scaffoldOptions(ctx, flags),
  );
  ctx.out(formatSummary(summary, ctx.cwd));
  return 0;
}

export async function runTeam(ctx: CommandContext, request: string, flags: TargetFlags): Promise<number> {
  const options = scaffoldOptions(ctx, flags);
  const { blueprint, summary, mcpServersAdded } = await buildTeam(request, { ...options, projectDir: ctx.cwd });

  ctx.out(`Team blueprint: ${blueprint.title}`);
  ctx.out(formatSummary(summary, ctx.cwd));
  if (mcpServersAdded.length > 0) {
    ctx.out(`MCP servers added to ${MCP_CONFIG_FILE}: ${mcpServersAdded.join(", ")}`);
  }
  const commands = blueprint.skills.map((s) => `/${s.name}`);
  if (commands.length > 0) {
    ctx.out(`Try: ${commands.join(", ")}`);
  }
  return 0;
}

/** Dispatch a slash-command line ("/metaskill ios app"). Ambiguous requests ask the user. */
export async function runSlash(ctx: CommandContext, line: string, flags: TargetFlags): Promise<number> {
  const parsed = parseSlashCommand(line);
  if (!parsed) {
    throw new MetaskillError(`Not a slash command: ${line}`);
  }

  const routed = routeCommand(parsed.command, parsed.args);
  let mode: CreationMode | null;
  if (routed.kind === "ambiguous") {
    mode = resolveClarification(await ctx.prompter.ask(routed.question));
    if (!mode) {
      throw new MetaskillError("Unrecognized answer; expected agent, skill or team");
    }
  } else {
    mode = routed.mode;
  }

  const suggested = suggestName(parsed.args) || undefined;
  switch (mode) {
    case "agent":
      return runNewAgent(ctx, await ctx.prompter.ask("Agent name", suggested), flags);
    case "skill":
      return runNewSkill(ctx, await ctx.prompter.ask("Skill name", suggested), flags);
    case "team":
      if (!parsed.args) {
        throw new MetaskillError("Describe the project, e.g. /metaskill fullstack web app");
      }
      return runTeam(ctx, parsed.args, flags);
  }
}

// ── mcp ─────────────────────────────────────────────────────────

function mcpPath(ctx: CommandContext): string {
  return path.join(ctx.cwd, MCP_CONFIG_FILE);
}

export function runMcpList(ctx: CommandContext): number {
  const config = loadMcpConfig(mcpPath(ctx));
  const entries = Object.entries(config.mcpServers);
  if (entries.length === 0) {
    ctx.out(`No MCP servers in ${MCP_CONFIG_FILE}`);
    return 0;
  }
  for (const [name, server] of entries) {
    const target = isRemoteServer(server)
      ? `${server.type} ${server.url}`
      : `stdio ${[server.command, ...(server.args ?? [])].join(" ")}`;
    ctx.out(`${name}: ${target}`);
  }
  return 0;
}

export interface McpAddFlags {
  transport?: string;
  env?: string[];
  header?: string[];
  replace?: boolean;
}

function parsePairs(pairs: string[] | undefined, separator: string, label: string): Record<string, string> | undefined {
  if (!pairs || pairs.length === 0) return undefined;
  const result: Record<string, string> = {};
  for (const pair of pairs) {
    const index = pair.indexOf(separator);
    if (index <= 0) {
      throw new McpConfigError(`Invalid ${label} "${pair}", expected KEY${separator}VALUE`);
    }
    result[pair.slice(0, index).trim()] = pair.slice(index + 1).trim();
  }
  return result;
}

export function buildServer(target: string, args: string[], flags: McpAddFlags): McpServer {
  const transport = flags.transport ?? "stdio";
  switch (transport) {
    case "stdio":
      return {
        command: target,
        args: args.length > 0 ? args : undefined,
        env: parsePairs(flags.env, "=", "env"),
      };
    case "http":
    case "sse":
      return { type: transport, url: target, headers: parsePairs(flags.header, ":", "header") };
    default:
      throw new McpConfigError(`Unknown transport "${transport}", expected stdio, http or sse`);
  }
}

export function runMcpAdd(ctx: CommandContext, name: string, target: string, args: string[], flags: McpAddFlags): number {
  const filePath = mcpPath(ctx);
  const config = addMcpServer(loadMcpConfig(filePath), name, buildServer(target, args, flags), {
    replace: flags.replace,
  });
  writeMcpConfig(filePath, config);
  ctx.out(`Added MCP server "${name}" to ${MCP_CONFIG_FILE}`);
  return 0;
}

export function runMcpRemove(ctx: CommandContext, name: string): number {
  const filePath = mcpPath(ctx);
  writeMcpConfig(filePath, removeMcpServer(loadMcpConfig(filePath), name));
  ctx.out(`Removed MCP server "${name}" from ${MCP_CONFIG_FILE}`);
  return 0;
}

// ── install ─────────────────────────────────────────────────────

export async function runInstall(
  ctx: CommandContext,
  flags: { dir?: string; force?: boolean; skills?: string[] },
): Promise<number> {
  const targetDir = flags.dir
    ? path.resolve(ctx.cwd, flags.dir)
    : path.join(getHostRoots(ctx.settings, ctx.cwd).user, "skills");

  const summary = await installSkills({
    targetDir,
    skills: flags.skills,
    force: flags.force,
    confirmOverwrite: (filePath) => ctx.prompter.confirm(`${filePath} already exists. Overwrite?`, false),
  });
  ctx.out(formatSummary(summary, ctx.cwd));
  ctx.out("");
  ctx.out(formatInstallBanner(targetDir));
  return 0;
}
