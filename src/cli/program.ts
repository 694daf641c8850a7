/**
 * Commander program wiring: argument parsing and error reporting only.
 * The command bodies live in commands.ts.
 */
import { Command } from "commander";
import { MetaskillError } from "../infra/errors.ts";
import { getLogger } from "../infra/logger.ts";
import {
  runClassify,
  runContext,
  runInstall,
  runLint,
  runList,
  runMcpAdd,
  runMcpList,
  runMcpRemove,
  runNewAgent,
  runNewSkill,
  runRender,
  runSlash,
  runTeam,
  type CommandContext,
  type McpAddFlags,
  type NewAgentFlags,
  type NewSkillFlags,
} from "./commands.ts";

const logger = getLogger("cli");

export const VERSION = "0.1.0";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Run a handler and turn its result into process.exitCode.
 * MetaskillError is a user-facing failure: print it and exit 1.
 */
async function execute(ctx: CommandContext, handler: () => number | Promise<number>): Promise<void> {
  try {
    process.exitCode = await handler();
  } catch (err) {
    if (err instanceof MetaskillError) {
      logger.warn({ error: err.message, kind: err.name }, "command_failed");
      ctx.err(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  } finally {
    ctx.prompter.close();
  }
}

export function createProgram(ctx: CommandContext): Command {
  const program = new Command();

  program
    .name("metaskill")
    .description("Scaffold, lint and install agents, skills and rules for AI coding assistants")
    .version(VERSION);

  program
    .command("lint [root]")
    .description("Check every skill, agent, rule and .mcp.json under a host config root")
    .action((root: string | undefined) => execute(ctx, () => runLint(ctx, root)));

  program
    .command("list [root]")
    .description("List skills, agents and rules visible from this project")
    .action((root: string | undefined) => execute(ctx, () => runList(ctx, root)));

  program
    .command("context [root]")
    .description("Print the skill, subagent and rule context injected into a session")
    .action((root: string | undefined) => execute(ctx, () => runContext(ctx, root)));

  program
    .command("classify <text...>")
    .description("Show how a /metaskill request would be routed")
    .action((words: string[]) => execute(ctx, () => runClassify(ctx, words.join(" "))));

  const create = program.command("new").description("Create a single agent or skill");

  create
    .command("agent [name]")
    .description("Create a subagent definition")
    .option("-d, --description <text>", "when the agent should be used")
    .option("-m, --model <model>", "model tier (sonnet, opus, haiku, inherit)")
    .option("-t, --tools <list>", "comma-separated tool allowlist")
    .option("-p, --persona <text>", "one-sentence persona")
    .option("--user", "write under the user config root")
    .option("-f, --force", "overwrite existing files without asking")
    .action((name: string | undefined, flags: NewAgentFlags) => execute(ctx, () => runNewAgent(ctx, name, flags)));

  create
    .command("skill [name]")
    .description("Create a skill (slash command)")
    .option("-d, --description <text>", "what the skill does and when to use it")
    .option("-a, --argument-hint <hint>", "argument hint shown in autocomplete")
    .option("-t, --tools <list>", "comma-separated allowed tools")
    .option("--manual", "only run when invoked explicitly")
    .option("--user", "write under the user config root")
    .option("-f, --force", "overwrite existing files without asking")
    .action((name: string | undefined, flags: NewSkillFlags) => execute(ctx, () => runNewSkill(ctx, name, flags)));

  program
    .command("team <description...>")
    .description("Build a full team of agents, skills, rules and MCP servers for a project")
    .option("--user", "write under the user config root")
    .option("-f, --force", "overwrite existing files without asking")
    .action((words: string[], flags: { user?: boolean; force?: boolean }) =>
      execute(ctx, () => runTeam(ctx, words.join(" "), flags)),
    );

  program
    .command("run <line...>")
    .description('Dispatch a slash command line, e.g. run /metaskill "ios app"')
    .option("--user", "write under the user config root")
    .option("-f, --force", "overwrite existing files without asking")
    .action((words: string[], flags: { user?: boolean; force?: boolean }) =>
      execute(ctx, () => runSlash(ctx, words.join(" "), flags)),
    );

  program
    .command("render <skill> [args...]")
    .description("Print a skill body with arguments substituted")
    .action((name: string, args: string[]) => execute(ctx, () => runRender(ctx, name, args.join(" "))));

  const mcp = program.command("mcp").description("Manage MCP servers in .mcp.json");

  mcp
    .command("list")
    .description("List configured MCP servers")
    .action(() => execute(ctx, () => runMcpList(ctx)));

  mcp
    .command("add <name> <target> [args...]")
    .description("Add a server: a command for stdio, a URL for http/sse")
    .option("--transport <type>", "stdio, http or sse", "stdio")
    .option("-e, --env <KEY=VALUE>", "environment variable (repeatable)", collect)
    .option("-H, --header <Name: value>", "HTTP header (repeatable)", collect)
    .option("--replace", "replace an existing server with the same name")
    .action((name: string, target: string, args: string[], flags: McpAddFlags) =>
      execute(ctx, () => runMcpAdd(ctx, name, target, args, flags)),
    );

  mcp
    .command("remove <name>")
    .description("Remove a server")
    .action((name: string) => execute(ctx, () => runMcpRemove(ctx, name)));

  program
    .command("install")
    .description("Install the bundled /metaskill, /create-agent and /create-skill skills")
    .option("--dir <path>", "target skills directory")
    .option("-s, --skill <name>", "install only this skill (repeatable)", collect)
    .option("-f, --force", "overwrite existing files without asking")
    .action((flags: { dir?: string; force?: boolean; skill?: string[] }) =>
      execute(ctx, () => runInstall(ctx, { dir: flags.dir, force: flags.force, skills: flags.skill })),
    );

  return program;
}
