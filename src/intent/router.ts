/**
 * Slash-command routing: /metaskill, /create-agent, /create-skill.
 */
import { UnknownCommandError } from "../infra/errors.ts";
import { classifyIntent, type IntentResult } from "./classifier.ts";

export const COMMANDS = ["metaskill", "create-agent", "create-skill"] as const;
export type CommandName = (typeof COMMANDS)[number];

export interface SlashCommand {
  command: string;
  args: string;
}

/** Split "/name rest of line" into command and args. Null for non-slash input. */
export function parseSlashCommand(line: string): SlashCommand | null {
  const match = line.trim().match(/^\/([A-Za-z0-9][\w-]*)(?:\s+([\s\S]*))?$/);
  if (!match?.[1]) return null;
  return { command: match[1].toLowerCase(), args: (match[2] ?? "").trim() };
}

const COMMAND_SET: ReadonlySet<string> = new Set(COMMANDS);

function isCommandName(command: string): command is CommandName {
  return COMMAND_SET.has(command);
}

/**
 * Route a command to a creation mode.
 * The dedicated commands are unconditional; /metaskill classifies its args.
 */
export function routeCommand(command: string, args: string): IntentResult {
  if (!isCommandName(command)) {
    throw new UnknownCommandError(command);
  }

  switch (command) {
    case "create-agent":
      return { kind: "resolved", mode: "agent", matched: [] };
    case "create-skill":
      return { kind: "resolved", mode: "skill", matched: [] };
    case "metaskill":
      return classifyIntent(args);
  }
}
