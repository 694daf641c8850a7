/**
 * Intent classification for /metaskill requests.
 *
 * Routes free text to one of three creation modes by keyword presence:
 *   agent — the user wants a single role/persona
 *   skill — the user wants a single command/workflow
 *   team  — anything else: a full project setup
 *
 * When both agent and skill words appear the request is ambiguous and the
 * caller must ask the user instead of guessing.
 */
import { getLogger } from "../infra/logger.ts";

const logger = getLogger("intent");

export type CreationMode = "agent" | "skill" | "team";

export type IntentResult =
  | { kind: "resolved"; mode: CreationMode; matched: string[] }
  | { kind: "ambiguous"; candidates: CreationMode[]; matched: string[]; question: string };

export const AGENT_KEYWORDS: readonly string[] = [
  "agent",
  "agents",
  "subagent",
  "subagents",
  "sub-agent",
  "role",
  "persona",
  "reviewer",
  "engineer",
  "specialist",
  "expert",
  "assistant",
];

export const SKILL_KEYWORDS: readonly string[] = [
  "skill",
  "skills",
  "command",
  "commands",
  "slash command",
  "slash-command",
  "workflow",
  "shortcut",
  "macro",
];

export const CLARIFYING_QUESTION = [
  "Your request mentions both an agent and a skill. What should I create?",
  "  1. agent — a specialized subagent persona",
  "  2. skill — a slash-command workflow",
  "  3. team  — a full set of agents, skills and rules for the project",
].join("\n");

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Keywords from `keywords` that occur in `text` as whole words (case-insensitive). */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const lower = text.toLowerCase();
  return keywords.filter((keyword) => {
    const pattern = new RegExp(`(?<![a-z0-9])${escapeRegExp(keyword)}(?![a-z0-9])`);
    return pattern.test(lower);
  });
}

export function classifyIntent(input: string): IntentResult {
  const agentHits = findKeywords(input, AGENT_KEYWORDS);
  const skillHits = findKeywords(input, SKILL_KEYWORDS);
  const matched = [...agentHits, ...skillHits];

  let result: IntentResult;
  if (agentHits.length > 0 && skillHits.length > 0) {
    result = { kind: "ambiguous", candidates: ["agent", "skill", "team"], matched, question: CLARIFYING_QUESTION };
  } else if (agentHits.length > 0) {
    result = { kind: "resolved", mode: "agent", matched };
  } else if (skillHits.length > 0) {
    result = { kind: "resolved", mode: "skill", matched };
  } else {
    result = { kind: "resolved", mode: "team", matched };
  }

  logger.debug({ kind: result.kind, matched }, "intent_classified");
  return result;
}

/** Map the user's answer to the clarifying question. Null when unrecognized. */
export function resolveClarification(answer: string): CreationMode | null {
  const normalized = answer.trim().toLowerCase();
  switch (normalized) {
    case "1":
    case "agent":
      return "agent";
    case "2":
    case "skill":
      return "skill";
    case "3":
    case "team":
      return "team";
    default:
      return null;
  }
}
