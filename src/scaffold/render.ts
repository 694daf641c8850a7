/**
 * Render drafts into skill / agent / rule markdown documents.
 */
import { serializeDocument, type FrontmatterData } from "../documents/frontmatter.ts";
import type { AgentDraftData, RuleDraftData, SkillDraftData } from "./types.ts";

/** "build-and-test" -> "Build And Test" */
export function titleFromName(name: string): string {
  return name
    .split("-")
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(" ");
}

function bulletList(items: string[]): string {
  return items.map((item) => `- ${item}`).join("\n");
}

export function renderAgent(draft: AgentDraftData): string {
  const frontmatter: FrontmatterData = {
    name: draft.name,
    description: draft.description,
    tools: draft.tools?.length ? draft.tools.join(", ") : undefined,
    disallowedTools: draft.disallowedTools?.length ? draft.disallowedTools.join(", ") : undefined,
    model: draft.model,
    permissionMode: draft.permissionMode,
    maxTurns: draft.maxTurns,
    memory: draft.memory,
    skills: draft.skills?.length ? draft.skills : undefined,
  };

  const sections = [draft.persona.trim()];
  if (draft.responsibilities.length > 0) {
    sections.push(`## Responsibilities\n\n${bulletList(draft.responsibilities)}`);
  }
  if (draft.rules.length > 0) {
    sections.push(`## Rules\n\n${bulletList(draft.rules)}`);
  }
  return serializeDocument(frontmatter, sections.join("\n\n"));
}

export function renderSkill(draft: SkillDraftData): string {
  const frontmatter: FrontmatterData = {
    name: draft.name,
    description: draft.description,
    "argument-hint": draft.argumentHint,
    "allowed-tools": draft.allowedTools?.length ? draft.allowedTools.join(", ") : undefined,
    // Only written when they differ from the host defaults
    "user-invocable": draft.userInvocable === false ? false : undefined,
    "disable-model-invocation": draft.disableModelInvocation === true ? true : undefined,
    context: draft.context === "fork" ? "fork" : undefined,
    agent: draft.context === "fork" ? draft.agent : undefined,
    model: draft.model,
  };

  const steps = draft.steps.map((step, i) => `${i + 1}. ${step}`).join("\n");
  const sections = [`# ${titleFromName(draft.name)}`];
  if (draft.argumentHint) {
    sections.push("Arguments: $ARGUMENTS");
  }
  sections.push(`## Steps\n\n${steps}`);
  if (draft.onFailure) {
    sections.push(`## On failure\n\n${draft.onFailure.trim()}`);
  }
  return serializeDocument(frontmatter, sections.join("\n\n"));
}

/** Rules only get frontmatter when they are scoped by paths. */
export function renderRule(draft: RuleDraftData): string {
  const body = `# ${draft.title.trim()}\n\n${bulletList(draft.conventions)}`;
  if (draft.paths?.length) {
    return serializeDocument({ paths: draft.paths }, body);
  }
  return `${body}\n`;
}
