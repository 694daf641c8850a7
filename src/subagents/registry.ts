/**
 * SubagentRegistry — manage discovered subagent definitions.
 *
 * Handles priority resolution (project > user > builtin), metadata listing
 * for prompt injection, and tool/prompt resolution.
 */
import { getLogger } from "../infra/logger.ts";
import { canOverride } from "../documents/source.ts";
import type { SubagentDefinition } from "./types.ts";

const logger = getLogger("subagent_registry");

export class SubagentRegistry {
  private defs = new Map<string, SubagentDefinition>();

  /** Register subagents with priority resolution. */
  registerMany(defs: SubagentDefinition[]): void {
    for (const def of defs) {
      const existing = this.defs.get(def.name);
      if (existing && !canOverride(existing.source, def.source)) {
        continue;
      }
      this.defs.set(def.name, def);
      if (existing) {
        logger.info({ name: def.name, source: def.source, replaced: existing.source }, "subagent_override");
      }
    }
  }

  /** Get subagent definition by name. Returns null if not found. */
  get(name: string): SubagentDefinition | null {
    return this.defs.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.defs.has(name);
  }

  /**
   * Resolved tool names for a subagent.
   * "*" expands to `allTools`; disallowedTools are removed afterwards.
   * Unknown subagents get `allTools`.
   */
  getToolNames(name: string, allTools: string[]): string[] {
    const def = this.defs.get(name);
    const declared = def?.tools ?? ["*"];
    const base = declared.includes("*") ? allTools : declared;
    const denied = new Set(def?.disallowedTools ?? []);
    return base.filter((tool) => !denied.has(tool));
  }

  /** Persona body for a subagent. Empty string for unknown names. */
  getPrompt(name: string): string {
    return this.defs.get(name)?.prompt ?? "";
  }

  /**
   * Model hint for a subagent: a tier ("sonnet") or a model id.
   * Undefined when none is declared or the subagent is unknown.
   */
  getModel(name: string): string | undefined {
    return this.defs.get(name)?.model;
  }

  /** Subagent listing with descriptions, for delegation prompts. */
  getMetadataForPrompt(): string {
    if (this.defs.size === 0) return "";

    const lines: string[] = ["## Available Subagents", ""];
    for (const def of this.defs.values()) {
      lines.push(`- **${def.name}**: ${def.description}`);
    }
    return lines.join("\n");
  }

  listAll(): SubagentDefinition[] {
    return [...this.defs.values()];
  }
}
