import path from "node:path";
import type { ScaffoldSummary } from "./types.ts";

/** Human-readable summary printed at the end of a scaffold flow. */
export function formatSummary(summary: ScaffoldSummary, cwd = process.cwd()): string {
  const rel = (p: string) => path.relative(cwd, p) || p;
  const lines: string[] = [];

  for (const file of summary.written) lines.push(`  + ${rel(file)}`);
  for (const file of summary.overwritten) lines.push(`  ~ ${rel(file)} (overwritten)`);
  for (const file of summary.skipped) lines.push(`  - ${rel(file)} (skipped, already exists)`);

  const total = summary.written.length + summary.overwritten.length;
  lines.push(`${total} file(s) written, ${summary.skipped.length} skipped.`);
  return lines.join("\n");
}
