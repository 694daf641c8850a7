/**
 * File writing with the ask-before-overwrite discipline.
 */
import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { getLogger } from "../infra/logger.ts";
import type { ConfirmOverwrite, ScaffoldSummary } from "./types.ts";

const logger = getLogger("scaffold_writer");

export interface WriteDiscipline {
  force?: boolean;
  confirmOverwrite?: ConfirmOverwrite;
}

/**
 * Write `content` to `filePath`, recording the outcome in `summary`.
 *
 * Existing files are replaced only with `force` or a confirmed prompt;
 * without a prompt the file is skipped.
 */
export async function writeGuarded(
  filePath: string,
  content: string,
  discipline: WriteDiscipline,
  summary: ScaffoldSummary,
): Promise<void> {
  const exists = existsSync(filePath);
  if (exists) {
    const allowed = discipline.force
      ? true
      : discipline.confirmOverwrite
        ? await discipline.confirmOverwrite(filePath)
        : false;
    if (!allowed) {
      logger.info({ filePath }, "overwrite_declined");
      summary.skipped.push(filePath);
      return;
    }
  }

  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");

  if (exists) {
    logger.info({ filePath }, "file_overwritten");
    summary.overwritten.push(filePath);
  } else {
    logger.info({ filePath }, "file_written");
    summary.written.push(filePath);
  }
}
