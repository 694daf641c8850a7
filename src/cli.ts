#!/usr/bin/env tsx
/**
 * CLI entry point: `metaskill <command>`.
 */
import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { getSettings } from "./infra/config.ts";
import type { Settings } from "./infra/config-schema.ts";
import { MetaskillError } from "./infra/errors.ts";
import { getLogger } from "./infra/logger.ts";
import { createProgram } from "./cli/program.ts";
import { ReadlinePrompter } from "./cli/prompter.ts";

const logger = getLogger("cli");

export async function startCLI(argv: string[] = process.argv): Promise<void> {
  let settings: Settings;
  try {
    settings = getSettings();
  } catch (err) {
    if (err instanceof MetaskillError) {
      console.error(`Error: ${err.message}`);
      process.exitCode = 1;
      return;
    }
    throw err;
  }
  const program = createProgram({
    settings,
    cwd: process.cwd(),
    prompter: new ReadlinePrompter(),
    out: (text) => console.log(text),
    err: (text) => console.error(text),
  });

  logger.debug({ args: argv.slice(2) }, "cli_started");
  await program.parseAsync(argv);
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  startCLI().catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
}
