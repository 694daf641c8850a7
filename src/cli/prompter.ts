/**
 * Prompter — the "ask the user" seam of every interactive flow.
 *
 * The readline implementation is used by the CLI; tests pass scripted answers.
 */
import { createInterface, type Interface } from "node:readline/promises";

export interface Prompter {
  /** Ask a free-text question. An empty answer yields `defaultValue` (or ""). */
  ask(question: string, defaultValue?: string): Promise<string>;
  /** Ask a yes/no question. */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  close(): void;
}

export function parseYesNo(answer: string, defaultValue: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "") return defaultValue;
  return normalized === "y" || normalized === "yes";
}

export class ReadlinePrompter implements Prompter {
  private rl: Interface | null = null;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {}

  private get readline(): Interface {
    if (!this.rl) {
      this.rl = createInterface({ input: this.input, output: this.output });
    }
    return this.rl;
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    const hint = defaultValue ? ` (${defaultValue})` : "";
    const answer = (await this.readline.question(`${question}${hint}: `)).trim();
    return answer || defaultValue || "";
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? "Y/n" : "y/N";
    const answer = await this.readline.question(`${question} [${hint}] `);
    return parseYesNo(answer, defaultValue);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}
