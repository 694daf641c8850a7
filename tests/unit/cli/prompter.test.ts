/**
 * Tests for prompter.ts
 */
import { describe, expect, test } from "vitest";
import { PassThrough } from "node:stream";
import { ReadlinePrompter, parseYesNo } from "../../../src/cli/prompter.ts";

describe("parseYesNo", () => {
  test.each([
    ["y", false, true],
    ["YES", false, true],
    [" yes ", false, true],
    ["n", true, false],
    ["nope", true, false],
    ["", true, true],
    ["", false, false],
  ])("%j with default %s -> %s", (answer, defaultValue, expected) => {
    expect(parseYesNo(answer, defaultValue)).toBe(expected);
  });
});

describe("ReadlinePrompter", () => {
  function streams() {
    const input = new PassThrough();
    const output = new PassThrough();
    let written = "";
    output.on("data", (chunk: Buffer) => {
      written += chunk.toString();
    });
    return { input, output, written: () => written };
  }

  test("ask trims the answer and shows the default", async () => {
    const { input, output, written } = streams();
    const prompter = new ReadlinePrompter(input, output);

    const pending = prompter.ask("Agent name", "security-reviewer");
    input.write("  data-expert  \n");
    expect(await pending).toBe("data-expert");
    expect(written()).toContain("Agent name (security-reviewer): ");
    prompter.close();
  });

  test("an empty answer falls back to the default", async () => {
    const { input, output } = streams();
    const prompter = new ReadlinePrompter(input, output);

    const first = prompter.ask("Agent name", "security-reviewer");
    input.write("\n");
    expect(await first).toBe("security-reviewer");

    const second = prompter.ask("Tools");
    input.write("\n");
    expect(await second).toBe("");
    prompter.close();
  });

  test("confirm shows the default in the hint", async () => {
    const { input, output, written } = streams();
    const prompter = new ReadlinePrompter(input, output);

    const pending = prompter.confirm("Overwrite?", true);
    input.write("\n");
    expect(await pending).toBe(true);
    expect(written()).toContain("Overwrite? [Y/n] ");

    const declined = prompter.confirm("Overwrite?");
    input.write("n\n");
    expect(await declined).toBe(false);
    prompter.close();
  });
});
