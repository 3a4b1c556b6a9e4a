/**
 * Terminal prompts via @clack/prompts, plus typed value reads on top of any
 * Prompter.
 */

import * as clack from "@clack/prompts";

import type { PromptResult, Prompter, TypeNode } from "../../core/src/index.js";

// ============================================================================
// Terminal Prompter
// ============================================================================

export class TerminalPrompter implements Prompter {
  async readLine(message: string): Promise<PromptResult<string>> {
    const value = await clack.text({ message });
    if (clack.isCancel(value)) {
      return { canceled: true };
    }
    // clack hands back undefined for an empty submission
    return { canceled: false, value: (value ?? "").trim() };
  }

  async readSecret(message: string): Promise<PromptResult<string>> {
    const value = await clack.password({ message, mask: "*" });
    if (clack.isCancel(value)) {
      return { canceled: true };
    }
    return { canceled: false, value: value ?? "" };
  }

  notify(message: string): void {
    clack.log.info(message);
  }
}

// ============================================================================
// Value Parsers
// ============================================================================

export interface ValueParser<T> {
  /** Type name shown in prompts and error messages. */
  readonly label: string;
  /** Returns undefined when the input is not a valid value. */
  parse(input: string): T | undefined;
}

export const stringParser: ValueParser<string> = {
  label: "string",
  parse: (input) => input,
};

export const numberParser: ValueParser<number> = {
  label: "number",
  parse: (input) => {
    const trimmed = input.trim();
    if (trimmed === "") return undefined;
    const value = Number(trimmed);
    return Number.isFinite(value) ? value : undefined;
  },
};

export const booleanParser: ValueParser<boolean> = {
  label: "boolean",
  parse: (input) => {
    const normalized = input.trim().toLowerCase();
    if (normalized === "true") return true;
    if (normalized === "false") return false;
    return undefined;
  },
};

/**
 * Parser for a scalar field type. Collections and objects have none.
 */
export function parserFor(type: TypeNode): ValueParser<string | number | boolean> | null {
  switch (type.kind) {
    case "string":
      return stringParser;
    case "number":
      return numberParser;
    case "boolean":
      return booleanParser;
    default:
      return null;
  }
}

// ============================================================================
// Typed Reads
// ============================================================================

export interface ReadValueOptions {
  /** Shown line by line before the first prompt. */
  description?: string;
  /** What is being asked for, e.g. "retry count". */
  prompt?: string;
}

/**
 * Ask until the input parses. Cancellation ends the loop and is reported
 * as such, never as a value.
 */
export async function readValue<T>(
  prompter: Prompter,
  parser: ValueParser<T>,
  options: ReadValueOptions = {},
): Promise<PromptResult<T>> {
  if (options.description?.trim()) {
    for (const line of options.description.split("\n")) {
      prompter.notify(line.trim());
    }
  }

  const message = promptMessage(parser.label, options.prompt);

  while (true) {
    const result = await prompter.readLine(message);
    if (result.canceled) {
      return result;
    }

    const value = parser.parse(result.value);
    if (value !== undefined) {
      return { canceled: false, value };
    }

    prompter.notify(`Invalid input. Expected ${parser.label}, but received '${result.value}'. Try again.`);
  }
}

function promptMessage(label: string, prompt?: string): string {
  const cleaned = prompt?.trim().replace(/:+$/, "").trim();
  return cleaned ? `Enter ${label} ${cleaned}:` : `Enter ${label}:`;
}
