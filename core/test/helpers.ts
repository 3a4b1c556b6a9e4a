/**
 * In-process stand-ins shared by the core tests.
 */

import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";

import type { Logger } from "../src/logger.js";
import type { PromptResult, Prompter } from "../src/types.js";

// Helper to create temp directory
export async function createTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "sealed-settings-test-"));
}

/**
 * Answers prompts from a script. `null` in the script cancels.
 * Running out of answers also cancels, so a broken loop cannot hang a test.
 */
export class ScriptedPrompter implements Prompter {
  readonly messages: string[] = [];
  readonly asked: string[] = [];
  private answers: Array<string | null>;

  constructor(answers: Array<string | null> = []) {
    this.answers = [...answers];
  }

  async readLine(message: string): Promise<PromptResult<string>> {
    return this.next(message);
  }

  async readSecret(message: string): Promise<PromptResult<string>> {
    return this.next(message);
  }

  notify(message: string): void {
    this.messages.push(message);
  }

  get remaining(): number {
    return this.answers.length;
  }

  private next(message: string): PromptResult<string> {
    this.asked.push(message);
    const answer = this.answers.shift();
    if (answer === undefined || answer === null) {
      return { canceled: true };
    }
    return { canceled: false, value: answer };
  }
}

export interface LogEntry {
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export class RecordingLogger implements Logger {
  readonly entries: LogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  messages(level: LogEntry["level"]): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
