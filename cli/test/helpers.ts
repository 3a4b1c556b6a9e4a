import { stripVTControlCharacters } from "util";

import type { TextOutput } from "../src/console.js";

export { RecordingLogger, ScriptedPrompter, createTempDir } from "../../core/test/helpers.js";

/**
 * Captures everything written, for assertions on exact lines.
 */
export class BufferOutput implements TextOutput {
  text = "";
  clears = 0;

  write(text: string): void {
    this.text += text;
  }

  writeLine(text = ""): void {
    this.text += `${text}\n`;
  }

  clear(): void {
    this.clears += 1;
  }

  /** Written lines with terminal colors removed. */
  get lines(): string[] {
    return stripVTControlCharacters(this.text).split("\n");
  }
}
