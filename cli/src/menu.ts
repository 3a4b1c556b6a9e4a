/**
 * Numbered console menu.
 *
 * Renders a title, an optional description and numbered options, then reads
 * a choice. Invalid choices print a message and wait before redrawing. The
 * loop ends when an action returns "exit" or the prompt is canceled.
 */

import { setTimeout as delay } from "timers/promises";

import type { Prompter } from "../../core/src/index.js";
import { ValidationError } from "../../core/src/index.js";
import type { TextOutput } from "./console.js";
import { ConsoleWriter } from "./console.js";
import { TerminalPrompter } from "./prompts.js";

// ============================================================================
// Types
// ============================================================================

export type MenuOutcome = void | "exit";

export type MenuAction = () => MenuOutcome | Promise<MenuOutcome>;

export interface MenuOption {
  readonly label: string;
  readonly action: MenuAction;
}

export interface CliMenuOptions {
  description?: string;
  /** Clear the screen before each redraw (default true). */
  clearScreen?: boolean;
  prompter?: Prompter;
  output?: TextOutput;
  /** Pause after an invalid choice, in milliseconds. */
  retryDelayMs?: number;
}

const DEFAULT_RETRY_DELAY_MS = 3500;

// ============================================================================
// Menu
// ============================================================================

export class CliMenu {
  readonly title: string;
  readonly description?: string;
  private readonly entries: MenuOption[] = [];
  private readonly clearScreen: boolean;
  private readonly prompter: Prompter;
  private readonly output: TextOutput;
  private readonly retryDelayMs: number;

  constructor(title: string, options: CliMenuOptions = {}) {
    this.title = title;
    this.description = options.description;
    this.clearScreen = options.clearScreen ?? true;
    this.prompter = options.prompter ?? new TerminalPrompter();
    this.output = options.output ?? new ConsoleWriter();
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  get options(): readonly MenuOption[] {
    return this.entries;
  }

  addOption(label: string, action: MenuAction): this {
    this.entries.push({ label, action });
    return this;
  }

  async show(): Promise<void> {
    if (this.entries.length === 0) {
      throw new ValidationError(`Menu "${this.title}" has no options`);
    }

    while (true) {
      this.render();

      const input = await this.prompter.readLine("Choice:");
      if (input.canceled) return;

      const choice = this.parseChoice(input.value);
      if (choice === null) {
        this.output.writeLine(
          `Invalid choice. Please enter a number between 1 and ${this.entries.length}. Retrying soon...`,
        );
        await delay(this.retryDelayMs);
        continue;
      }

      const outcome = await this.entries[choice - 1].action();
      if (outcome === "exit") return;
    }
  }

  private render(): void {
    if (this.clearScreen) {
      this.output.clear();
    } else {
      this.output.writeLine();
    }

    this.output.writeLine(`=== ${this.title} ===`);

    if (this.description) {
      for (const line of this.description.split("\n")) {
        this.output.writeLine(line);
      }
      this.output.writeLine();
    }

    this.entries.forEach((entry, index) => {
      this.output.writeLine(`${index + 1}. ${entry.label}`);
    });
    this.output.writeLine();
  }

  private parseChoice(input: string): number | null {
    const trimmed = input.trim();
    if (!/^\d+$/.test(trimmed)) return null;

    const choice = Number(trimmed);
    return choice >= 1 && choice <= this.entries.length ? choice : null;
  }
}
