/**
 * sealed-settings CLI program
 *
 * Commands:
 *   sealed-settings show [--reveal]        - Print the profile
 *   sealed-settings set <field> <value>    - Set a scalar field and save
 *   sealed-settings add-token <name> <v>   - Add or replace a named token
 *   sealed-settings menu                   - Interactive editor
 *   sealed-settings shred <path> [-r]      - Securely delete a file or tree
 */

import { Command, CommanderError } from "commander";
import chalk from "chalk";
import ora from "ora";

import type { Logger, Prompter } from "../../core/src/index.js";
import { SettingsDocument, ValidationError, createConsoleLogger, errorMessage } from "../../core/src/index.js";
import type { TextOutput } from "./console.js";
import { ConsoleWriter } from "./console.js";
import type { CliOverrides } from "./config.js";
import { createDefaultConfig } from "./config.js";
import { secureDelete, secureDeleteDirectory } from "./file-helper.js";
import { CliMenu } from "./menu.js";
import { PROFILE_SHAPE, ProfileSettings, applyFieldValue, formatProfile } from "./profile-settings.js";
import { TerminalPrompter, readValue, stringParser } from "./prompts.js";

export const CLI_VERSION = "0.1.0";

// ============================================================================
// Environment
// ============================================================================

export interface CliEnvironment {
  output: TextOutput;
  prompter: Prompter;
  logger: Logger;
  env: NodeJS.ProcessEnv;
  /** Show ora spinners (default true). */
  spinners?: boolean;
  menuRetryDelayMs?: number;
}

export function defaultEnvironment(): CliEnvironment {
  return {
    output: new ConsoleWriter(),
    prompter: new TerminalPrompter(),
    logger: createConsoleLogger("sealed-settings"),
    env: process.env,
  };
}

// ============================================================================
// Program
// ============================================================================

export function createProgram(environment: CliEnvironment = defaultEnvironment()): Command {
  const { output, prompter, logger, env } = environment;
  const program: Command = new Command();

  program
    .name("sealed-settings")
    .description("Manage an encrypted settings profile")
    .version(CLI_VERSION)
    .option("-d, --dir <path>", "Settings directory")
    .option("-f, --file <name>", "Settings file name")
    .option("--format <format>", "File format: json or yaml")
    .option("-p, --password <password>", "Encryption password (prompts when omitted)");

  const spinner = (text: string) => ora({ text, isSilent: environment.spinners === false }).start();

  function fail(error: unknown): never {
    if (error instanceof CommanderError) throw error;
    program.error(chalk.red(errorMessage(error)), { exitCode: 1 });
  }

  async function withProfile(task: (profile: ProfileSettings) => Promise<void>): Promise<void> {
    let profile: ProfileSettings | null = null;
    try {
      const config = createDefaultConfig(program.opts<CliOverrides>(), env);
      profile = await SettingsDocument.open(ProfileSettings, config.storageDirectory, config.fileName, {
        password: config.password,
        format: config.format,
        prompter,
        logger,
      });
      await task(profile);
    } catch (error) {
      fail(error);
    } finally {
      profile?.dispose();
    }
  }

  async function saveProfile(profile: ProfileSettings): Promise<boolean> {
    const progress = spinner("Saving settings...");
    if (!(await profile.save())) {
      progress.fail(chalk.red(`Could not save ${profile.filePath}`));
      return false;
    }
    progress.succeed(chalk.green(`Saved ${profile.filePath}`));

    // Saved secrets stay encrypted in memory; read them back.
    await profile.load();
    return true;
  }

  async function saveOrFail(profile: ProfileSettings): Promise<void> {
    if (!(await saveProfile(profile))) {
      throw new Error(`Settings were not saved to ${profile.filePath}`);
    }
  }

  function printProfile(profile: ProfileSettings, reveal: boolean): void {
    output.writeLine(chalk.bold(profile.filePath));
    for (const line of formatProfile(profile, reveal)) {
      output.writeLine(`  ${line}`);
    }
  }

  // ==========================================================================
  // Show Command
  // ==========================================================================

  program
    .command("show")
    .description("Print the current settings")
    .option("--reveal", "Print secret values instead of a mask")
    .action(async (options: { reveal?: boolean }) => {
      await withProfile(async (profile) => {
        printProfile(profile, options.reveal === true);
      });
    });

  // ==========================================================================
  // Set Command
  // ==========================================================================

  program
    .command("set")
    .description("Set a field and save")
    .argument("<field>", "Field name (case-insensitive)")
    .argument("<value>", "New value")
    .action(async (fieldName: string, value: string) => {
      await withProfile(async (profile) => {
        const name = applyFieldValue(profile, fieldName, value);
        await saveOrFail(profile);
        output.writeLine(`${chalk.dim("Updated:")} ${name}`);
      });
    });

  // ==========================================================================
  // Add Token Command
  // ==========================================================================

  program
    .command("add-token")
    .description("Add a named token, or replace its value")
    .argument("<name>", "Token name")
    .argument("<value>", "Token value (stored encrypted)")
    .action(async (name: string, value: string) => {
      await withProfile(async (profile) => {
        profile.upsertToken(name, value);
        await saveOrFail(profile);
        output.writeLine(`${chalk.dim("Token:")} ${name}`);
      });
    });

  // ==========================================================================
  // Menu Command
  // ==========================================================================

  program
    .command("menu")
    .description("Edit the settings interactively")
    .action(async () => {
      await withProfile(async (profile) => {
        const menu = new CliMenu("Sealed Settings", {
          description: `Settings file: ${profile.filePath}`,
          clearScreen: false,
          prompter,
          output,
          retryDelayMs: environment.menuRetryDelayMs,
        });

        menu
          .addOption("Show settings", () => {
            printProfile(profile, false);
          })
          .addOption("Edit a field", async () => {
            const fieldName = await readValue(prompter, stringParser, {
              description: `Fields: ${PROFILE_SHAPE.fields.map((entry) => entry.name).join(", ")}`,
              prompt: "field name",
            });
            if (fieldName.canceled) return;

            const value = await readValue(prompter, stringParser, { prompt: "new value" });
            if (value.canceled) return;

            try {
              applyFieldValue(profile, fieldName.value, value.value);
            } catch (error) {
              if (!(error instanceof ValidationError)) throw error;
              output.writeLine(chalk.yellow(error.message));
              return;
            }
            await saveProfile(profile);
          })
          .addOption("Add a token", async () => {
            const name = await readValue(prompter, stringParser, { prompt: "token name" });
            if (name.canceled) return;

            const value = await prompter.readSecret("Token value");
            if (value.canceled) return;

            profile.upsertToken(name.value, value.value);
            await saveProfile(profile);
          })
          .addOption("Exit", () => "exit");

        await menu.show();
      });
    });

  // ==========================================================================
  // Shred Command
  // ==========================================================================

  program
    .command("shred")
    .description("Overwrite a file with zeros and delete it")
    .argument("<path>", "File to delete")
    .option("-r, --recursive", "Delete a directory and everything below it")
    .action(async (target: string, options: { recursive?: boolean }) => {
      const progress = spinner(`Shredding ${target}...`);

      try {
        if (options.recursive) {
          await secureDeleteDirectory(target);
        } else {
          await secureDelete(target);
        }
        progress.succeed(chalk.green(`Deleted ${target}`));
      } catch (error) {
        progress.stop();
        fail(error);
      }
    });

  return program;
}
