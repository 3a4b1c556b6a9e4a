#!/usr/bin/env node
/**
 * sealed-settings CLI
 *
 * Reads and edits an encrypted settings profile stored under
 * ~/.sealed-settings (or --dir / SEALED_SETTINGS_HOME).
 */

import chalk from "chalk";

import { isPlatformSupported } from "./config.js";
import { createProgram } from "./program.js";

if (!isPlatformSupported()) {
  console.error(chalk.red(`The current platform (${process.platform}) is not supported.`));
  process.exit(1);
}

await createProgram().parseAsync(process.argv);
