/**
 * CLI configuration.
 *
 * Flags win over environment variables, which win over defaults:
 *   --dir        SEALED_SETTINGS_HOME      ~/.sealed-settings
 *   --format     SEALED_SETTINGS_FORMAT    json
 *   --password   SEALED_SETTINGS_PASSWORD  (prompt)
 */

import * as os from "os";
import * as path from "path";

import type { SettingsFormatName } from "../../core/src/index.js";
import { getFormat } from "../../core/src/index.js";

// ============================================================================
// Types
// ============================================================================

export interface CliConfig {
  storageDirectory: string;
  fileName: string;
  format: SettingsFormatName;
  password?: string;
}

export interface CliOverrides {
  dir?: string;
  file?: string;
  format?: string;
  password?: string;
}

export const STORAGE_FOLDER_NAME = ".sealed-settings";
export const DEFAULT_FILE_NAME = "profile";

/** Platforms the CLI runs on. `null` accepts any. */
export const SUPPORTED_PLATFORMS: readonly NodeJS.Platform[] | null = ["linux", "darwin", "win32"];

// ============================================================================
// Resolution
// ============================================================================

export function isPlatformSupported(
  platform: NodeJS.Platform = process.platform,
  supported: readonly NodeJS.Platform[] | null = SUPPORTED_PLATFORMS,
): boolean {
  return supported === null || supported.includes(platform);
}

/**
 * Directory the settings files live in.
 */
export function resolveStorageDirectory(
  dir?: string,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir(),
): string {
  if (dir?.trim()) {
    return path.resolve(dir.trim());
  }

  const fromEnv = env.SEALED_SETTINGS_HOME?.trim();
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return path.join(home, STORAGE_FOLDER_NAME);
}

/**
 * Create the CLI configuration
 */
export function createDefaultConfig(
  overrides: CliOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const format = getFormat(overrides.format ?? env.SEALED_SETTINGS_FORMAT ?? "json");

  return {
    storageDirectory: resolveStorageDirectory(overrides.dir, env),
    fileName: overrides.file?.trim() || DEFAULT_FILE_NAME,
    format: format.name,
    password: overrides.password ?? (env.SEALED_SETTINGS_PASSWORD || undefined),
  };
}
