/**
 * Structured-text codecs for settings files.
 */

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

import { ValidationError } from "./errors.js";
import type { SettingsFormatName } from "./types.js";

export interface SettingsFormat {
  readonly name: SettingsFormatName;
  /** Suffix appended to file names that lack one. */
  readonly extension: string;
  /** Other suffixes accepted as already normalized. */
  readonly aliases: readonly string[];
  parse(text: string): unknown;
  stringify(data: Record<string, unknown>): string;
}

export const JSON_FORMAT: SettingsFormat = {
  name: "json",
  extension: ".json",
  aliases: [],
  parse: (text) => JSON.parse(text),
  stringify: (data) => JSON.stringify(data, null, 2),
};

export const YAML_FORMAT: SettingsFormat = {
  name: "yaml",
  extension: ".yaml",
  aliases: [".yml"],
  parse: (text) => parseYaml(text),
  stringify: (data) => stringifyYaml(data),
};

const FORMATS: Record<SettingsFormatName, SettingsFormat> = {
  json: JSON_FORMAT,
  yaml: YAML_FORMAT,
};

export function getFormat(name: string): SettingsFormat {
  const key = name.toLowerCase();
  if (key === "json" || key === "yaml") {
    return FORMATS[key];
  }
  throw new ValidationError(`Unsupported settings format: ${name}`);
}

/**
 * Append the format's suffix unless the name already ends with it.
 */
export function normalizeFileName(fileName: string, format: SettingsFormat): string {
  const lower = fileName.toLowerCase();
  const suffixes = [format.extension, ...format.aliases];

  return suffixes.some((suffix) => lower.endsWith(suffix)) ? fileName : `${fileName}${format.extension}`;
}
