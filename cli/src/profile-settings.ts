/**
 * Profile Settings
 *
 * The settings document the CLI manages: an API key, connection options and
 * a list of named tokens. The key and token values are stored encrypted.
 */

import type { ObjectShape } from "../../core/src/index.js";
import {
  SettingsDocument,
  ValidationError,
  defineShape,
  field,
  findField,
  getFieldInfo,
  t,
} from "../../core/src/index.js";
import { parserFor } from "./prompts.js";

// ============================================================================
// Types
// ============================================================================

export class ApiToken {
  name: string | null = null;
  value: string | null = null;
}

export const API_TOKEN_SHAPE = defineShape<ApiToken>(
  "ApiToken",
  {
    name: field.string({ label: "Token name" }),
    value: field.secret({ label: "Token value" }),
  },
  () => new ApiToken(),
);

export class ProfileSettings extends SettingsDocument {
  apiKey: string | null = null;
  endpoint: string | null = "https://api.example.com";
  retries = 3;
  verbose = false;
  tokens: ApiToken[] = [];

  protected describe(): ObjectShape {
    return PROFILE_SHAPE;
  }

  /** Add a token, or replace the value of the one with the same name. */
  upsertToken(name: string, value: string): ApiToken {
    const existing = this.tokens.find((token) => token.name === name);
    if (existing) {
      existing.value = value;
      return existing;
    }

    const token = new ApiToken();
    token.name = name;
    token.value = value;
    this.tokens.push(token);
    return token;
  }
}

export const PROFILE_SHAPE = defineShape<ProfileSettings>("ProfileSettings", {
  apiKey: field.secret({ label: "API key", description: "Sent with every request" }),
  endpoint: field.string({ label: "Endpoint", description: "Base URL of the service" }),
  retries: field.number({ label: "Retries" }),
  verbose: field.boolean({ label: "Verbose output" }),
  tokens: field.array(t.object(API_TOKEN_SHAPE), { label: "Tokens" }),
});

// ============================================================================
// Editing & Display
// ============================================================================

/**
 * Set a scalar field from text. Returns the field's declared name.
 */
export function applyFieldValue(settings: ProfileSettings, fieldName: string, input: string): string {
  const descriptor = findField(PROFILE_SHAPE, fieldName);
  if (!descriptor) {
    const known = PROFILE_SHAPE.fields.map((entry) => entry.name).join(", ");
    throw new ValidationError(`Unknown field "${fieldName}". Known fields: ${known}`);
  }

  const parser = parserFor(descriptor.type);
  if (!parser) {
    throw new ValidationError(`Field "${descriptor.name}" cannot be set from text`);
  }

  const value = parser.parse(input);
  if (value === undefined) {
    throw new ValidationError(`Invalid value for "${descriptor.name}": expected ${parser.label}, received '${input}'`);
  }

  descriptor.set(settings, value);
  return descriptor.name;
}

const MASK = "********";

function display(value: string | null, reveal: boolean): string {
  if (value === null) return "(not set)";
  return reveal ? value : MASK;
}

/**
 * One line per field. Secret values are masked unless `reveal` is set.
 */
export function formatProfile(settings: ProfileSettings, reveal = false): string[] {
  const label = (name: string): string => getFieldInfo(PROFILE_SHAPE, name).label;
  const lines = [
    `${label("apiKey")}: ${display(settings.apiKey, reveal)}`,
    `${label("endpoint")}: ${settings.endpoint ?? "(not set)"}`,
    `${label("retries")}: ${settings.retries}`,
    `${label("verbose")}: ${settings.verbose}`,
  ];

  if (settings.tokens.length === 0) {
    lines.push(`${label("tokens")}: (none)`);
  } else {
    lines.push(`${label("tokens")}:`);
    for (const token of settings.tokens) {
      lines.push(`  ${token.name ?? "(unnamed)"}: ${display(token.value, reveal)}`);
    }
  }

  return lines;
}
