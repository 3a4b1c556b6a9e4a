/**
 * Settings Document Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs/promises";
import * as path from "path";
import { parse as parseYaml } from "yaml";

import { isRecord } from "../src/conversion.js";
import { hashPassword } from "../src/crypto.js";
import type { ObjectShape } from "../src/descriptor.js";
import { defineShape, field, t } from "../src/descriptor.js";
import { AuthenticationError, InvalidStateError, StructuralParseError, ValidationError } from "../src/errors.js";
import { MemoryFileStore } from "../src/file-store.js";
import { SettingsDocument } from "../src/settings-document.js";
import { RecordingLogger, ScriptedPrompter, createTempDir } from "./helpers.js";

// ============================================================================
// Settings Types
// ============================================================================

class ApiSettings extends SettingsDocument {
  apiKey: string | null = null;
  retries = 3;

  protected describe(): ObjectShape {
    return API_SHAPE;
  }
}

const API_SHAPE = defineShape<ApiSettings>("ApiSettings", {
  apiKey: field.secret(),
  retries: field.number(),
});

class PlainSettings extends SettingsDocument {
  name: string | null = "default";
  verbose = false;

  protected describe(): ObjectShape {
    return PLAIN_SHAPE;
  }
}

const PLAIN_SHAPE = defineShape<PlainSettings>("PlainSettings", {
  name: field.string(),
  verbose: field.boolean(),
});

class Credential {
  user: string | null = null;
  token: string | null = null;
}

const CREDENTIAL_SHAPE = defineShape<Credential>(
  "Credential",
  { user: field.string(), token: field.secret() },
  () => new Credential(),
);

class ClusterSettings extends SettingsDocument {
  primary: Credential | null = null;
  backup: Credential | null = null;

  protected describe(): ObjectShape {
    return CLUSTER_SHAPE;
  }
}

const CLUSTER_SHAPE = defineShape<ClusterSettings>("ClusterSettings", {
  primary: field.object(CREDENTIAL_SHAPE),
  backup: field.object(CREDENTIAL_SHAPE),
});

class ParentSettings extends SettingsDocument {
  name: string | null = null;
  child: ChildSettings | null = null;

  protected describe(): ObjectShape {
    return PARENT_SHAPE;
  }
}

class ChildSettings extends SettingsDocument {
  name: string | null = null;
  parent: ParentSettings | null = null;

  protected describe(): ObjectShape {
    return CHILD_SHAPE;
  }
}

const PARENT_SHAPE = defineShape<ParentSettings>("ParentSettings", {
  name: field.string(),
  child: field.document(),
});

const CHILD_SHAPE = defineShape<ChildSettings>("ChildSettings", {
  name: field.string(),
  parent: field.document(),
});

class HubSettings extends SettingsDocument {
  name: string | null = null;
  credential: Credential | null = null;
  leaves: LeafSettings[] = [];

  protected describe(): ObjectShape {
    return HUB_SHAPE;
  }
}

class LeafSettings extends SettingsDocument {
  credential: Credential | null = null;

  protected describe(): ObjectShape {
    return LEAF_SHAPE;
  }
}

const HUB_SHAPE = defineShape<HubSettings>("HubSettings", {
  name: field.string(),
  credential: field.object(CREDENTIAL_SHAPE),
  leaves: field.array(t.document()),
});

const LEAF_SHAPE = defineShape<LeafSettings>("LeafSettings", {
  credential: field.object(CREDENTIAL_SHAPE),
});

class ReservedNameSettings extends SettingsDocument {
  protected describe(): ObjectShape {
    return RESERVED_SHAPE;
  }
}

const RESERVED_SHAPE = defineShape<{ PasswordHash: string | null }>("ReservedNameSettings", {
  PasswordHash: field.string(),
});

class FullDiskStore extends MemoryFileStore {
  async writeAll(): Promise<void> {
    throw new Error("disk full");
  }
}

// ============================================================================
// Helpers
// ============================================================================

const DIR = "/virtual/settings";

function asRecord(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) throw new Error(`expected an object, got ${JSON.stringify(value)}`);
  return value;
}

function storedJson(store: MemoryFileStore, filePath: string): Record<string, unknown> {
  const text = store.peek(filePath);
  if (text === undefined) throw new Error(`nothing stored at ${filePath}`);
  return asRecord(JSON.parse(text));
}

// ============================================================================
// Tests
// ============================================================================

describe("SettingsDocument", () => {
  let store: MemoryFileStore;
  let logger: RecordingLogger;

  beforeEach(() => {
    store = new MemoryFileStore();
    logger = new RecordingLogger();
  });

  describe("construction", () => {
    it("should require a directory and a file name", () => {
      expect(() => new PlainSettings("", "plain")).toThrow("Both directory path and file name must be provided.");
      expect(() => new PlainSettings(DIR, "  ")).toThrow(ValidationError);
    });

    it("should append the format extension", () => {
      expect(new PlainSettings(DIR, "plain", { fileStore: store }).filePath).toBe(path.join(DIR, "plain.json"));
      expect(new PlainSettings(DIR, "plain", { fileStore: store, format: "yaml" }).fileName).toBe("plain.yaml");
    });

    it("should refuse a field named like the password hash", async () => {
      await expect(SettingsDocument.open(ReservedNameSettings, DIR, "reserved", { fileStore: store, logger })).rejects.toThrow(
        ValidationError,
      );
    });

    it("should refuse to save before initialization", async () => {
      const settings = new PlainSettings(DIR, "plain", { fileStore: store, logger });

      await expect(settings.save()).resolves.toBe(false);
      expect(logger.messages("error")).toEqual([
        `Failed to save settings to ${path.join(DIR, "plain.json")}: Document is not initialized; call initialize() or SettingsDocument.open()`,
      ]);
    });

    it("should refuse to load before initialization", async () => {
      const settings = new PlainSettings(DIR, "plain", { fileStore: store, logger });

      await expect(settings.load()).rejects.toBeInstanceOf(InvalidStateError);
    });
  });

  describe("plain settings", () => {
    it("should never ask for a password", async () => {
      const prompter = new ScriptedPrompter();
      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, prompter, logger });
      settings.name = "changed";

      await expect(settings.save()).resolves.toBe(true);
      expect(settings.state).toBe("NoEncryptionNeeded");
      expect(prompter.asked).toEqual([]);
      expect(storedJson(store, settings.filePath)).toEqual({ name: "changed", verbose: false });
    });

    it("should match stored keys case-insensitively and ignore unknown keys", async () => {
      store.put(path.join(DIR, "plain.json"), JSON.stringify({ NAME: "from-file", legacy: true }));

      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });

      expect(settings.name).toBe("from-file");
      expect(settings.verbose).toBe(false);
      expect(logger.messages("warn")).toEqual([]);
    });

    it("should keep defaults for an empty file", async () => {
      const filePath = path.join(DIR, "plain.json");
      store.put(filePath, "  \n");

      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });

      expect(settings.name).toBe("default");
      expect(logger.messages("warn")).toEqual([`Settings file is empty, keeping defaults: ${filePath}`]);
    });

    it("should fail on a file that is not structured text", async () => {
      store.put(path.join(DIR, "plain.json"), "{not json");

      const opening = SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });

      await expect(opening).rejects.toBeInstanceOf(StructuralParseError);
      await expect(opening).rejects.toThrow(`Invalid settings file: ${path.join(DIR, "plain.json")} - `);
    });

    it("should fail on a file whose top level is not an object", async () => {
      const filePath = path.join(DIR, "plain.json");
      store.put(filePath, "[1, 2]");

      await expect(SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger })).rejects.toThrow(
        `Invalid settings file: ${filePath} - top-level value is not an object`,
      );
    });

    it("should skip null in a slot that does not accept it", async () => {
      const filePath = path.join(DIR, "plain.json");
      store.put(filePath, JSON.stringify({ name: null, verbose: null }));

      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });

      expect(settings.name).toBeNull();
      expect(settings.verbose).toBe(false);
      expect(logger.messages("warn")).toEqual([
        `Skipping "verbose" in ${filePath}: Cannot convert "verbose": verbose: Expected boolean, received null`,
      ]);
    });

    it("should skip values of the wrong type and keep the rest", async () => {
      const filePath = path.join(DIR, "plain.json");
      store.put(filePath, JSON.stringify({ name: "kept", verbose: "yes" }));

      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });

      expect(settings.name).toBe("kept");
      expect(settings.verbose).toBe(false);
      expect(logger.messages("warn")).toEqual([
        `Skipping "verbose" in ${filePath}: Cannot convert "verbose": verbose: Expected boolean, received string`,
      ]);
    });

    it("should report a failed save without throwing", async () => {
      const failing = new FullDiskStore();
      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: failing, logger });

      await expect(settings.save()).resolves.toBe(false);
      expect(logger.messages("error")).toEqual([
        `Failed to save settings to ${path.join(DIR, "plain.json")}: disk full`,
      ]);
    });

    it("should re-read the file on load", async () => {
      const settings = await SettingsDocument.open(PlainSettings, DIR, "plain", { fileStore: store, logger });
      store.put(settings.filePath, JSON.stringify({ name: "edited", verbose: true }));

      await settings.load();

      expect(settings.name).toBe("edited");
      expect(settings.verbose).toBe(true);
    });
  });

  describe("encrypted settings", () => {
    it("should create a password at first use and save right away", async () => {
      const prompter = new ScriptedPrompter(["p1", "p1"]);
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, prompter, logger });

      const stored = storedJson(store, settings.filePath);
      expect(Object.keys(stored)).toEqual(["passwordHash", "apiKey", "retries"]);
      expect(stored.passwordHash).toBe(settings.passwordHash);
      expect(stored.apiKey).toBeNull();
      expect(stored.retries).toBe(3);
      expect(prompter.messages[prompter.messages.length - 1]).toBe("Encryption password set successfully.");

      settings.apiKey = "abc";
      await expect(settings.save()).resolves.toBe(true);

      const ciphertext = storedJson(store, settings.filePath).apiKey;
      expect(typeof ciphertext).toBe("string");
      expect(ciphertext).not.toBe("abc");

      const reopened = await SettingsDocument.open(ApiSettings, DIR, "api", {
        fileStore: store,
        prompter: new ScriptedPrompter(["p1"]),
        logger,
      });
      expect(reopened.apiKey).toBe("abc");
      expect(reopened.retries).toBe(3);
    });

    it("should keep existing data when the first password is created", async () => {
      const filePath = path.join(DIR, "api.json");
      store.put(filePath, JSON.stringify({ apiKey: null, retries: 7 }));

      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", {
        fileStore: store,
        prompter: new ScriptedPrompter(["p1", "p1"]),
        logger,
      });

      expect(settings.retries).toBe(7);
      expect(storedJson(store, filePath).retries).toBe(7);
    });

    it("should round-trip through the filesystem with a supplied password", async () => {
      const dir = await createTempDir();
      try {
        const settings = await SettingsDocument.open(ApiSettings, dir, "api", { password: "p1", logger });
        settings.apiKey = "secret";
        settings.retries = 5;
        await expect(settings.save()).resolves.toBe(true);

        const text = await fs.readFile(path.join(dir, "api.json"), "utf-8");
        expect(text).not.toContain("secret");

        const reopened = await SettingsDocument.open(ApiSettings, dir, "api", { password: "p1", logger });
        expect(reopened.apiKey).toBe("secret");
        expect(reopened.retries).toBe(5);
      } finally {
        await fs.rm(dir, { recursive: true, force: true });
      }
    });

    it("should reject a wrong password before decrypting anything", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      settings.apiKey = "secret";
      await settings.save();

      const opening = SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "wrong", logger });

      await expect(opening).rejects.toBeInstanceOf(AuthenticationError);
      expect(logger.messages("warn")).toEqual([]);
    });

    it("should verify a password passed to load", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      await settings.save();

      await expect(settings.load("wrong")).rejects.toThrow("Invalid encryption password provided");
    });

    it("should not encrypt ciphertext twice on repeated saves", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      settings.apiKey = "secret";

      await settings.save();
      const first = storedJson(store, settings.filePath).apiKey;
      await settings.save();
      const second = storedJson(store, settings.filePath).apiKey;

      expect(second).toBe(first);

      const reopened = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      expect(reopened.apiKey).toBe("secret");
    });

    it("should decrypt again after load", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      settings.apiKey = "secret";
      await settings.save();

      await settings.load();

      expect(settings.apiKey).toBe("secret");
    });

    it("should leave a corrupted ciphertext in place and warn", async () => {
      const filePath = path.join(DIR, "api.json");
      store.put(filePath, JSON.stringify({ passwordHash: hashPassword("p1"), apiKey: "garbage!!", retries: 1 }));

      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });

      expect(settings.apiKey).toBe("garbage!!");
      expect(settings.retries).toBe(1);
      expect(logger.messages("warn")).toEqual([
        'Could not decrypt "apiKey", keeping the stored value. Decryption failed: Ciphertext is not valid base64',
      ]);
    });

    it("should read stored blank ciphertext as null", async () => {
      store.put(path.join(DIR, "api.json"), JSON.stringify({ passwordHash: hashPassword("p1"), apiKey: "" }));

      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });

      expect(settings.apiKey).toBeNull();
    });

    it("should fail when the password prompt is canceled", async () => {
      store.put(path.join(DIR, "api.json"), JSON.stringify({ passwordHash: hashPassword("p1") }));

      await expect(
        SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, prompter: new ScriptedPrompter([null]), logger }),
      ).rejects.toThrow("Password entry was canceled");
    });

    it("should round-trip YAML", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", {
        fileStore: store,
        password: "p1",
        format: "yaml",
        logger,
      });
      settings.apiKey = "secret";
      await settings.save();

      const stored = asRecord(parseYaml(store.peek(path.join(DIR, "api.yaml")) ?? ""));
      expect(stored.passwordHash).toBe(settings.passwordHash);
      expect(stored.retries).toBe(3);

      const reopened = await SettingsDocument.open(ApiSettings, DIR, "api", {
        fileStore: store,
        password: "p1",
        format: "yaml",
        logger,
      });
      expect(reopened.apiKey).toBe("secret");
    });

    it("should encrypt a shared object once", async () => {
      const settings = await SettingsDocument.open(ClusterSettings, DIR, "cluster", {
        fileStore: store,
        password: "p1",
        logger,
      });
      const shared = new Credential();
      shared.user = "ci";
      shared.token = "shared-token";
      settings.primary = shared;
      settings.backup = shared;

      await settings.save();

      const stored = storedJson(store, settings.filePath);
      const primary = asRecord(stored.primary);
      const backup = asRecord(stored.backup);
      expect(primary.token).toBe(backup.token);
      expect(primary.token).not.toBe("shared-token");

      const reopened = await SettingsDocument.open(ClusterSettings, DIR, "cluster", {
        fileStore: store,
        password: "p1",
        logger,
      });
      expect(reopened.primary).toBeInstanceOf(Credential);
      expect(reopened.primary?.token).toBe("shared-token");
      expect(reopened.backup?.token).toBe("shared-token");
    });

    it("should zero the key on dispose", async () => {
      const settings = await SettingsDocument.open(ApiSettings, DIR, "api", { fileStore: store, password: "p1", logger });
      settings.dispose();

      expect(settings.state).toBe("NeedPassword");
    });
  });

  describe("nested documents", () => {
    it("should save each document once across a back-reference", async () => {
      const parent = await SettingsDocument.open(ParentSettings, DIR, "parent", { fileStore: store, logger });
      const child = await SettingsDocument.open(ChildSettings, DIR, "child", { fileStore: store, logger });
      parent.name = "p";
      child.name = "c";
      parent.child = child;
      child.parent = parent;

      await expect(parent.save()).resolves.toBe(true);

      expect(store.writes).toEqual([parent.filePath, child.filePath]);
      expect(storedJson(store, parent.filePath)).toEqual({ name: "p" });
      expect(storedJson(store, child.filePath)).toEqual({ name: "c" });
    });

    it("should cascade into a collection of encrypted documents", async () => {
      const options = { fileStore: store, password: "p1", logger };
      const hub = await SettingsDocument.open(HubSettings, DIR, "hub", options);
      const first = await SettingsDocument.open(LeafSettings, DIR, "leaf-a", options);
      const second = await SettingsDocument.open(LeafSettings, DIR, "leaf-b", options);
      first.credential = Object.assign(new Credential(), { user: "a", token: "token-a" });
      hub.name = "hub";
      hub.leaves = [first, second];

      const before = store.writes.length;
      await expect(hub.save()).resolves.toBe(true);

      expect(store.writes.slice(before)).toEqual([hub.filePath, first.filePath, second.filePath]);
      expect(Object.keys(storedJson(store, hub.filePath))).toEqual(["passwordHash", "name", "credential"]);

      await hub.load();
      expect(hub.leaves).toHaveLength(2);
      expect(hub.leaves[0]).toBe(first);
      expect(hub.leaves[1]).toBe(second);

      second.credential = Object.assign(new Credential(), { user: "b", token: "token-b" });
      await expect(hub.save()).resolves.toBe(true);

      const reopenedFirst = await SettingsDocument.open(LeafSettings, DIR, "leaf-a", options);
      const reopenedSecond = await SettingsDocument.open(LeafSettings, DIR, "leaf-b", options);
      expect(reopenedFirst.credential?.token).toBe("token-a");
      expect(reopenedSecond.credential?.token).toBe("token-b");
      expect(logger.messages("warn")).toEqual([]);
    });

    it("should store an object shared across documents under each document's key", async () => {
      const options = { fileStore: store, password: "p1", logger };
      const hub = await SettingsDocument.open(HubSettings, DIR, "hub", options);
      const leaf = await SettingsDocument.open(LeafSettings, DIR, "leaf", options);
      const shared = Object.assign(new Credential(), { user: "ci", token: "shared-token" });
      hub.credential = shared;
      leaf.credential = shared;
      hub.leaves = [leaf];

      await expect(hub.save()).resolves.toBe(true);
      await expect(hub.save()).resolves.toBe(true);

      const reopenedHub = await SettingsDocument.open(HubSettings, DIR, "hub", options);
      const reopenedLeaf = await SettingsDocument.open(LeafSettings, DIR, "leaf", options);
      expect(reopenedHub.credential?.token).toBe("shared-token");
      expect(reopenedLeaf.credential?.token).toBe("shared-token");
      expect(logger.messages("warn")).toEqual([]);
    });

    it("should report a failed nested save", async () => {
      const failing = new FullDiskStore();
      const parent = await SettingsDocument.open(ParentSettings, DIR, "parent", { fileStore: store, logger });
      parent.child = await SettingsDocument.open(ChildSettings, DIR, "child", { fileStore: failing, logger });

      await expect(parent.save()).resolves.toBe(false);
      expect(store.writes).toEqual([parent.filePath]);
    });
  });
});
