/**
 * Tests for the unified configuration system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { config, defineConfig, ConfigError } from "../src/index.js";

function tempDirWith(fileName: string, contents: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pullstream-config-"));
  fs.writeFileSync(path.join(dir, fileName), contents);
  return dir;
}

describe("config", () => {
  const dirs: string[] = [];

  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
    for (const dir of dirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  describe("defaults", () => {
    it("disables debug", () => {
      expect(config.get("debug")).toBe(false);
      expect(config.isDebug()).toBe(false);
    });

    it("uses a single space as print delimiter", () => {
      expect(config.get("print.delimiter")).toBe(" ");
      expect(config.printDelimiter()).toBe(" ");
    });

    it("returns undefined for unknown paths", () => {
      expect(config.get("nope.missing")).toBeUndefined();
      expect(config.has("nope")).toBe(false);
    });
  });

  describe("programmatic overrides", () => {
    it("merges nested values", () => {
      config.set({ print: { delimiter: ", " } });
      expect(config.printDelimiter()).toBe(", ");
      expect(config.get("debug")).toBe(false);
    });

    it("exposes set values through has and getAll", () => {
      expect(config.has("print.delimiter")).toBe(true);
      config.set({ print: { delimiter: "" } });
      expect(config.has("print.delimiter")).toBe(false);
      expect(config.getAll().print).toEqual({ delimiter: "" });
      expect(config.printDelimiter()).toBe("");
    });

    it("reset discards overrides", () => {
      config.set({ debug: true });
      config.reset();
      expect(config.isDebug()).toBe(false);
    });
  });

  describe("environment variables", () => {
    it("parses PULLSTREAM_DEBUG as boolean", () => {
      vi.stubEnv("PULLSTREAM_DEBUG", "1");
      config.reset();
      expect(config.get("debug")).toBe(true);
    });

    it("maps underscores to nested paths", () => {
      vi.stubEnv("PULLSTREAM_PRINT_DELIMITER", "|");
      config.reset();
      expect(config.printDelimiter()).toBe("|");
    });

    it("keeps delimiter values verbatim", () => {
      vi.stubEnv("PULLSTREAM_PRINT_DELIMITER", "10");
      config.reset();
      expect(config.printDelimiter()).toBe("10");

      vi.stubEnv("PULLSTREAM_PRINT_DELIMITER", "");
      config.reset();
      expect(config.printDelimiter()).toBe("");
    });

    it("parses digits as integers", () => {
      vi.stubEnv("PULLSTREAM_LIMIT", "42");
      config.reset();
      expect(config.get("limit")).toBe(42);
    });
  });

  describe("config files", () => {
    it("loads .pullstreamrc.json from the search directory", () => {
      const dir = tempDirWith(".pullstreamrc.json", JSON.stringify({ print: { delimiter: "_" } }));
      dirs.push(dir);
      config.reset(dir);

      expect(config.printDelimiter()).toBe("_");
      expect(config.getConfigFilePath()).toBe(path.join(dir, ".pullstreamrc.json"));
    });

    it("lets environment variables win over the file", () => {
      const dir = tempDirWith(".pullstreamrc.json", JSON.stringify({ debug: false }));
      dirs.push(dir);
      vi.stubEnv("PULLSTREAM_DEBUG", "true");
      config.reset(dir);

      expect(config.isDebug()).toBe(true);
    });

    it("raises ConfigError for an unreadable file", () => {
      const dir = tempDirWith(".pullstreamrc.json", "{ not json");
      dirs.push(dir);
      config.reset(dir);

      expect(() => config.get("debug")).toThrow(ConfigError);
    });

    it("reports no file when none exists", () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), "pullstream-config-"));
      dirs.push(dir);
      config.reset(dir);

      expect(config.getConfigFilePath()).toBeUndefined();
    });
  });

  it("defineConfig returns its argument", () => {
    const cfg = { debug: true };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});
