/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { expandTilde, isVerbose, resolveConfigPath, resolveRoot } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalRoot: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalRoot = process.env.PATHTABLE_ROOT;
    originalDebug = process.env.PATHTABLE_CLI_DEBUG;
    delete process.env.PATHTABLE_ROOT;
    delete process.env.PATHTABLE_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalRoot !== undefined) {
      process.env.PATHTABLE_ROOT = originalRoot;
    } else {
      delete process.env.PATHTABLE_ROOT;
    }
    if (originalDebug !== undefined) {
      process.env.PATHTABLE_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.PATHTABLE_CLI_DEBUG;
    }
  });

  describe("resolveRoot", () => {
    it("should prefer the CLI option", () => {
      process.env.PATHTABLE_ROOT = "/env/path";
      expect(resolveRoot("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should fall back to PATHTABLE_ROOT", () => {
      process.env.PATHTABLE_ROOT = "/env/path";
      expect(resolveRoot()).toBe(path.resolve("/env/path"));
    });

    it("should leave the root to the configuration otherwise", () => {
      expect(resolveRoot()).toBeUndefined();
    });

    it("should resolve relative paths to absolute", () => {
      expect(resolveRoot("./my-data")).toBe(path.resolve("my-data"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveRoot("~/tables")).toBe(path.join(homedir(), "tables"));
    });
  });

  describe("expandTilde", () => {
    it("should expand ~ alone", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should leave other paths and ~user references alone", () => {
      expect(expandTilde("/a/~b")).toBe("/a/~b");
      expect(expandTilde("~someone/x")).toBe("~someone/x");
    });
  });

  describe("resolveConfigPath", () => {
    it("should resolve the option", () => {
      expect(resolveConfigPath("conf.json")).toBe(path.resolve("conf.json"));
    });

    it("should leave the lookup to the SDK without an option", () => {
      expect(resolveConfigPath()).toBeUndefined();
    });
  });

  describe("isVerbose", () => {
    it("should follow the flag", () => {
      expect(isVerbose(true)).toBe(true);
      expect(isVerbose()).toBe(false);
    });

    it("should follow PATHTABLE_CLI_DEBUG", () => {
      process.env.PATHTABLE_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
