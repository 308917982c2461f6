/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { expandTilde, isVerbose, resolveBackendName, resolveRepository } from "../src/lib/env.js";

const VARS = ["MODELREPO_REPOSITORY", "MODELREPO_INDEX_BACKEND", "MODELREPO_CLI_DEBUG"] as const;

describe("environment resolution", () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    for (const name of VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    for (const name of VARS) {
      const value = saved.get(name);
      if (value !== undefined) {
        process.env[name] = value;
      } else {
        delete process.env[name];
      }
    }
  });

  describe("resolveRepository", () => {
    it("should use CLI option when provided", () => {
      process.env.MODELREPO_REPOSITORY = "/env/path";
      expect(resolveRepository("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use MODELREPO_REPOSITORY when CLI option not provided", () => {
      process.env.MODELREPO_REPOSITORY = "/env/path";
      expect(resolveRepository()).toBe(path.resolve("/env/path"));
    });

    it("should default to ./model", () => {
      expect(resolveRepository()).toBe(path.resolve("./model"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveRepository("~/models/resnet")).toBe(path.join(homedir(), "models/resnet"));
    });
  });

  describe("expandTilde", () => {
    it("should expand a bare tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("/abs/~path")).toBe("/abs/~path");
      expect(expandTilde("~other/models")).toBe("~other/models");
    });
  });

  describe("resolveBackendName", () => {
    it("should prefer the CLI option", () => {
      process.env.MODELREPO_INDEX_BACKEND = "ivf";
      expect(resolveBackendName("tree")).toBe("tree");
    });

    it("should fall back to MODELREPO_INDEX_BACKEND, then none", () => {
      expect(resolveBackendName()).toBe("none");
      process.env.MODELREPO_INDEX_BACKEND = "ivf";
      expect(resolveBackendName()).toBe("ivf");
    });
  });

  describe("isVerbose", () => {
    it("should only be true for MODELREPO_CLI_DEBUG=1", () => {
      expect(isVerbose()).toBe(false);
      process.env.MODELREPO_CLI_DEBUG = "true";
      expect(isVerbose()).toBe(false);
      process.env.MODELREPO_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
