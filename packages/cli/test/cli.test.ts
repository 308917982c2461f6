/**
 * In-process tests for CLI commands
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { CommanderError } from "commander";
import { BadParameterError, INVERTED_FILE_INDEX_FILENAME, TREE_INDEX_FILENAME } from "@modelrepo/sdk";
import { createTempDir, removeDir, writeTarArchive } from "@modelrepo/testkit";
import { createProgram } from "../src/program.js";
import { CliError, mapSdkErrorToExitCode } from "../src/lib/errors.js";

interface CliRun {
  stdout: string[];
  stderr: string;
  error: unknown;
}

/**
 * Run the CLI in-process, capturing console and commander output
 */
async function runCli(args: string[]): Promise<CliRun> {
  const run: CliRun = { stdout: [], stderr: "", error: undefined };
  const log = vi.spyOn(console, "log").mockImplementation((...data: unknown[]) => {
    run.stdout.push(data.join(" "));
  });
  const error = vi.spyOn(console, "error").mockImplementation((...data: unknown[]) => {
    run.stderr += data.join(" ") + "\n";
  });

  const program = createProgram({
    writeOut: (str) => run.stdout.push(str),
    writeErr: (str) => {
      run.stderr += str;
    },
  });

  try {
    await program.parseAsync(["node", "modelrepo", ...args]);
  } catch (err) {
    run.error = err;
  } finally {
    log.mockRestore();
    error.mockRestore();
  }
  return run;
}

async function readJson(file: string): Promise<Record<string, unknown>> {
  return JSON.parse(await readFile(file, "utf-8"));
}

describe("CLI", () => {
  let tmpDir: string;
  let repo: string;
  let savedBackend: string | undefined;

  beforeEach(async () => {
    tmpDir = await createTempDir("modelrepo-cli-");
    repo = join(tmpDir, "model");
    savedBackend = process.env.MODELREPO_INDEX_BACKEND;
    delete process.env.MODELREPO_INDEX_BACKEND;
    delete process.env.MODELREPO_CLI_DEBUG;
  });

  afterEach(async () => {
    if (savedBackend !== undefined) {
      process.env.MODELREPO_INDEX_BACKEND = savedBackend;
    } else {
      delete process.env.MODELREPO_INDEX_BACKEND;
    }
    await removeDir(tmpDir);
  });

  describe("--version", () => {
    it("should print the package version", async () => {
      const { stdout, error } = await runCli(["--version"]);

      expect(stdout).toEqual(["0.1.0\n"]);
      expect(error).toBeInstanceOf(CommanderError);
      expect(error).toMatchObject({ code: "commander.version", exitCode: 0 });
    });
  });

  describe("init", () => {
    it("should create a missing repository with --create", async () => {
      const { stdout, error } = await runCli(["--repository", repo, "init", "--create"]);

      expect(error).toBeUndefined();
      expect(JSON.parse(stdout[0] ?? "")).toEqual({
        repository: repo,
        bootstrapped: false,
        parameters: {},
      });
      expect((await stat(repo)).isDirectory()).toBe(true);
    });

    it("should exit with code 2 for a missing repository without --create", async () => {
      const { stdout, error } = await runCli(["--repository", repo, "init"]);

      expect(error).toBeInstanceOf(CliError);
      expect(mapSdkErrorToExitCode(error)).toBe(2);
      expect(error).toMatchObject({
        message: `Repository not found: ${repo} (use --create to create it)`,
      });
      expect(stdout).toEqual([]);
    });

    it("should install an archive and print the merged parameters", async () => {
      const archive = await writeTarArchive(join(tmpDir, "resnet.tar.gz"), {
        "config.json": '{"parameters": {"mllib": {"nclasses": 2}}}',
        "model.bin": "weights",
      });

      const { stdout, error } = await runCli([
        "--repository",
        repo,
        "init",
        "--create",
        "--init",
        archive,
        "--params",
        '{"parameters": {"stale": true}, "service": "imgserv"}',
      ]);

      expect(error).toBeUndefined();
      expect(JSON.parse(stdout[0] ?? "")).toEqual({
        repository: repo,
        bootstrapped: true,
        parameters: { mllib: { nclasses: 2 } },
      });
      expect(await readFile(join(repo, "model.bin"), "utf-8")).toBe("weights");
    });

    it("should exit with code 1 when a file occupies the repository path", async () => {
      await writeFile(repo, "not a directory");

      const { error } = await runCli(["--repository", repo, "init", "--create"]);

      expect(error).toBeInstanceOf(BadParameterError);
      expect(error).toMatchObject({ reason: "repository-collision" });
      expect(mapSdkErrorToExitCode(error)).toBe(1);
    });

    it("should reject --params that is not a JSON object", async () => {
      const { error, stderr } = await runCli(["init", "--params", "[1, 2]"]);

      expect(error).toMatchObject({ code: "commander.invalidArgument", exitCode: 1 });
      expect(stderr).toContain("--params must be a JSON object");
    });
  });

  describe("labels", () => {
    it("should print one line per requested index", async () => {
      const file = join(tmpDir, "corresp.txt");
      await writeFile(file, "0 cat\n1 dog\n");

      const { stdout, error } = await runCli(["labels", file, "1", "0", "7"]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual(["1 dog", "0 cat", "7 7"]);
    });

    it("should fall back to the index itself when the file cannot be read", async () => {
      const { stdout } = await runCli(["labels", join(tmpDir, "absent.txt"), "3"]);

      expect(stdout).toEqual(["3 3"]);
    });

    it("should reject a non-integer index", async () => {
      const { error } = await runCli(["labels", join(tmpDir, "corresp.txt"), "x"]);

      expect(error).toMatchObject({ code: "commander.invalidArgument", exitCode: 1 });
    });

    it("should fail on a malformed correspondence file", async () => {
      const file = join(tmpDir, "corresp.txt");
      await writeFile(file, "0 cat\nbad entry\n");

      const { error } = await runCli(["labels", file, "0"]);

      expect(error).toBeInstanceOf(BadParameterError);
      expect(error).toMatchObject({ reason: "corresp-parse" });
    });
  });

  describe("best-model", () => {
    it("should print the trimmed marker", async () => {
      await mkdir(repo, { recursive: true });
      await writeFile(join(repo, "best_model.txt"), "iteration 500\n");

      const { stdout, error } = await runCli(["--repository", repo, "best-model"]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual(["iteration 500"]);
    });

    it("should exit with code 2 when the marker is missing", async () => {
      const { error } = await runCli(["--repository", repo, "best-model"]);

      expect(error).toBeInstanceOf(CliError);
      expect(mapSdkErrorToExitCode(error)).toBe(2);
    });
  });

  describe("index", () => {
    beforeEach(async () => {
      await mkdir(repo, { recursive: true });
    });

    it("should create a tree index", async () => {
      const { stdout, error } = await runCli([
        "--repository",
        repo,
        "index",
        "create",
        "--dimension",
        "8",
        "--backend",
        "tree",
      ]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual([`Created tree index in ${repo}`]);
      expect(await readJson(join(repo, TREE_INDEX_FILENAME))).toMatchObject({
        backend: "tree",
        dimension: 8,
        state: "empty",
      });
    });

    it("should build an inverted-file index chosen through the environment", async () => {
      process.env.MODELREPO_INDEX_BACKEND = "ivf";

      const { stdout, error } = await runCli([
        "--repository",
        repo,
        "index",
        "build",
        "--dimension",
        "16",
        "--nprobe",
        "4",
        "--gpuid",
        "0,1",
      ]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual([`Built ivf index in ${repo}`]);
      expect(await readJson(join(repo, INVERTED_FILE_INDEX_FILENAME))).toMatchObject({
        backend: "ivf",
        dimension: 16,
        options: { indexKey: "IVF256,Flat", nprobe: 4, gpu: true, gpuIds: [0, 1] },
        state: "built",
        builds: 1,
      });
    });

    it("should remove the index", async () => {
      const args = ["--repository", repo, "index", "remove", "--dimension", "8", "--backend", "tree"];

      const { stdout, error } = await runCli(args);

      expect(error).toBeUndefined();
      expect(stdout).toEqual([`Removed tree index in ${repo}`]);
      await expect(stat(join(repo, TREE_INDEX_FILENAME))).rejects.toMatchObject({
        code: "ENOENT",
      });
    });

    it("should do nothing without a configured backend", async () => {
      const { stdout, stderr, error } = await runCli([
        "--repository",
        repo,
        "index",
        "build",
        "--dimension",
        "8",
      ]);

      expect(error).toBeUndefined();
      expect(stdout).toEqual([]);
      expect(stderr).toContain("No similarity backend configured; nothing to do");
    });

    it("should stay silent with --quiet", async () => {
      const { stdout, stderr } = await runCli([
        "--repository",
        repo,
        "--quiet",
        "index",
        "create",
        "--dimension",
        "8",
      ]);

      expect(stdout).toEqual([]);
      expect(stderr).toBe("");
    });

    it("should reject an unknown backend name", async () => {
      const { error } = await runCli([
        "--repository",
        repo,
        "index",
        "create",
        "--dimension",
        "8",
        "--backend",
        "hnsw",
      ]);

      expect(error).toBeInstanceOf(BadParameterError);
      expect(error).toMatchObject({ reason: "invalid-option" });
    });

    it("should require --dimension", async () => {
      const { error } = await runCli(["--repository", repo, "index", "create"]);

      expect(error).toMatchObject({ code: "commander.missingMandatoryOptionValue" });
    });

    it("should reject an unknown action", async () => {
      const { error } = await runCli(["index", "rebuild", "--dimension", "8"]);

      expect(error).toMatchObject({ code: "commander.invalidArgument" });
    });

    it("should reject a zero dimension", async () => {
      const { error, stderr } = await runCli(["index", "create", "--dimension", "0"]);

      expect(error).toMatchObject({ code: "commander.invalidArgument" });
      expect(stderr).toContain("--dimension must be greater than 0");
    });
  });
});
