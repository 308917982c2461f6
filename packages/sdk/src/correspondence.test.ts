import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createRecordingLogger, createTempDir, removeDir } from "@modelrepo/testkit";
import { CorrespondenceTable } from "./correspondence.js";
import { BadParameterError } from "./errors.js";

describe("CorrespondenceTable", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(testDir);
  });

  describe("lookup", () => {
    it("should stringify every index on an empty table", () => {
      const table = new CorrespondenceTable();
      expect(table.size).toBe(0);
      expect(table.lookup(0)).toBe("0");
      expect(table.lookup(42)).toBe("42");
    });

    it("should map known indices and stringify unknown ones", () => {
      const table = CorrespondenceTable.parse("3 cat\n5 dog\n");
      expect(table.lookup(3)).toBe("cat");
      expect(table.lookup(5)).toBe("dog");
      expect(table.lookup(7)).toBe("7");
    });
  });

  describe("parse", () => {
    it("should split on the first space only", () => {
      const table = CorrespondenceTable.parse("1 n01440764 tench, Tinca tinca\n");
      expect(table.lookup(1)).toBe("n01440764 tench, Tinca tinca");
    });

    it("should let later duplicates win", () => {
      const table = CorrespondenceTable.parse("2 first\n2 second\n");
      expect(table.size).toBe(1);
      expect(table.lookup(2)).toBe("second");
    });

    it("should skip blank lines and lines with an empty key", () => {
      const table = CorrespondenceTable.parse("\n0 zero\n\n leading space\n1 one\n\n");
      expect(table.size).toBe(2);
      expect(table.lookup(0)).toBe("zero");
      expect(table.lookup(1)).toBe("one");
    });

    it("should strip CRLF line endings", () => {
      const table = CorrespondenceTable.parse("0 zero\r\n1 one\r\n");
      expect(table.lookup(0)).toBe("zero");
      expect(table.lookup(1)).toBe("one");
    });

    it("should map a line without a space to itself", () => {
      const table = CorrespondenceTable.parse("9\n");
      expect(table.lookup(9)).toBe("9");
      expect(table.size).toBe(1);
    });

    it("should keep an empty label after a trailing space", () => {
      const table = CorrespondenceTable.parse("4 \n");
      expect(table.lookup(4)).toBe("");
    });

    it.each(["cat 3", "-1 minus", "1.5 half", "0x1 hex"])(
      "should reject a non-integer key in %j",
      (line) => {
        const logger = createRecordingLogger();
        expect(() => CorrespondenceTable.parse(`0 ok\n${line}\n`, "labels.txt", logger)).toThrow(
          BadParameterError
        );
        expect(logger.events("error")).toEqual(["corresp.parse.error"]);
      }
    );

    it("should reject a key too large to hold exactly", () => {
      expect(() =>
        CorrespondenceTable.parse("9007199254740993 a\n9007199254740992 b\n", "labels.txt")
      ).toThrow('Invalid class index "9007199254740993" in corresp file labels.txt at line 1');
    });

    it("should accept the largest exact key", () => {
      const table = CorrespondenceTable.parse("9007199254740991 last\n");
      expect(table.lookup(9007199254740991)).toBe("last");
    });

    it("should name the file and line of a bad key", () => {
      expect(() => CorrespondenceTable.parse("0 ok\nbad entry\n", "labels.txt")).toThrow(
        'Invalid class index "bad" in corresp file labels.txt at line 2'
      );
    });
  });

  describe("load", () => {
    it("should return an empty table for an empty path", async () => {
      const logger = createRecordingLogger();
      const table = await CorrespondenceTable.load("", logger);
      expect(table.size).toBe(0);
      expect(logger.entries).toHaveLength(0);
    });

    it("should return an empty table and log when the file cannot be opened", async () => {
      const logger = createRecordingLogger();
      const table = await CorrespondenceTable.load(join(testDir, "absent.txt"), logger);

      expect(table.size).toBe(0);
      expect(table.lookup(3)).toBe("3");
      expect(logger.events("info")).toEqual(["corresp.open.failed"]);
    });

    it("should load entries from a file", async () => {
      const file = join(testDir, "corresp.txt");
      await writeFile(file, "3 cat\n5 dog\n");

      const table = await CorrespondenceTable.load(file, createRecordingLogger());

      expect(table.size).toBe(2);
      expect(table.lookup(3)).toBe("cat");
      expect(table.lookup(7)).toBe("7");
    });
  });
});
