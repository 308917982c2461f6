/**
 * Unit tests for output rendering
 */

import { describe, it, expect } from "vitest";
import { CorrespondenceTable } from "@modelrepo/sdk";
import { formatLabelLines, paint } from "../src/lib/render.js";

describe("render", () => {
  describe("formatLabelLines", () => {
    it("should keep request order and fall back to the index", () => {
      const table = CorrespondenceTable.parse("0 cat\n1 dog\n");

      expect(formatLabelLines(table, [1, 5, 0, 1])).toEqual(["1 dog", "5 5", "0 cat", "1 dog"]);
    });
  });

  describe("paint", () => {
    it("should color only terminal streams", () => {
      expect(paint("oops", "red", { isTTY: true })).toBe("\x1b[31moops\x1b[0m");
      expect(paint("oops", "yellow", { isTTY: false })).toBe("oops");
      expect(paint("oops", "yellow", {})).toBe("oops");
    });
  });
});
