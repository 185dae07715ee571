import { describe, it, expect } from "vitest";
import { uniqueInOrder, splitList } from "./array_utils";

describe("Array Utils", () => {
  describe("uniqueInOrder", () => {
    it("should dedupe keeping first occurrence order", () => {
      expect(uniqueInOrder(["work", "q4", "work", "home"])).toEqual(["work", "q4", "home"]);
    });

    it("should return an empty array for empty input", () => {
      expect(uniqueInOrder([])).toEqual([]);
    });

    it("should compare case-sensitively", () => {
      expect(uniqueInOrder(["Work", "work"])).toEqual(["Work", "work"]);
    });
  });

  describe("splitList", () => {
    it("should split comma lists and trim entries", () => {
      expect(splitList(" work, q4,,home ")).toEqual(["work", "q4", "home"]);
    });

    it("should return nothing for a blank value", () => {
      expect(splitList(" , ")).toEqual([]);
    });

    it("should keep a single entry without commas", () => {
      expect(splitList("errands")).toEqual(["errands"]);
    });
  });
});
