import { describe, it, expect } from "vitest";
import { encodeRecord, decodeRecord } from "./record_codec";
import { ParseError } from "../validation/errors";
import type { TaskdeckRecord } from "../record_types";

function captureParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) return error;
    throw error;
  }
  throw new Error("expected a ParseError");
}

const baseRecord: TaskdeckRecord = {
  id: "6f1c9a52-4a7e-4d0b-9a51-2b7c0c1f3e10",
  kind: "task",
  title: "Draft Q4 Strategy",
  status: "active",
  priority: "high",
  tags: ["work", "q4"],
  dueDate: "2025-10-01",
  createdAt: "2025-09-01T09:00:00.000Z",
  extra: {},
  body: "Outline the three bets.",
};

describe("Record codec", () => {
  describe("encodeRecord", () => {
    it("should wrap the header in delimiter lines followed by a blank line and the body", () => {
      const lines = encodeRecord(baseRecord).split("\n");

      expect(lines[0]).toBe("---");
      expect(lines).toContain("type: task");
      expect(lines).toContain("title: Draft Q4 Strategy");
      expect(lines.slice(-3)).toEqual(["---", "", "Outline the three bets."]);
    });

    it("should write snake_case keys in a fixed order", () => {
      const keys = encodeRecord(baseRecord)
        .split("\n")
        .filter((line) => /^[a-z_]+:/.test(line))
        .map((line) => line.split(":")[0]);

      expect(keys).toEqual(["id", "type", "title", "status", "priority", "tags", "due_date", "created_at"]);
    });

    it("should omit absent optional keys", () => {
      const { priority: _p, dueDate: _d, ...rest } = baseRecord;
      const text = encodeRecord({ ...rest, tags: [] });

      expect(text).not.toContain("priority:");
      expect(text).not.toContain("due_date:");
      expect(text).not.toContain("parent_goal_id:");
    });
  });

  describe("round-trip", () => {
    it("should decode what it encodes", () => {
      expect(decodeRecord(encodeRecord(baseRecord))).toEqual(baseRecord);
    });

    it("should preserve unrecognized header keys", () => {
      const record: TaskdeckRecord = {
        ...baseRecord,
        parentGoalId: "goal-1",
        extra: { area: "Career", estimate: 3, flags: { pinned: true }, links: ["a", "b"] },
      };

      const decoded = decodeRecord(encodeRecord(record));

      expect(decoded).toEqual(record);
      expect(Object.keys(decoded.extra)).toEqual(["area", "estimate", "flags", "links"]);
    });

    it("should keep an empty body and bodies containing delimiter lines", () => {
      expect(decodeRecord(encodeRecord({ ...baseRecord, body: "" })).body).toBe("");

      const tricky = { ...baseRecord, body: "before\n---\nafter\n" };
      expect(decodeRecord(encodeRecord(tricky)).body).toBe("before\n---\nafter\n");
    });

    it("should keep CRLF line endings inside the body", () => {
      const record = { ...baseRecord, body: "line1\r\nline2\r\n" };

      expect(decodeRecord(encodeRecord(record))).toEqual(record);
    });

    it("should keep a body that starts with a blank line", () => {
      const record = { ...baseRecord, body: "\nindented start" };

      expect(decodeRecord(encodeRecord(record)).body).toBe("\nindented start");
    });
  });

  describe("decodeRecord", () => {
    it("should read files without the blank separator line and with CRLF endings", () => {
      const text = [
        "---",
        "id: note-1",
        "type: note",
        "title: Reading list",
        "status: next",
        "created_at: 2025-01-02T03:04:05Z",
        "---",
        "First line",
      ].join("\r\n");

      const record = decodeRecord(text);

      expect(record.kind).toBe("note");
      expect(record.status).toBe("next");
      expect(record.body).toBe("First line");
      expect(record.tags).toEqual([]);
    });

    it("should drop a CRLF blank separator and keep the body's own CRLF", () => {
      const text = "---\r\nid: t9\r\ntype: task\r\ntitle: X\r\ncreated_at: 2025-10-01T08:00:00Z\r\n---\r\n\r\na\r\nb";

      expect(decodeRecord(text).body).toBe("a\r\nb");
    });

    it("should accept a closing delimiter on the last line", () => {
      const record = decodeRecord("---\nid: t10\ntype: note\ntitle: Y\ncreated_at: 2025-10-01T08:00:00Z\n---");

      expect(record.title).toBe("Y");
      expect(record.body).toBe("");
    });

    it("should keep date-looking values as strings", () => {
      const record = decodeRecord(
        "---\nid: t1\ntype: task\ntitle: Pay rent\ndue_date: 2025-11-01\ncreated_at: 2025-10-01T08:00:00Z\n---\n",
      );

      expect(record.dueDate).toBe("2025-11-01");
      expect(record.createdAt).toBe("2025-10-01T08:00:00Z");
    });

    it("should default the status and treat null optional keys as absent", () => {
      const record = decodeRecord(
        "---\nid: t2\ntype: goal\ntitle: Run a marathon\ndue_date: null\npriority: null\ncreated_at: 2025-10-01T08:00:00Z\n---\n",
      );

      expect(record.status).toBe("active");
      expect(record.dueDate).toBeUndefined();
      expect(record.priority).toBeUndefined();
    });

    it("should de-duplicate tags keeping first occurrence order", () => {
      const record = decodeRecord(
        "---\nid: t3\ntype: task\ntitle: Tidy\ntags: [home, errands, home]\ncreated_at: 2025-10-01T08:00:00Z\n---\n",
      );

      expect(record.tags).toEqual(["home", "errands"]);
    });

    it("should accept priorities outside the recommended set", () => {
      const record = decodeRecord(
        "---\nid: t4\ntype: task\ntitle: Someday\npriority: urgent\ncreated_at: 2025-10-01T08:00:00Z\n---\n",
      );

      expect(record.priority).toBe("urgent");
    });

    it("should name a missing required field", () => {
      const error = captureParseError(() =>
        decodeRecord("---\nid: t5\ntype: task\ncreated_at: 2025-10-01T08:00:00Z\n---\n"),
      );

      expect(error.field).toBe("title");
      expect(error.code).toBe("PARSE_ERROR");
    });

    it("should name an unrecognized status", () => {
      const error = captureParseError(() =>
        decodeRecord("---\nid: t6\ntype: task\ntitle: X\nstatus: someday\ncreated_at: 2025-10-01T08:00:00Z\n---\n"),
      );

      expect(error.field).toBe("status");
    });

    it("should name an unrecognized kind", () => {
      const error = captureParseError(() =>
        decodeRecord("---\nid: t7\ntype: project\ntitle: X\ncreated_at: 2025-10-01T08:00:00Z\n---\n"),
      );

      expect(error.field).toBe("type");
    });

    it("should reject content without delimiter lines", () => {
      expect(captureParseError(() => decodeRecord("just text")).field).toBe("header");
      expect(captureParseError(() => decodeRecord("---\nid: t8\n")).field).toBe("header");
    });

    it("should reject malformed YAML and non-mapping headers", () => {
      expect(captureParseError(() => decodeRecord("---\nid: [unclosed\n---\n")).field).toBe("header");
      expect(captureParseError(() => decodeRecord("---\n- a\n- b\n---\n")).field).toBe("header");
    });

    it("should include the source path in the message", () => {
      const error = captureParseError(() => decodeRecord("nope", "/data/bad.md"));

      expect(error.message).toBe("/data/bad.md: invalid header: missing opening delimiter line");
    });
  });
});
