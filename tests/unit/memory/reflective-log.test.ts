/**
 * Unit tests for reflective logs.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  FileReflectiveLog,
  InMemoryReflectiveLog,
  formatEntry,
  safeSessionDir,
  type ReflectiveLogEntry,
} from "../../../src/memory/reflective-log";

const entry: ReflectiveLogEntry = {
  sessionId: "s1",
  turn: 3,
  timestamp: "2026-05-06T07:08:09.000Z",
  input: "Cancel it",
  reply: "Cancelled.",
  gist: "Order cancelled",
  facts: ["Order ABC-123 cancelled"],
  partial: false,
};

describe("formatEntry", () => {
  it("renders a Markdown section", () => {
    expect(formatEntry(entry)).toBe(
      [
        "",
        "## [07:08:09] turn 3",
        "**User**: Cancel it",
        "",
        "**Agent**: Cancelled.",
        "",
        "**Gist**: Order cancelled",
        "",
        "**Facts**:",
        "- Order ABC-123 cancelled",
        "",
      ].join("\n")
    );
  });

  it("flags partial replies and omits an empty fact list", () => {
    const text = formatEntry({ ...entry, partial: true, facts: [] });
    expect(text.split("\n")[1]).toBe("## [07:08:09] turn 3 (partial reply)");
    expect(text).not.toContain("**Facts**");
  });
});

describe("safeSessionDir", () => {
  it("keeps ids inside the log directory", () => {
    expect(safeSessionDir("../etc/passwd")).toBe("_2E_2E_2Fetc_2Fpasswd");
    expect(safeSessionDir("")).toBe("_");
    expect(safeSessionDir("user-42")).toBe("user-42");
  });

  it("gives distinct ids distinct directories", () => {
    expect(safeSessionDir("alice.smith")).toBe("alice_2Esmith");
    expect(safeSessionDir("alice_smith")).toBe("alice_5Fsmith");
    expect(safeSessionDir("あ")).toBe("_E3_81_82");
  });

  it("shortens long ids to a prefix and a hash", () => {
    const long = safeSessionDir("x".repeat(300));
    expect(long).toHaveLength(120);
    expect(long.startsWith(`${"x".repeat(103)}~`)).toBe(true);
    expect(long).not.toBe(safeSessionDir("x".repeat(301)));
  });
});

describe("FileReflectiveLog", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "reflective-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends to one file per session per day", async () => {
    const log = new FileReflectiveLog(dir);
    await log.append(entry);
    await log.append({ ...entry, turn: 4 });
    const filePath = path.join(dir, "s1", "2026-05-06.md");
    expect(log.pathFor("s1", entry.timestamp)).toBe(filePath);
    const text = fs.readFileSync(filePath, "utf8");
    expect(text).toBe(formatEntry(entry) + formatEntry({ ...entry, turn: 4 }));
  });

  it("keeps sessions with similar ids in separate files", async () => {
    const log = new FileReflectiveLog(dir);
    await log.append({ ...entry, sessionId: "alice.smith" });
    await log.append({ ...entry, sessionId: "alice_smith", turn: 9 });
    expect(fs.readFileSync(path.join(dir, "alice_2Esmith", "2026-05-06.md"), "utf8")).toBe(
      formatEntry({ ...entry, sessionId: "alice.smith" })
    );
    expect(fs.readFileSync(path.join(dir, "alice_5Fsmith", "2026-05-06.md"), "utf8")).toBe(
      formatEntry({ ...entry, sessionId: "alice_smith", turn: 9 })
    );
  });
});

describe("InMemoryReflectiveLog", () => {
  it("lists entries by session", async () => {
    const log = new InMemoryReflectiveLog();
    await log.append(entry);
    await log.append({ ...entry, sessionId: "s2" });
    expect(log.list("s2")).toHaveLength(1);
    expect(log.list()).toHaveLength(2);
  });
});
