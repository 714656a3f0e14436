/**
 * Unit tests for long-term memory.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  FileLongTermMemory,
  InMemoryLongTermMemory,
  LONG_TERM_MEMORY_HEADER,
  recentText,
} from "../../../src/memory/long-term-memory";

describe("recentText", () => {
  it("keeps the tail, starting at a line", () => {
    expect(recentText("- a\n- bb\n- ccc", 8)).toBe("- ccc");
    expect(recentText("- a\n- bb", 100)).toBe("- a\n- bb");
    expect(recentText("- a", 0)).toBe("");
  });
});

describe("FileLongTermMemory", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "long-term-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("starts the file with a header and appends facts as a list", async () => {
    const filePath = path.join(dir, "team", "MEMORY.md");
    const memory = new FileLongTermMemory(filePath);
    await memory.append(["User is Aiko"]);
    await memory.append(["Prefers email", "Works in Osaka"]);
    expect(fs.readFileSync(filePath, "utf8")).toBe(
      `${LONG_TERM_MEMORY_HEADER}- User is Aiko\n- Prefers email\n- Works in Osaka\n`
    );
    expect(await memory.read(1_000)).toBe("- User is Aiko\n- Prefers email\n- Works in Osaka");
  });

  it("reads nothing before the first fact and writes nothing for an empty list", async () => {
    const filePath = path.join(dir, "MEMORY.md");
    const memory = new FileLongTermMemory(filePath);
    await memory.append([]);
    expect(fs.existsSync(filePath)).toBe(false);
    expect(await memory.read(1_000)).toBe("");
  });
});

describe("InMemoryLongTermMemory", () => {
  it("lists and renders remembered facts", async () => {
    const memory = new InMemoryLongTermMemory();
    await memory.append(["Budget is 500 USD"]);
    await memory.append(["No red-eye flights"]);
    expect(memory.list()).toEqual(["Budget is 500 USD", "No red-eye flights"]);
    expect(await memory.read(1_000)).toBe("- Budget is 500 USD\n- No red-eye flights");
    expect(await memory.read(20)).toBe("- No red-eye flights");
  });
});
