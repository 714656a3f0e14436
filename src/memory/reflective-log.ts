/**
 * Reflective log: one running journal per session, appended after each finalized turn.
 * File-backed logs are Markdown, one file per session per day.
 */

import * as fs from "fs";
import * as path from "path";
import { createHash } from "crypto";

export interface ReflectiveLogEntry {
  sessionId: string;
  turn: number;
  /** ISO-8601. */
  timestamp: string;
  input: string;
  reply: string;
  gist: string;
  facts: string[];
  /** Reply was cut short (consumer cancelled, error, timeout). */
  partial: boolean;
}

export interface IReflectiveLog {
  append(entry: ReflectiveLogEntry): Promise<void>;
}

export function formatEntry(entry: ReflectiveLogEntry): string {
  const time = entry.timestamp.slice(11, 19);
  const lines = [
    "",
    `## [${time}] turn ${entry.turn}${entry.partial ? " (partial reply)" : ""}`,
    `**User**: ${entry.input}`,
    "",
    `**Agent**: ${entry.reply}`,
    "",
    `**Gist**: ${entry.gist}`,
  ];
  if (entry.facts.length > 0) {
    lines.push("", "**Facts**:", ...entry.facts.map((f) => `- ${f}`));
  }
  return lines.join("\n") + "\n";
}

const MAX_DIR_CHARS = 120;

/**
 * Session ids are caller-supplied. Bytes outside [A-Za-z0-9-] become `_XX` (hex), so distinct ids
 * never share a directory and none escapes the log directory. Long names keep a prefix plus a hash.
 */
export function safeSessionDir(sessionId: string): string {
  let out = "";
  for (const byte of Buffer.from(sessionId, "utf8")) {
    const ch = String.fromCharCode(byte);
    out += /[A-Za-z0-9-]/.test(ch) ? ch : `_${byte.toString(16).toUpperCase().padStart(2, "0")}`;
  }
  if (out.length === 0) return "_";
  if (out.length <= MAX_DIR_CHARS) return out;
  const hash = createHash("sha256").update(sessionId, "utf8").digest("hex").slice(0, 16);
  return `${out.slice(0, MAX_DIR_CHARS - hash.length - 1)}~${hash}`;
}

export class FileReflectiveLog implements IReflectiveLog {
  constructor(private readonly dir: string) {}

  pathFor(sessionId: string, timestamp: string): string {
    return path.join(this.dir, safeSessionDir(sessionId), `${timestamp.slice(0, 10)}.md`);
  }

  async append(entry: ReflectiveLogEntry): Promise<void> {
    const filePath = this.pathFor(entry.sessionId, entry.timestamp);
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    await fs.promises.appendFile(filePath, formatEntry(entry), "utf8");
  }
}

export class InMemoryReflectiveLog implements IReflectiveLog {
  private readonly entries: ReflectiveLogEntry[] = [];

  async append(entry: ReflectiveLogEntry): Promise<void> {
    this.entries.push({ ...entry, facts: [...entry.facts] });
  }

  list(sessionId?: string): ReflectiveLogEntry[] {
    return this.entries.filter((e) => sessionId === undefined || e.sessionId === sessionId);
  }
}
