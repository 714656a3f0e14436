/**
 * Long-term memory: a running Markdown list of the facts extracted from finalized turns.
 * Shared by every session of one namespace; the Compressor reads it so the state does not repeat
 * what is already remembered.
 */

import * as fs from "fs";
import * as path from "path";

export const LONG_TERM_MEMORY_HEADER = "# Long-term Memory\n\n";

export interface ILongTermMemory {
  append(facts: string[]): Promise<void>;
  /** Most recent content, at most `maxChars` characters. Empty when nothing is remembered. */
  read(maxChars: number): Promise<string>;
}

export function formatFacts(facts: readonly string[]): string {
  return facts.map((f) => `- ${f}\n`).join("");
}

/** Trailing part of the text, cut at a line start where possible. */
export function recentText(text: string, maxChars: number): string {
  if (maxChars <= 0) return "";
  if (text.length <= maxChars) return text;
  const tail = text.slice(text.length - maxChars);
  const newline = tail.indexOf("\n");
  return newline >= 0 && newline < tail.length - 1 ? tail.slice(newline + 1) : tail;
}

export class FileLongTermMemory implements ILongTermMemory {
  constructor(private readonly filePath: string) {}

  async append(facts: string[]): Promise<void> {
    if (facts.length === 0) return;
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const prefix = fs.existsSync(this.filePath) ? "" : LONG_TERM_MEMORY_HEADER;
    await fs.promises.appendFile(this.filePath, prefix + formatFacts(facts), "utf8");
  }

  async read(maxChars: number): Promise<string> {
    if (!fs.existsSync(this.filePath)) return "";
    const text = await fs.promises.readFile(this.filePath, "utf8");
    const body = text.startsWith(LONG_TERM_MEMORY_HEADER) ? text.slice(LONG_TERM_MEMORY_HEADER.length) : text;
    return recentText(body.trim(), maxChars);
  }
}

export class InMemoryLongTermMemory implements ILongTermMemory {
  private readonly facts: string[] = [];

  async append(facts: string[]): Promise<void> {
    this.facts.push(...facts);
  }

  async read(maxChars: number): Promise<string> {
    return recentText(formatFacts(this.facts).trim(), maxChars);
  }

  list(): string[] {
    return [...this.facts];
  }
}
