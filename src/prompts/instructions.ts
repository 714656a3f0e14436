/**
 * Persona/instruction text supplied to the Compressor and Agent Engine.
 * Contents are opaque: read and passed through, never parsed.
 */

import * as fs from "fs";
import * as path from "path";
import { logger, errorMessage } from "../logging";

export interface Instructions {
  /** Tone and identity (SOUL.md). */
  soul: string;
  /** Facts about the user (USER.md). */
  user: string;
  /** Working protocol and standing rules (AGENTS.md). */
  agents: string;
}

export const EMPTY_INSTRUCTIONS: Instructions = { soul: "", user: "", agents: "" };

const FILES: Record<keyof Instructions, string> = {
  soul: "SOUL.md",
  user: "USER.md",
  agents: "AGENTS.md",
};

function readOptional(dir: string, file: string): string {
  const filePath = path.join(dir, file);
  try {
    return fs.existsSync(filePath) ? fs.readFileSync(filePath, "utf8") : "";
  } catch (err) {
    logger.warn({ event: "INSTRUCTIONS_READ_FAILED", filePath, err: errorMessage(err) }, "Failed to read instruction file");
    return "";
  }
}

/** Missing files (or a missing directory) yield empty strings. */
export function loadInstructions(dir: string): Instructions {
  return {
    soul: readOptional(dir, FILES.soul),
    user: readOptional(dir, FILES.user),
    agents: readOptional(dir, FILES.agents),
  };
}
