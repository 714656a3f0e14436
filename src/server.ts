/**
 * Thin HTTP transport over the Controller.
 * POST /chat -> reply streamed as chunked text/plain; 409 while a turn is in flight.
 * GET /state/:sessionId -> committed state or 404.
 * GET /health -> 200 if process is up.
 */

import * as http from "http";
import { z } from "zod";
import type { Controller } from "./pipeline/controller";
import type { ReplyChunk } from "./pipeline/types";
import { logger, errorMessage } from "./logging";

const MAX_BODY_BYTES = 64 * 1024;

export const ChatRequestSchema = z.object({
  session_id: z.string().trim().min(1).max(200),
  message: z.string(),
});

export type ChatRequest = z.infer<typeof ChatRequestSchema>;

/** Text for one reply chunk on the wire. An error chunk is a terminal line of its own. */
export function renderChunk(chunk: ReplyChunk, wroteText: boolean): string {
  if (chunk.kind === "text") return chunk.text;
  return `${wroteText ? "\n" : ""}[error:${chunk.code}] ${chunk.message}\n`;
}

export function parseChatBody(raw: string): { ok: true; request: ChatRequest } | { ok: false; error: string } {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Body must be JSON" };
  }
  const parsed = ChatRequestSchema.safeParse(json);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ") };
  }
  return { ok: true, request: parsed.data };
}

/** `/state/<id>` -> decoded id, otherwise null. */
export function matchStatePath(url: string): string | null {
  const match = /^\/state\/([^/?#]+)\/?(?:\?.*)?$/.exec(url);
  if (!match) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
}

/** The parts of a response the chat stream writes through. */
export interface ChunkSink {
  write(chunk: string): boolean;
  once(event: "drain" | "close", listener: () => void): unknown;
  off(event: "drain" | "close", listener: () => void): unknown;
}

/** Write one chunk; when the socket buffer is full, wait until it drains or the client goes away. */
export function writeChunk(sink: ChunkSink, text: string): Promise<void> {
  if (sink.write(text)) return Promise.resolve();
  return new Promise((resolve) => {
    const done = (): void => {
      sink.off("drain", done);
      sink.off("close", done);
      resolve();
    };
    sink.once("drain", done);
    sink.once("close", done);
  });
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: http.IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on("data", (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new Error("Request body too large"));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf8")));
    req.on("error", reject);
  });
}

async function handleChat(controller: Controller, req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
  let raw: string;
  try {
    raw = await readBody(req);
  } catch (err) {
    sendJson(res, 413, { error: errorMessage(err) });
    return;
  }
  const body = parseChatBody(raw);
  if (!body.ok) {
    sendJson(res, 400, { error: body.error });
    return;
  }

  const submission = controller.submitTurn({ sessionId: body.request.session_id, message: body.request.message });
  if (submission.status === "rejected") {
    sendJson(res, submission.reason === "turn_in_progress" ? 409 : 400, {
      error: submission.reason,
      session_id: submission.sessionId,
    });
    return;
  }

  const { reply } = submission;
  let ended = false;
  res.on("close", () => {
    if (ended) return;
    reply.cancel().catch((err: unknown) => {
      logger.warn({ event: "REPLY_CANCEL_FAILED", sessionId: submission.sessionId, err: errorMessage(err) }, "Cancel failed");
    });
  });

  res.writeHead(200, {
    "Content-Type": "text/plain; charset=utf-8",
    "Cache-Control": "no-cache",
    "X-Session-Id": submission.sessionId,
    "X-Turn": String(submission.turn),
  });
  let wroteText = false;
  for await (const chunk of reply) {
    await writeChunk(res, renderChunk(chunk, wroteText));
    if (chunk.kind === "text") wroteText = true;
    if (res.destroyed) break;
  }
  ended = true;
  res.end();
}

export function createServer(controller: Controller): http.Server {
  return http.createServer((req, res) => {
    const url = req.url ?? "";
    if (req.method === "GET" && (url === "/health" || url === "/")) {
      sendJson(res, 200, { ok: true });
      return;
    }
    if (req.method === "POST" && url === "/chat") {
      handleChat(controller, req, res).catch((err: unknown) => {
        logger.error({ event: "CHAT_REQUEST_FAILED", err: errorMessage(err) }, "Chat request failed");
        if (!res.headersSent) sendJson(res, 500, { error: "internal_error" });
        else res.end();
      });
      return;
    }
    const sessionId = req.method === "GET" ? matchStatePath(url) : null;
    if (sessionId !== null) {
      const result = controller.readState(sessionId);
      if (!result.found) sendJson(res, 404, { error: "unknown_session", session_id: sessionId });
      else sendJson(res, 200, { session_id: result.sessionId, turn: result.turn, state: result.state });
      return;
    }
    res.writeHead(404);
    res.end();
  });
}

export function startServer(controller: Controller, port: number): http.Server {
  const server = createServer(controller);
  server.listen(port, () => {
    logger.info({ event: "SERVER_STARTED", port }, "Server listening");
  });
  return server;
}
