/**
 * LLM adapter types.
 * Implementations can be swapped via config (e.g. OpenAI, Anthropic, stub).
 */

import type { ZodTypeAny } from "zod";

export interface Message {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ResponseFormat {
  /** Schema name sent to providers that support structured output. */
  name: string;
  /** Shape the reply text must parse to. Callers still validate the returned text themselves. */
  schema: ZodTypeAny;
}

export interface ChatOptions {
  /** If true, response may be streamed (tokens as they arrive). */
  stream?: boolean;
  /** Max tokens to generate. */
  maxTokens?: number;
  temperature?: number;
  /** Ask for a JSON object matching this schema instead of free text. */
  responseFormat?: ResponseFormat;
  /** Aborts the in-flight request (and stream) when signalled. */
  signal?: AbortSignal;
  /** Short name of the calling stage, used in logs. */
  label?: string;
}

export interface ChatResponse {
  /** Full text of the assistant reply (for non-streaming). Empty when streaming. */
  text: string;
  /** If streaming was requested, yields chunks. */
  stream?: AsyncIterable<string>;
}

/**
 * LLM adapter interface: messages in, assistant reply out.
 * Supports streaming so the reply can be forwarded as it is generated.
 */
export interface ILLM {
  /**
   * Get assistant reply for the given messages.
   * @param messages - System instructions plus the user turn.
   */
  chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse>;
}
