/**
 * Anthropic Claude LLM adapter.
 * No native structured output here: JSON requests get an instruction appended to the system prompt.
 */

import Anthropic from "@anthropic-ai/sdk";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
import { logger, logLlmCall } from "../../logging";

export interface AnthropicLlmConfig {
  apiKey: string;
  model: string;
}

const JSON_ONLY_INSTRUCTION =
  "Respond with a single JSON object that matches the requested fields. No prose, no code fences.";

export class AnthropicLLM implements ILLM {
  private client: Anthropic;

  constructor(private readonly cfg: AnthropicLlmConfig) {
    this.client = new Anthropic({ apiKey: cfg.apiKey });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const stream = options?.stream ?? false;
    const maxTokens = options?.maxTokens ?? 512;
    const label = options?.label ?? "chat";
    const systemParts = messages.filter((m) => m.role === "system").map((m) => m.content);
    if (options?.responseFormat) systemParts.push(JSON_ONLY_INSTRUCTION);
    const system = systemParts.length > 0 ? systemParts.join("\n\n") : undefined;
    const msgs = messages.flatMap((m) =>
      m.role === "user" || m.role === "assistant" ? [{ role: m.role, content: m.content }] : []
    );
    const body = {
      model: this.cfg.model,
      max_tokens: maxTokens,
      temperature: options?.temperature,
      system,
      messages: msgs,
    };
    const requestOptions = { signal: options?.signal };
    if (stream) {
      const streamResult = this.client.messages.stream(body, requestOptions);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const event of streamResult) {
          if (event.type === "content_block_delta" && event.delta.type === "text_delta") {
            yield event.delta.text;
          }
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const started = Date.now();
    const response = await this.client.messages.create(body, requestOptions);
    const textBlock = response.content.find((b) => b.type === "text");
    const text = textBlock && textBlock.type === "text" ? textBlock.text : "";
    logLlmCall(logger, label, messages.length, text.length, Date.now() - started);
    return { text };
  }
}
