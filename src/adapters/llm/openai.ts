/**
 * OpenAI Chat Completions LLM adapter.
 * Structured requests use zodResponseFormat so the provider constrains output to the schema.
 */

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";
import { logger, logLlmCall } from "../../logging";

export interface OpenAILlmConfig {
  apiKey: string;
  model: string;
  baseUrl?: string;
}

export class OpenAILLM implements ILLM {
  private client: OpenAI;

  constructor(private readonly cfg: OpenAILlmConfig) {
    this.client = new OpenAI({
      apiKey: cfg.apiKey,
      ...(cfg.baseUrl ? { baseURL: cfg.baseUrl } : {}),
    });
  }

  async chat(messages: Message[], options?: ChatOptions): Promise<ChatResponse> {
    const stream = options?.stream ?? false;
    const maxTokens = options?.maxTokens ?? 512;
    const label = options?.label ?? "chat";
    const body = {
      model: this.cfg.model,
      messages: messages.map((m) => ({ role: m.role, content: m.content })),
      max_tokens: maxTokens,
      temperature: options?.temperature,
      ...(options?.responseFormat
        ? { response_format: zodResponseFormat(options.responseFormat.schema, options.responseFormat.name) }
        : {}),
    };
    const requestOptions = { signal: options?.signal };
    if (stream) {
      const streamResult = await this.client.chat.completions.create({ ...body, stream: true }, requestOptions);
      const asyncIter = (async function* (): AsyncIterable<string> {
        for await (const chunk of streamResult) {
          const delta = chunk.choices[0]?.delta?.content;
          if (delta) yield delta;
        }
      })();
      return { text: "", stream: asyncIter };
    }
    const started = Date.now();
    const response = await this.client.chat.completions.create({ ...body, stream: false }, requestOptions);
    const text = response.choices[0]?.message?.content ?? "";
    logLlmCall(logger, label, messages.length, text.length, Date.now() - started);
    return { text };
  }
}
