/**
 * Stub LLM adapter for when no provider is configured.
 * Returns an empty response: compression falls back to the carried state and replies are empty.
 */

import type { ILLM, Message, ChatOptions, ChatResponse } from "./types";

export class StubLLM implements ILLM {
  async chat(_messages: Message[], _options?: ChatOptions): Promise<ChatResponse> {
    return { text: "" };
  }
}
