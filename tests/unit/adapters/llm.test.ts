/**
 * Unit tests for LLM adapters (stub and factory) and structured output parsing.
 */

import { z } from "zod";
import { AnthropicLLM, OpenAILLM, StubLLM, createLLM, extractJsonCandidates, parseStructured } from "../../../src/adapters/llm";
import { testConfig } from "../../helpers/fakes";

describe("StubLLM", () => {
  it("returns empty response", async () => {
    const llm = new StubLLM();
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(testConfig())).toBeInstanceOf(StubLLM);
  });

  it("returns StubLLM when provider is openai but no api key", () => {
    expect(createLLM(testConfig({ llm: { provider: "openai" } }))).toBeInstanceOf(StubLLM);
  });

  it("returns OpenAILLM when an openai key is set", () => {
    const llm = createLLM(testConfig({ llm: { provider: "openai", openaiApiKey: "test-secret" } }));
    expect(llm).toBeInstanceOf(OpenAILLM);
  });

  it("returns AnthropicLLM when an anthropic key is set", () => {
    const llm = createLLM(testConfig({ llm: { provider: "anthropic", anthropicApiKey: "test-secret" } }));
    expect(llm).toBeInstanceOf(AnthropicLLM);
  });
});

describe("extractJsonCandidates", () => {
  it("unwraps fenced blocks", () => {
    expect(extractJsonCandidates('```json\n{"a":1}\n```')).toEqual(['{"a":1}']);
  });

  it("finds a JSON object inside prose", () => {
    expect(extractJsonCandidates('Sure! {"a":"}"} hope that helps')).toEqual([
      'Sure! {"a":"}"} hope that helps',
      '{"a":"}"}',
    ]);
  });
});

describe("parseStructured", () => {
  const Schema = z.object({ selected: z.array(z.string()) });

  it("returns the first candidate that validates", () => {
    const result = parseStructured('{"other":true} then {"selected":["a1"]}', Schema);
    expect(result).toEqual({ ok: true, value: { selected: ["a1"] } });
  });

  it("reports schema issues with their path", () => {
    const result = parseStructured('{"selected":"a1"}', Schema);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.issues[0]).toMatch(/^selected: /);
  });

  it("reports an empty response", () => {
    expect(parseStructured("   ", Schema)).toEqual({ ok: false, issues: ["(root): empty response"] });
  });

  it("reports text without JSON", () => {
    expect(parseStructured("no json here", Schema)).toEqual({ ok: false, issues: ["(root): response is not valid JSON"] });
  });
});
