import OpenAI from "openai";
import { describe, it, expect, vi } from "vitest";
import { createSilentLogger } from "../logger/index.js";
import type { ChatCompletionCall, ChatCompletionResult } from "./client.js";
import { FatalProviderError, TransientProviderError } from "./errors.js";
import { classifyProviderError, OpenAICompatibleProvider } from "./openaiProvider.js";
import type { ReviseRequest } from "./types.js";

const logger = createSilentLogger();

const REQUEST: ReviseRequest = {
  text: "Original text.",
  sectionType: "results",
  suggestions: [],
  messages: [
    { role: "system", content: "Revise." },
    { role: "user", content: "{}" },
  ],
};

function reply(content: string): ChatCompletionResult {
  return { choices: [{ message: { content } }] };
}

function provider(complete: ChatCompletionCall) {
  return new OpenAICompatibleProvider(
    { id: "openai", apiKey: "test-secret", baseURL: "http://localhost:0/v1", model: "test-model" },
    { logger, complete }
  );
}

describe("OpenAICompatibleProvider", () => {
  it("asks for a JSON object and returns the validated revision", async () => {
    const complete = vi.fn<Parameters<ChatCompletionCall>, ReturnType<ChatCompletionCall>>(async () =>
      reply(JSON.stringify({ revisedText: "  Revised text.  ", changeRationale: ["shorter"] }))
    );

    await expect(provider(complete).revise(REQUEST, {})).resolves.toBe("Revised text.");
    const [body] = complete.mock.calls[0];
    expect(body.model).toBe("test-model");
    expect(body.response_format).toEqual({ type: "json_object" });
    expect(body.temperature).toBe(0.4);
    expect(body.messages).toEqual(REQUEST.messages);
  });

  it("retries without response_format when the endpoint rejects it", async () => {
    const complete = vi
      .fn<Parameters<ChatCompletionCall>, ReturnType<ChatCompletionCall>>()
      .mockRejectedValueOnce(new OpenAI.BadRequestError(400, undefined, "response_format unsupported", {}))
      .mockResolvedValueOnce(reply('Sure! ```json\n{"draftText": "A draft."}\n```'));

    const text = await provider(complete).generate(
      { topic: "edge caching", sectionType: "abstract", keyPoints: [], messages: [] },
      {}
    );
    expect(text).toBe("A draft.");
    expect(complete).toHaveBeenCalledTimes(2);
    expect(complete.mock.calls[1][0].response_format).toBeUndefined();
  });

  it("classifies unparsable output as transient", async () => {
    const complete = vi.fn<Parameters<ChatCompletionCall>, ReturnType<ChatCompletionCall>>(async () => reply("no json here"));
    await expect(provider(complete).revise(REQUEST, {})).rejects.toMatchObject({
      name: "TransientProviderError",
      kind: "malformed_output",
    });
  });

  it("classifies JSON of the wrong shape as transient", async () => {
    const complete = vi.fn<Parameters<ChatCompletionCall>, ReturnType<ChatCompletionCall>>(async () =>
      reply(JSON.stringify({ text: "wrong key" }))
    );
    await expect(provider(complete).revise(REQUEST, {})).rejects.toBeInstanceOf(TransientProviderError);
  });
});

describe("classifyProviderError", () => {
  const kindOf = (err: unknown) => {
    const e = classifyProviderError("openai", err);
    return [e instanceof TransientProviderError ? "transient" : "fatal", e.kind];
  };

  it("retries rate limits, server errors and connection problems", () => {
    expect(kindOf(OpenAI.APIError.generate(429, undefined, "slow down", {}))).toEqual(["transient", "rate_limit"]);
    expect(kindOf(OpenAI.APIError.generate(503, undefined, "unavailable", {}))).toEqual(["transient", "server"]);
    expect(kindOf(new OpenAI.APIConnectionTimeoutError())).toEqual(["transient", "timeout"]);
    expect(kindOf(new OpenAI.APIConnectionError({ message: "socket hang up" }))).toEqual(["transient", "connection"]);
  });

  it("treats auth and request errors as fatal", () => {
    expect(kindOf(OpenAI.APIError.generate(401, undefined, "bad key", {}))).toEqual(["fatal", "auth"]);
    expect(kindOf(OpenAI.APIError.generate(404, undefined, "no such model", {}))).toEqual(["fatal", "bad_request"]);
    expect(kindOf(new Error("boom"))).toEqual(["fatal", "unknown"]);
  });

  it("passes classified errors through", () => {
    const err = new FatalProviderError("gemini", "auth", "bad key");
    expect(classifyProviderError("openai", err)).toBe(err);
  });
});
