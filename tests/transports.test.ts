/**
 * Chat transports: retry policy, Ollama wire format, scripted replies
 */

import { EventBus } from "../src/core/eventBus";
import { TransportError } from "../src/core/errors";
import { classifyHttpStatus } from "../src/core/models/adapter";
import { OllamaTransport } from "../src/core/models/ollamaAdapter";
import { OpenAITransport } from "../src/core/models/openaiAdapter";
import { ScriptedTransport } from "../src/core/models/mockAdapter";
import { ChatMessage } from "../src/core/types";

const messages: ChatMessage[] = [
  { role: "system", content: "sys" },
  { role: "user", content: "hi" },
];

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function sequence(...responses: Array<Response | Error>) {
  let i = 0;
  return jest.fn(async (..._args: Parameters<typeof fetch>) => {
    const next = responses[Math.min(i++, responses.length - 1)];
    if (next instanceof Error) throw next;
    // A body can be read once; repeated entries hand out copies
    return next.clone();
  });
}

const ok = (content: string) => json(200, { model: "llama3.1", message: { role: "assistant", content }, done: true });

describe("classifyHttpStatus", () => {
  test.each([
    [429, "rate_limit_error"],
    [408, "timeout_error"],
    [500, "server_overload"],
    [503, "server_overload"],
    [400, "model_error"],
    [404, "model_error"],
  ])("should map %i to %s", (status, code) => {
    expect(classifyHttpStatus(status)).toBe(code);
  });
});

describe("OllamaTransport", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  test("should post the whole history to /api/chat", async () => {
    const fetchImpl = sequence(ok("Thought: hi"));
    const transport = new OllamaTransport(eventBus, { baseURL: "http://ollama.test/", fetchImpl });

    expect(await transport.chat({ model: "llama3.1", messages })).toBe("Thought: hi");

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://ollama.test/api/chat");
    expect(JSON.parse(String(init?.body))).toEqual({
      model: "llama3.1",
      messages,
      stream: false,
      options: { num_ctx: 32768 },
    });
  });

  test("should pass the configured context size and temperature", async () => {
    const fetchImpl = sequence(ok("x"));
    const transport = new OllamaTransport(eventBus, { fetchImpl, numCtx: 4096, temperature: 0 });

    await transport.chat({ model: "m", messages });

    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe("http://localhost:11434/api/chat");
    expect(JSON.parse(String(init?.body)).options).toEqual({ num_ctx: 4096, temperature: 0 });
  });

  test("should retry transient failures", async () => {
    const fetchImpl = sequence(json(503, { error: "busy" }), new TypeError("fetch failed"), ok("recovered"));
    const transport = new OllamaTransport(eventBus, { fetchImpl, retryIntervals: [0] });

    expect(await transport.chat({ model: "m", messages })).toBe("recovered");
    expect(fetchImpl).toHaveBeenCalledTimes(3);

    const types = eventBus.history.map((e) => e.type);
    expect(types).toEqual(["ModelErrorEvent", "ModelErrorEvent", "ModelResponseEvent"]);
  });

  test("should give up after the last attempt", async () => {
    const fetchImpl = sequence(json(500, { error: "down" }));
    const transport = new OllamaTransport(eventBus, { fetchImpl, maxAttempts: 2, retryIntervals: [0] });

    await expect(transport.chat({ model: "m", messages })).rejects.toThrow(TransportError);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  test("should not retry a client error", async () => {
    const fetchImpl = sequence(json(404, { error: "model not found" }));
    const transport = new OllamaTransport(eventBus, { fetchImpl, retryIntervals: [0] });

    await expect(transport.chat({ model: "missing", messages })).rejects.toThrow(
      'Transport error (ollama): Ollama API error: 404 {"error":"model not found"}'
    );
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });

  test("should reject an unexpected payload", async () => {
    const transport = new OllamaTransport(eventBus, { fetchImpl: sequence(json(200, { nope: true })) });

    await expect(transport.chat({ model: "m", messages })).rejects.toThrow(
      "Transport error (ollama): Ollama returned an unexpected payload"
    );
  });

  test("should list models", async () => {
    const fetchImpl = sequence(json(200, { models: [{ name: "llama3.1:latest" }, { name: "qwen2.5:7b" }] }));
    const transport = new OllamaTransport(eventBus, { fetchImpl });

    expect(await transport.listModels()).toEqual(["llama3.1:latest", "qwen2.5:7b"]);
    expect(fetchImpl.mock.calls[0][0]).toBe("http://localhost:11434/api/tags");
  });
});

describe("ScriptedTransport", () => {
  test("should replay replies in order and record requests", async () => {
    const transport = new ScriptedTransport(new EventBus(), ["one", "two"]);

    expect(await transport.chat({ model: "m", messages })).toBe("one");
    expect(await transport.chat({ model: "m", messages })).toBe("two");
    expect(transport.callCount).toBe(2);
    expect(transport.requests[0]).toEqual({ model: "m", messages });
  });

  test("should copy the messages it receives", async () => {
    const transport = new ScriptedTransport(new EventBus(), ["one"]);
    const live: ChatMessage[] = [{ role: "user", content: "a" }];

    await transport.chat({ model: "m", messages: live });
    live.push({ role: "assistant", content: "b" });

    expect(transport.requests[0].messages).toHaveLength(1);
  });

  test("should fail once the script runs out", async () => {
    const transport = new ScriptedTransport(new EventBus(), ["only"]);
    await transport.chat({ model: "m", messages });

    await expect(transport.chat({ model: "m", messages })).rejects.toThrow(
      "Transport error (scripted): Script exhausted after 1 replies"
    );
  });

  test("should accept a reply function", async () => {
    const transport = new ScriptedTransport(new EventBus(), (request, index) => `${index}:${request.messages.length}`);
    expect(await transport.chat({ model: "m", messages })).toBe("0:2");
  });
});

describe("OpenAITransport", () => {
  test("should require an API key", () => {
    expect(() => new OpenAITransport(new EventBus(), { apiKey: "" })).toThrow("OpenAI API key is required");
  });

  test("should build with a key", () => {
    expect(new OpenAITransport(new EventBus(), { apiKey: "test-secret" }).id).toBe("openai");
  });
});
