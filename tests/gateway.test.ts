import { describe, it, expect } from "vitest";
import type { FastifyInstance } from "fastify";
import { BatchOrchestrator } from "../adapters/batch.js";
import { TransportError } from "../adapters/errors.js";
import { buildGateway } from "../adapters/gateway.js";
import { silentLogger } from "../adapters/logger.js";
import { GatewayPipeline } from "../adapters/pipeline.js";
import { fallbackProfile } from "../adapters/providers/profile.js";
import { ResponseCache } from "../adapters/response-cache.js";
import type { ToolExecutor } from "../adapters/tool-loop.js";
import { FakeTransport, providerResponse, streamChunks, type Script } from "./fakes.js";

interface AppOptions {
  cache?: boolean;
  streamingThreshold?: number;
  executor?: ToolExecutor;
}

function app(script: Script, options: AppOptions = {}): FastifyInstance {
  const logger = silentLogger();
  const cache = options.cache
    ? new ResponseCache({ maxEntries: 10, ttlMs: 60_000, namespace: "test", logger })
    : undefined;
  const pipeline = new GatewayPipeline({ transport: new FakeTransport(script), profile: fallbackProfile("test"), cache, logger });
  const batch = new BatchOrchestrator({
    pipeline,
    maxConcurrency: 2,
    streamingThreshold: options.streamingThreshold ?? 5,
    chunkSize: 2,
    maxBatchSize: 10,
    itemTimeoutMs: 5_000,
    newBatchId: () => "batch_test",
  });
  const tools = options.executor ? { executor: options.executor, maxRounds: 2 } : undefined;
  return buildGateway({ pipeline, batch, cache, logger, tools });
}

const body = { model: "gpt-4o-mini", max_tokens: 32, messages: [{ role: "user", content: "hi" }] };

/** Event names of an SSE body, in order */
function eventNames(payload: string): string[] {
  return payload
    .split("\n")
    .filter((line) => line.startsWith("event: "))
    .map((line) => line.slice("event: ".length));
}

function dataOf(payload: string, event: string): unknown[] {
  const out: unknown[] = [];
  const frames = payload.split("\n\n");
  for (const frame of frames) {
    const [head, data] = frame.split("\n");
    if (head === `event: ${event}` && data?.startsWith("data: ")) out.push(JSON.parse(data.slice("data: ".length)));
  }
  return out;
}

describe("gateway", () => {
  it("reports health with the provider name", async () => {
    const res = await app({}).inject({ method: "GET", url: "/healthz" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true, provider: "test", cache: null });
  });

  it("answers a non-streaming request in the client format", async () => {
    const res = await app({ response: providerResponse }).inject({ method: "POST", url: "/v1/messages", payload: body });
    expect(res.statusCode).toBe(200);
    expect(res.headers["x-cache"]).toBe("miss");
    expect(res.json()).toEqual({
      id: "msg_chatcmpl-1",
      type: "message",
      role: "assistant",
      model: "gpt-4o-mini",
      content: [{ type: "text", text: "Hello there" }],
      stop_reason: "end_turn",
      stop_sequence: null,
      usage: { input_tokens: 4, output_tokens: 2 },
    });
  });

  it("rejects invalid requests with a 400 in the client error shape", async () => {
    const res = await app({ response: providerResponse }).inject({
      method: "POST",
      url: "/v1/messages",
      payload: {
        ...body,
        tools: [{ name: "lookup", input_schema: { type: "object" } }],
        tool_choice: { type: "tool", name: "search" },
      },
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      type: "error",
      error: { type: "invalid_request_error", message: 'tool_choice.name: "search" is not a declared tool' },
    });
  });

  it("renders malformed JSON bodies as client errors", async () => {
    const res = await app({}).inject({
      method: "POST",
      url: "/v1/messages",
      headers: { "content-type": "application/json" },
      payload: "{not json",
    });
    expect(res.statusCode).toBe(400);
    expect(res.json().type).toBe("error");
    expect(res.json().error.type).toBe("invalid_request_error");
  });

  it("hides upstream details behind a mapped status", async () => {
    const res = await app({ error: new TransportError(429, "Provider returned HTTP 429") }).inject({
      method: "POST",
      url: "/v1/messages",
      payload: body,
    });
    expect(res.statusCode).toBe(429);
    expect(res.json()).toEqual({
      type: "error",
      error: { type: "rate_limit_error", message: "Upstream provider returned HTTP 429" },
    });
  });

  it("streams server-sent events", async () => {
    const res = await app({ chunks: streamChunks }).inject({
      method: "POST",
      url: "/v1/messages",
      payload: { ...body, stream: true },
    });
    expect(res.statusCode).toBe(200);
    expect(res.headers["content-type"]).toBe("text/event-stream");
    expect(eventNames(res.payload)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
    ]);
    expect(dataOf(res.payload, "content_block_delta")).toEqual([
      { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: "Hello" } },
      { type: "content_block_delta", index: 0, delta: { type: "text_delta", text: " there" } },
    ]);
    expect(dataOf(res.payload, "message_delta")).toEqual([
      {
        type: "message_delta",
        delta: { stop_reason: "end_turn", stop_sequence: null },
        usage: { input_tokens: 4, output_tokens: 2 },
      },
    ]);
  });

  it("fails a stream with a plain HTTP error when nothing was sent yet", async () => {
    const res = await app({ chunks: [], failAt: 0, error: new TransportError(401, "Provider returned HTTP 401") }).inject({
      method: "POST",
      url: "/v1/messages",
      payload: { ...body, stream: true },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toEqual({ type: "authentication_error", message: "Upstream provider returned HTTP 401" });
  });

  it("closes a broken stream and appends an error event", async () => {
    const res = await app({
      chunks: streamChunks.slice(0, 1),
      failAt: 1,
      error: new TransportError(0, "Provider could not be reached"),
    }).inject({ method: "POST", url: "/v1/messages", payload: { ...body, stream: true } });

    expect(res.statusCode).toBe(200);
    expect(eventNames(res.payload)).toEqual([
      "message_start",
      "content_block_start",
      "content_block_delta",
      "content_block_stop",
      "message_delta",
      "message_stop",
      "error",
    ]);
    expect(dataOf(res.payload, "error")).toEqual([
      { type: "error", error: { type: "api_error", message: "Provider stream ended unexpectedly" } },
    ]);
  });

  it("runs declared tools server-side when an executor is configured", async () => {
    const executed: string[] = [];
    const executor: ToolExecutor = {
      async execute(call) {
        executed.push(`${call.name}:${JSON.stringify(call.input)}`);
        return { kind: "tool_result", toolUseId: call.id, content: "sunny", isError: false };
      },
    };
    const res = await app(
      {
        responses: [
          {
            id: "chatcmpl-a",
            model: "gpt-4o-mini",
            choices: [
              {
                index: 0,
                message: {
                  content: null,
                  tool_calls: [
                    { id: "call_1", type: "function", function: { name: "weather", arguments: '{"city":"Oslo"}' } },
                  ],
                },
                finish_reason: "tool_calls",
              },
            ],
          },
          providerResponse,
        ],
      },
      { executor },
    ).inject({
      method: "POST",
      url: "/v1/messages",
      payload: { ...body, tools: [{ name: "weather", input_schema: { type: "object" } }] },
    });

    expect(res.statusCode).toBe(200);
    expect(res.headers["x-tool-rounds"]).toBe("1");
    expect(executed).toEqual(['weather:{"city":"Oslo"}']);
    expect(res.json().content).toEqual([{ type: "text", text: "Hello there" }]);
  });

  describe("batch", () => {
    it("returns a JSON report for small batches", async () => {
      const res = await app({ response: providerResponse }).inject({
        method: "POST",
        url: "/v1/messages/batch",
        payload: { requests: [body, { model: "gpt-4o-mini", messages: [] }] },
      });
      expect(res.statusCode).toBe(200);
      const report = res.json();
      expect(report).toMatchObject({ batchId: "batch_test", totalItems: 2, successCount: 1, failureCount: 1 });
      expect(report.results[0]).toEqual({
        index: 0,
        success: true,
        cached: false,
        response: {
          id: "msg_chatcmpl-1",
          type: "message",
          role: "assistant",
          model: "gpt-4o-mini",
          content: [{ type: "text", text: "Hello there" }],
          stop_reason: "end_turn",
          stop_sequence: null,
          usage: { input_tokens: 4, output_tokens: 2 },
        },
      });
      expect(report.results[1].success).toBe(false);
      expect(report.results[1].error.kind).toBe("validation_error");
    });

    it("streams NDJSON above the threshold", async () => {
      const res = await app({ response: providerResponse }, { streamingThreshold: 2 }).inject({
        method: "POST",
        url: "/v1/messages/batch",
        payload: { requests: [body, body, body] },
      });
      expect(res.statusCode).toBe(200);
      expect(res.headers["content-type"]).toBe("application/x-ndjson");

      const lines = res.payload
        .trim()
        .split("\n")
        .map((line) => JSON.parse(line));
      expect(lines.map((l) => l.type)).toEqual(["results", "results", "summary"]);
      expect(lines[0].results).toHaveLength(2);
      expect(lines[1].results).toHaveLength(1);
      expect(lines[2]).toMatchObject({ type: "summary", batchId: "batch_test", totalItems: 3, successCount: 3 });
    });

    it("rejects a body without requests", async () => {
      const res = await app({}).inject({ method: "POST", url: "/v1/messages/batch", payload: { requests: [] } });
      expect(res.statusCode).toBe(400);
      expect(res.json().error.type).toBe("invalid_request_error");
      expect(res.json().error.message).toMatch(/^requests: /);
    });
  });

  describe("cache endpoints", () => {
    it("reports hits and clears entries", async () => {
      const gateway = app({ response: providerResponse }, { cache: true });
      const first = await gateway.inject({ method: "POST", url: "/v1/messages", payload: body });
      const second = await gateway.inject({ method: "POST", url: "/v1/messages", payload: body });
      expect(first.headers["x-cache"]).toBe("miss");
      expect(second.headers["x-cache"]).toBe("hit");

      const stats = await gateway.inject({ method: "GET", url: "/v1/cache/stats" });
      expect(stats.json()).toMatchObject({ enabled: true, hits: 1, misses: 1, stores: 1, size: 1 });

      const cleared = await gateway.inject({ method: "DELETE", url: "/v1/cache" });
      expect(cleared.json()).toEqual({ ok: true });
      const after = await gateway.inject({ method: "GET", url: "/v1/cache/stats" });
      expect(after.json().size).toBe(0);
    });

    it("respects cache-control: no-store", async () => {
      const gateway = app({ response: providerResponse }, { cache: true });
      await gateway.inject({ method: "POST", url: "/v1/messages", payload: body, headers: { "cache-control": "no-store" } });
      const again = await gateway.inject({ method: "POST", url: "/v1/messages", payload: body });
      expect(again.headers["x-cache"]).toBe("miss");
    });

    it("reports a disabled cache", async () => {
      const res = await app({}).inject({ method: "GET", url: "/v1/cache/stats" });
      expect(res.json()).toEqual({ enabled: false });
    });
  });
});
