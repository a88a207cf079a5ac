import { describe, it, expect } from "vitest";
import type { CanonicalRequest, CanonicalResponse } from "../adapters/canonical.js";
import { BatchOrchestrator, type BatchItem, type BatchOptions, type BatchResult } from "../adapters/batch.js";
import { CancelledError, TransportError, ValidationError } from "../adapters/errors.js";
import { plainText } from "../adapters/map.js";
import type { CompletionResult, RequestOptions } from "../adapters/pipeline.js";
import { Semaphore } from "../adapters/semaphore.js";
import type { Completer } from "../adapters/tool-loop.js";

type Handler = (req: CanonicalRequest, options: RequestOptions) => Promise<CanonicalResponse>;

function reply(text: string): CanonicalResponse {
  return {
    id: `msg_${text}`,
    model: "gpt-4o-mini",
    content: [{ kind: "text", text }],
    stopReason: "endTurn",
    usage: { inputTokens: 1, outputTokens: 1 },
  };
}

/** Echoes the first user message back */
const echo: Handler = async (req) => reply(plainText(req.messages[0].content));

function stubPipeline(handler: Handler = echo): Completer & { calls: CanonicalRequest[] } {
  const calls: CanonicalRequest[] = [];
  return {
    calls,
    async complete(req: CanonicalRequest, options: RequestOptions = {}): Promise<CompletionResult> {
      calls.push(req);
      return { response: await handler(req, options), warnings: [], cached: false };
    },
  };
}

/** Settles only when the signal aborts */
const hang: Handler = (_req, options) =>
  new Promise<CanonicalResponse>((_resolve, reject) => {
    options.signal?.addEventListener("abort", () => reject(new CancelledError()), { once: true });
  });

function body(text: string, extra: Record<string, unknown> = {}) {
  return { model: "gpt-4o-mini", max_tokens: 32, messages: [{ role: "user", content: text }], ...extra };
}

function items(bodies: unknown[]): BatchItem[] {
  return bodies.map((b, index) => ({ index, body: b }));
}

function orchestrator(pipeline: Completer, overrides: Partial<BatchOptions> = {}): BatchOrchestrator {
  return new BatchOrchestrator({
    pipeline,
    maxConcurrency: 4,
    streamingThreshold: 5,
    chunkSize: 3,
    maxBatchSize: 50,
    itemTimeoutMs: 5_000,
    newBatchId: () => "batch_test",
    ...overrides,
  });
}

const tick = (ms = 0) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// ── run ──────────────────────────────────────────────────────────────

describe("BatchOrchestrator.run", () => {
  it("isolates a failing item: valid text, undeclared tool choice, image", async () => {
    const report = await orchestrator(stubPipeline()).run(
      items([
        body("hello"),
        body("use a tool", {
          tools: [{ name: "lookup", input_schema: { type: "object" } }],
          tool_choice: { type: "tool", name: "search" },
        }),
        {
          model: "gpt-4o-mini",
          max_tokens: 32,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: "what is this" },
                { type: "image", source: { type: "base64", media_type: "image/png", data: "AAAA" } },
              ],
            },
          ],
        },
      ]),
    );

    expect(report.results.map((r) => r.success)).toEqual([true, false, true]);
    expect(report.results[1]).toEqual({
      index: 1,
      success: false,
      error: { kind: "validation_error", message: 'tool_choice.name: "search" is not a declared tool' },
    });
    expect(report).toMatchObject({
      batchId: "batch_test",
      totalItems: 3,
      successCount: 2,
      failureCount: 1,
      successRate: 2 / 3,
    });
    expect(new Date(report.completionTime).toISOString()).toBe(report.completionTime);
  });

  it("keeps siblings running when a transport call fails", async () => {
    const pipeline = stubPipeline(async (req) => {
      const text = plainText(req.messages[0].content);
      if (text === "item 2") throw new TransportError(500, "Provider returned HTTP 500");
      return reply(text);
    });
    const report = await orchestrator(pipeline).run(items([0, 1, 2, 3, 4].map((i) => body(`item ${i}`))));

    expect(report.successRate).toBe(4 / 5);
    expect(report.results.map((r) => r.index)).toEqual([0, 1, 2, 3, 4]);
    expect(report.results[2]).toEqual({
      index: 2,
      success: false,
      error: { kind: "transport_error", message: "Upstream provider returned HTTP 500" },
    });
    const first = report.results[0];
    expect(first.success && first.response.content).toEqual([{ kind: "text", text: "item 0" }]);
  });

  it("never runs more than maxConcurrency items at once", async () => {
    let active = 0;
    let peak = 0;
    const pipeline = stubPipeline(async (req) => {
      active++;
      peak = Math.max(peak, active);
      await tick(5);
      active--;
      return echo(req, {});
    });
    const report = await orchestrator(pipeline, { maxConcurrency: 2 }).run(
      items([0, 1, 2, 3, 4, 5].map((i) => body(`n${i}`))),
    );
    expect(report.successCount).toBe(6);
    expect(peak).toBe(2);
  });

  it("sends batch items as non-streaming requests and passes the cache opt-out", async () => {
    const seen: RequestOptions[] = [];
    const pipeline = stubPipeline(async (req, options) => {
      seen.push(options);
      return echo(req, options);
    });
    await orchestrator(pipeline).run([{ index: 0, body: body("x", { stream: true }), noStore: true }]);
    expect(pipeline.calls[0].stream).toBe(false);
    expect(seen[0].noStore).toBe(true);
  });

  it("lets dispatched items finish and cancels the rest", async () => {
    const controller = new AbortController();
    const signals: (AbortSignal | undefined)[] = [];
    const pipeline = stubPipeline(async (req, options) => {
      signals.push(options.signal);
      await tick(30);
      return echo(req, options);
    });
    const running = orchestrator(pipeline, { maxConcurrency: 1 }).run(items([body("a"), body("b"), body("c")]), {
      signal: controller.signal,
    });
    await tick(5);
    controller.abort();
    const report = await running;

    expect(report.results[0]).toMatchObject({ index: 0, success: true });
    expect(report.results.slice(1)).toEqual([
      { index: 1, success: false, error: { kind: "cancelled", message: "Batch cancelled" } },
      { index: 2, success: false, error: { kind: "cancelled", message: "Batch cancelled" } },
    ]);
    expect(pipeline.calls).toHaveLength(1);
    expect(signals[0]?.aborted).toBe(false);
    expect(report.successRate).toBe(1 / 3);
  });

  it("times out a slow item without touching the others", async () => {
    const pipeline = stubPipeline(async (req, options) =>
      plainText(req.messages[0].content) === "slow" ? hang(req, options) : echo(req, options),
    );
    const report = await orchestrator(pipeline, { itemTimeoutMs: 20 }).run(items([body("fast"), body("slow")]));
    expect(report.results[0].success).toBe(true);
    expect(report.results[1]).toEqual({
      index: 1,
      success: false,
      error: { kind: "timeout", message: "Timed out after 20ms" },
    });
  });

  it("rejects empty, oversized and ambiguous batches", async () => {
    const batch = orchestrator(stubPipeline(), { maxBatchSize: 2 });
    await expect(batch.run([])).rejects.toBeInstanceOf(ValidationError);
    await expect(batch.run(items([body("a"), body("b"), body("c")]))).rejects.toThrow(
      "requests: at most 2 requests per batch, got 3",
    );
    await expect(
      batch.run([
        { index: 0, body: body("a") },
        { index: 0, body: body("b") },
      ]),
    ).rejects.toThrow("requests: duplicate item index 0");
  });
});

// ── stream ───────────────────────────────────────────────────────────

describe("BatchOrchestrator.stream", () => {
  it("switches to chunked delivery above the threshold", () => {
    const batch = orchestrator(stubPipeline());
    expect(batch.shouldStream(5)).toBe(false);
    expect(batch.shouldStream(6)).toBe(true);
  });

  it("delivers results in chunks and returns the summary", async () => {
    const batch = orchestrator(stubPipeline());
    const it = batch.stream(items([0, 1, 2, 3, 4, 5, 6].map((i) => body(`s${i}`))));

    const chunks: BatchResult[][] = [];
    let step = await it.next();
    while (!step.done) {
      chunks.push(step.value);
      step = await it.next();
    }

    expect(chunks.map((c) => c.length)).toEqual([3, 3, 1]);
    expect(
      chunks
        .flat()
        .map((r) => r.index)
        .sort((a, b) => a - b),
    ).toEqual([0, 1, 2, 3, 4, 5, 6]);
    expect(step.value).toMatchObject({ batchId: "batch_test", totalItems: 7, successCount: 7, successRate: 1 });
  });

  it("stops dispatching when the consumer walks away", async () => {
    const pipeline = stubPipeline(async (req) => {
      await tick(2);
      return echo(req, {});
    });
    const batch = orchestrator(pipeline, { maxConcurrency: 1, chunkSize: 1 });
    for await (const chunk of batch.stream(items([0, 1, 2, 3, 4, 5, 6, 7].map((i) => body(`w${i}`))))) {
      expect(chunk).toHaveLength(1);
      break;
    }
    expect(pipeline.calls.length).toBeLessThan(8);
  });
});

// ── Semaphore ────────────────────────────────────────────────────────

describe("Semaphore", () => {
  it("hands permits to waiters in arrival order", async () => {
    const sem = new Semaphore(1);
    const order: string[] = [];
    await sem.acquire();
    const a = sem.acquire().then(() => order.push("a"));
    const b = sem.acquire().then(() => order.push("b"));
    expect(sem.waiting).toBe(2);

    sem.release();
    await a;
    sem.release();
    await b;
    expect(order).toEqual(["a", "b"]);
    expect(sem.inUse).toBe(1);
  });

  it("releases the permit when the task throws", async () => {
    const sem = new Semaphore(2);
    await expect(sem.use(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    expect(sem.inUse).toBe(0);
  });

  it("rejects a non-positive permit count", () => {
    expect(() => new Semaphore(0)).toThrow("permits must be a positive integer, got 0");
  });
});
