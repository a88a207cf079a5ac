// HTTP surface: Fastify routes on top of the pipeline, the batch orchestrator and the cache
import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { randomUUID } from "crypto";
import { z } from "zod";
import type { CanonicalRequest, Converted, StreamEvent } from "./canonical.js";
import type { BatchItem, BatchOrchestrator, BatchResult, BatchSummary } from "./batch.js";
import { CancelledError, ValidationError, clientTypeForStatus, toClientError } from "./errors.js";
import type { Logger } from "./logger.js";
import { toCanonicalRequest, toClientResponse } from "./map.js";
import type { CompletionResult, GatewayPipeline } from "./pipeline.js";
import type { ResponseCache } from "./response-cache.js";
import { sendErrorEvent, sendStreamEvent, setSseHeaders } from "./sse.js";
import { runConversation, type ToolExecutor } from "./tool-loop.js";
import type { AnthropicResponse } from "./types.js";

export interface GatewayDeps {
  pipeline: GatewayPipeline;
  batch: BatchOrchestrator;
  cache?: ResponseCache;
  logger: Logger;
  bodyLimit?: number;
  /** When set, non-streaming requests that declare tools run the continuation loop server-side */
  tools?: { executor: ToolExecutor; maxRounds: number };
}

const batchBodySchema = z.object({
  requests: z.array(z.unknown()).min(1),
  /** false opts every item out of the response cache */
  cache: z.boolean().optional(),
});

type WireBatchResult =
  | { index: number; success: true; response: AnthropicResponse; cached: boolean }
  | { index: number; success: false; error: { kind: string; message: string } };

function toWireResult(r: BatchResult): WireBatchResult {
  return r.success
    ? { index: r.index, success: true, response: toClientResponse(r.response), cached: r.cached }
    : r;
}

function wantsNoStore(req: FastifyRequest): boolean {
  const header = req.headers["cache-control"];
  return typeof header === "string" && /\bno-store\b/i.test(header);
}

/** Abort when the client disconnects before the response is finished */
function disconnectSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.on("close", () => {
    if (!reply.raw.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function buildGateway(deps: GatewayDeps): FastifyInstance {
  const { pipeline, batch, cache, tools } = deps;
  const log = deps.logger.child({ module: "gateway" });
  const app = Fastify({ logger: false, bodyLimit: deps.bodyLimit ?? 100 * 1024 * 1024 });

  function sendError(reply: FastifyReply, err: unknown, requestId?: string) {
    const { status, body } = toClientError(err);
    if (status >= 500) log.error({ err, requestId }, body.error.message);
    else log.warn({ requestId, status }, body.error.message);
    return reply.code(status).send(body);
  }

  // malformed JSON, oversized bodies, unknown content types
  app.setErrorHandler<FastifyError>((err, _req, reply) => {
    const status = typeof err.statusCode === "number" ? err.statusCode : 500;
    if (status >= 500) return sendError(reply, err);
    log.warn({ status, code: err.code }, err.message);
    return reply.code(status).send({ type: "error", error: { type: clientTypeForStatus(status), message: err.message } });
  });

  app.get("/healthz", async () => ({
    ok: true,
    provider: pipeline.profile.name,
    cache: cache ? await cache.stats() : null,
  }));

  app.post("/v1/messages", async (req, reply) => {
    const requestId = randomUUID().replace(/-/g, "");
    let converted: Converted<CanonicalRequest>;
    try {
      converted = toCanonicalRequest(req.body);
    } catch (err) {
      return sendError(reply, err, requestId);
    }
    const request = converted.value;
    for (const w of converted.warnings) log.warn({ requestId, path: w.path }, w.message);
    log.info(
      {
        requestId,
        model: request.model,
        stream: request.stream,
        tools: request.tools?.map((t) => t.name) ?? [],
        messages: request.messages.length,
      },
      "request",
    );

    const options = { requestId, noStore: wantsNoStore(req), signal: disconnectSignal(reply) };

    if (!request.stream) {
      try {
        if (tools && request.tools?.length) {
          const { response, rounds } = await runConversation(pipeline, request, tools.executor, {
            ...options,
            maxRounds: tools.maxRounds,
            logger: log,
          });
          reply.header("x-tool-rounds", String(rounds));
          return toClientResponse(response);
        }
        const { response, cached } = await pipeline.complete(request, options);
        reply.header("x-cache", cached ? "hit" : "miss");
        return toClientResponse(response);
      } catch (err) {
        return sendError(reply, err, requestId);
      }
    }

    const events = pipeline.stream(request, options);
    let first: IteratorResult<StreamEvent, CompletionResult>;
    try {
      // nothing has been written yet, so an early failure can still be a plain HTTP error
      first = await events.next();
    } catch (err) {
      return sendError(reply, err, requestId);
    }

    reply.hijack();
    setSseHeaders(reply);
    try {
      if (!first.done) {
        sendStreamEvent(reply, first.value);
        for await (const ev of events) sendStreamEvent(reply, ev);
      }
    } catch (err) {
      if (err instanceof CancelledError) {
        log.info({ requestId }, "stream cancelled by client");
      } else {
        const { body } = toClientError(err);
        log.error({ err, requestId }, body.error.message);
        sendErrorEvent(reply, body);
      }
    } finally {
      reply.raw.end();
    }
  });

  app.post("/v1/messages/batch", async (req, reply) => {
    const parsed = batchBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return sendError(
        reply,
        new ValidationError(parsed.error.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`)),
      );
    }
    const noStore = parsed.data.cache === false || wantsNoStore(req);
    const items: BatchItem[] = parsed.data.requests.map((body, index) => ({ index, body, noStore }));
    const signal = disconnectSignal(reply);

    if (!batch.shouldStream(items.length)) {
      try {
        const report = await batch.run(items, { signal });
        return { ...report, results: report.results.map(toWireResult) };
      } catch (err) {
        return sendError(reply, err);
      }
    }

    // large batches go out as NDJSON: result chunks as they complete, then the summary
    const stream = batch.stream(items, { signal });
    let step: IteratorResult<BatchResult[], BatchSummary>;
    try {
      step = await stream.next();
    } catch (err) {
      return sendError(reply, err);
    }

    reply.hijack();
    reply.raw.statusCode = 200;
    reply.raw.setHeader("Content-Type", "application/x-ndjson");
    reply.raw.setHeader("Cache-Control", "no-cache, no-transform");
    try {
      while (!step.done) {
        reply.raw.write(`${JSON.stringify({ type: "results", results: step.value.map(toWireResult) })}\n`);
        step = await stream.next();
      }
      reply.raw.write(`${JSON.stringify({ type: "summary", ...step.value })}\n`);
    } catch (err) {
      const { body } = toClientError(err);
      log.error({ err }, body.error.message);
      reply.raw.write(`${JSON.stringify(body)}\n`);
    } finally {
      reply.raw.end();
    }
  });

  app.get("/v1/cache/stats", async () => (cache ? { enabled: true, ...(await cache.stats()) } : { enabled: false }));

  app.delete("/v1/cache", async () => {
    if (cache) await cache.clear();
    return { ok: true };
  });

  return app;
}
