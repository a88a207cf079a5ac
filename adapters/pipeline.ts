// Single-request flow: cache → convert → transport → reconstruct → cache store
import { randomUUID } from "crypto";
import type { CanonicalRequest, CanonicalResponse, ConversionFallbackWarning, StreamEvent } from "./canonical.js";
import { CancelledError, StreamInterruptedError, errorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { toProviderRequest } from "./providers/openai.js";
import type { ProviderProfile } from "./providers/profile.js";
import type { ResponseCache } from "./response-cache.js";
import { StreamReconstructor, reconstructResponse, replayResponse } from "./stream-reconstructor.js";
import type { ProviderTransport } from "./transport.js";

export interface PipelineDeps {
  transport: ProviderTransport;
  profile: ProviderProfile;
  cache?: ResponseCache;
  logger: Logger;
  newRequestId?: () => string;
}

export interface RequestOptions {
  signal?: AbortSignal;
  requestId?: string;
  /** Skip storing the response (the cache is still read) */
  noStore?: boolean;
}

export interface CompletionResult {
  response: CanonicalResponse;
  warnings: ConversionFallbackWarning[];
  cached: boolean;
}

export class GatewayPipeline {
  private readonly log: Logger;
  private readonly newRequestId: () => string;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger.child({ module: "pipeline" });
    this.newRequestId = deps.newRequestId ?? (() => randomUUID().replace(/-/g, ""));
  }

  get profile(): ProviderProfile {
    return this.deps.profile;
  }

  async complete(req: CanonicalRequest, options: RequestOptions = {}): Promise<CompletionResult> {
    const requestId = options.requestId ?? this.newRequestId();
    const log = this.log.child({ requestId });

    const hit = await this.deps.cache?.get(req);
    if (hit) return { response: hit, warnings: [], cached: true };

    const { value: providerReq, warnings } = toProviderRequest({ ...req, stream: false }, this.deps.profile);
    this.logWarnings(log, warnings);
    if (options.signal?.aborted) throw new CancelledError();

    const started = Date.now();
    const resp = await this.deps.transport.send(providerReq, { signal: options.signal });
    const { response, warnings: responseWarnings } = reconstructResponse(resp, {
      model: req.model,
      fallbackId: `msg_${requestId}`,
      logger: log,
    });
    this.logWarnings(log, responseWarnings);
    log.info(
      { model: response.model, stopReason: response.stopReason, ms: Date.now() - started, usage: response.usage },
      "completion finished",
    );

    await this.deps.cache?.put(req, response, { noStore: options.noStore });
    return { response, warnings: [...warnings, ...responseWarnings], cached: false };
  }

  /**
   * Stream client events for one request. Errors raised before the first event leave the
   * client untouched; after that, partial output is closed off and StreamInterruptedError follows.
   */
  async *stream(req: CanonicalRequest, options: RequestOptions = {}): AsyncGenerator<StreamEvent, CompletionResult> {
    const requestId = options.requestId ?? this.newRequestId();
    const log = this.log.child({ requestId });

    const hit = await this.deps.cache?.get(req);
    if (hit) {
      yield* replayResponse(hit);
      return { response: hit, warnings: [], cached: true };
    }

    const { value: providerReq, warnings } = toProviderRequest({ ...req, stream: true }, this.deps.profile);
    this.logWarnings(log, warnings);
    if (options.signal?.aborted) throw new CancelledError();

    const r = new StreamReconstructor({ model: req.model, fallbackId: `msg_${requestId}`, logger: log });
    try {
      try {
        for await (const chunk of this.deps.transport.sendStreaming(providerReq, { signal: options.signal })) {
          if (options.signal?.aborted) throw new CancelledError();
          yield* r.push(chunk);
        }
        yield* r.end();
      } catch (err) {
        if (options.signal?.aborted || err instanceof CancelledError) {
          log.info("client went away; stream cancelled");
          r.cancel();
          throw err instanceof CancelledError ? err : new CancelledError();
        }
        if (r.currentState === "not_started") throw err;
        log.warn({ err, kind: errorKind(err) }, "provider stream broke mid-response");
        yield* r.abort();
        throw new StreamInterruptedError("Provider stream ended unexpectedly", { cause: err });
      }
    } finally {
      // consumer stopped iterating early
      if (r.currentState !== "done") r.cancel();
    }

    const response = r.result();
    this.logWarnings(log, r.warnings);
    log.info({ model: response.model, stopReason: response.stopReason, usage: response.usage }, "stream finished");
    await this.deps.cache?.put(req, response, { noStore: options.noStore });
    return { response, warnings: [...warnings, ...r.warnings], cached: false };
  }

  private logWarnings(log: Logger, warnings: readonly ConversionFallbackWarning[]): void {
    for (const w of warnings) log.warn({ path: w.path }, w.message);
  }
}
