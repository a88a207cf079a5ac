// Provider transport: the only place the gateway talks to the network.
import { createParser } from "eventsource-parser";
import type { EventSourceMessage } from "eventsource-parser";
import { CancelledError, TransportError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  openAIChatResponseSchema,
  openAIStreamChunkSchema,
  type OpenAIChatRequest,
  type OpenAIChatResponse,
  type OpenAIStreamChunk,
} from "./providers/types.js";

export interface TransportCallOptions {
  signal?: AbortSignal;
}

/**
 * What the pipeline calls. No retries happen behind this interface: any failure is
 * terminal for the call and surfaces as a TransportError (or CancelledError).
 */
export interface ProviderTransport {
  send(req: OpenAIChatRequest, options?: TransportCallOptions): Promise<OpenAIChatResponse>;
  sendStreaming(req: OpenAIChatRequest, options?: TransportCallOptions): AsyncIterable<OpenAIStreamChunk>;
}

export interface HttpTransportOptions {
  /** e.g. https://api.openai.com/v1 */
  baseUrl: string;
  apiKey?: string;
  timeoutMs: number;
  headers?: Record<string, string>;
  logger?: Logger;
}

export class HttpTransport implements ProviderTransport {
  private readonly url: string;
  private readonly log: Logger | undefined;

  constructor(private readonly options: HttpTransportOptions) {
    this.url = `${options.baseUrl.replace(/\/+$/, "")}/chat/completions`;
    this.log = options.logger?.child({ module: "transport" });
  }

  async send(req: OpenAIChatRequest, options: TransportCallOptions = {}): Promise<OpenAIChatResponse> {
    const resp = await this.post({ ...req, stream: false }, options.signal);
    let json: unknown;
    try {
      json = await resp.json();
    } catch (err) {
      throw new TransportError(resp.status, "Provider returned a body that is not JSON", { cause: err });
    }
    const parsed = openAIChatResponseSchema.safeParse(json);
    if (!parsed.success) {
      this.log?.warn({ issues: parsed.error.issues }, "provider response failed validation");
      throw new TransportError(resp.status, "Provider returned an unexpected response shape", { cause: parsed.error });
    }
    return parsed.data;
  }

  async *sendStreaming(req: OpenAIChatRequest, options: TransportCallOptions = {}): AsyncGenerator<OpenAIStreamChunk> {
    const resp = await this.post({ ...req, stream: true }, options.signal);
    if (!resp.body) throw new TransportError(resp.status, "Provider returned an empty stream");

    const queue: OpenAIStreamChunk[] = [];
    const state: { finished: boolean; error?: TransportError } = { finished: false };
    const log = this.log;

    const parser = createParser({
      onEvent(event: EventSourceMessage) {
        const data = event.data;
        if (!data || state.finished) return;
        if (data === "[DONE]") {
          state.finished = true;
          return;
        }
        let json: unknown;
        try {
          json = JSON.parse(data);
        } catch (err) {
          log?.warn({ err, data: data.slice(0, 200) }, "skipping malformed stream chunk");
          return;
        }
        if (isProviderErrorFrame(json)) {
          const message = typeof json.error.message === "string" ? json.error.message : "unknown";
          state.error = new TransportError(502, `Provider stream error: ${message}`);
          return;
        }
        const parsed = openAIStreamChunkSchema.safeParse(json);
        if (!parsed.success) {
          log?.warn({ issues: parsed.error.issues }, "skipping stream chunk with unexpected shape");
          return;
        }
        queue.push(parsed.data);
      },
    });

    const reader = resp.body.getReader();
    const decoder = new TextDecoder();
    try {
      while (!state.finished) {
        const read = await reader.read().catch((err: unknown) => {
          throw this.wrapFetchError(err, options.signal);
        });
        if (read.done) break;
        parser.feed(decoder.decode(read.value, { stream: true }));
        while (queue.length > 0) {
          const next = queue.shift();
          if (next) yield next;
        }
        if (state.error) throw state.error;
      }
    } finally {
      if (!state.finished) {
        // consumer stopped early or the stream failed: release the connection
        await reader.cancel().catch((err: unknown) => this.log?.debug({ err }, "stream reader cancel failed"));
      }
    }
  }

  private async post(body: OpenAIChatRequest, signal: AbortSignal | undefined): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      ...this.options.headers,
    };
    if (this.options.apiKey) headers.Authorization = `Bearer ${this.options.apiKey}`;

    let resp: Response;
    try {
      resp = await fetch(this.url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: withTimeout(signal, this.options.timeoutMs),
      });
    } catch (err) {
      throw this.wrapFetchError(err, signal);
    }

    if (!resp.ok) {
      const text = await safeText(resp);
      // the upstream body is logged, never passed to the client
      this.log?.warn({ status: resp.status, body: text.slice(0, 500) }, "provider returned an error");
      throw new TransportError(resp.status, `Provider returned HTTP ${resp.status}`);
    }
    return resp;
  }

  private wrapFetchError(err: unknown, signal: AbortSignal | undefined): Error {
    if (signal?.aborted) return new CancelledError();
    if (err instanceof Error && err.name === "TimeoutError") {
      return new TransportError(0, `Provider did not answer within ${this.options.timeoutMs}ms`, { cause: err });
    }
    return new TransportError(0, "Provider could not be reached", { cause: err });
  }
}

function isProviderErrorFrame(json: unknown): json is { error: { message?: unknown } } {
  return (
    typeof json === "object" &&
    json !== null &&
    "error" in json &&
    typeof json.error === "object" &&
    json.error !== null
  );
}

/** The caller's signal, also aborted after `timeoutMs` */
function withTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const timeout = AbortSignal.timeout(timeoutMs);
  if (!signal) return timeout;
  const controller = new AbortController();
  const forward = (source: AbortSignal) => () => controller.abort(source.reason);
  if (signal.aborted) controller.abort(signal.reason);
  signal.addEventListener("abort", forward(signal), { once: true });
  timeout.addEventListener("abort", forward(timeout), { once: true });
  return controller.signal;
}

async function safeText(resp: Response): Promise<string> {
  try {
    return await resp.text();
  } catch {
    return "<no-body>";
  }
}
