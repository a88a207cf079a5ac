// Batch execution: many independent requests, bounded parallelism, per-item failure isolation.
import { randomUUID } from "crypto";
import type { CanonicalResponse } from "./canonical.js";
import { DeadlineError, ValidationError, errorKind, toClientError, type ErrorKind } from "./errors.js";
import type { Logger } from "./logger.js";
import { toCanonicalRequest } from "./map.js";
import type { Completer } from "./tool-loop.js";
import { Semaphore } from "./semaphore.js";

export interface BatchItem {
  index: number;
  /** Client-format request body; converted per item so a bad item fails alone */
  body: unknown;
  /** Opt this item out of the response cache */
  noStore?: boolean;
}

/** Why one item failed; the batch itself carries on */
export type BatchItemError = { kind: ErrorKind; message: string };

export type BatchResult =
  | { index: number; success: true; response: CanonicalResponse; cached: boolean }
  | { index: number; success: false; error: BatchItemError };

export interface BatchSummary {
  batchId: string;
  totalItems: number;
  successCount: number;
  failureCount: number;
  /** successCount / totalItems */
  successRate: number;
  /** ISO timestamp */
  completionTime: string;
  durationMs: number;
}

export interface BatchReport extends BatchSummary {
  /** Ordered by index */
  results: BatchResult[];
}

export interface BatchOptions {
  pipeline: Completer;
  maxConcurrency: number;
  /** Batches larger than this are delivered in chunks */
  streamingThreshold: number;
  chunkSize: number;
  maxBatchSize: number;
  itemTimeoutMs: number;
  logger?: Logger;
  newBatchId?: () => string;
}

export interface RunOptions {
  signal?: AbortSignal;
}

type Progress = { successCount: number; failureCount: number };

export class BatchOrchestrator {
  private readonly log: Logger | undefined;
  private readonly newBatchId: () => string;

  constructor(private readonly options: BatchOptions) {
    for (const key of ["maxConcurrency", "chunkSize", "maxBatchSize"] as const) {
      if (!Number.isInteger(options[key]) || options[key] < 1) {
        throw new RangeError(`${key} must be a positive integer, got ${options[key]}`);
      }
    }
    this.log = options.logger?.child({ module: "batch" });
    this.newBatchId = options.newBatchId ?? (() => `batch_${randomUUID().replace(/-/g, "")}`);
  }

  shouldStream(itemCount: number): boolean {
    return itemCount > this.options.streamingThreshold;
  }

  /** Run the whole batch and return every result at once */
  async run(items: readonly BatchItem[], options: RunOptions = {}): Promise<BatchReport> {
    this.validate(items);
    const batchId = this.newBatchId();
    const started = Date.now();
    const results: BatchResult[] = [];
    const progress: Progress = { successCount: 0, failureCount: 0 };

    const controller = new AbortController();
    const unlink = linkSignal(options.signal, controller);
    try {
      await this.dispatch(items, controller.signal, (r) => {
        results.push(r);
        count(progress, r);
      });
    } finally {
      unlink();
    }

    results.sort((a, b) => a.index - b.index);
    const summary = this.summarize(batchId, items.length, progress, started);
    return { ...summary, results };
  }

  /**
   * Deliver results in chunks of `chunkSize`, in completion order. Dispatch pauses while a full
   * chunk waits for the consumer, so memory stays bounded by the chunk size plus what is in flight.
   * The generator's return value is the batch summary.
   */
  async *stream(items: readonly BatchItem[], options: RunOptions = {}): AsyncGenerator<BatchResult[], BatchSummary> {
    this.validate(items);
    const batchId = this.newBatchId();
    const started = Date.now();
    const { chunkSize } = this.options;
    const progress: Progress = { successCount: 0, failureCount: 0 };

    const buffer: BatchResult[] = [];
    const state: { done: boolean; wake?: () => void; resume?: () => void } = { done: false };

    const controller = new AbortController();
    const unlink = linkSignal(options.signal, controller);

    const dispatching = this.dispatch(
      items,
      controller.signal,
      (r) => {
        buffer.push(r);
        count(progress, r);
        state.wake?.();
      },
      async () => {
        while (buffer.length >= chunkSize && !controller.signal.aborted) {
          await new Promise<void>((resolve) => (state.resume = resolve));
        }
      },
    ).then(() => {
      state.done = true;
      state.wake?.();
    });

    try {
      for (;;) {
        if (buffer.length >= chunkSize || (state.done && buffer.length > 0)) {
          const chunk = buffer.splice(0, chunkSize);
          state.resume?.();
          yield chunk;
          continue;
        }
        if (state.done) break;
        await new Promise<void>((resolve) => (state.wake = resolve));
      }
      await dispatching;
    } finally {
      if (!state.done) {
        // consumer stopped early: stop dispatching and let in-flight items settle
        controller.abort();
        state.resume?.();
        await dispatching;
      }
      unlink();
    }

    return this.summarize(batchId, items.length, progress, started);
  }

  private validate(items: readonly BatchItem[]): void {
    if (items.length === 0) throw new ValidationError("requests: a batch needs at least one request");
    if (items.length > this.options.maxBatchSize) {
      throw new ValidationError(`requests: at most ${this.options.maxBatchSize} requests per batch, got ${items.length}`);
    }
    const seen = new Set<number>();
    for (const item of items) {
      if (seen.has(item.index)) throw new ValidationError(`requests: duplicate item index ${item.index}`);
      seen.add(item.index);
    }
  }

  /** Start items as permits free up; resolves once every item has a result */
  private async dispatch(
    items: readonly BatchItem[],
    signal: AbortSignal,
    record: (result: BatchResult) => void,
    waitForRoom?: () => Promise<void>,
  ): Promise<void> {
    const semaphore = new Semaphore(this.options.maxConcurrency);
    const inFlight = new Set<Promise<void>>();

    for (const item of items) {
      if (waitForRoom) await waitForRoom();
      let acquired = false;
      if (!signal.aborted) {
        await semaphore.acquire();
        acquired = true;
      }
      if (signal.aborted) {
        // never dispatched
        if (acquired) semaphore.release();
        record({ index: item.index, success: false, error: { kind: "cancelled", message: "Batch cancelled" } });
        continue;
      }
      const task = this.runItem(item)
        .then(record)
        .finally(() => {
          semaphore.release();
          inFlight.delete(task);
        });
      inFlight.add(task);
    }
    await Promise.all(inFlight);
  }

  /**
   * Never rejects: every outcome becomes a BatchResult. Only the item timeout aborts a running
   * item; cancelling the batch stops dispatch but lets dispatched items finish.
   */
  private async runItem(item: BatchItem): Promise<BatchResult> {
    const { itemTimeoutMs } = this.options;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, itemTimeoutMs);

    try {
      const { value: request } = toCanonicalRequest(item.body);
      const { response, cached } = await this.options.pipeline.complete(
        { ...request, stream: false },
        { signal: controller.signal, noStore: item.noStore },
      );
      return { index: item.index, success: true, response, cached };
    } catch (err) {
      const failure = timedOut ? new DeadlineError(itemTimeoutMs) : err;
      this.log?.debug({ index: item.index, err: failure }, "batch item failed");
      return {
        index: item.index,
        success: false,
        error: { kind: errorKind(failure), message: toClientError(failure).body.error.message },
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private summarize(batchId: string, totalItems: number, progress: Progress, started: number): BatchSummary {
    const finished = Date.now();
    const summary: BatchSummary = {
      batchId,
      totalItems,
      successCount: progress.successCount,
      failureCount: progress.failureCount,
      successRate: totalItems === 0 ? 0 : progress.successCount / totalItems,
      completionTime: new Date(finished).toISOString(),
      durationMs: finished - started,
    };
    this.log?.info(summary, "batch finished");
    return summary;
  }
}

function count(progress: Progress, result: BatchResult): void {
  if (result.success) progress.successCount++;
  else progress.failureCount++;
}

/** Abort `controller` when `signal` aborts; returns the unsubscribe */
function linkSignal(signal: AbortSignal | undefined, controller: AbortController): () => void {
  if (!signal) return () => undefined;
  if (signal.aborted) {
    controller.abort(signal.reason);
    return () => undefined;
  }
  const onAbort = () => controller.abort(signal.reason);
  signal.addEventListener("abort", onAbort, { once: true });
  return () => signal.removeEventListener("abort", onAbort);
}
