// Server-sent events in the client wire format
import type { FastifyReply } from "fastify";
import { assertNever, type StreamEvent } from "./canonical.js";
import type { ClientErrorBody } from "./errors.js";
import { toClientStopReason } from "./map.js";
import type { AnthropicStreamEvent } from "./types.js";

export function toClientStreamEvent(ev: StreamEvent): AnthropicStreamEvent {
  switch (ev.type) {
    case "message_start":
      return {
        type: "message_start",
        message: {
          id: ev.id,
          type: "message",
          role: "assistant",
          model: ev.model,
          content: [],
          stop_reason: null,
          stop_sequence: null,
          usage: { input_tokens: ev.usage.inputTokens, output_tokens: ev.usage.outputTokens },
        },
      };
    case "block_start":
      return {
        type: "content_block_start",
        index: ev.index,
        content_block:
          ev.block.kind === "text"
            ? { type: "text", text: "" }
            : { type: "tool_use", id: ev.block.id, name: ev.block.name, input: {} },
      };
    case "block_delta":
      return {
        type: "content_block_delta",
        index: ev.index,
        delta:
          ev.delta.kind === "text"
            ? { type: "text_delta", text: ev.delta.text }
            : { type: "input_json_delta", partial_json: ev.delta.partialJson },
      };
    case "block_stop":
      return { type: "content_block_stop", index: ev.index };
    case "message_delta":
      return {
        type: "message_delta",
        delta: { stop_reason: ev.stopReason ? toClientStopReason(ev.stopReason) : null, stop_sequence: null },
        usage: { input_tokens: ev.usage?.inputTokens ?? 0, output_tokens: ev.usage?.outputTokens ?? 0 },
      };
    case "message_stop":
      return { type: "message_stop" };
    default:
      return assertNever(ev);
  }
}

export function formatSse(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export function setSseHeaders(res: FastifyReply): void {
  res.raw.statusCode = 200;
  res.raw.setHeader("Content-Type", "text/event-stream");
  res.raw.setHeader("Cache-Control", "no-cache, no-transform");
  res.raw.setHeader("Connection", "keep-alive");
  res.raw.flushHeaders();
}

export function sendEvent(res: FastifyReply, event: string, data: unknown): void {
  res.raw.write(formatSse(event, data));
}

/** Write one canonical event; the SSE event name is the wire event's `type` */
export function sendStreamEvent(res: FastifyReply, ev: StreamEvent): void {
  const wire = toClientStreamEvent(ev);
  sendEvent(res, wire.type, wire);
}

export function sendErrorEvent(res: FastifyReply, body: ClientErrorBody): void {
  sendEvent(res, "error", body);
}
