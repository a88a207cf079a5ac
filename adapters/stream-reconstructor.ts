// Provider deltas → client stream events, and the final canonical response.
//
// Request level: not_started → streaming → finalizing → done
// Block level:   absent → open → closed   (one block open at a time)
//
// A block closes when the provider moves on to a different block (text ↔ another tool call),
// when a finish reason arrives, or when the stream ends. Tool-call argument fragments are
// buffered per block and parsed once, at close. Name fragments concatenate until the first
// argument fragment; the block starts then, or at close for a call without arguments.
import {
  fallbackWarning,
  type CanonicalResponse,
  type ContentBlock,
  type ConversionFallbackWarning,
  type JsonValue,
  type StopReason,
  type StreamEvent,
  type Usage,
} from "./canonical.js";
import type { Logger } from "./logger.js";
import { mapFinishReason, responseToChunks } from "./providers/openai.js";
import type { OpenAIChatResponse, OpenAIStreamChunk, OpenAIToolCallDelta } from "./providers/types.js";
import { jsonValueSchema } from "./types.js";

export type ReconstructorState = "not_started" | "streaming" | "finalizing" | "done";

type TextBlockState = {
  kind: "text";
  index: number;
  parts: string[];
  closed: boolean;
};

type ToolBlockState = {
  kind: "tool_use";
  /** assigned when block_start is emitted; -1 until the name and the first arguments are in */
  index: number;
  providerIndex: number;
  id: string;
  name: string;
  args: string[];
  input: JsonValue;
  closed: boolean;
};

type BlockState = TextBlockState | ToolBlockState;

export interface ReconstructorOptions {
  /** Requested model; used when the provider does not echo one */
  model: string;
  /** Message id when the provider sends none */
  fallbackId: string;
  logger?: Logger;
}

export class StreamReconstructor {
  private state: ReconstructorState = "not_started";
  private id: string;
  private model: string;
  private nextIndex = 0;
  private blocks: BlockState[] = [];
  private active: BlockState | null = null;
  private toolsByProviderIndex = new Map<number, ToolBlockState>();
  private stopReason: StopReason | undefined;
  private usage: Usage = { inputTokens: 0, outputTokens: 0 };
  private final: CanonicalResponse | undefined;
  private readonly logger: Logger | undefined;

  readonly warnings: ConversionFallbackWarning[] = [];

  constructor(options: ReconstructorOptions) {
    this.id = options.fallbackId;
    this.model = options.model;
    this.logger = options.logger?.child({ module: "stream-reconstructor" });
  }

  get currentState(): ReconstructorState {
    return this.state;
  }

  /** Consume one provider delta */
  push(chunk: OpenAIStreamChunk): StreamEvent[] {
    if (this.state === "done") {
      this.logger?.debug("delta received after completion; ignored");
      return [];
    }

    const events: StreamEvent[] = [];
    if (this.state === "not_started") {
      if (chunk.id) this.id = `msg_${chunk.id}`;
      if (chunk.model) this.model = chunk.model;
      events.push(this.start());
    }

    if (chunk.usage) {
      this.usage = { inputTokens: chunk.usage.prompt_tokens, outputTokens: chunk.usage.completion_tokens };
    }

    const choice = chunk.choices[0];
    if (this.state === "streaming" && choice) {
      if (choice.delta.content) events.push(...this.appendText(choice.delta.content));
      for (const tc of choice.delta.tool_calls ?? []) events.push(...this.appendToolCall(tc));

      if (choice.finish_reason) {
        const { stopReason, known } = mapFinishReason(choice.finish_reason);
        if (!known) {
          this.logger?.warn({ finishReason: choice.finish_reason }, "unknown provider finish reason; using end_turn");
        }
        this.stopReason = stopReason;
        events.push(...this.closeActive());
        this.state = "finalizing";
        // usage usually follows in its own chunk; complete now only if it came with the finish reason
        if (chunk.usage) events.push(...this.complete());
      }
    } else if (this.state === "finalizing") {
      if (choice?.delta.content || choice?.delta.tool_calls?.length) {
        this.logger?.debug("content after finish reason; ignored");
      }
      if (chunk.usage) events.push(...this.complete());
    }

    return events;
  }

  /** The transport signalled a clean end of stream */
  end(): StreamEvent[] {
    if (this.state === "done") return [];
    const events: StreamEvent[] = [];
    if (this.state === "not_started") events.push(this.start());
    events.push(...this.complete());
    return events;
  }

  /**
   * The stream broke. Closes open blocks and finishes the message with an error stop reason.
   * Events already emitted stay valid; the caller surfaces the error afterwards.
   */
  abort(): StreamEvent[] {
    if (this.state === "done") return [];
    const events: StreamEvent[] = [];
    if (this.state === "not_started") events.push(this.start());
    events.push(...this.closeActive());
    this.stopReason = "error";
    events.push(...this.complete());
    return events;
  }

  /** Stop emitting and release buffers (client went away) */
  cancel(): void {
    this.state = "done";
    this.blocks = [];
    this.active = null;
    this.toolsByProviderIndex.clear();
  }

  /** The finalized response; available exactly once the message has stopped */
  result(): CanonicalResponse {
    if (!this.final) throw new Error(`Response not finalized (state: ${this.state})`);
    return this.final;
  }

  // ── internals ──────────────────────────────────────────────────────

  private start(): StreamEvent {
    this.state = "streaming";
    return { type: "message_start", id: this.id, model: this.model, usage: { inputTokens: 0, outputTokens: 0 } };
  }

  private appendText(text: string): StreamEvent[] {
    const events: StreamEvent[] = [];
    let block = this.active;
    if (block?.kind !== "text") {
      events.push(...this.closeActive());
      block = { kind: "text", index: this.nextIndex++, parts: [], closed: false };
      this.blocks.push(block);
      this.active = block;
      events.push({ type: "block_start", index: block.index, block: { kind: "text" } });
    }
    block.parts.push(text);
    events.push({ type: "block_delta", index: block.index, delta: { kind: "text", text } });
    return events;
  }

  private appendToolCall(tc: OpenAIToolCallDelta): StreamEvent[] {
    const events: StreamEvent[] = [];
    let block = this.toolsByProviderIndex.get(tc.index);

    if (!block) {
      // the provider moved on to a new call: whatever was open is complete
      events.push(...this.closeActive());
      block = {
        kind: "tool_use",
        index: -1,
        providerIndex: tc.index,
        id: "",
        name: "",
        args: [],
        input: {},
        closed: false,
      };
      this.toolsByProviderIndex.set(tc.index, block);
      this.blocks.push(block);
      this.active = block;
    } else if (block.closed) {
      this.warnings.push(fallbackWarning(`tool_calls[${tc.index}]`, "fragment for an already closed tool call; dropped"));
      this.logger?.warn({ providerIndex: tc.index }, "tool call fragment after block closed; dropped");
      return events;
    }

    if (tc.id && !block.id) block.id = tc.id;
    if (tc.function?.name && block.index < 0) block.name += tc.function.name;
    const fragment = tc.function?.arguments ?? "";

    if (block.index < 0) {
      if (fragment) block.args.push(fragment);
      if (block.name && block.args.length > 0) events.push(...this.startTool(block));
    } else if (fragment) {
      block.args.push(fragment);
      events.push({ type: "block_delta", index: block.index, delta: { kind: "input_json", partialJson: fragment } });
    }
    return events;
  }

  /** Emit block_start for a tool call, replaying any argument fragments buffered before its name arrived */
  private startTool(block: ToolBlockState): StreamEvent[] {
    if (!block.id) block.id = `${this.id}_tool_${block.providerIndex}`;
    block.index = this.nextIndex++;
    const events: StreamEvent[] = [
      { type: "block_start", index: block.index, block: { kind: "tool_use", id: block.id, name: block.name } },
    ];
    const buffered = block.args.join("");
    if (buffered) {
      events.push({ type: "block_delta", index: block.index, delta: { kind: "input_json", partialJson: buffered } });
    }
    return events;
  }

  private closeActive(): StreamEvent[] {
    const block = this.active;
    if (!block) return [];
    this.active = null;
    const events: StreamEvent[] = [];

    if (block.kind === "tool_use") {
      if (block.index < 0) {
        if (!block.name) {
          this.warnings.push(fallbackWarning(`tool_calls[${block.providerIndex}]`, "tool call without a name"));
          block.name = "unknown_tool";
        }
        events.push(...this.startTool(block));
      }
      block.input = this.parseArguments(block);
    }

    block.closed = true;
    events.push({ type: "block_stop", index: block.index });
    return events;
  }

  private parseArguments(block: ToolBlockState): JsonValue {
    const raw = block.args.join("");
    if (raw.trim() === "") return {};
    try {
      const parsed = jsonValueSchema.safeParse(JSON.parse(raw));
      if (parsed.success) return parsed.data;
    } catch (err) {
      this.logger?.warn({ tool: block.name, err }, "tool call arguments are not valid JSON");
    }
    this.warnings.push(
      fallbackWarning(`content[${block.index}].input`, `arguments for tool ${block.name} are not valid JSON; replaced with {}`),
    );
    return {};
  }

  private complete(): StreamEvent[] {
    const events = this.closeActive();
    const hasTools = this.blocks.some((b) => b.kind === "tool_use");
    const stopReason = this.stopReason ?? (hasTools ? "toolUse" : "endTurn");
    events.push({ type: "message_delta", stopReason, usage: { ...this.usage } });
    events.push({ type: "message_stop" });

    const content: ContentBlock[] = [...this.blocks]
      .sort((a, b) => a.index - b.index)
      .map((b) =>
        b.kind === "text"
          ? { kind: "text", text: b.parts.join("") }
          : { kind: "tool_use", id: b.id, name: b.name, input: b.input },
      );
    this.final = { id: this.id, model: this.model, content, stopReason, usage: { ...this.usage } };

    this.state = "done";
    this.blocks = [];
    this.toolsByProviderIndex.clear();
    return events;
  }
}

/** Non-streaming path: the whole provider response runs through the same state machine */
export function reconstructResponse(
  resp: OpenAIChatResponse,
  options: ReconstructorOptions,
): { response: CanonicalResponse; warnings: ConversionFallbackWarning[] } {
  const r = new StreamReconstructor(options);
  for (const chunk of responseToChunks(resp)) r.push(chunk);
  r.end();
  return { response: r.result(), warnings: r.warnings };
}

/** Events a stream would have carried for an already complete response (cache hits on the streaming path) */
export function replayResponse(resp: CanonicalResponse): StreamEvent[] {
  const events: StreamEvent[] = [
    { type: "message_start", id: resp.id, model: resp.model, usage: { inputTokens: 0, outputTokens: 0 } },
  ];
  let index = 0;
  for (const block of resp.content) {
    if (block.kind === "text") {
      events.push({ type: "block_start", index, block: { kind: "text" } });
      if (block.text) events.push({ type: "block_delta", index, delta: { kind: "text", text: block.text } });
    } else if (block.kind === "tool_use") {
      events.push({ type: "block_start", index, block: { kind: "tool_use", id: block.id, name: block.name } });
      events.push({ type: "block_delta", index, delta: { kind: "input_json", partialJson: JSON.stringify(block.input) } });
    } else {
      // assistant output never carries images or tool results
      continue;
    }
    events.push({ type: "block_stop", index });
    index++;
  }
  events.push({ type: "message_delta", stopReason: resp.stopReason, usage: { ...resp.usage } });
  events.push({ type: "message_stop" });
  return events;
}
