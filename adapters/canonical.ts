// Wire-format independent model of a chat request/response.
// Every converter pivots through these types; nothing here knows about JSON field names on the wire.

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Role = "user" | "assistant" | "system";

export type ImageSource =
  | { type: "base64"; mediaType: string; data: string }
  | { type: "url"; url: string };

export type TextBlock = { kind: "text"; text: string };
export type ImageBlock = { kind: "image"; source: ImageSource };
export type ToolUseBlock = { kind: "tool_use"; id: string; name: string; input: JsonValue };
export type ToolResultBlock = {
  kind: "tool_result";
  toolUseId: string;
  content: string | ContentBlock[];
  isError: boolean;
};

export type ContentBlock = TextBlock | ImageBlock | ToolUseBlock | ToolResultBlock;

export type ContentBlockKind = ContentBlock["kind"];

export interface Message {
  readonly role: Role;
  readonly content: readonly ContentBlock[];
}

export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: JsonObject;
  /** false when running the tool has side effects; responses to such requests are never cached */
  idempotent: boolean;
}

export type ToolChoice =
  | { type: "auto"; disableParallelToolUse?: boolean }
  | { type: "any"; disableParallelToolUse?: boolean }
  | { type: "none" }
  | { type: "specific"; name: string; disableParallelToolUse?: boolean };

export interface CanonicalRequest {
  readonly model: string;
  readonly messages: readonly Message[];
  readonly system?: string | readonly ContentBlock[];
  readonly tools?: readonly ToolSpec[];
  readonly toolChoice?: ToolChoice;
  readonly maxTokens: number;
  readonly temperature?: number;
  readonly topP?: number;
  readonly stopSequences?: readonly string[];
  readonly stream: boolean;
  /** Provider-specific passthrough parameters, filtered against a per-provider allow-list. */
  readonly extensions: Readonly<Record<string, JsonValue>>;
  /** Request-scoped client metadata (e.g. user_id). Never part of a cache key. */
  readonly metadata?: Readonly<Record<string, JsonValue>>;
}

export type StopReason = "endTurn" | "maxTokens" | "toolUse" | "stopSequence" | "error";

export interface Usage {
  inputTokens: number;
  outputTokens: number;
}

export interface CanonicalResponse {
  id: string;
  model: string;
  content: ContentBlock[];
  stopReason: StopReason;
  usage: Usage;
}

// ── Stream events ────────────────────────────────────────────────────

export type StreamBlockStart =
  | { kind: "text" }
  | { kind: "tool_use"; id: string; name: string };

export type StreamBlockDelta =
  | { kind: "text"; text: string }
  | { kind: "input_json"; partialJson: string };

export type StreamEvent =
  | { type: "message_start"; id: string; model: string; usage: Usage }
  | { type: "block_start"; index: number; block: StreamBlockStart }
  | { type: "block_delta"; index: number; delta: StreamBlockDelta }
  | { type: "block_stop"; index: number }
  | { type: "message_delta"; stopReason?: StopReason; usage?: Usage }
  | { type: "message_stop" };

// ── Conversion warnings ──────────────────────────────────────────────

/** A recoverable conversion problem: the offending piece was replaced, the request proceeds. */
export interface ConversionFallbackWarning {
  kind: "conversion_fallback";
  path: string;
  message: string;
}

export interface Converted<T> {
  value: T;
  warnings: ConversionFallbackWarning[];
}

export function fallbackWarning(path: string, message: string): ConversionFallbackWarning {
  return { kind: "conversion_fallback", path, message };
}

export function textBlock(text: string): TextBlock {
  return { kind: "text", text };
}

export function toolUseBlocks(content: readonly ContentBlock[]): ToolUseBlock[] {
  return content.filter((b): b is ToolUseBlock => b.kind === "tool_use");
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
