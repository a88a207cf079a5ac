// Anthropic Messages wire format (the client side of the gateway)
import { z } from "zod";
import type { JsonValue } from "./canonical.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const textBlockSchema = z.object({ type: z.literal("text"), text: z.string() }).passthrough();

export const imageBlockSchema = z
  .object({
    type: z.literal("image"),
    source: z.discriminatedUnion("type", [
      z.object({ type: z.literal("base64"), media_type: z.string().min(1), data: z.string() }),
      z.object({ type: z.literal("url"), url: z.string().min(1) }),
    ]),
  })
  .passthrough();

export const toolUseBlockSchema = z
  .object({
    type: z.literal("tool_use"),
    id: z.string().min(1),
    name: z.string().min(1),
    input: jsonValueSchema,
  })
  .passthrough();

/**
 * Blocks are only checked for a `type` tag here; map.ts validates each known kind
 * with its own schema and degrades unknown kinds to a placeholder.
 */
export const anthropicContentBlockSchema = z.object({ type: z.string() }).passthrough();

export const toolResultBlockSchema = z
  .object({
    type: z.literal("tool_result"),
    tool_use_id: z.string().min(1),
    content: z.union([z.string(), z.array(anthropicContentBlockSchema)]).optional(),
    is_error: z.boolean().optional(),
  })
  .passthrough();

export const anthropicMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.union([z.string(), z.array(anthropicContentBlockSchema)]),
});

export const anthropicToolSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  input_schema: jsonValueSchema,
  /** Gateway extension: false marks a tool with side effects (disables response caching) */
  idempotent: z.boolean().optional(),
});

export const anthropicToolChoiceSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("auto"), disable_parallel_tool_use: z.boolean().optional() }),
  z.object({ type: z.literal("any"), disable_parallel_tool_use: z.boolean().optional() }),
  z.object({ type: z.literal("none") }),
  z.object({
    type: z.literal("tool"),
    name: z.string().min(1),
    disable_parallel_tool_use: z.boolean().optional(),
  }),
]);

export const anthropicRequestSchema = z
  .object({
    model: z.string().min(1),
    messages: z.array(anthropicMessageSchema).min(1),
    system: z.union([z.string(), z.array(textBlockSchema)]).optional(),
    tools: z.array(anthropicToolSchema).optional(),
    tool_choice: anthropicToolChoiceSchema.optional(),
    max_tokens: z.number().int().positive(),
    temperature: z.number().min(0).optional(),
    top_p: z.number().min(0).max(1).optional(),
    stop_sequences: z.array(z.string()).optional(),
    stream: z.boolean().optional(),
    metadata: z.record(jsonValueSchema).optional(),
  })
  // every other top-level key is a provider extension
  .passthrough();

export type AnthropicContentBlock = z.infer<typeof anthropicContentBlockSchema>;
export type AnthropicMessage = z.infer<typeof anthropicMessageSchema>;
export type AnthropicTool = z.infer<typeof anthropicToolSchema>;
export type AnthropicToolChoice = z.infer<typeof anthropicToolChoiceSchema>;
export type AnthropicRequest = z.infer<typeof anthropicRequestSchema>;

/** Top-level request keys that are not extensions */
export const CORE_REQUEST_KEYS: ReadonlySet<string> = new Set([
  "model",
  "messages",
  "system",
  "tools",
  "tool_choice",
  "max_tokens",
  "temperature",
  "top_p",
  "stop_sequences",
  "stream",
  "metadata",
]);

/** Client request as produced by the gateway (canonical → wire); extensions sit at top level */
export type AnthropicRequestWire = {
  model: string;
  messages: Array<{ role: "user" | "assistant"; content: AnthropicResponseBlock[] }>;
  system?: string | Array<{ type: "text"; text: string }>;
  tools?: Array<{ name: string; description?: string; input_schema: JsonValue; idempotent?: boolean }>;
  tool_choice?: AnthropicToolChoice;
  max_tokens: number;
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  stream?: boolean;
  metadata?: Record<string, JsonValue>;
  [extension: string]: unknown;
};

// ── Responses and stream events ──────────────────────────────────────

export type AnthropicStopReason = "end_turn" | "max_tokens" | "tool_use" | "stop_sequence" | "error";

export type AnthropicResponseBlock =
  | { type: "text"; text: string }
  | { type: "image"; source: { type: "base64"; media_type: string; data: string } | { type: "url"; url: string } }
  | { type: "tool_use"; id: string; name: string; input: JsonValue }
  | {
      type: "tool_result";
      tool_use_id: string;
      content: string | AnthropicResponseBlock[];
      is_error?: boolean;
    };

export type AnthropicUsage = { input_tokens: number; output_tokens: number };

export type AnthropicResponse = {
  id: string;
  type: "message";
  role: "assistant";
  model: string;
  content: AnthropicResponseBlock[];
  stop_reason: AnthropicStopReason;
  stop_sequence: null;
  usage: AnthropicUsage;
};

export type AnthropicStreamEvent =
  | {
      type: "message_start";
      message: Omit<AnthropicResponse, "stop_reason"> & { stop_reason: null };
    }
  | {
      type: "content_block_start";
      index: number;
      content_block:
        | { type: "text"; text: "" }
        | { type: "tool_use"; id: string; name: string; input: Record<string, never> };
    }
  | {
      type: "content_block_delta";
      index: number;
      delta: { type: "text_delta"; text: string } | { type: "input_json_delta"; partial_json: string };
    }
  | { type: "content_block_stop"; index: number }
  | {
      type: "message_delta";
      delta: { stop_reason: AnthropicStopReason | null; stop_sequence: null };
      /** cumulative; input_tokens is only known once the provider reports usage at the end */
      usage: { input_tokens: number; output_tokens: number };
    }
  | { type: "message_stop" };
