// Client wire format (Anthropic Messages) <-> canonical model
import type { ZodError } from "zod";
import {
  assertNever,
  fallbackWarning,
  textBlock,
  type CanonicalRequest,
  type CanonicalResponse,
  type ContentBlock,
  type ConversionFallbackWarning,
  type Converted,
  type JsonValue,
  type Message,
  type StopReason,
  type ToolChoice,
  type ToolSpec,
} from "./canonical.js";
import { ValidationError } from "./errors.js";
import { isJsonObject, validateToolInputSchema } from "./json-schema.js";
import {
  CORE_REQUEST_KEYS,
  anthropicRequestSchema,
  imageBlockSchema,
  jsonValueSchema,
  textBlockSchema,
  toolResultBlockSchema,
  toolUseBlockSchema,
  type AnthropicContentBlock,
  type AnthropicRequestWire,
  type AnthropicResponse,
  type AnthropicResponseBlock,
  type AnthropicStopReason,
  type AnthropicToolChoice,
} from "./types.js";

const STOP_REASON_TO_CLIENT: Record<StopReason, AnthropicStopReason> = {
  endTurn: "end_turn",
  maxTokens: "max_tokens",
  toolUse: "tool_use",
  stopSequence: "stop_sequence",
  error: "error",
};

const STOP_REASON_FROM_CLIENT: Record<AnthropicStopReason, StopReason> = {
  end_turn: "endTurn",
  max_tokens: "maxTokens",
  tool_use: "toolUse",
  stop_sequence: "stopSequence",
  error: "error",
};

export function toClientStopReason(reason: StopReason): AnthropicStopReason {
  return STOP_REASON_TO_CLIENT[reason];
}

function zodIssues(err: ZodError, prefix: string): string[] {
  return err.issues.map((issue) => {
    const path = [prefix, ...issue.path.map((p) => (typeof p === "number" ? `[${p}]` : p))]
      .filter((p) => p !== "")
      .join(".")
      .replace(/\.\[/g, "[");
    return `${path || "body"}: ${issue.message}`;
  });
}

// ── Client request → canonical ───────────────────────────────────────

type BlockContext = {
  role: "user" | "assistant";
  issues: string[];
  warnings: ConversionFallbackWarning[];
  /** tool_use ids emitted so far, in conversation order */
  seenToolUseIds: Set<string>;
};

function unsupportedBlock(type: string, path: string, ctx: BlockContext): ContentBlock {
  ctx.warnings.push(fallbackWarning(path, `content block type "${type}" is not supported; replaced with text`));
  return textBlock(`[unsupported content block: ${type}]`);
}

/** Blocks allowed inside a tool_result: text and images */
function toolResultInnerToCanonical(raw: AnthropicContentBlock, path: string, ctx: BlockContext): ContentBlock | null {
  switch (raw.type) {
    case "text":
    case "image":
      return blockToCanonical(raw, path, ctx);
    default:
      return unsupportedBlock(raw.type, path, ctx);
  }
}

function blockToCanonical(raw: AnthropicContentBlock, path: string, ctx: BlockContext): ContentBlock | null {
  switch (raw.type) {
    case "text": {
      const parsed = textBlockSchema.safeParse(raw);
      if (!parsed.success) {
        ctx.issues.push(...zodIssues(parsed.error, path));
        return null;
      }
      return textBlock(parsed.data.text);
    }
    case "image": {
      const parsed = imageBlockSchema.safeParse(raw);
      if (!parsed.success) {
        ctx.issues.push(...zodIssues(parsed.error, path));
        return null;
      }
      const src = parsed.data.source;
      return src.type === "base64"
        ? { kind: "image", source: { type: "base64", mediaType: src.media_type, data: src.data } }
        : { kind: "image", source: { type: "url", url: src.url } };
    }
    case "tool_use": {
      const parsed = toolUseBlockSchema.safeParse(raw);
      if (!parsed.success) {
        ctx.issues.push(...zodIssues(parsed.error, path));
        return null;
      }
      if (ctx.role !== "assistant") {
        ctx.issues.push(`${path}: tool_use blocks are only allowed in assistant messages`);
        return null;
      }
      if (ctx.seenToolUseIds.has(parsed.data.id)) {
        ctx.issues.push(`${path}.id: duplicate tool_use id "${parsed.data.id}"`);
        return null;
      }
      ctx.seenToolUseIds.add(parsed.data.id);
      return { kind: "tool_use", id: parsed.data.id, name: parsed.data.name, input: parsed.data.input };
    }
    case "tool_result": {
      const parsed = toolResultBlockSchema.safeParse(raw);
      if (!parsed.success) {
        ctx.issues.push(...zodIssues(parsed.error, path));
        return null;
      }
      const r = parsed.data;
      if (ctx.role !== "user") {
        ctx.issues.push(`${path}: tool_result blocks are only allowed in user messages`);
        return null;
      }
      if (!ctx.seenToolUseIds.has(r.tool_use_id)) {
        ctx.issues.push(`${path}.tool_use_id: "${r.tool_use_id}" does not reference an earlier tool_use block`);
        return null;
      }
      let content: string | ContentBlock[];
      if (r.content === undefined) {
        content = "";
      } else if (typeof r.content === "string") {
        content = r.content;
      } else {
        const inner: ContentBlock[] = [];
        r.content.forEach((raw, k) => {
          const b = toolResultInnerToCanonical(raw, `${path}.content[${k}]`, ctx);
          if (b) inner.push(b);
        });
        content = inner;
      }
      return { kind: "tool_result", toolUseId: r.tool_use_id, content, isError: r.is_error ?? false };
    }
    default:
      return unsupportedBlock(raw.type, path, ctx);
  }
}

function toolChoiceToCanonical(
  choice: AnthropicToolChoice | undefined,
  tools: readonly ToolSpec[] | undefined,
  issues: string[],
): ToolChoice | undefined {
  if (!choice) return undefined;
  const declared = new Set((tools ?? []).map((t) => t.name));
  switch (choice.type) {
    case "auto":
      return withParallel({ type: "auto" }, choice.disable_parallel_tool_use);
    case "none":
      return { type: "none" };
    case "any":
      if (declared.size === 0) issues.push(`tool_choice: type "any" requires at least one tool`);
      return withParallel({ type: "any" }, choice.disable_parallel_tool_use);
    case "tool":
      if (!declared.has(choice.name)) {
        issues.push(`tool_choice.name: "${choice.name}" is not a declared tool`);
      }
      return withParallel({ type: "specific", name: choice.name }, choice.disable_parallel_tool_use);
    default:
      return assertNever(choice);
  }
}

function withParallel<T extends Exclude<ToolChoice, { type: "none" }>>(choice: T, disable: boolean | undefined): T {
  return disable === undefined ? choice : { ...choice, disableParallelToolUse: disable };
}

/**
 * Validate a client request body and convert it to the canonical model.
 * Throws ValidationError listing every problem found; recoverable problems come back as warnings.
 */
export function toCanonicalRequest(body: unknown): Converted<CanonicalRequest> {
  const parsed = anthropicRequestSchema.safeParse(body);
  if (!parsed.success) throw new ValidationError(zodIssues(parsed.error, ""));
  const req = parsed.data;

  const issues: string[] = [];
  const warnings: ConversionFallbackWarning[] = [];

  let tools: ToolSpec[] | undefined;
  if (req.tools) {
    const names = new Set<string>();
    const specs: ToolSpec[] = [];
    req.tools.forEach((t, i) => {
      if (names.has(t.name)) issues.push(`tools[${i}].name: duplicate tool name "${t.name}"`);
      names.add(t.name);
      const schemaIssues = validateToolInputSchema(t.input_schema, `tools[${i}].input_schema`);
      issues.push(...schemaIssues);
      if (schemaIssues.length === 0 && isJsonObject(t.input_schema)) {
        specs.push({
          name: t.name,
          description: t.description ?? "",
          inputSchema: t.input_schema,
          idempotent: t.idempotent ?? true,
        });
      }
    });
    tools = specs;
  }

  const toolChoice = toolChoiceToCanonical(req.tool_choice, tools, issues);

  const seenToolUseIds = new Set<string>();
  const messages: Message[] = req.messages.map((m, i) => {
    if (typeof m.content === "string") return { role: m.role, content: [textBlock(m.content)] };
    const ctx: BlockContext = { role: m.role, issues, warnings, seenToolUseIds };
    const content: ContentBlock[] = [];
    m.content.forEach((raw, j) => {
      const block = blockToCanonical(raw, `messages[${i}].content[${j}]`, ctx);
      if (block) content.push(block);
    });
    return { role: m.role, content };
  });

  const extensions: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(req)) {
    if (CORE_REQUEST_KEYS.has(key)) continue;
    const v = jsonValueSchema.safeParse(value);
    if (v.success) extensions[key] = v.data;
    else issues.push(`${key}: extension values must be JSON`);
  }

  if (issues.length > 0) throw new ValidationError(issues);

  const system =
    req.system === undefined
      ? undefined
      : typeof req.system === "string"
        ? req.system
        : req.system.map((b) => textBlock(b.text));

  const value: CanonicalRequest = {
    model: req.model,
    messages,
    maxTokens: req.max_tokens,
    stream: req.stream ?? false,
    extensions,
    ...(system !== undefined && { system }),
    ...(tools && { tools }),
    ...(toolChoice && { toolChoice }),
    ...(req.temperature !== undefined && { temperature: req.temperature }),
    ...(req.top_p !== undefined && { topP: req.top_p }),
    ...(req.stop_sequences && { stopSequences: req.stop_sequences }),
    ...(req.metadata && { metadata: req.metadata }),
  };
  return { value, warnings };
}

// ── Canonical → client wire ──────────────────────────────────────────

export function blockToClient(block: ContentBlock): AnthropicResponseBlock {
  switch (block.kind) {
    case "text":
      return { type: "text", text: block.text };
    case "image":
      return {
        type: "image",
        source:
          block.source.type === "base64"
            ? { type: "base64", media_type: block.source.mediaType, data: block.source.data }
            : { type: "url", url: block.source.url },
      };
    case "tool_use":
      return { type: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return {
        type: "tool_result",
        tool_use_id: block.toolUseId,
        content: typeof block.content === "string" ? block.content : block.content.map(blockToClient),
        ...(block.isError && { is_error: true }),
      };
    default:
      return assertNever(block);
  }
}

function toolChoiceToClient(choice: ToolChoice): AnthropicToolChoice {
  const parallel =
    choice.type !== "none" && choice.disableParallelToolUse !== undefined
      ? { disable_parallel_tool_use: choice.disableParallelToolUse }
      : {};
  switch (choice.type) {
    case "auto":
      return { type: "auto", ...parallel };
    case "any":
      return { type: "any", ...parallel };
    case "none":
      return { type: "none" };
    case "specific":
      return { type: "tool", name: choice.name, ...parallel };
    default:
      return assertNever(choice);
  }
}

/** Render a canonical request back into the client wire format */
export function fromCanonicalRequest(req: CanonicalRequest): AnthropicRequestWire {
  // the client format has no system role inside messages; fold such messages into `system`
  const folded = req.messages.filter((m) => m.role === "system").map((m) => plainText(m.content));
  const messages: AnthropicRequestWire["messages"] = [];
  for (const m of req.messages) {
    if (m.role !== "system") messages.push({ role: m.role, content: m.content.map(blockToClient) });
  }

  let system: AnthropicRequestWire["system"];
  if (req.system === undefined) {
    system = folded.length > 0 ? folded.join("\n") : undefined;
  } else if (typeof req.system === "string") {
    system = [req.system, ...folded].join("\n");
  } else {
    system = [
      ...req.system.map((b) => ({ type: "text" as const, text: plainText([b]) })),
      ...folded.map((text) => ({ type: "text" as const, text })),
    ];
  }

  return {
    ...req.extensions,
    model: req.model,
    messages,
    max_tokens: req.maxTokens,
    ...(system !== undefined && { system }),
    ...(req.tools && {
      tools: req.tools.map((t) => ({
        name: t.name,
        ...(t.description ? { description: t.description } : {}),
        input_schema: t.inputSchema,
        ...(!t.idempotent && { idempotent: false }),
      })),
    }),
    ...(req.toolChoice && { tool_choice: toolChoiceToClient(req.toolChoice) }),
    ...(req.temperature !== undefined && { temperature: req.temperature }),
    ...(req.topP !== undefined && { top_p: req.topP }),
    ...(req.stopSequences && { stop_sequences: [...req.stopSequences] }),
    ...(req.stream && { stream: true }),
    ...(req.metadata && { metadata: { ...req.metadata } }),
  };
}

export function toClientResponse(resp: CanonicalResponse): AnthropicResponse {
  return {
    id: resp.id,
    type: "message",
    role: "assistant",
    model: resp.model,
    content: resp.content.map(blockToClient),
    stop_reason: toClientStopReason(resp.stopReason),
    stop_sequence: null,
    usage: { input_tokens: resp.usage.inputTokens, output_tokens: resp.usage.outputTokens },
  };
}

function blockFromClient(block: AnthropicResponseBlock): ContentBlock {
  switch (block.type) {
    case "text":
      return textBlock(block.text);
    case "image":
      return {
        kind: "image",
        source:
          block.source.type === "base64"
            ? { type: "base64", mediaType: block.source.media_type, data: block.source.data }
            : { type: "url", url: block.source.url },
      };
    case "tool_use":
      return { kind: "tool_use", id: block.id, name: block.name, input: block.input };
    case "tool_result":
      return {
        kind: "tool_result",
        toolUseId: block.tool_use_id,
        content: typeof block.content === "string" ? block.content : block.content.map(blockFromClient),
        isError: block.is_error ?? false,
      };
    default:
      return assertNever(block);
  }
}

/** Inverse of toClientResponse */
export function fromClientResponse(wire: AnthropicResponse): CanonicalResponse {
  return {
    id: wire.id,
    model: wire.model,
    content: wire.content.map(blockFromClient),
    stopReason: STOP_REASON_FROM_CLIENT[wire.stop_reason],
    usage: { inputTokens: wire.usage.input_tokens, outputTokens: wire.usage.output_tokens },
  };
}

/**
 * Flatten content to text. Tool results contribute their text; images and tool calls contribute nothing.
 */
export function plainText(content: string | readonly ContentBlock[]): string {
  if (typeof content === "string") return content;
  return content
    .map((c) => {
      switch (c.kind) {
        case "text":
          return c.text;
        case "tool_result":
          return plainText(c.content);
        case "image":
        case "tool_use":
          return "";
        default:
          return assertNever(c);
      }
    })
    .join("");
}
