// Canonical model <-> OpenAI-style chat completions
import {
  assertNever,
  fallbackWarning,
  type CanonicalRequest,
  type ContentBlock,
  type ConversionFallbackWarning,
  type Converted,
  type ImageSource,
  type Message,
  type StopReason,
  type ToolChoice,
  type ToolResultBlock,
} from "../canonical.js";
import { plainText } from "../map.js";
import { filterExtensions, type ProviderProfile } from "./profile.js";
import type {
  OpenAIChatRequest,
  OpenAIChatResponse,
  OpenAIContentPart,
  OpenAIMessage,
  OpenAIStreamChunk,
  OpenAITool,
  OpenAIToolCall,
  OpenAIToolChoice,
} from "./types.js";

// ── Images ───────────────────────────────────────────────────────────

const DATA_URI = /^data:([^;,]+);base64,(.*)$/s;

/** Typed image source → the single URL string the provider takes */
export function imageToUrl(source: ImageSource): string {
  return source.type === "base64" ? `data:${source.mediaType};base64,${source.data}` : source.url;
}

/** Inverse of imageToUrl: base64 data URIs come back as inline data, anything else as a URL */
export function imageFromUrl(url: string): ImageSource {
  const m = DATA_URI.exec(url);
  return m ? { type: "base64", mediaType: m[1], data: m[2] } : { type: "url", url };
}

// ── Finish reasons ───────────────────────────────────────────────────

const FINISH_REASONS: Readonly<Record<string, StopReason>> = {
  stop: "endTurn",
  length: "maxTokens",
  tool_calls: "toolUse",
  function_call: "toolUse",
  content_filter: "stopSequence",
};

/** Map a provider finish reason; unknown reasons fall back to endTurn and report `known: false` */
export function mapFinishReason(reason: string): { stopReason: StopReason; known: boolean } {
  const mapped = Object.hasOwn(FINISH_REASONS, reason) ? FINISH_REASONS[reason] : undefined;
  return mapped ? { stopReason: mapped, known: true } : { stopReason: "endTurn", known: false };
}

// ── Request conversion ───────────────────────────────────────────────

type Ctx = { profile: ProviderProfile; warnings: ConversionFallbackWarning[] };

function imagePart(source: ImageSource, path: string, ctx: Ctx): OpenAIContentPart {
  if (!ctx.profile.supportsVision) {
    ctx.warnings.push(fallbackWarning(path, `provider ${ctx.profile.name} does not accept images; replaced with text`));
    return { type: "text", text: "[image omitted]" };
  }
  if (source.type === "base64" && !ctx.profile.imageMediaTypes.includes(source.mediaType)) {
    ctx.warnings.push(fallbackWarning(path, `image media type ${source.mediaType} is not supported; replaced with text`));
    return { type: "text", text: `[unsupported image: ${source.mediaType}]` };
  }
  return { type: "image_url", image_url: { url: imageToUrl(source) } };
}

function toolResultText(block: ToolResultBlock, path: string, ctx: Ctx): string {
  let text: string;
  if (typeof block.content === "string") {
    text = block.content;
  } else {
    text = block.content
      .map((inner, i) => {
        if (inner.kind === "image") {
          // tool messages are text-only on the provider side
          ctx.warnings.push(fallbackWarning(`${path}.content[${i}]`, "images in tool results are not supported; replaced with text"));
          return "[image omitted]";
        }
        return plainText([inner]);
      })
      .join("\n");
  }
  return block.isError ? `Error: ${text}` : text;
}

function userMessages(m: Message, path: string, ctx: Ctx): OpenAIMessage[] {
  const toolMessages: OpenAIMessage[] = [];
  const parts: OpenAIContentPart[] = [];

  m.content.forEach((block, j) => {
    const p = `${path}.content[${j}]`;
    switch (block.kind) {
      case "text":
        parts.push({ type: "text", text: block.text });
        break;
      case "image":
        parts.push(imagePart(block.source, p, ctx));
        break;
      case "tool_result":
        // tool answers must directly follow the assistant turn that asked for them
        toolMessages.push({ role: "tool", tool_call_id: block.toolUseId, content: toolResultText(block, p, ctx) });
        break;
      case "tool_use":
        ctx.warnings.push(fallbackWarning(p, "tool_use in a user message is not supported; replaced with text"));
        parts.push({ type: "text", text: `[tool call: ${block.name}]` });
        break;
      default:
        assertNever(block);
    }
  });

  const out = [...toolMessages];
  if (parts.length === 1 && parts[0].type === "text") {
    out.push({ role: "user", content: parts[0].text });
  } else if (parts.length > 0) {
    out.push({ role: "user", content: parts });
  }
  return out;
}

function assistantMessage(m: Message, path: string, ctx: Ctx): OpenAIMessage {
  const text: string[] = [];
  const toolCalls: OpenAIToolCall[] = [];

  m.content.forEach((block, j) => {
    const p = `${path}.content[${j}]`;
    switch (block.kind) {
      case "text":
        text.push(block.text);
        break;
      case "tool_use":
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input) },
        });
        break;
      case "image":
      case "tool_result":
        ctx.warnings.push(fallbackWarning(p, `${block.kind} in an assistant message is not supported; replaced with text`));
        text.push(`[${block.kind} omitted]`);
        break;
      default:
        assertNever(block);
    }
  });

  if (toolCalls.length > 0) {
    return { role: "assistant", content: text.length > 0 ? text.join("") : null, tool_calls: toolCalls };
  }
  return { role: "assistant", content: text.join("") };
}

function toProviderMessages(req: CanonicalRequest, ctx: Ctx): OpenAIMessage[] {
  const out: OpenAIMessage[] = [];
  if (req.system !== undefined) {
    const system = plainText(req.system);
    if (system) out.push({ role: "system", content: system });
  }
  req.messages.forEach((m, i) => {
    const path = `messages[${i}]`;
    switch (m.role) {
      case "system":
        out.push({ role: "system", content: plainText(m.content) });
        break;
      case "user":
        out.push(...userMessages(m, path, ctx));
        break;
      case "assistant":
        out.push(assistantMessage(m, path, ctx));
        break;
      default:
        assertNever(m.role);
    }
  });
  return out;
}

function toProviderTools(req: CanonicalRequest): OpenAITool[] | undefined {
  if (!req.tools || req.tools.length === 0) return undefined;
  return req.tools.map((t) => ({
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.inputSchema },
  }));
}

function toProviderToolChoice(choice: ToolChoice): OpenAIToolChoice {
  switch (choice.type) {
    case "auto":
      return "auto";
    case "any":
      return "required";
    case "none":
      return "none";
    case "specific":
      return { type: "function", function: { name: choice.name } };
    default:
      return assertNever(choice);
  }
}

/**
 * Canonical request → provider request. Pure: the same request and profile always give
 * byte-identical JSON, which the response cache relies on.
 */
export function toProviderRequest(req: CanonicalRequest, profile: ProviderProfile): Converted<OpenAIChatRequest> {
  const ctx: Ctx = { profile, warnings: [] };
  const messages = toProviderMessages(req, ctx);
  const tools = toProviderTools(req);
  const { allowed, warnings: dropped } = filterExtensions(req.extensions, profile);

  const out: OpenAIChatRequest = {
    model: req.model,
    messages,
    max_tokens: req.maxTokens,
    stream: req.stream,
  };
  if (req.stream) out.stream_options = { include_usage: true };
  if (tools) out.tools = tools;
  if (req.toolChoice) {
    out.tool_choice = toProviderToolChoice(req.toolChoice);
    if (req.toolChoice.type !== "none" && req.toolChoice.disableParallelToolUse) {
      out.parallel_tool_calls = false;
    }
  }
  if (req.temperature !== undefined) out.temperature = req.temperature;
  if (req.topP !== undefined) out.top_p = req.topP;
  if (req.stopSequences && req.stopSequences.length > 0) out.stop = [...req.stopSequences];
  for (const [key, value] of allowed) out[key] = value;

  return { value: out, warnings: [...ctx.warnings, ...dropped] };
}

// ── Response conversion ──────────────────────────────────────────────

/**
 * Re-express a complete provider response as a single synthetic stream chunk, so that
 * non-streaming responses go through the same reconstruction as streamed ones.
 */
export function responseToChunks(resp: OpenAIChatResponse): OpenAIStreamChunk[] {
  const choice = resp.choices[0];
  const chunk: OpenAIStreamChunk = {
    id: resp.id,
    model: resp.model,
    choices: choice
      ? [
          {
            index: 0,
            delta: {
              content: choice.message.content,
              tool_calls: choice.message.tool_calls?.map((tc, i) => ({
                index: i,
                id: tc.id,
                function: { name: tc.function.name, arguments: tc.function.arguments },
              })),
            },
            finish_reason: choice.finish_reason,
          },
        ]
      : [],
    usage: resp.usage,
  };
  return [chunk];
}

/** Provider user content → canonical blocks (the inverse of the user-part conversion above) */
export function contentFromProvider(content: string | OpenAIContentPart[]): ContentBlock[] {
  if (typeof content === "string") return [{ kind: "text", text: content }];
  return content.map((part) =>
    part.type === "text"
      ? { kind: "text", text: part.text }
      : { kind: "image", source: imageFromUrl(part.image_url.url) },
  );
}
