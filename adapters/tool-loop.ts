// Conversation continuation: run requested tools and send their results back until the model stops asking.
import {
  toolUseBlocks,
  type CanonicalRequest,
  type CanonicalResponse,
  type Message,
  type ToolResultBlock,
  type ToolUseBlock,
} from "./canonical.js";
import { ToolLoopLimitError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CompletionResult, RequestOptions } from "./pipeline.js";

/** Supplied by whatever sandbox actually runs tools */
export interface ToolExecutor {
  execute(call: ToolUseBlock, options: { signal?: AbortSignal }): Promise<ToolResultBlock>;
}

export interface Completer {
  complete(req: CanonicalRequest, options?: RequestOptions): Promise<CompletionResult>;
}

export interface ConversationOptions extends RequestOptions {
  maxRounds: number;
  logger?: Logger;
}

export interface ConversationResult {
  response: CanonicalResponse;
  /** Full transcript, including every assistant turn and tool result appended on the way */
  messages: Message[];
  rounds: number;
}

export async function runConversation(
  completer: Completer,
  request: CanonicalRequest,
  executor: ToolExecutor,
  options: ConversationOptions,
): Promise<ConversationResult> {
  const { maxRounds, logger, ...requestOptions } = options;
  const log = logger?.child({ module: "tool-loop" });
  let messages: Message[] = [...request.messages];
  let rounds = 0;

  for (;;) {
    const { response } = await completer.complete({ ...request, messages }, requestOptions);
    const calls = toolUseBlocks(response.content);
    if (response.stopReason !== "toolUse" || calls.length === 0) {
      return { response, messages, rounds };
    }
    if (rounds >= maxRounds) throw new ToolLoopLimitError(maxRounds);
    rounds++;

    log?.debug({ round: rounds, tools: calls.map((c) => c.name) }, "executing tool calls");
    const results = await Promise.all(calls.map((call) => runTool(executor, call, requestOptions.signal, log)));
    messages = [
      ...messages,
      { role: "assistant", content: response.content },
      { role: "user", content: results },
    ];
  }
}

async function runTool(
  executor: ToolExecutor,
  call: ToolUseBlock,
  signal: AbortSignal | undefined,
  log: Logger | undefined,
): Promise<ToolResultBlock> {
  try {
    const result = await executor.execute(call, { signal });
    return { ...result, toolUseId: call.id };
  } catch (err) {
    log?.warn({ err, tool: call.name }, "tool execution failed");
    const message = err instanceof Error ? err.message : String(err);
    return { kind: "tool_result", toolUseId: call.id, content: `Tool ${call.name} failed: ${message}`, isError: true };
  }
}
