// This module drives the bounded completion → tool execution → completion loop for one request.

import type { FastifyBaseLogger } from 'fastify';
import type { CompletionPort } from '../providers/completion-client.js';
import type {
  HistoryTurn,
  OrchestrationStatus,
  TokenUsage,
  ToolCallRecord,
  ToolCallRequest,
  TranscriptMessage
} from '../types/domain.js';
import type { McpTool, ToolCallResult } from '../types/mcp.js';
import { AppError, normalizeError, toolFailureKindOf } from '../utils/errors.js';
import { isPlainObject, parseToolArguments } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { Transcript } from './transcript.js';

export const DEFAULT_MAX_ITERATIONS = 10;
export const MAX_ITERATIONS_MESSAGE = 'Maximum tool-call iterations reached without a final answer.';

const MAX_SOURCES = 20;
const MAX_SOURCE_DEPTH = 6;

export interface ToolExecutor {
  execute(name: string, args: Record<string, unknown>): Promise<ToolCallResult>;
}

export interface OrchestrationInput {
  input: string;
  systemPrompt: string | null;
  history?: readonly HistoryTurn[];
  tools: readonly McpTool[];
  autoExecuteTools: boolean;
  maxIterations?: number;
  temperature?: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface OrchestrationDeps {
  completion: CompletionPort;
  tools: ToolExecutor;
  logger: FastifyBaseLogger;
}

export interface OrchestrationResult {
  status: OrchestrationStatus;
  response: string | null;
  toolCalls: ToolCallRecord[];
  pendingToolCalls: ToolCallRequest[];
  toolsExecuted: number;
  iterations: number;
  usage: TokenUsage;
  model: string;
  sources: string[];
  transcript: readonly TranscriptMessage[];
}

function addUsage(left: TokenUsage, right: TokenUsage): TokenUsage {
  return {
    promptTokens: left.promptTokens + right.promptTokens,
    completionTokens: left.completionTokens + right.completionTokens,
    totalTokens: left.totalTokens + right.totalTokens
  };
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AppError(499, 'request_cancelled', 'Request was cancelled by the caller.');
  }
}

// This helper collects url fields from nested tool output.
function collectUrls(value: unknown, found: Set<string>, depth: number): void {
  if (depth > MAX_SOURCE_DEPTH || found.size >= MAX_SOURCES) {
    return;
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      collectUrls(item, found, depth + 1);
    }
    return;
  }

  if (!isPlainObject(value)) {
    return;
  }

  for (const [key, entry] of Object.entries(value)) {
    if (key === 'url' && typeof entry === 'string' && /^https?:\/\//i.test(entry)) {
      found.add(entry);
    } else {
      collectUrls(entry, found, depth + 1);
    }
  }
}

// Source attribution is best-effort: any failure yields an empty list instead of failing the answer.
export function extractSources(records: readonly ToolCallRecord[], logger?: FastifyBaseLogger): string[] {
  try {
    const found = new Set<string>();
    for (const record of records) {
      if (record.success) {
        collectUrls(record.result, found, 0);
      }
    }
    return [...found].slice(0, MAX_SOURCES);
  } catch (error) {
    logger?.debug({ event: 'source_extraction_failed', error: errorForLog(error) }, 'source_extraction_failed');
    return [];
  }
}

// This helper executes one requested call and records success or failure without throwing.
async function executeToolCall(call: ToolCallRequest, deps: OrchestrationDeps): Promise<ToolCallRecord> {
  const parsed = parseToolArguments(call.rawArguments);
  const startedAt = Date.now();

  if (parsed.malformed) {
    deps.logger.warn(
      {
        event: 'orchestrator_tool_arguments_malformed',
        toolCallId: call.id,
        toolName: call.name,
        rawArguments: sanitizeForLog(call.rawArguments)
      },
      'orchestrator_tool_arguments_malformed'
    );
  }

  try {
    const result = await deps.tools.execute(call.name, parsed.arguments);
    return {
      id: call.id,
      tool: call.name,
      arguments: parsed.arguments,
      argumentsMalformed: parsed.malformed,
      success: true,
      result: result.structuredContent,
      durationMs: Date.now() - startedAt
    };
  } catch (error) {
    const appError = normalizeError(error);
    if (appError.code === 'request_cancelled') {
      throw appError;
    }

    deps.logger.warn(
      {
        event: 'orchestrator_tool_call_failed',
        toolCallId: call.id,
        toolName: call.name,
        code: appError.code,
        message: appError.message
      },
      'orchestrator_tool_call_failed'
    );

    return {
      id: call.id,
      tool: call.name,
      arguments: parsed.arguments,
      argumentsMalformed: parsed.malformed,
      success: false,
      error: {
        code: appError.code,
        kind: toolFailureKindOf(appError),
        message: appError.message
      },
      durationMs: Date.now() - startedAt
    };
  }
}

// This helper renders one audit record as the tool-result text the model reads next turn.
function toolResultContent(record: ToolCallRecord): string {
  if (record.success) {
    return JSON.stringify(record.result ?? {});
  }
  return JSON.stringify({ error: record.error });
}

// This function runs the orchestration loop until a final answer, a pending approval, or the iteration cap.
export async function runOrchestration(input: OrchestrationInput, deps: OrchestrationDeps): Promise<OrchestrationResult> {
  const maxIterations = Math.max(1, input.maxIterations ?? DEFAULT_MAX_ITERATIONS);
  const transcript = new Transcript();
  const records: ToolCallRecord[] = [];
  let usage: TokenUsage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };
  let model = deps.completion.model;

  if (input.systemPrompt) {
    transcript.addSystem(input.systemPrompt);
  }
  for (const turn of input.history ?? []) {
    if (turn.role === 'user') {
      transcript.addUser(turn.content);
    } else {
      transcript.addAssistant(turn.content, []);
    }
  }
  transcript.addUser(input.input);

  const finish = (
    status: OrchestrationStatus,
    response: string | null,
    iterations: number,
    pendingToolCalls: ToolCallRequest[] = []
  ): OrchestrationResult => ({
    status,
    response,
    toolCalls: records,
    pendingToolCalls,
    toolsExecuted: records.length,
    iterations,
    usage,
    model,
    sources: extractSources(records, deps.logger),
    transcript: transcript.messages()
  });

  for (let iteration = 1; iteration <= maxIterations; iteration += 1) {
    throwIfCancelled(input.signal);

    const completion = await deps.completion.complete({
      transcript: transcript.messages(),
      tools: input.tools,
      temperature: input.temperature,
      maxTokens: input.maxTokens,
      signal: input.signal
    });
    usage = addUsage(usage, completion.usage);
    model = completion.model;
    transcript.addAssistant(completion.text, completion.toolCalls);

    deps.logger.debug(
      {
        event: 'orchestrator_iteration_completed',
        iteration,
        toolCallCount: completion.toolCalls.length,
        finishReason: completion.finishReason
      },
      'orchestrator_iteration_completed'
    );

    if (completion.toolCalls.length === 0) {
      return finish('completed', completion.text ?? '', iteration);
    }

    if (!input.autoExecuteTools) {
      return finish('awaiting_approval', completion.text, iteration, completion.toolCalls);
    }

    // Sequential execution keeps tool results in the order the provider issued the calls.
    for (const call of completion.toolCalls) {
      const record = await executeToolCall(call, deps);
      records.push(record);
      transcript.addToolResult(call, toolResultContent(record), !record.success);
    }
  }

  deps.logger.warn(
    {
      event: 'orchestrator_max_iterations_reached',
      maxIterations,
      toolsExecuted: records.length
    },
    'orchestrator_max_iterations_reached'
  );

  return finish('max_iterations', MAX_ITERATIONS_MESSAGE, maxIterations);
}
