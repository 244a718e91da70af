// This module implements the tool registry handlers and normalizes their failures into tool error codes.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { buildCompletionClient } from '../agent/assistant.js';
import { runOrchestration, type ToolExecutor } from '../agent/orchestrator.js';
import { fetchHttpResource } from '../resources/http-reader.js';
import type { GatewayRuntime } from '../runtime.js';
import { getCurrentWeather } from '../services/weather.js';
import { searchWeb } from '../services/web-search.js';
import type { ToolCallResult } from '../types/mcp.js';
import { isAbortError } from '../utils/abort.js';
import { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import {
  askAssistantSchema,
  buildToolList,
  fetchDocumentSchema,
  getCurrentWeatherSchema,
  getServerInfoSchema,
  isToolName,
  searchWebSchema,
  TOOL_NAMES,
  type ToolName
} from './tool-schemas.js';

export interface ToolRuntimeContext {
  runtime: GatewayRuntime;
  logger: FastifyBaseLogger;
  apiKey: string | null;
  signal?: AbortSignal;
}

type ToolHandler = (args: unknown, context: ToolRuntimeContext) => Promise<ToolCallResult>;

// Resource reader failures are re-labelled so tool callers see the tool error taxonomy.
const RESOURCE_TO_TOOL_CODES: Record<string, string> = {
  resource_timeout: 'tool_timeout',
  resource_read_failed: 'tool_network_error',
  resource_not_found: 'tool_network_error'
};

// This helper wraps structured objects in both text and structured fields for client compatibility.
function mcpResult(payload: Record<string, unknown>): ToolCallResult {
  return {
    content: [{ type: 'text', text: JSON.stringify(payload, null, 2) }],
    structuredContent: payload
  };
}

async function handleGetServerInfo(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  getServerInfoSchema.parse(args);
  const provider = context.runtime.settings.provider;

  return mcpResult({
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    protocolVersion: MCP_PROTOCOL_VERSION,
    provider: {
      kind: provider.kind,
      model: provider.model
    },
    tools: [...TOOL_NAMES]
  });
}

async function handleGetCurrentWeather(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const input = getCurrentWeatherSchema.parse(args);
  const weather = await getCurrentWeather(input.city, input.units, {
    settings: context.runtime.settings.tools,
    signal: context.signal,
    logger: context.logger
  });
  return mcpResult({ ...weather });
}

async function handleSearchWeb(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const input = searchWebSchema.parse(args);
  const results = await searchWeb(input.query, input.count, {
    settings: context.runtime.settings.tools,
    signal: context.signal,
    logger: context.logger
  });
  return mcpResult({
    query: input.query,
    count: results.length,
    results
  });
}

async function handleFetchDocument(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const input = fetchDocumentSchema.parse(args);

  try {
    const document = await fetchHttpResource(input.url, {
      timeoutMs: context.runtime.settings.tools.timeoutMs,
      maxBytes: context.runtime.settings.resources.maxBytes,
      signal: context.signal,
      logger: context.logger
    });
    const clipped = document.text.length > input.maxChars;

    return mcpResult({
      url: document.uri,
      mimeType: document.mimeType,
      kind: document.kind,
      byteLength: document.byteLength,
      truncated: document.truncated || clipped,
      content: clipped ? document.text.slice(0, input.maxChars) : document.text
    });
  } catch (error) {
    const toolCode = error instanceof AppError ? RESOURCE_TO_TOOL_CODES[error.code] : undefined;
    if (error instanceof AppError && toolCode) {
      throw new AppError(error.statusCode, toolCode, error.message, error.details);
    }
    throw error;
  }
}

// The nested run never offers ask_assistant to itself.
async function handleAskAssistant(args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const input = askAssistantSchema.parse(args);
  if (!context.apiKey) {
    throw new AppError(401, 'missing_api_key', 'ask_assistant requires an AI provider API key on the request.');
  }

  const settings = context.runtime.settings;
  const nestedTools: ToolExecutor = {
    execute: async (name, toolArgs) => {
      if (name === 'ask_assistant') {
        throw new AppError(404, 'tool_not_found', 'ask_assistant cannot be called from within ask_assistant.');
      }
      return executeTool(name, toolArgs, context);
    }
  };

  const result = await runOrchestration(
    {
      input: input.question,
      systemPrompt: settings.agent.systemPrompt,
      tools: buildToolList({ exclude: ['ask_assistant'] }),
      autoExecuteTools: true,
      maxIterations: input.maxIterations ?? settings.agent.maxIterations,
      temperature: settings.agent.temperature,
      maxTokens: settings.agent.maxTokens,
      signal: context.signal
    },
    {
      completion: buildCompletionClient(context.runtime, context.apiKey, undefined, context.logger),
      tools: nestedTools,
      logger: context.logger
    }
  );

  return mcpResult({
    answer: result.response,
    status: result.status,
    iterations: result.iterations,
    toolsExecuted: result.toolsExecuted,
    toolCalls: result.toolCalls.map((record) => ({
      tool: record.tool,
      success: record.success,
      ...(record.error ? { error: record.error } : {})
    })),
    sources: result.sources,
    tokensUsed: result.usage.totalTokens,
    model: result.model
  });
}

const toolHandlers: Record<ToolName, ToolHandler> = {
  get_server_info: handleGetServerInfo,
  get_current_weather: handleGetCurrentWeather,
  search_web: handleSearchWeb,
  fetch_document: handleFetchDocument,
  ask_assistant: handleAskAssistant
};

// This helper keeps the result log line small for large tool payloads.
function summarizeToolOutput(result: ToolCallResult): Record<string, unknown> {
  return {
    keys: Object.keys(result.structuredContent),
    textLength: result.content.reduce((total, block) => total + block.text.length, 0)
  };
}

// This function dispatches validated tool calls and normalizes their failures.
export async function executeTool(toolName: string, args: unknown, context: ToolRuntimeContext): Promise<ToolCallResult> {
  const startedAt = Date.now();
  context.logger.info(
    {
      event: 'tool_execution_started',
      toolName,
      args: sanitizeForLog(args)
    },
    'tool_execution_started'
  );

  if (!isToolName(toolName)) {
    context.logger.warn(
      {
        event: 'tool_not_found',
        toolName
      },
      'tool_not_found'
    );
    throw new AppError(404, 'tool_not_found', `Unknown tool: ${toolName}`);
  }

  try {
    const result = await toolHandlers[toolName](args, context);

    context.logger.info(
      {
        event: 'tool_execution_completed',
        toolName,
        durationMs: Date.now() - startedAt,
        result: summarizeToolOutput(result)
      },
      'tool_execution_completed'
    );

    return result;
  } catch (error) {
    context.logger.error(
      {
        event: 'tool_execution_failed',
        toolName,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'tool_execution_failed'
    );

    if (error instanceof z.ZodError) {
      throw new AppError(400, 'validation_error', 'Tool input validation failed.', error.flatten());
    }
    if (error instanceof AppError) {
      throw error;
    }
    // Only the caller's own signal means cancellation; any other abort came from a backend timeout.
    if (isAbortError(error)) {
      if (context.signal?.aborted) {
        throw new AppError(499, 'request_cancelled', 'Request was cancelled by the caller.');
      }
      throw new AppError(504, 'tool_timeout', `Tool ${toolName} timed out.`, { toolName });
    }

    throw new AppError(500, 'tool_execution_failed', `Tool ${toolName} failed unexpectedly.`, {
      toolName,
      errorName: error instanceof Error ? error.name : typeof error,
      message: error instanceof Error ? error.message : String(error)
    });
  }
}
