// This module implements the stateless MCP JSON-RPC dispatcher for single requests and batches.

import { randomUUID } from 'node:crypto';
import type { FastifyBaseLogger } from 'fastify';
import { listResources, listResourceTemplates } from '../resources/catalog.js';
import { readResource } from '../resources/reader.js';
import type { GatewayRuntime } from '../runtime.js';
import {
  JSON_RPC_ERRORS,
  MCP_METHODS,
  type JsonRpcError,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type McpMethod
} from '../types/mcp.js';
import { AppError, errorTypeOf, normalizeError, toolFailureKindOf } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { completePromptArgument } from './completion.js';
import { getPrompt, listPrompts } from './prompts.js';
import { buildToolList } from './tool-schemas.js';
import { executeTool } from './tools.js';

export interface McpContext {
  runtime: GatewayRuntime;
  logger: FastifyBaseLogger;
  apiKey: string | null;
  signal?: AbortSignal;
}

type RpcParams = Record<string, unknown>;
type RpcMethodHandler = (params: RpcParams, context: McpContext) => Promise<unknown>;

type ValidationResult = { ok: true; request: JsonRpcRequest } | { ok: false; response: JsonRpcResponse };

const TOOL_ERROR_CODES = new Set(['tool_network_error', 'tool_timeout', 'tool_execution_failed', 'tool_not_configured']);

// This helper creates a canonical JSON-RPC error payload.
export function rpcError(id: JsonRpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return {
    jsonrpc: '2.0',
    error,
    id
  };
}

function isRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

function isMcpMethod(method: string): method is McpMethod {
  return (MCP_METHODS as readonly string[]).includes(method);
}

// This helper maps internal application errors into JSON-RPC error code ranges.
export function mapAppErrorToRpc(error: AppError): JsonRpcError {
  switch (error.code) {
    case 'validation_error':
    case 'invalid_params':
      return { code: JSON_RPC_ERRORS.invalidParams, message: error.message, data: error.details };
    case 'tool_not_found':
    case 'method_not_found':
    case 'subscriptions_unsupported':
      return { code: JSON_RPC_ERRORS.methodNotFound, message: error.message };
    case 'tool_parse_error':
      return { code: JSON_RPC_ERRORS.parseError, message: error.message, data: error.details };
    case 'missing_api_key':
      return { code: JSON_RPC_ERRORS.unauthorized, message: error.message };
    case 'resource_not_found':
      return { code: JSON_RPC_ERRORS.resourceNotFound, message: error.message, data: error.details };
    case 'internal_error':
      return { code: JSON_RPC_ERRORS.internalError, message: 'Internal error' };
  }

  if (TOOL_ERROR_CODES.has(error.code)) {
    return {
      code: JSON_RPC_ERRORS.serverError,
      message: error.message,
      data: {
        errorType: errorTypeOf(error),
        kind: toolFailureKindOf(error),
        errorCode: error.code,
        details: error.details
      }
    };
  }

  if (error.statusCode < 500 && error.code !== 'request_cancelled') {
    return { code: JSON_RPC_ERRORS.invalidParams, message: error.message, data: error.details };
  }

  return {
    code: JSON_RPC_ERRORS.serverError,
    message: error.message,
    data: { errorType: errorTypeOf(error), errorCode: error.code, details: error.details }
  };
}

// This helper reads one required string parameter or raises invalid params.
function requireString(params: RpcParams, key: string, method: string): string {
  const value = params[key];
  if (typeof value !== 'string' || value.length === 0) {
    throw new AppError(400, 'invalid_params', `${method} requires params.${key} as string.`);
  }
  return value;
}

function rejectSubscription(): Promise<never> {
  return Promise.reject(
    new AppError(
      404,
      'subscriptions_unsupported',
      'Resource subscriptions are not supported: this server answers over synchronous request/response HTTP and cannot push notifications.'
    )
  );
}

const methodHandlers: Record<McpMethod, RpcMethodHandler> = {
  initialize: async (params) => ({
    protocolVersion: typeof params.protocolVersion === 'string' ? params.protocolVersion : MCP_PROTOCOL_VERSION,
    capabilities: {
      tools: { listChanged: false },
      resources: { subscribe: false, listChanged: false },
      prompts: { listChanged: false },
      completions: {}
    },
    serverInfo: {
      name: MCP_SERVER_NAME,
      version: MCP_SERVER_VERSION
    }
  }),
  initialized: async () => ({}),
  'notifications/initialized': async () => ({}),
  ping: async () => ({}),
  'tools/list': async () => ({ tools: buildToolList() }),
  'tools/call': async (params, context) => {
    const name = requireString(params, 'name', 'tools/call');
    context.logger.info(
      {
        event: 'mcp_tool_call_requested',
        toolName: name,
        arguments: sanitizeForLog(params.arguments ?? {})
      },
      'mcp_tool_call_requested'
    );
    return executeTool(name, params.arguments ?? {}, {
      runtime: context.runtime,
      logger: context.logger,
      apiKey: context.apiKey,
      signal: context.signal
    });
  },
  'resources/list': async (_params, context) => ({ resources: listResources(context.runtime.settings) }),
  'resources/templates/list': async () => ({ resourceTemplates: listResourceTemplates() }),
  'resources/read': async (params, context) => {
    const uri = requireString(params, 'uri', 'resources/read');
    const content = await readResource(uri, {
      settings: context.runtime.settings,
      logger: context.logger,
      signal: context.signal
    });
    return { contents: [content] };
  },
  'resources/subscribe': rejectSubscription,
  'resources/unsubscribe': rejectSubscription,
  'prompts/list': async () => ({ prompts: listPrompts() }),
  'prompts/get': async (params) => getPrompt(requireString(params, 'name', 'prompts/get'), params.arguments),
  'completion/complete': async (params) => ({ completion: completePromptArgument(params) })
};

// This function checks the JSON-RPC envelope shape before any dispatch.
export function validateRpcRequest(payload: unknown): ValidationResult {
  if (!isPlainObject(payload)) {
    return { ok: false, response: rpcError(null, JSON_RPC_ERRORS.invalidRequest, 'Request must be a JSON object.') };
  }

  const id = isRpcId(payload.id) ? payload.id : null;

  if (payload.id !== undefined && !isRpcId(payload.id)) {
    return { ok: false, response: rpcError(null, JSON_RPC_ERRORS.invalidRequest, 'id must be a string, number, or null.') };
  }
  if (payload.jsonrpc !== '2.0') {
    return { ok: false, response: rpcError(id, JSON_RPC_ERRORS.invalidRequest, 'jsonrpc must be exactly "2.0".') };
  }
  if (typeof payload.method !== 'string' || payload.method.length === 0) {
    return { ok: false, response: rpcError(id, JSON_RPC_ERRORS.invalidRequest, 'method must be a non-empty string.') };
  }

  const params = payload.params;
  if (params !== undefined && params !== null && typeof params !== 'object') {
    return {
      ok: false,
      response: rpcError(id, JSON_RPC_ERRORS.invalidRequest, 'params must be an object, an array, or null.')
    };
  }

  const request: JsonRpcRequest = {
    jsonrpc: '2.0',
    method: payload.method,
    params: isPlainObject(params) || Array.isArray(params) ? params : null
  };
  if (payload.id !== undefined) {
    request.id = id;
  }
  return { ok: true, request };
}

// This function validates and dispatches one JSON-RPC payload; it never throws.
export async function handleRpcPayload(payload: unknown, context: McpContext): Promise<JsonRpcResponse> {
  const validation = validateRpcRequest(payload);
  if (!validation.ok) {
    context.logger.warn(
      {
        event: 'mcp_rpc_request_invalid',
        response: validation.response
      },
      'mcp_rpc_request_invalid'
    );
    return validation.response;
  }

  const request = validation.request;
  const requestId = request.id ?? null;
  const startedAt = Date.now();
  const rpcTraceId = randomUUID();
  const logger = context.logger.child({ rpcTraceId, rpcRequestId: requestId, method: request.method });

  logger.info({ event: 'mcp_rpc_request_received', notification: request.id === undefined }, 'mcp_rpc_request_received');

  try {
    if (!isMcpMethod(request.method)) {
      return rpcError(requestId, JSON_RPC_ERRORS.methodNotFound, `Unknown method: ${request.method}`);
    }

    // Positional params carry no names the methods read, so they behave like an empty object.
    const params = isPlainObject(request.params) ? request.params : {};
    const result = await methodHandlers[request.method](params, { ...context, logger });
    return {
      jsonrpc: '2.0',
      result,
      id: requestId
    };
  } catch (error) {
    const appError = normalizeError(error);
    const mapped = mapAppErrorToRpc(appError);

    logger.error(
      {
        event: 'mcp_rpc_request_failed',
        code: appError.code,
        rpcCode: mapped.code,
        statusCode: appError.statusCode,
        details: sanitizeForLog(appError.details),
        error: errorForLog(error),
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_failed'
    );

    return rpcError(requestId, mapped.code, mapped.message, mapped.data);
  } finally {
    logger.info(
      {
        event: 'mcp_rpc_request_completed',
        durationMs: Date.now() - startedAt
      },
      'mcp_rpc_request_completed'
    );
  }
}

// This function processes a batch item by item in order.
export async function handleRpcBatch(items: readonly unknown[], context: McpContext): Promise<JsonRpcResponse | JsonRpcResponse[]> {
  if (items.length === 0) {
    return rpcError(null, JSON_RPC_ERRORS.invalidRequest, 'Batch must contain at least one request.');
  }

  context.logger.info({ event: 'mcp_batch_received', batchSize: items.length }, 'mcp_batch_received');

  const responses: JsonRpcResponse[] = [];
  for (const item of items) {
    responses.push(await handleRpcPayload(item, context));
  }
  return responses;
}
