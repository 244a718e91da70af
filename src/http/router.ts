// This module classifies raw inbound bodies and routes them to the MCP or agent handler.

import type { FastifyBaseLogger, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { agentErrorEnvelope, handleAgentRequest, type AgentEnvelope } from '../agent/agent-handler.js';
import { handleRpcBatch, handleRpcPayload, rpcError } from '../mcp/protocol.js';
import type { GatewayRuntime } from '../runtime.js';
import { JSON_RPC_ERRORS, MCP_METHODS, type JsonRpcResponse } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog } from '../utils/logger.js';
import { MCP_SERVER_NAME } from '../version.js';
import { resolveProviderApiKey } from './auth.js';

export type RequestKind = 'batch' | 'mcp' | 'agent' | 'unrecognized';

export interface Classification {
  kind: RequestKind;
  payload: unknown;
  upgraded: boolean;
}

export interface RouteContext {
  runtime: GatewayRuntime;
  logger: FastifyBaseLogger;
  apiKey: string | null;
  signal?: AbortSignal;
}

export type RouteResponse = JsonRpcResponse | JsonRpcResponse[] | AgentEnvelope;

const DISCRIMINATOR_FIELDS = ['jsonrpc', 'mode', 'input', 'method'] as const;

// This function decides which handler owns a parsed body; a bare method is upgraded to JSON-RPC 2.0.
export function classifyPayload(payload: unknown): Classification {
  if (Array.isArray(payload)) {
    return { kind: 'batch', payload, upgraded: false };
  }
  if (!isPlainObject(payload)) {
    return { kind: 'unrecognized', payload, upgraded: false };
  }
  if ('jsonrpc' in payload) {
    return { kind: 'mcp', payload, upgraded: false };
  }
  if ('mode' in payload || 'input' in payload) {
    return { kind: 'agent', payload, upgraded: false };
  }
  if ('method' in payload) {
    return { kind: 'mcp', payload: { ...payload, jsonrpc: '2.0' }, upgraded: true };
  }
  return { kind: 'unrecognized', payload, upgraded: false };
}

// This helper parses raw text and reports a parse failure without throwing.
function parseBody(rawBody: string): { ok: true; value: unknown } | { ok: false; message: string } {
  try {
    return { ok: true, value: JSON.parse(rawBody) };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : 'Body is not valid JSON.' };
  }
}

// This function produces exactly one response body for one raw request; it never throws.
export async function routeRequest(rawBody: string, context: RouteContext): Promise<RouteResponse> {
  const parsed = parseBody(rawBody);
  if (!parsed.ok) {
    context.logger.warn({ event: 'router_invalid_json', reason: parsed.message }, 'router_invalid_json');
    return rpcError(null, JSON_RPC_ERRORS.parseError, 'Parse error: request body is not valid JSON.', {
      errorCode: 'INVALID_JSON',
      reason: parsed.message
    });
  }

  const classification = classifyPayload(parsed.value);
  context.logger.info(
    {
      event: 'router_request_classified',
      kind: classification.kind,
      upgraded: classification.upgraded
    },
    'router_request_classified'
  );

  try {
    switch (classification.kind) {
      case 'batch':
        return await handleRpcBatch(Array.isArray(classification.payload) ? classification.payload : [], context);
      case 'mcp':
        return await handleRpcPayload(classification.payload, context);
      case 'agent':
        return await handleAgentRequest(classification.payload, context);
      case 'unrecognized':
        return agentErrorEnvelope(
          new AppError(
            400,
            'unrecognized_request',
            'Request could not be classified. Send a JSON-RPC 2.0 object with "jsonrpc" and "method", or an agent request with "input".',
            { acceptedFields: [...DISCRIMINATOR_FIELDS] }
          )
        );
    }
  } catch (error) {
    context.logger.error({ event: 'router_request_failed', error: errorForLog(error) }, 'router_request_failed');
    if (classification.kind === 'agent') {
      return agentErrorEnvelope(error);
    }
    return rpcError(null, JSON_RPC_ERRORS.internalError, 'Internal error');
  }
}

// This helper ties request cancellation to the client connection closing before the reply is sent.
function createRequestSignal(request: FastifyRequest, reply: FastifyReply): AbortController {
  const controller = new AbortController();
  reply.raw.on('close', () => {
    if (!reply.raw.writableFinished) {
      request.log.info({ event: 'request_cancelled_by_client' }, 'request_cancelled_by_client');
      controller.abort();
    }
  });
  return controller;
}

// This function registers the gateway entry routes, transport discovery, and the disabled SSE route.
export function registerGatewayRoutes(fastify: FastifyInstance, runtime: GatewayRuntime): void {
  const handlePost = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const controller = createRequestSignal(request, reply);
    const rawBody = typeof request.body === 'string' ? request.body : '';
    const response = await routeRequest(rawBody, {
      runtime,
      logger: request.log.child({ component: 'router' }),
      apiKey: resolveProviderApiKey(request.headers, runtime.settings.fallbackApiKey),
      signal: controller.signal
    });

    reply.code(200).header('content-type', 'application/json; charset=utf-8').send(JSON.stringify(response));
  };

  fastify.post('/mcp', handlePost);
  fastify.post('/', handlePost);

  fastify.get('/mcp', async (request, reply) => {
    request.log.info({ event: 'mcp_transport_discovery' }, 'mcp_transport_discovery');
    reply.send({
      name: MCP_SERVER_NAME,
      transport: 'streamable-http',
      endpoint: '/mcp',
      methods: [...MCP_METHODS],
      agent: {
        endpoint: '/mcp',
        discriminator: 'input'
      }
    });
  });

  // This route keeps SSE transport disabled because this service answers over plain request/response HTTP.
  fastify.get('/mcp/sse', async (request, reply) => {
    request.log.info({ event: 'mcp_sse_disabled_requested' }, 'mcp_sse_disabled_requested');
    reply.code(410).send({
      error: 'sse_disabled',
      message: 'SSE transport is disabled. Use Streamable HTTP at /mcp.'
    });
  });
}
