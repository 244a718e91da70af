// This module builds the Fastify application: body handling, request logging, health routes and the gateway endpoints.

import Fastify, { type FastifyInstance, type FastifyRequest } from 'fastify';
import type { AppSettings } from './config/settings.js';
import { registerGatewayRoutes } from './http/router.js';
import { createGatewayRuntime, type GatewayRuntime } from './runtime.js';
import { AppError, normalizeError } from './utils/errors.js';
import { buildLoggerOptions, errorForLog, sanitizeForLog } from './utils/logger.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from './version.js';

const MAX_BODY_BYTES = 1024 * 1024;

export interface ServerResources {
  app: FastifyInstance;
  runtime: GatewayRuntime;
}

interface HttpErrorBody {
  ok: false;
  error: {
    code: string;
    message: string;
  };
}

const requestStartTimes = new WeakMap<FastifyRequest, bigint>();

function requestFields(request: FastifyRequest): Record<string, unknown> {
  return {
    requestId: request.id,
    method: request.method,
    path: request.url
  };
}

function elapsedMs(request: FastifyRequest): number | undefined {
  const startedAt = requestStartTimes.get(request);
  return startedAt === undefined ? undefined : Number(process.hrtime.bigint() - startedAt) / 1_000_000;
}

function httpErrorBody(code: string, message: string): HttpErrorBody {
  return { ok: false, error: { code, message } };
}

// Credential headers are reduced to a boolean; provider keys never reach the log.
function describeHeaders(request: FastifyRequest): unknown {
  const { headers } = request;
  return sanitizeForLog({
    host: headers.host ?? null,
    userAgent: headers['user-agent'] ?? null,
    contentType: headers['content-type'] ?? null,
    contentLength: headers['content-length'] ?? null,
    forwardedFor: headers['x-forwarded-for'] ?? null,
    carriesCredentials: Boolean(headers.authorization ?? headers['x-api-key'] ?? headers['api-key'])
  });
}

function registerRequestLogging(app: FastifyInstance): void {
  app.addHook('onRequest', async (request) => {
    requestStartTimes.set(request, process.hrtime.bigint());
    request.log.info({ event: 'http_request_start', ...requestFields(request), ip: request.ip }, 'http_request_start');
    request.log.debug({ event: 'http_request_headers', requestId: request.id, headers: describeHeaders(request) }, 'http_request_headers');
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        event: 'http_request_complete',
        ...requestFields(request),
        statusCode: reply.statusCode,
        durationMs: elapsedMs(request)
      },
      'http_request_complete'
    );
  });

  app.addHook('onTimeout', async (request) => {
    request.log.warn({ event: 'http_request_timeout', ...requestFields(request), durationMs: elapsedMs(request) }, 'http_request_timeout');
  });
}

export function createServer(settings: AppSettings): ServerResources {
  const runtime = createGatewayRuntime(settings);
  const app = Fastify({
    logger: buildLoggerOptions(settings.logLevel),
    bodyLimit: MAX_BODY_BYTES,
    trustProxy: true
  });

  // The router parses JSON itself so malformed bodies still get a JSON-RPC parse error.
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, typeof body === 'string' ? body : String(body));
  });

  registerRequestLogging(app);

  app.get('/health', async () => ({
    ok: true,
    status: 'alive',
    ts: new Date().toISOString()
  }));

  app.get('/version', async () => ({
    ok: true,
    name: MCP_SERVER_NAME,
    version: MCP_SERVER_VERSION,
    protocolVersion: MCP_PROTOCOL_VERSION,
    provider: settings.provider.kind
  }));

  registerGatewayRoutes(app, runtime);

  // Framework failures such as oversized bodies surface here; gateway routes answer their own errors.
  app.setErrorHandler((error, request, reply) => {
    const normalized = normalizeError(error);
    const known = error instanceof AppError;
    const status = known ? normalized.statusCode : (error.statusCode ?? normalized.statusCode);
    const code = known ? normalized.code : (error.code ?? normalized.code);

    request.log.error(
      {
        event: 'http_request_failed',
        ...requestFields(request),
        code,
        details: sanitizeForLog(normalized.details),
        error: errorForLog(error)
      },
      'http_request_failed'
    );

    reply.status(status).send(httpErrorBody(code, normalized.message));
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ event: 'http_route_not_found', ...requestFields(request) }, 'http_route_not_found');
    reply.status(404).send(httpErrorBody('not_found', `Route not found: ${request.method} ${request.url}`));
  });

  return { app, runtime };
}
