// This module fetches HTTP(S) resources under strict timeout and payload limits and normalizes them by content type.

import type { FastifyBaseLogger } from 'fastify';
import type { McpResourceContent } from '../types/mcp.js';
import { createAbortScope, type AbortScope } from '../utils/abort.js';
import { AppError } from '../utils/errors.js';

export interface HttpResourceOptions {
  timeoutMs: number;
  maxBytes: number;
  signal?: AbortSignal;
  logger?: FastifyBaseLogger;
}

export interface HttpResourceResult extends McpResourceContent {
  kind: ContentKind;
  byteLength: number;
  truncated: boolean;
}

export type ContentKind = 'json' | 'text' | 'binary';

const TEXT_LIKE_TYPES = new Set([
  'application/xml',
  'application/javascript',
  'application/ecmascript',
  'application/x-yaml',
  'application/yaml',
  'application/x-www-form-urlencoded'
]);

// This helper strips media type parameters such as charset and lowercases the essence.
function mediaTypeEssence(contentType: string | null): string {
  return (contentType ?? '').split(';')[0].trim().toLowerCase();
}

// This helper decides how one response body is surfaced from its declared content type.
export function sniffContentKind(contentType: string | null): ContentKind {
  const essence = mediaTypeEssence(contentType);
  if (essence.length === 0) {
    return 'text';
  }

  if (essence === 'application/json' || essence.endsWith('+json')) {
    return 'json';
  }

  if (essence.startsWith('text/') || essence.endsWith('+xml') || TEXT_LIKE_TYPES.has(essence)) {
    return 'text';
  }

  return 'binary';
}

// This helper clips a UTF-8 response to one deterministic upper byte bound.
function decodeBoundedBody(view: Uint8Array, maxBytes: number): string {
  const clipped = view.byteLength > maxBytes ? view.slice(0, maxBytes) : view;
  return new TextDecoder('utf-8', { fatal: false }).decode(clipped);
}

function transportError(error: unknown, scope: AbortScope, uri: string, options: HttpResourceOptions): AppError {
  const cause = scope.cause();
  if (cause === 'timeout') {
    return new AppError(504, 'resource_timeout', `Resource ${uri} timed out after ${options.timeoutMs}ms.`);
  }
  if (cause === 'cancelled') {
    return new AppError(499, 'request_cancelled', `Reading resource ${uri} was cancelled.`);
  }
  return new AppError(502, 'resource_read_failed', `Resource ${uri} could not be fetched.`, {
    reason: error instanceof Error ? error.message : 'unknown'
  });
}

// This function fetches one URL with GET and returns normalized resource content.
export async function fetchHttpResource(uri: string, options: HttpResourceOptions): Promise<HttpResourceResult> {
  const scope = createAbortScope(options.signal, options.timeoutMs);

  try {
    let response: Response;
    try {
      response = await fetch(uri, {
        method: 'GET',
        redirect: 'follow',
        signal: scope.signal,
        headers: {
          Accept: 'application/json, text/*;q=0.9, */*;q=0.5'
        }
      });
    } catch (error) {
      throw transportError(error, scope, uri, options);
    }

    if (response.status === 404) {
      throw new AppError(404, 'resource_not_found', `Resource not found: ${uri}`);
    }

    if (!response.ok) {
      throw new AppError(502, 'resource_read_failed', `Resource ${uri} returned HTTP ${response.status}.`, {
        status: response.status
      });
    }

    const contentType = response.headers.get('content-type');
    const kind = sniffContentKind(contentType);
    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw transportError(error, scope, uri, options);
    }
    const truncated = body.byteLength > options.maxBytes;

    options.logger?.debug(
      {
        event: 'resource_http_fetched',
        uri,
        status: response.status,
        contentType,
        kind,
        byteLength: body.byteLength,
        truncated
      },
      'resource_http_fetched'
    );

    if (kind === 'binary') {
      return {
        uri,
        kind,
        mimeType: 'application/json',
        text: JSON.stringify({ binary: true, contentType: mediaTypeEssence(contentType), byteLength: body.byteLength }),
        byteLength: body.byteLength,
        truncated: false
      };
    }

    const text = decodeBoundedBody(body, options.maxBytes);
    if (kind === 'json' && !truncated) {
      try {
        const parsed = JSON.parse(text) as unknown;
        return {
          uri,
          kind,
          mimeType: 'application/json',
          text: JSON.stringify(parsed, null, 2),
          byteLength: body.byteLength,
          truncated
        };
      } catch {
        options.logger?.debug({ event: 'resource_json_parse_fallback', uri }, 'resource_json_parse_fallback');
      }
    }

    return {
      uri,
      kind: 'text',
      mimeType: mediaTypeEssence(contentType) || 'text/plain',
      text,
      byteLength: body.byteLength,
      truncated
    };
  } finally {
    scope.dispose();
  }
}
