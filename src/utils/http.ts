// This module performs tool backend HTTP calls and maps transport failures onto tool error codes.

import type { FastifyBaseLogger } from 'fastify';
import { createAbortScope, type AbortScope } from './abort.js';
import { AppError } from './errors.js';
import { sanitizeForLog } from './logger.js';

export interface FetchJsonOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
  logger?: FastifyBaseLogger;
  label: string;
}

const MAX_ERROR_BODY_CHARS = 2000;

function transportError(error: unknown, scope: AbortScope, options: FetchJsonOptions): AppError {
  const cause = scope.cause();
  if (cause === 'timeout') {
    return new AppError(504, 'tool_timeout', `${options.label} request timed out after ${options.timeoutMs}ms.`);
  }
  if (cause === 'cancelled') {
    return new AppError(499, 'request_cancelled', `${options.label} request was cancelled.`);
  }
  return new AppError(502, 'tool_network_error', `${options.label} request failed.`, {
    reason: error instanceof Error ? error.message : 'unknown'
  });
}

// This helper executes one GET request and returns the parsed JSON body.
// The timeout covers the body read as well as the response headers.
export async function fetchJson(url: string | URL, options: FetchJsonOptions): Promise<unknown> {
  const scope = createAbortScope(options.signal, options.timeoutMs);
  const startedAt = Date.now();

  try {
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          ...options.headers
        },
        signal: scope.signal
      });
      text = await response.text();
    } catch (error) {
      throw transportError(error, scope, options);
    }

    options.logger?.debug(
      {
        event: 'tool_backend_response',
        label: options.label,
        status: response.status,
        durationMs: Date.now() - startedAt
      },
      'tool_backend_response'
    );

    if (!response.ok) {
      throw new AppError(
        502,
        'tool_network_error',
        `${options.label} returned HTTP ${response.status}.`,
        sanitizeForLog({ status: response.status, body: text.slice(0, MAX_ERROR_BODY_CHARS) })
      );
    }

    try {
      return JSON.parse(text) as unknown;
    } catch {
      throw new AppError(502, 'tool_parse_error', `${options.label} returned a malformed JSON body.`, {
        excerpt: text.slice(0, 200)
      });
    }
  } finally {
    scope.dispose();
  }
}
