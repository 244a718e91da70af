// This module performs one AI provider round trip with timeout, cancellation, and bounded retries.

import { setTimeout as sleep } from 'node:timers/promises';
import type { FastifyBaseLogger } from 'fastify';
import type { CompletionResult, ProviderConfig, ProviderKind, TranscriptMessage } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';
import { createAbortScope, isAbortError } from '../utils/abort.js';
import { AppError } from '../utils/errors.js';
import { isPlainObject } from '../utils/json.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import type { TtlCache } from '../utils/ttl-cache.js';
import type { Provider, ProviderHttpRequest, ProviderToolSpec } from './types.js';

const MAX_ERROR_BODY_CHARS = 4000;

export interface CompletionRequest {
  transcript: readonly TranscriptMessage[];
  tools: readonly McpTool[];
  temperature?: number;
  maxTokens: number;
  signal?: AbortSignal;
}

// The orchestrator depends on this port only, so tests can script completions without HTTP.
export interface CompletionPort {
  readonly providerKind: ProviderKind;
  readonly model: string;
  complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface CompletionClientOptions {
  provider: Provider;
  config: ProviderConfig;
  apiKey: string;
  toolSpecCache?: TtlCache<ProviderToolSpec[]>;
  logger?: FastifyBaseLogger;
}

// This class executes provider completions for one configured endpoint and API key.
export class CompletionClient implements CompletionPort {
  private readonly provider: Provider;
  private readonly config: ProviderConfig;
  private readonly apiKey: string;
  private readonly toolSpecCache?: TtlCache<ProviderToolSpec[]>;
  private readonly logger?: FastifyBaseLogger;

  public constructor(options: CompletionClientOptions) {
    if (options.provider.kind !== options.config.kind) {
      throw new AppError(
        500,
        'internal_error',
        `Provider ${options.provider.kind} cannot serve a ${options.config.kind} configuration.`
      );
    }

    this.provider = options.provider;
    this.config = options.config;
    this.apiKey = options.apiKey;
    this.toolSpecCache = options.toolSpecCache;
    this.logger = options.logger?.child({
      component: 'completion_client',
      provider: options.config.kind
    });
  }

  public get providerKind(): ProviderKind {
    return this.config.kind;
  }

  public get model(): string {
    return this.config.model;
  }

  // This helper writes one structured client event only when a logger is available.
  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const sanitized = sanitizeForLog(details);
    const sanitizedDetails = isPlainObject(sanitized) ? sanitized : {};
    this.logger?.[level](
      {
        event,
        ...sanitizedDetails
      },
      event
    );
  }

  // This helper applies exponential backoff with jitter between retries.
  private async waitWithBackoff(attempt: number, signal?: AbortSignal): Promise<number> {
    const jitter = Math.floor(Math.random() * 100);
    const delay = this.config.retryBaseDelayMs * 2 ** attempt + jitter;
    try {
      await sleep(delay, undefined, { signal });
    } catch (error) {
      if (isAbortError(error)) {
        throw new AppError(499, 'request_cancelled', 'Request was cancelled by the caller.');
      }
      throw error;
    }
    return delay;
  }

  // Tool specs are keyed by endpoint identity and tool names; definitions are static per process.
  private translateTools(tools: readonly McpTool[]): ProviderToolSpec[] {
    if (tools.length === 0) {
      return [];
    }

    const key = [
      this.config.kind,
      this.config.baseUrl,
      this.config.model,
      tools.map((tool) => tool.name).join(',')
    ].join('|');

    if (!this.toolSpecCache) {
      return this.provider.translateTools(tools);
    }
    return this.toolSpecCache.getOrCreate(key, () => this.provider.translateTools(tools));
  }

  public async complete(request: CompletionRequest): Promise<CompletionResult> {
    const httpRequest = this.provider.buildRequest(
      {
        transcript: request.transcript,
        tools: this.translateTools(request.tools),
        temperature: request.temperature,
        maxTokens: request.maxTokens
      },
      this.config,
      this.apiKey
    );

    const payload = await this.send(httpRequest, request.signal);
    const result = this.provider.parseResponse(payload);

    this.log('info', 'provider_completion_received', {
      model: result.model || this.config.model,
      finishReason: result.finishReason,
      toolCallCount: result.toolCalls.length,
      hasText: result.text !== null,
      usage: result.usage
    });

    return {
      ...result,
      model: result.model || this.config.model
    };
  }

  // This helper posts one request, retrying 429 and 5xx responses within the configured budget.
  private async send(httpRequest: ProviderHttpRequest, signal?: AbortSignal): Promise<unknown> {
    const maxAttempts = Math.max(1, this.config.maxRetries + 1);
    const startedAt = Date.now();
    const path = new URL(httpRequest.url).pathname;

    this.log('info', 'provider_request_started', {
      path,
      model: this.config.model,
      maxAttempts
    });

    for (let attempt = 0; attempt < maxAttempts; attempt += 1) {
      const attemptNumber = attempt + 1;
      const scope = createAbortScope(signal, this.config.timeoutMs);
      const hasAttemptsLeft = attempt < maxAttempts - 1;

      try {
        let response: Response;
        let text: string;
        try {
          response = await fetch(httpRequest.url, {
            method: 'POST',
            headers: httpRequest.headers,
            body: JSON.stringify(httpRequest.body),
            signal: scope.signal
          });
          text = await response.text();
        } catch (error) {
          const cause = scope.cause();
          if (cause === 'timeout') {
            throw new AppError(504, 'upstream_timeout', `Provider ${this.config.kind} request timed out.`, {
              provider: this.config.kind,
              timeoutMs: this.config.timeoutMs
            });
          }
          if (cause === 'cancelled') {
            throw new AppError(499, 'request_cancelled', 'Request was cancelled by the caller.');
          }
          if (hasAttemptsLeft) {
            const delayMs = await this.waitWithBackoff(attempt, signal);
            this.log('warn', 'provider_request_retry_scheduled', {
              attempt: attemptNumber,
              delayMs,
              error: errorForLog(error)
            });
            continue;
          }
          throw new AppError(502, 'upstream_network_error', `Provider ${this.config.kind} request failed.`, {
            provider: this.config.kind,
            reason: error instanceof Error ? error.message : 'unknown'
          });
        }

        this.log('debug', 'provider_request_attempt_response', {
          attempt: attemptNumber,
          status: response.status,
          durationMs: Date.now() - startedAt
        });

        if (!response.ok) {
          const retryable = response.status === 429 || (response.status >= 500 && response.status <= 599);
          if (retryable && hasAttemptsLeft) {
            const delayMs = await this.waitWithBackoff(attempt, signal);
            this.log('warn', 'provider_request_retry_scheduled', {
              attempt: attemptNumber,
              status: response.status,
              delayMs
            });
            continue;
          }

          this.log('error', 'provider_request_failed', {
            status: response.status,
            durationMs: Date.now() - startedAt
          });
          throw new AppError(502, 'upstream_provider_error', `Provider ${this.config.kind} returned HTTP ${response.status}.`, {
            provider: this.config.kind,
            status: response.status,
            body: text.slice(0, MAX_ERROR_BODY_CHARS)
          });
        }

        try {
          return JSON.parse(text) as unknown;
        } catch {
          throw new AppError(502, 'upstream_parse_error', `Provider ${this.config.kind} returned a non-JSON body.`, {
            provider: this.config.kind,
            excerpt: text.slice(0, 200)
          });
        }
      } finally {
        scope.dispose();
      }
    }

    throw new AppError(502, 'upstream_network_error', `Provider ${this.config.kind} request failed after retries.`, {
      provider: this.config.kind,
      attempts: maxAttempts
    });
  }
}
