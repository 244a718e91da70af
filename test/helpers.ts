// Shared fixtures for the gateway test suites.

import type { FastifyBaseLogger } from 'fastify';
import pino from 'pino';
import { loadSettings, type AppSettings } from '../src/config/settings.js';
import { createGatewayRuntime, type GatewayRuntime } from '../src/runtime.js';
import type { CompletionResult, ProviderConfig, ToolCallRequest } from '../src/types/domain.js';

export const silentLogger: FastifyBaseLogger = pino({ level: 'silent' });

export function testSettings(env: Record<string, string> = {}): AppSettings {
  return loadSettings({ LOG_LEVEL: 'silent', AI_RETRY_BASE_DELAY_MS: '0', ...env });
}

export function testRuntime(env: Record<string, string> = {}): GatewayRuntime {
  return createGatewayRuntime(testSettings(env));
}

export const OPENAI_CONFIG: ProviderConfig = {
  kind: 'openai',
  baseUrl: 'https://api.openai.com/v1',
  model: 'gpt-4o-mini',
  apiVersion: '2024-06-01',
  anthropicVersion: '2023-06-01',
  timeoutMs: 5000,
  maxRetries: 0,
  retryBaseDelayMs: 0
};

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  });
}

// This helper builds an OpenAI chat-completions body with either text or tool calls.
export function openAiCompletion(options: {
  text?: string | null;
  toolCalls?: ToolCallRequest[];
  promptTokens?: number;
  completionTokens?: number;
}): Record<string, unknown> {
  const toolCalls = options.toolCalls ?? [];
  return {
    choices: [
      {
        message: {
          content: options.text ?? null,
          ...(toolCalls.length > 0
            ? {
                tool_calls: toolCalls.map((call) => ({
                  id: call.id,
                  type: 'function',
                  function: { name: call.name, arguments: call.rawArguments }
                }))
              }
            : {})
        },
        finish_reason: toolCalls.length > 0 ? 'tool_calls' : 'stop'
      }
    ],
    usage: {
      prompt_tokens: options.promptTokens ?? 0,
      completion_tokens: options.completionTokens ?? 0
    }
  };
}

export function completionResult(options: Partial<CompletionResult> = {}): CompletionResult {
  return {
    text: options.text ?? null,
    toolCalls: options.toolCalls ?? [],
    usage: options.usage ?? { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
    finishReason: options.finishReason ?? null,
    model: options.model ?? 'scripted-model'
  };
}

// This helper reads the JSON body of one recorded fetch call.
export function requestBody(init: RequestInit | undefined): Record<string, unknown> {
  const parsed: unknown = JSON.parse(typeof init?.body === 'string' ? init.body : '{}');
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Recorded request body is not a JSON object.');
  }
  return Object.fromEntries(Object.entries(parsed));
}

// This helper mirrors the error fetch rejects with once its signal aborts.
export function abortError(): Error {
  const error = new Error('The operation was aborted.');
  error.name = 'AbortError';
  return error;
}

// This fetch stand-in never answers and rejects only when its signal aborts.
export function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    signal?.addEventListener('abort', () => reject(abortError()), { once: true });
  });
}

// This fetch stand-in answers headers at once but its body stalls until the signal aborts.
export function stallingBodyFetch(contentType = 'application/json') {
  return async (_input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const signal = init?.signal;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        signal?.addEventListener('abort', () => controller.error(abortError()), { once: true });
      }
    });
    return new Response(body, { status: 200, headers: { 'content-type': contentType } });
  };
}

// This helper returns whatever a synchronous call throws, or undefined when it returns.
export function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}
