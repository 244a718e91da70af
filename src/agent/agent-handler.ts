// This module validates natural-language agent requests, runs the orchestrator, and shapes agent envelopes.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import { executeTool } from '../mcp/tools.js';
import { buildToolList } from '../mcp/tool-schemas.js';
import type { GatewayRuntime } from '../runtime.js';
import type { OrchestrationStatus, ToolCallRecord, ToolCallRequest } from '../types/domain.js';
import { AppError, errorTypeOf, normalizeError, publicErrorCode, type ErrorType } from '../utils/errors.js';
import { errorForLog } from '../utils/logger.js';
import { buildCompletionClient } from './assistant.js';
import { runOrchestration, type ToolExecutor } from './orchestrator.js';

export const agentRequestSchema = z.object({
  input: z.string().trim().min(1).max(32_000),
  mode: z.enum(['agent', 'chat']).default('agent'),
  history: z
    .array(
      z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string()
      })
    )
    .max(100)
    .default([]),
  options: z
    .object({
      autoExecuteTools: z.boolean().default(true),
      maxToolCalls: z.number().int().min(1).max(50).optional(),
      includeToolResults: z.boolean().default(true),
      temperature: z.number().min(0).max(2).optional(),
      maxTokens: z.number().int().min(1).max(32_000).optional(),
      model: z.string().trim().min(1).max(200).optional()
    })
    .default({})
});

export type AgentRequest = z.infer<typeof agentRequestSchema>;

export interface AgentContext {
  runtime: GatewayRuntime;
  logger: FastifyBaseLogger;
  apiKey: string | null;
  signal?: AbortSignal;
}

export interface AgentSuccessEnvelope {
  response: string | null;
  execution: {
    toolCalls: Array<Omit<ToolCallRecord, 'result'> & { result?: unknown }>;
    toolsExecuted: number;
    iterations: number;
    status: OrchestrationStatus;
    pendingToolCalls: ToolCallRequest[];
  };
  metadata: {
    tokensUsed: number;
    duration: number;
    model: string;
    provider: string;
    sources: string[];
  };
  error: null;
}

export interface AgentErrorEnvelope {
  response: null;
  error: string;
  errorType: ErrorType;
  errorCode: string;
  details: unknown;
}

export type AgentEnvelope = AgentSuccessEnvelope | AgentErrorEnvelope;

// This function renders any failure as the agent error envelope.
export function agentErrorEnvelope(error: unknown): AgentErrorEnvelope {
  const appError = normalizeError(error);
  return {
    response: null,
    error: appError.message,
    errorType: errorTypeOf(appError),
    errorCode: publicErrorCode(appError),
    details: appError.details ?? null
  };
}

// This helper drops tool output from audit records when the caller asked for a lean response.
function presentToolCalls(records: readonly ToolCallRecord[], includeResults: boolean): AgentSuccessEnvelope['execution']['toolCalls'] {
  if (includeResults) {
    return [...records];
  }
  return records.map(({ result: _result, ...record }) => record);
}

// This function handles one agent request end to end and never throws.
export async function handleAgentRequest(payload: unknown, context: AgentContext): Promise<AgentEnvelope> {
  const startedAt = Date.now();
  const logger = context.logger.child({ component: 'agent' });

  try {
    const parsed = agentRequestSchema.safeParse(payload);
    if (!parsed.success) {
      throw new AppError(400, 'validation_error', 'Agent request is invalid.', parsed.error.flatten());
    }

    const request = parsed.data;
    if (!context.apiKey) {
      throw new AppError(
        401,
        'missing_api_key',
        'No AI provider API key was supplied. Send it as a Bearer token, x-api-key, or api-key header.'
      );
    }

    const settings = context.runtime.settings;
    const completion = buildCompletionClient(context.runtime, context.apiKey, request.options.model, logger);
    const tools: ToolExecutor = {
      execute: (name, args) =>
        executeTool(name, args, {
          runtime: context.runtime,
          logger,
          apiKey: context.apiKey,
          signal: context.signal
        })
    };

    logger.info(
      {
        event: 'agent_request_started',
        mode: request.mode,
        historyTurns: request.history.length,
        autoExecuteTools: request.options.autoExecuteTools,
        model: completion.model
      },
      'agent_request_started'
    );

    const result = await runOrchestration(
      {
        input: request.input,
        systemPrompt: settings.agent.systemPrompt,
        history: request.history,
        tools: request.mode === 'chat' ? [] : buildToolList(),
        autoExecuteTools: request.options.autoExecuteTools,
        maxIterations: request.options.maxToolCalls ?? settings.agent.maxIterations,
        temperature: request.options.temperature ?? settings.agent.temperature,
        maxTokens: request.options.maxTokens ?? settings.agent.maxTokens,
        signal: context.signal
      },
      { completion, tools, logger }
    );

    const duration = Date.now() - startedAt;
    logger.info(
      {
        event: 'agent_request_completed',
        status: result.status,
        iterations: result.iterations,
        toolsExecuted: result.toolsExecuted,
        tokensUsed: result.usage.totalTokens,
        durationMs: duration
      },
      'agent_request_completed'
    );

    return {
      response: result.response,
      execution: {
        toolCalls: presentToolCalls(result.toolCalls, request.options.includeToolResults),
        toolsExecuted: result.toolsExecuted,
        iterations: result.iterations,
        status: result.status,
        pendingToolCalls: result.pendingToolCalls
      },
      metadata: {
        tokensUsed: result.usage.totalTokens,
        duration,
        model: result.model,
        provider: completion.providerKind,
        sources: result.sources
      },
      error: null
    };
  } catch (error) {
    const envelope = agentErrorEnvelope(error);
    logger.warn(
      {
        event: 'agent_request_failed',
        errorType: envelope.errorType,
        errorCode: envelope.errorCode,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      },
      'agent_request_failed'
    );
    return envelope;
  }
}
