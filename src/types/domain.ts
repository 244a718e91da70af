// This file defines provider, transcript, and orchestration types shared by the agent and MCP paths.

import type { ToolFailureKind } from '../utils/errors.js';

export type ProviderKind = 'openai' | 'azure-openai' | 'anthropic';

export interface ProviderConfig {
  kind: ProviderKind;
  baseUrl: string;
  model: string;
  apiVersion: string;
  anthropicVersion: string;
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

// One tool invocation requested by a model; the id is kept verbatim so results correlate back.
export interface ToolCallRequest {
  id: string;
  name: string;
  rawArguments: string;
}

export type TranscriptMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string | null; toolCalls: ToolCallRequest[] }
  | { role: 'tool'; toolCallId: string; toolName: string; content: string; isError: boolean };

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface CompletionResult {
  text: string | null;
  toolCalls: ToolCallRequest[];
  usage: TokenUsage;
  finishReason: string | null;
  model: string;
}

export interface ToolCallFailure {
  code: string;
  kind: ToolFailureKind;
  message: string;
}

export interface ToolCallRecord {
  id: string;
  tool: string;
  arguments: Record<string, unknown>;
  argumentsMalformed: boolean;
  success: boolean;
  result?: unknown;
  error?: ToolCallFailure;
  durationMs: number;
}

export type OrchestrationStatus = 'completed' | 'max_iterations' | 'awaiting_approval';

export interface HistoryTurn {
  role: 'user' | 'assistant';
  content: string;
}
