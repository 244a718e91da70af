// This module defines the provider capability interface that isolates each AI back end's wire format.

import type { CompletionResult, ProviderConfig, ProviderKind, ToolCallRequest, TranscriptMessage } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';

export interface OpenAiToolSpec {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface AnthropicToolSpec {
  name: string;
  description: string;
  input_schema: Record<string, unknown>;
}

export type ProviderToolSpec = OpenAiToolSpec | AnthropicToolSpec;

export interface ProviderRequestParams {
  transcript: readonly TranscriptMessage[];
  tools: readonly ProviderToolSpec[];
  temperature?: number;
  maxTokens: number;
}

export interface ProviderHttpRequest {
  url: string;
  headers: Record<string, string>;
  body: Record<string, unknown>;
}

export interface Provider {
  readonly kind: ProviderKind;
  translateTools(tools: readonly McpTool[]): ProviderToolSpec[];
  buildRequest(params: ProviderRequestParams, config: ProviderConfig, apiKey: string): ProviderHttpRequest;
  parseResponse(payload: unknown): CompletionResult;
  extractToolCalls(payload: unknown): ToolCallRequest[];
}
