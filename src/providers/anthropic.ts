// This module speaks the Anthropic messages dialect: top-level system text, tool_use blocks, and tool_result blocks.

import { z } from 'zod';
import type { CompletionResult, ProviderConfig, ProviderKind, ToolCallRequest, TranscriptMessage } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';
import { parseToolArguments } from '../utils/json.js';
import { buildUsage, parseProviderPayload } from './payload.js';
import type { AnthropicToolSpec, Provider, ProviderHttpRequest, ProviderRequestParams } from './types.js';

type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

interface AnthropicMessage {
  role: 'user' | 'assistant';
  content: string | AnthropicContentBlock[];
}

// Unknown block types (for example thinking blocks) are tolerated and skipped.
const anthropicResponseSchema = z.object({
  model: z.string().optional(),
  content: z.array(
    z
      .object({
        type: z.string(),
        text: z.string().optional(),
        id: z.string().optional(),
        name: z.string().optional(),
        input: z.unknown().optional()
      })
      .passthrough()
  ),
  stop_reason: z.string().nullable().optional(),
  usage: z
    .object({
      input_tokens: z.number().optional(),
      output_tokens: z.number().optional()
    })
    .optional()
});

type AnthropicResponse = z.infer<typeof anthropicResponseSchema>;

// This helper appends one tool result to the trailing tool-result user message, or opens a new one.
function appendToolResult(messages: AnthropicMessage[], block: Extract<AnthropicContentBlock, { type: 'tool_result' }>): void {
  const last = messages[messages.length - 1];
  if (
    last &&
    last.role === 'user' &&
    Array.isArray(last.content) &&
    last.content.every((entry) => entry.type === 'tool_result')
  ) {
    last.content.push(block);
    return;
  }

  messages.push({ role: 'user', content: [block] });
}

// This function converts a neutral transcript into the system field plus alternating messages.
export function toAnthropicMessages(transcript: readonly TranscriptMessage[]): {
  system: string | null;
  messages: AnthropicMessage[];
} {
  const systemParts: string[] = [];
  const messages: AnthropicMessage[] = [];

  for (const message of transcript) {
    switch (message.role) {
      case 'system':
        systemParts.push(message.content);
        break;
      case 'user':
        messages.push({ role: 'user', content: message.content });
        break;
      case 'assistant': {
        const blocks: AnthropicContentBlock[] = [];
        if (message.content && message.content.length > 0) {
          blocks.push({ type: 'text', text: message.content });
        }
        for (const call of message.toolCalls) {
          blocks.push({
            type: 'tool_use',
            id: call.id,
            name: call.name,
            input: parseToolArguments(call.rawArguments).arguments
          });
        }
        if (blocks.length > 0) {
          messages.push({ role: 'assistant', content: blocks });
        }
        break;
      }
      case 'tool':
        appendToolResult(messages, {
          type: 'tool_result',
          tool_use_id: message.toolCallId,
          content: message.content,
          ...(message.isError ? { is_error: true } : {})
        });
        break;
    }
  }

  return {
    system: systemParts.length > 0 ? systemParts.join('\n\n') : null,
    messages
  };
}

export class AnthropicProvider implements Provider {
  public readonly kind: ProviderKind = 'anthropic';

  public translateTools(tools: readonly McpTool[]): AnthropicToolSpec[] {
    return tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.inputSchema
    }));
  }

  public buildRequest(params: ProviderRequestParams, config: ProviderConfig, apiKey: string): ProviderHttpRequest {
    const { system, messages } = toAnthropicMessages(params.transcript);
    const body: Record<string, unknown> = {
      model: config.model,
      max_tokens: params.maxTokens,
      messages
    };

    if (system) {
      body.system = system;
    }
    if (params.temperature !== undefined) {
      // Anthropic accepts temperatures in [0, 1].
      body.temperature = Math.min(1, params.temperature);
    }
    if (params.tools.length > 0) {
      body.tools = params.tools;
    }

    const path = config.baseUrl.endsWith('/v1') ? '/messages' : '/v1/messages';
    return {
      url: `${config.baseUrl}${path}`,
      headers: {
        'x-api-key': apiKey,
        'anthropic-version': config.anthropicVersion,
        'Content-Type': 'application/json'
      },
      body
    };
  }

  public parseResponse(payload: unknown): CompletionResult {
    const response = parseProviderPayload(anthropicResponseSchema, payload, this.kind);
    const text = response.content
      .filter((block) => block.type === 'text' && typeof block.text === 'string')
      .map((block) => block.text ?? '')
      .join('\n');

    return {
      text: text.length > 0 ? text : null,
      toolCalls: this.readToolCalls(response),
      usage: buildUsage(response.usage?.input_tokens, response.usage?.output_tokens),
      finishReason: response.stop_reason ?? null,
      model: response.model ?? ''
    };
  }

  public extractToolCalls(payload: unknown): ToolCallRequest[] {
    return this.readToolCalls(parseProviderPayload(anthropicResponseSchema, payload, this.kind));
  }

  private readToolCalls(response: AnthropicResponse): ToolCallRequest[] {
    const calls: ToolCallRequest[] = [];
    for (const block of response.content) {
      if (block.type !== 'tool_use' || !block.id || !block.name) {
        continue;
      }
      calls.push({
        id: block.id,
        name: block.name,
        rawArguments: JSON.stringify(block.input ?? {})
      });
    }
    return calls;
  }
}
