// This module speaks the OpenAI chat-completions dialect: inline system messages, function tools, role=tool results.

import { z } from 'zod';
import type { CompletionResult, ProviderConfig, ProviderKind, ToolCallRequest, TranscriptMessage } from '../types/domain.js';
import type { McpTool } from '../types/mcp.js';
import { buildUsage, parseProviderPayload } from './payload.js';
import type { OpenAiToolSpec, Provider, ProviderHttpRequest, ProviderRequestParams } from './types.js';

type OpenAiMessage =
  | { role: 'system' | 'user'; content: string }
  | {
      role: 'assistant';
      content: string | null;
      tool_calls?: Array<{ id: string; type: 'function'; function: { name: string; arguments: string } }>;
    }
  | { role: 'tool'; tool_call_id: string; content: string };

const contentPartSchema = z.object({ type: z.string().optional(), text: z.string().optional() }).passthrough();

const openAiResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.union([z.string(), z.array(contentPartSchema)]).nullable().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.string().optional(),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().nullable().optional()
                })
              })
            )
            .nullable()
            .optional()
        }),
        finish_reason: z.string().nullable().optional()
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
      total_tokens: z.number().optional()
    })
    .nullable()
    .optional()
});

type OpenAiResponse = z.infer<typeof openAiResponseSchema>;

// This helper flattens string or content-part message bodies into plain text.
function readMessageText(content: OpenAiResponse['choices'][number]['message']['content']): string | null {
  if (typeof content === 'string') {
    return content;
  }

  if (Array.isArray(content)) {
    const parts = content.map((part) => part.text ?? '').filter((part) => part.length > 0);
    return parts.length > 0 ? parts.join('\n') : null;
  }

  return null;
}

function toOpenAiMessage(message: TranscriptMessage): OpenAiMessage {
  switch (message.role) {
    case 'system':
    case 'user':
      return { role: message.role, content: message.content };
    case 'assistant':
      if (message.toolCalls.length === 0) {
        return { role: 'assistant', content: message.content };
      }
      return {
        role: 'assistant',
        content: message.content,
        tool_calls: message.toolCalls.map((call) => ({
          id: call.id,
          type: 'function',
          function: { name: call.name, arguments: call.rawArguments }
        }))
      };
    case 'tool':
      return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
  }
}

export class OpenAiProvider implements Provider {
  public readonly kind: ProviderKind = 'openai';

  public translateTools(tools: readonly McpTool[]): OpenAiToolSpec[] {
    return tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.inputSchema
      }
    }));
  }

  public buildRequest(params: ProviderRequestParams, config: ProviderConfig, apiKey: string): ProviderHttpRequest {
    const body: Record<string, unknown> = {
      messages: params.transcript.map(toOpenAiMessage),
      max_tokens: params.maxTokens
    };

    if (this.includeModelInBody()) {
      body.model = config.model;
    }
    if (params.temperature !== undefined) {
      body.temperature = params.temperature;
    }
    if (params.tools.length > 0) {
      body.tools = params.tools;
      body.tool_choice = 'auto';
    }

    return {
      url: this.buildUrl(config),
      headers: {
        ...this.buildAuthHeaders(apiKey),
        'Content-Type': 'application/json'
      },
      body
    };
  }

  public parseResponse(payload: unknown): CompletionResult {
    const response = parseProviderPayload(openAiResponseSchema, payload, this.kind);
    const choice = response.choices[0];

    return {
      text: readMessageText(choice.message.content),
      toolCalls: this.readToolCalls(response),
      usage: buildUsage(
        response.usage?.prompt_tokens,
        response.usage?.completion_tokens,
        response.usage?.total_tokens
      ),
      finishReason: choice.finish_reason ?? null,
      model: response.model ?? ''
    };
  }

  public extractToolCalls(payload: unknown): ToolCallRequest[] {
    return this.readToolCalls(parseProviderPayload(openAiResponseSchema, payload, this.kind));
  }

  protected buildUrl(config: ProviderConfig): string {
    return `${config.baseUrl}/chat/completions`;
  }

  protected buildAuthHeaders(apiKey: string): Record<string, string> {
    return { Authorization: `Bearer ${apiKey}` };
  }

  protected includeModelInBody(): boolean {
    return true;
  }

  private readToolCalls(response: OpenAiResponse): ToolCallRequest[] {
    return (response.choices[0].message.tool_calls ?? []).map((call) => ({
      id: call.id,
      name: call.function.name,
      rawArguments: call.function.arguments ?? ''
    }));
  }
}
