// This test suite verifies the three provider wire dialects and their loss-less tool translation.

import { describe, expect, it } from 'vitest';
import { AnthropicProvider, toAnthropicMessages } from '../src/providers/anthropic.js';
import { AzureOpenAiProvider } from '../src/providers/azure-openai.js';
import { createProvider, withModelOverride } from '../src/providers/factory.js';
import { OpenAiProvider } from '../src/providers/openai.js';
import type { ProviderConfig, TranscriptMessage } from '../src/types/domain.js';
import type { McpTool } from '../src/types/mcp.js';
import { captureError, OPENAI_CONFIG } from './helpers.js';

const WEATHER_TOOL: McpTool = {
  name: 'get_current_weather',
  description: 'Look up current weather conditions for a city.',
  inputSchema: {
    type: 'object',
    properties: { city: { type: 'string' } },
    required: ['city']
  }
};

const TOOL_ROUND_TRIP: TranscriptMessage[] = [
  { role: 'system', content: 'Be brief.' },
  { role: 'user', content: 'Weather in Berlin?' },
  {
    role: 'assistant',
    content: null,
    toolCalls: [{ id: 'call_1', name: 'get_current_weather', rawArguments: '{"city":"Berlin"}' }]
  },
  { role: 'tool', toolCallId: 'call_1', toolName: 'get_current_weather', content: '{"temperature":18}', isError: false }
];

describe('openai provider', () => {
  const provider = new OpenAiProvider();

  it('translates tools into function specs without losing name, description, or schema', () => {
    expect(provider.translateTools([WEATHER_TOOL])).toEqual([
      {
        type: 'function',
        function: {
          name: WEATHER_TOOL.name,
          description: WEATHER_TOOL.description,
          parameters: WEATHER_TOOL.inputSchema
        }
      }
    ]);
  });

  it('keeps the system message inline and correlates tool results by call id', () => {
    const request = provider.buildRequest(
      {
        transcript: TOOL_ROUND_TRIP,
        tools: provider.translateTools([WEATHER_TOOL]),
        temperature: 0.2,
        maxTokens: 300
      },
      OPENAI_CONFIG,
      'test-secret'
    );

    expect(request.url).toBe('https://api.openai.com/v1/chat/completions');
    expect(request.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(request.body).toMatchObject({
      model: 'gpt-4o-mini',
      max_tokens: 300,
      temperature: 0.2,
      tool_choice: 'auto'
    });
    expect(request.body.messages).toEqual([
      { role: 'system', content: 'Be brief.' },
      { role: 'user', content: 'Weather in Berlin?' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [
          { id: 'call_1', type: 'function', function: { name: 'get_current_weather', arguments: '{"city":"Berlin"}' } }
        ]
      },
      { role: 'tool', tool_call_id: 'call_1', content: '{"temperature":18}' }
    ]);
  });

  it('omits tools and tool_choice when no tools are offered', () => {
    const request = provider.buildRequest(
      { transcript: [{ role: 'user', content: 'hi' }], tools: [], maxTokens: 10 },
      OPENAI_CONFIG,
      'test-secret'
    );

    expect('tools' in request.body).toBe(false);
    expect('tool_choice' in request.body).toBe(false);
    expect('temperature' in request.body).toBe(false);
  });

  it('parses tool calls, usage, and finish reason', () => {
    const result = provider.parseResponse({
      model: 'gpt-4o-mini-2024-07-18',
      choices: [
        {
          message: {
            content: null,
            tool_calls: [{ id: 'call_9', type: 'function', function: { name: 'search_web', arguments: '{"query":"vitest"}' } }]
          },
          finish_reason: 'tool_calls'
        }
      ],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 }
    });

    expect(result).toEqual({
      text: null,
      toolCalls: [{ id: 'call_9', name: 'search_web', rawArguments: '{"query":"vitest"}' }],
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      finishReason: 'tool_calls',
      model: 'gpt-4o-mini-2024-07-18'
    });
  });

  it('joins content parts into text', () => {
    const result = provider.parseResponse({
      choices: [{ message: { content: [{ type: 'text', text: 'Hello' }, { type: 'text', text: 'world' }] } }]
    });

    expect(result.text).toBe('Hello\nworld');
    expect(result.toolCalls).toEqual([]);
    expect(result.usage).toEqual({ promptTokens: 0, completionTokens: 0, totalTokens: 0 });
  });

  it('rejects bodies without choices as upstream parse errors', () => {
    expect(captureError(() => provider.parseResponse({ choices: [] }))).toMatchObject({
      code: 'upstream_parse_error',
      statusCode: 502
    });
    expect(provider.extractToolCalls({ choices: [{ message: { content: 'done' } }] })).toEqual([]);
  });
});

describe('azure openai provider', () => {
  const config: ProviderConfig = {
    ...OPENAI_CONFIG,
    kind: 'azure-openai',
    baseUrl: 'https://example-resource.openai.azure.com',
    model: 'chat-deployment'
  };

  it('routes by deployment and api-version and authenticates with api-key', () => {
    const request = new AzureOpenAiProvider().buildRequest(
      { transcript: [{ role: 'user', content: 'hi' }], tools: [], maxTokens: 50 },
      config,
      'test-secret'
    );

    expect(request.url).toBe(
      'https://example-resource.openai.azure.com/openai/deployments/chat-deployment/chat/completions?api-version=2024-06-01'
    );
    expect(request.headers).toEqual({ 'api-key': 'test-secret', 'Content-Type': 'application/json' });
    expect('model' in request.body).toBe(false);
  });
});

describe('anthropic provider', () => {
  const provider = new AnthropicProvider();
  const config: ProviderConfig = {
    ...OPENAI_CONFIG,
    kind: 'anthropic',
    baseUrl: 'https://api.anthropic.com',
    model: 'claude-3-5-haiku-latest'
  };

  it('translates tools with input_schema', () => {
    expect(provider.translateTools([WEATHER_TOOL])).toEqual([
      {
        name: WEATHER_TOOL.name,
        description: WEATHER_TOOL.description,
        input_schema: WEATHER_TOOL.inputSchema
      }
    ]);
  });

  it('moves system text to a top-level field and groups tool results into one user message', () => {
    const converted = toAnthropicMessages([
      { role: 'system', content: 'Be brief.' },
      { role: 'system', content: 'Cite sources.' },
      { role: 'user', content: 'Weather and news?' },
      {
        role: 'assistant',
        content: 'Let me check.',
        toolCalls: [
          { id: 'toolu_1', name: 'get_current_weather', rawArguments: '{"city":"Berlin"}' },
          { id: 'toolu_2', name: 'search_web', rawArguments: 'not json' }
        ]
      },
      { role: 'tool', toolCallId: 'toolu_1', toolName: 'get_current_weather', content: '{"temperature":18}', isError: false },
      { role: 'tool', toolCallId: 'toolu_2', toolName: 'search_web', content: '{"error":"down"}', isError: true }
    ]);

    expect(converted).toEqual({
      system: 'Be brief.\n\nCite sources.',
      messages: [
        { role: 'user', content: 'Weather and news?' },
        {
          role: 'assistant',
          content: [
            { type: 'text', text: 'Let me check.' },
            { type: 'tool_use', id: 'toolu_1', name: 'get_current_weather', input: { city: 'Berlin' } },
            { type: 'tool_use', id: 'toolu_2', name: 'search_web', input: {} }
          ]
        },
        {
          role: 'user',
          content: [
            { type: 'tool_result', tool_use_id: 'toolu_1', content: '{"temperature":18}' },
            { type: 'tool_result', tool_use_id: 'toolu_2', content: '{"error":"down"}', is_error: true }
          ]
        }
      ]
    });
  });

  it('builds the messages request with version header and clamped temperature', () => {
    const request = provider.buildRequest(
      { transcript: TOOL_ROUND_TRIP, tools: provider.translateTools([WEATHER_TOOL]), temperature: 1.5, maxTokens: 400 },
      config,
      'test-secret'
    );

    expect(request.url).toBe('https://api.anthropic.com/v1/messages');
    expect(request.headers).toEqual({
      'x-api-key': 'test-secret',
      'anthropic-version': '2023-06-01',
      'Content-Type': 'application/json'
    });
    expect(request.body).toMatchObject({
      model: 'claude-3-5-haiku-latest',
      max_tokens: 400,
      system: 'Be brief.',
      temperature: 1
    });

    const versioned = provider.buildRequest(
      { transcript: [{ role: 'user', content: 'hi' }], tools: [], maxTokens: 10 },
      { ...config, baseUrl: 'https://gateway.example.com/v1' },
      'test-secret'
    );
    expect(versioned.url).toBe('https://gateway.example.com/v1/messages');
    expect('system' in versioned.body).toBe(false);
  });

  it('parses text and tool_use blocks and skips unknown block types', () => {
    const result = provider.parseResponse({
      model: 'claude-3-5-haiku-20241022',
      content: [
        { type: 'thinking', thinking: 'hmm' },
        { type: 'text', text: 'Checking the weather.' },
        { type: 'tool_use', id: 'toolu_9', name: 'get_current_weather', input: { city: 'Oslo' } }
      ],
      stop_reason: 'tool_use',
      usage: { input_tokens: 12, output_tokens: 8 }
    });

    expect(result).toEqual({
      text: 'Checking the weather.',
      toolCalls: [{ id: 'toolu_9', name: 'get_current_weather', rawArguments: '{"city":"Oslo"}' }],
      usage: { promptTokens: 12, completionTokens: 8, totalTokens: 20 },
      finishReason: 'tool_use',
      model: 'claude-3-5-haiku-20241022'
    });
  });
});

describe('provider factory', () => {
  it('selects one implementation per configured kind', () => {
    expect(createProvider('openai')).toBeInstanceOf(OpenAiProvider);
    expect(createProvider('azure-openai')).toBeInstanceOf(AzureOpenAiProvider);
    expect(createProvider('anthropic')).toBeInstanceOf(AnthropicProvider);
    expect(createProvider('azure-openai').kind).toBe('azure-openai');
  });

  it('applies model overrides without mutating the shared config', () => {
    expect(withModelOverride(OPENAI_CONFIG, undefined)).toBe(OPENAI_CONFIG);
    expect(withModelOverride(OPENAI_CONFIG, 'gpt-4o').model).toBe('gpt-4o');
    expect(OPENAI_CONFIG.model).toBe('gpt-4o-mini');
  });
});
