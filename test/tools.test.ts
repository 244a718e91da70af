// This test suite verifies tool handlers, input validation, and tool failure normalization.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { executeTool, type ToolRuntimeContext } from '../src/mcp/tools.js';
import { buildToolList, TOOL_NAMES } from '../src/mcp/tool-schemas.js';
import { AppError, errorTypeOf } from '../src/utils/errors.js';
import { jsonResponse, openAiCompletion, requestBody, silentLogger, stallingBodyFetch, testRuntime } from './helpers.js';

afterEach(() => {
  vi.unstubAllGlobals();
});

function context(env: Record<string, string> = {}, apiKey: string | null = null): ToolRuntimeContext {
  return { runtime: testRuntime(env), logger: silentLogger, apiKey };
}

// This stand-in answers the geocoding and forecast endpoints of the weather backend.
function weatherFetch(input: string | URL | Request): Promise<Response> {
  const url = String(input);
  if (url.startsWith('https://geocoding-api.open-meteo.com/v1/search')) {
    return Promise.resolve(
      jsonResponse({ results: [{ name: 'Berlin', country: 'Germany', latitude: 52.52, longitude: 13.41 }] })
    );
  }
  return Promise.resolve(
    jsonResponse({
      current: {
        time: '2026-05-01T12:00',
        temperature_2m: 18.5,
        apparent_temperature: 17.9,
        relative_humidity_2m: 60,
        wind_speed_10m: 11.2,
        weather_code: 3
      }
    })
  );
}

describe('tool schemas', () => {
  it('renders inline JSON schemas without $schema or $ref', () => {
    const tools = buildToolList();

    expect(tools.map((tool) => tool.name)).toEqual([...TOOL_NAMES]);
    for (const tool of tools) {
      expect(tool.inputSchema.type).toBe('object');
      expect('$schema' in tool.inputSchema).toBe(false);
      expect(JSON.stringify(tool.inputSchema)).not.toContain('$ref');
    }
  });

  it('can leave tools out of the list', () => {
    expect(buildToolList({ exclude: ['ask_assistant'] }).map((tool) => tool.name)).not.toContain('ask_assistant');
  });
});

describe('tool execution', () => {
  it('describes the server and its provider', async () => {
    const result = await executeTool('get_server_info', {}, context());

    expect(result.structuredContent).toEqual({
      name: 'mcp-agent-gateway',
      version: '0.1.0',
      protocolVersion: '2025-03-26',
      provider: { kind: 'openai', model: 'gpt-4o-mini' },
      tools: [...TOOL_NAMES]
    });
    expect(result.content).toEqual([{ type: 'text', text: JSON.stringify(result.structuredContent, null, 2) }]);
  });

  it('rejects unknown tools as tool_not_found', async () => {
    await expect(executeTool('launch_rocket', {}, context())).rejects.toMatchObject({
      code: 'tool_not_found',
      statusCode: 404
    });
  });

  it('converts schema violations into validation errors', async () => {
    const error = await executeTool('get_current_weather', { units: 'kelvin' }, context()).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({ code: 'validation_error', statusCode: 400 });
    if (error instanceof AppError) {
      expect(errorTypeOf(error)).toBe('InvalidParams');
      expect(error.details).toMatchObject({ fieldErrors: { city: expect.any(Array), units: expect.any(Array) } });
    }
  });

  it('reads current weather through geocoding and forecast calls', async () => {
    const fetchMock = vi.fn(weatherFetch);
    vi.stubGlobal('fetch', fetchMock);

    const result = await executeTool('get_current_weather', { city: ' Berlin ' }, context());

    expect(result.structuredContent).toEqual({
      location: { name: 'Berlin', country: 'Germany', latitude: 52.52, longitude: 13.41 },
      units: 'metric',
      observedAt: '2026-05-01T12:00',
      temperature: 18.5,
      apparentTemperature: 17.9,
      relativeHumidity: 60,
      windSpeed: 11.2,
      weatherCode: 3,
      conditions: 'overcast'
    });
    expect(String(fetchMock.mock.calls[0][0])).toBe(
      'https://geocoding-api.open-meteo.com/v1/search?name=Berlin&count=1&format=json'
    );
    expect(String(fetchMock.mock.calls[1][0])).toContain('https://api.open-meteo.com/v1/forecast?latitude=52.52&longitude=13.41');
  });

  it('reports a malformed backend body as a tool parse error', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('<!doctype html>', { status: 200 }))
    );

    await expect(executeTool('get_current_weather', { city: 'Berlin' }, context())).rejects.toMatchObject({
      code: 'tool_parse_error'
    });
  });

  it('requires a search API key before calling the search backend', async () => {
    const fetchMock = vi.fn(async () => jsonResponse({}));
    vi.stubGlobal('fetch', fetchMock);

    await expect(executeTool('search_web', { query: 'vitest' }, context())).rejects.toMatchObject({
      code: 'tool_not_configured'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('returns cleaned search results', async () => {
    const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) =>
      jsonResponse({
        web: {
          results: [
            { title: '<strong>Vitest</strong> docs', url: 'https://vitest.dev/guide/', description: 'Fast <em>unit</em>  tests' }
          ]
        }
      })
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await executeTool('search_web', { query: 'vitest', count: 3 }, context({ SEARCH_API_KEY: 'test-secret' }));

    expect(result.structuredContent).toEqual({
      query: 'vitest',
      count: 1,
      results: [{ title: 'Vitest docs', url: 'https://vitest.dev/guide/', snippet: 'Fast unit tests' }]
    });
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe('https://api.search.brave.com/res/v1/web/search?q=vitest&count=3');
    expect(init?.headers).toMatchObject({ 'X-Subscription-Token': 'test-secret' });
  });

  it('fetches documents and clips content to maxChars', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('abcdefghij'.repeat(20), { headers: { 'content-type': 'text/plain; charset=utf-8' } }))
    );

    const result = await executeTool('fetch_document', { url: 'https://docs.example.com/notes.txt', maxChars: 100 }, context());

    expect(result.structuredContent).toEqual({
      url: 'https://docs.example.com/notes.txt',
      mimeType: 'text/plain',
      kind: 'text',
      byteLength: 200,
      truncated: true,
      content: 'abcdefghij'.repeat(10)
    });
  });

  it('maps document read failures onto tool error codes', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => new Response('missing', { status: 404 }))
    );

    await expect(
      executeTool('fetch_document', { url: 'https://docs.example.com/gone' }, context())
    ).rejects.toMatchObject({ code: 'tool_network_error', statusCode: 404 });

    await expect(executeTool('fetch_document', { url: 'ftp://docs.example.com/file' }, context())).rejects.toMatchObject({
      code: 'validation_error'
    });
  });

  it('requires an API key for ask_assistant', async () => {
    await expect(executeTool('ask_assistant', { question: 'hi' }, context())).rejects.toMatchObject({
      code: 'missing_api_key'
    });
  });

  it('runs a nested orchestration without offering ask_assistant to itself', async () => {
    const fetchMock = vi
      .fn(async (_input: string | URL | Request, _init?: RequestInit) =>
        jsonResponse(openAiCompletion({ text: 'The server is mcp-agent-gateway.', promptTokens: 20, completionTokens: 6 }))
      )
      .mockImplementationOnce(async () =>
        jsonResponse(
          openAiCompletion({
            toolCalls: [{ id: 'call_1', name: 'get_server_info', rawArguments: '{}' }],
            promptTokens: 10,
            completionTokens: 4
          })
        )
      );
    vi.stubGlobal('fetch', fetchMock);

    const result = await executeTool('ask_assistant', { question: 'Which server is this?' }, context({}, 'test-secret'));

    expect(result.structuredContent).toMatchObject({
      answer: 'The server is mcp-agent-gateway.',
      status: 'completed',
      iterations: 2,
      toolsExecuted: 1,
      toolCalls: [{ tool: 'get_server_info', success: true }],
      tokensUsed: 40,
      model: 'gpt-4o-mini'
    });

    const offered = requestBody(fetchMock.mock.calls[0][1]).tools;
    expect(Array.isArray(offered) ? offered.map((tool) => JSON.stringify(tool)) : []).toHaveLength(4);
    expect(JSON.stringify(offered)).not.toContain('"ask_assistant"');
  });

  it('reports a backend body that stalls past the tool timeout as tool_timeout', async () => {
    vi.stubGlobal('fetch', vi.fn(stallingBodyFetch()));

    await expect(
      executeTool('get_current_weather', { city: 'Berlin' }, context({ TOOL_TIMEOUT_MS: '100' }))
    ).rejects.toMatchObject({ code: 'tool_timeout', statusCode: 504 });

    vi.stubGlobal('fetch', vi.fn(stallingBodyFetch('text/plain')));
    await expect(
      executeTool('fetch_document', { url: 'https://docs.example.com/slow' }, context({ TOOL_TIMEOUT_MS: '100' }))
    ).rejects.toMatchObject({ code: 'tool_timeout', statusCode: 504 });
  });

  it('reports cancellation only when the caller signal aborts', async () => {
    vi.stubGlobal('fetch', vi.fn(stallingBodyFetch()));
    const controller = new AbortController();
    const pending = executeTool('get_current_weather', { city: 'Berlin' }, { ...context(), signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toMatchObject({ code: 'request_cancelled', statusCode: 499 });
  });

  it('records a timed-out nested tool call and asks the model again', async () => {
    const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      if (String(input).startsWith('https://geocoding-api.open-meteo.com/')) {
        return stallingBodyFetch()(input, init);
      }
      return jsonResponse(openAiCompletion({ text: 'Weather data is unavailable right now.' }));
    });
    fetchMock.mockImplementationOnce(async () =>
      jsonResponse(
        openAiCompletion({
          toolCalls: [{ id: 'call_1', name: 'get_current_weather', rawArguments: '{"city":"Berlin"}' }]
        })
      )
    );
    vi.stubGlobal('fetch', fetchMock);

    const result = await executeTool(
      'ask_assistant',
      { question: 'How warm is Berlin?' },
      context({ TOOL_TIMEOUT_MS: '100' }, 'test-secret')
    );

    expect(result.structuredContent).toMatchObject({
      answer: 'Weather data is unavailable right now.',
      status: 'completed',
      iterations: 2,
      toolsExecuted: 1,
      toolCalls: [{ tool: 'get_current_weather', success: false, error: { code: 'tool_timeout', kind: 'timeout' } }]
    });
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });
});

describe('tool definitions', () => {
  it('shares frozen definitions so callers cannot alter the registry', () => {
    const [first] = buildToolList();
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.inputSchema)).toBe(true);
    expect(() => {
      first.inputSchema.type = 'array';
    }).toThrow(TypeError);
    expect(buildToolList()[0].inputSchema.type).toBe('object');
  });
});
