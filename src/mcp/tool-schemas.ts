// This module defines tool input contracts and renders them as MCP tool definitions with JSON schemas.

import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { McpTool } from '../types/mcp.js';

export const TOOL_NAMES = [
  'get_server_info',
  'get_current_weather',
  'search_web',
  'fetch_document',
  'ask_assistant'
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const getServerInfoSchema = z.object({});

export const getCurrentWeatherSchema = z.object({
  city: z.string().trim().min(1).max(120).describe('City name, for example "Berlin" or "San Francisco".'),
  units: z.enum(['metric', 'imperial']).default('metric').describe('Unit system for temperature and wind speed.')
});

export const searchWebSchema = z.object({
  query: z.string().trim().min(1).max(400).describe('Search query.'),
  count: z.number().int().min(1).max(20).default(5).describe('Maximum number of results.')
});

export const fetchDocumentSchema = z.object({
  url: z
    .string()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), 'Only http and https URLs can be fetched.')
    .describe('Absolute http(s) URL of the document.'),
  maxChars: z.number().int().min(100).max(200_000).default(20_000).describe('Maximum characters of content to return.')
});

export const askAssistantSchema = z.object({
  question: z.string().trim().min(1).max(8000).describe('Natural-language question for the assistant.'),
  maxIterations: z.number().int().min(1).max(10).optional().describe('Upper bound on tool-calling rounds.')
});

export const toolSchemas: Record<ToolName, z.ZodTypeAny> = {
  get_server_info: getServerInfoSchema,
  get_current_weather: getCurrentWeatherSchema,
  search_web: searchWebSchema,
  fetch_document: fetchDocumentSchema,
  ask_assistant: askAssistantSchema
};

const TOOL_DESCRIPTIONS: Record<ToolName, string> = {
  get_server_info: 'Return server identity, protocol version, the active AI provider, and registered tool names.',
  get_current_weather: 'Look up current weather conditions for a city.',
  search_web: 'Search the web and return titles, URLs, and snippets.',
  fetch_document: 'Fetch one web document over HTTP(S) and return its normalized text or JSON content.',
  ask_assistant:
    'Ask the configured AI assistant a question; it may call the other tools before answering. Requires a provider API key on the request.'
};

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

// This helper renders one zod schema as an inline JSON schema without $ref indirection.
function toInputSchema(schema: z.ZodTypeAny): Record<string, unknown> {
  const jsonSchema = zodToJsonSchema(schema, { $refStrategy: 'none' }) as Record<string, unknown>;
  delete jsonSchema.$schema;
  return jsonSchema;
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

// Definitions are rendered once and shared by every request, so they are frozen.
const TOOL_DEFINITIONS: readonly McpTool[] = deepFreeze(
  TOOL_NAMES.map((name) => ({
    name,
    description: TOOL_DESCRIPTIONS[name],
    inputSchema: toInputSchema(toolSchemas[name])
  }))
);

// This function returns MCP-compatible tool definitions, optionally without some tools.
export function buildToolList(options?: { exclude?: readonly string[] }): McpTool[] {
  const excluded = new Set(options?.exclude ?? []);
  return TOOL_DEFINITIONS.filter((tool) => !excluded.has(tool.name));
}
