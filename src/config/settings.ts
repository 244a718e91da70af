// This module reads process environment into one validated, immutable settings object at start-up.

import { z } from 'zod';
import type { McpResource } from '../types/mcp.js';
import type { ProviderConfig, ProviderKind } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

const PROVIDER_DEFAULTS: Record<ProviderKind, { baseUrl: string | null; model: string | null }> = {
  openai: { baseUrl: 'https://api.openai.com/v1', model: 'gpt-4o-mini' },
  'azure-openai': { baseUrl: null, model: null },
  anthropic: { baseUrl: 'https://api.anthropic.com', model: 'claude-3-5-haiku-latest' }
};

const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant. Use the available tools when they help answer the request, and answer concisely.';

// This helper treats empty strings as missing so blank variables in container env files fall back to defaults.
function optionalString() {
  return z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional();
}

const resourceDocumentSchema = z.object({
  uri: z.string().url(),
  name: z.string().trim().min(1).max(160),
  description: z.string().max(1000).default(''),
  mimeType: z.string().trim().min(1).default('text/plain')
});

// This schema validates the raw environment; numeric values arrive as strings and are coerced.
const envSchema = z.object({
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  AI_PROVIDER: z.enum(['openai', 'azure-openai', 'anthropic']).default('openai'),
  AI_BASE_URL: optionalString(),
  AI_MODEL: optionalString(),
  AI_API_VERSION: z.string().default('2024-06-01'),
  AI_ANTHROPIC_VERSION: z.string().default('2023-06-01'),
  AI_API_KEY: optionalString(),
  AI_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600_000).default(60_000),
  AI_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(0),
  AI_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).max(10_000).default(350),
  AGENT_MAX_ITERATIONS: z.coerce.number().int().min(1).max(50).default(10),
  AGENT_MAX_TOKENS: z.coerce.number().int().min(1).max(32_000).default(1024),
  AGENT_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  AGENT_SYSTEM_PROMPT: optionalString(),
  TOOL_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  RESOURCE_MAX_BYTES: z.coerce.number().int().min(1024).max(20_000_000).default(1_000_000),
  WEATHER_API_BASE_URL: z.string().url().default('https://api.open-meteo.com/v1'),
  WEATHER_GEOCODING_BASE_URL: z.string().url().default('https://geocoding-api.open-meteo.com/v1'),
  SEARCH_API_URL: z.string().url().default('https://api.search.brave.com/res/v1/web/search'),
  SEARCH_API_KEY: optionalString(),
  TOOL_CACHE_TTL_MS: z.coerce.number().int().min(0).default(5 * 60 * 1000),
  TOOL_CACHE_MAX_ENTRIES: z.coerce.number().int().min(1).max(10_000).default(32),
  RESOURCE_DOCUMENTS: optionalString()
});

export interface AgentDefaults {
  maxIterations: number;
  maxTokens: number;
  temperature: number;
  systemPrompt: string;
}

export interface ToolSettings {
  timeoutMs: number;
  weatherApiBaseUrl: string;
  weatherGeocodingBaseUrl: string;
  searchApiUrl: string;
  searchApiKey: string | null;
}

export interface ResourceSettings {
  maxBytes: number;
  documents: McpResource[];
}

export interface CacheSettings {
  ttlMs: number;
  maxEntries: number;
}

export interface AppSettings {
  host: string;
  port: number;
  logLevel: string;
  provider: ProviderConfig;
  fallbackApiKey: string | null;
  agent: AgentDefaults;
  tools: ToolSettings;
  resources: ResourceSettings;
  toolCache: CacheSettings;
}

// This helper parses the optional JSON list of extra resource descriptors.
function parseResourceDocuments(raw: string | undefined): McpResource[] {
  if (!raw) {
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new AppError(500, 'invalid_configuration', 'RESOURCE_DOCUMENTS must be a JSON array.', {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }

  const result = z.array(resourceDocumentSchema).safeParse(parsed);
  if (!result.success) {
    throw new AppError(500, 'invalid_configuration', 'RESOURCE_DOCUMENTS entries are invalid.', result.error.flatten());
  }
  return result.data;
}

// This helper resolves provider endpoint and model defaults; Azure has none because both name a deployment.
function resolveProviderConfig(env: z.infer<typeof envSchema>): ProviderConfig {
  const defaults = PROVIDER_DEFAULTS[env.AI_PROVIDER];
  const baseUrl = env.AI_BASE_URL ?? defaults.baseUrl;
  const model = env.AI_MODEL ?? defaults.model;

  if (!baseUrl) {
    throw new AppError(500, 'invalid_configuration', `AI_BASE_URL is required when AI_PROVIDER=${env.AI_PROVIDER}.`);
  }
  if (!model) {
    throw new AppError(500, 'invalid_configuration', `AI_MODEL is required when AI_PROVIDER=${env.AI_PROVIDER}.`);
  }

  return {
    kind: env.AI_PROVIDER,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    model,
    apiVersion: env.AI_API_VERSION,
    anthropicVersion: env.AI_ANTHROPIC_VERSION,
    timeoutMs: env.AI_TIMEOUT_MS,
    maxRetries: env.AI_MAX_RETRIES,
    retryBaseDelayMs: env.AI_RETRY_BASE_DELAY_MS
  };
}

// This function validates environment variables and returns frozen settings for the process lifetime.
export function loadSettings(env: Record<string, string | undefined> = process.env): AppSettings {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError(500, 'invalid_configuration', 'Environment configuration is invalid.', parsed.error.flatten());
  }

  const values = parsed.data;
  const settings: AppSettings = {
    host: values.HOST,
    port: values.PORT,
    logLevel: values.LOG_LEVEL,
    provider: resolveProviderConfig(values),
    fallbackApiKey: values.AI_API_KEY ?? null,
    agent: {
      maxIterations: values.AGENT_MAX_ITERATIONS,
      maxTokens: values.AGENT_MAX_TOKENS,
      temperature: values.AGENT_TEMPERATURE,
      systemPrompt: values.AGENT_SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT
    },
    tools: {
      timeoutMs: values.TOOL_TIMEOUT_MS,
      weatherApiBaseUrl: values.WEATHER_API_BASE_URL.replace(/\/+$/, ''),
      weatherGeocodingBaseUrl: values.WEATHER_GEOCODING_BASE_URL.replace(/\/+$/, ''),
      searchApiUrl: values.SEARCH_API_URL,
      searchApiKey: values.SEARCH_API_KEY ?? null
    },
    resources: {
      maxBytes: values.RESOURCE_MAX_BYTES,
      documents: parseResourceDocuments(values.RESOURCE_DOCUMENTS)
    },
    toolCache: {
      ttlMs: values.TOOL_CACHE_TTL_MS,
      maxEntries: values.TOOL_CACHE_MAX_ENTRIES
    }
  };

  return Object.freeze(settings);
}
