// This module reads one resource URI by dispatching on its scheme to a registered reader.

import type { FastifyBaseLogger } from 'fastify';
import type { AppSettings } from '../config/settings.js';
import { buildToolList } from '../mcp/tool-schemas.js';
import { getCurrentWeather } from '../services/weather.js';
import type { McpResourceContent } from '../types/mcp.js';
import { AppError } from '../utils/errors.js';
import { MCP_PROTOCOL_VERSION, MCP_SERVER_NAME, MCP_SERVER_VERSION } from '../version.js';
import { fetchHttpResource } from './http-reader.js';

export interface ResourceContext {
  settings: AppSettings;
  logger: FastifyBaseLogger;
  signal?: AbortSignal;
}

type SchemeReader = (uri: URL, context: ResourceContext) => Promise<McpResourceContent>;

// This helper renders one JSON document as resource content.
function jsonContent(uri: string, payload: unknown): McpResourceContent {
  return {
    uri,
    mimeType: 'application/json',
    text: JSON.stringify(payload, null, 2)
  };
}

async function readHttp(uri: URL, context: ResourceContext): Promise<McpResourceContent> {
  const result = await fetchHttpResource(uri.toString(), {
    timeoutMs: context.settings.tools.timeoutMs,
    maxBytes: context.settings.resources.maxBytes,
    signal: context.signal,
    logger: context.logger
  });

  return {
    uri: result.uri,
    mimeType: result.mimeType,
    text: result.text
  };
}

async function readServer(uri: URL, context: ResourceContext): Promise<McpResourceContent> {
  const path = `${uri.host}${uri.pathname}`.replace(/\/+$/, '');

  switch (path) {
    case 'info':
      return jsonContent(uri.toString(), {
        name: MCP_SERVER_NAME,
        version: MCP_SERVER_VERSION,
        protocolVersion: MCP_PROTOCOL_VERSION,
        capabilities: ['tools', 'resources', 'prompts', 'completions'],
        provider: {
          kind: context.settings.provider.kind,
          model: context.settings.provider.model
        }
      });
    case 'tools':
      return jsonContent(uri.toString(), { tools: buildToolList() });
    default:
      throw new AppError(404, 'resource_not_found', `Resource not found: ${uri.toString()}`);
  }
}

async function readWeather(uri: URL, context: ResourceContext): Promise<McpResourceContent> {
  const city = decodeURIComponent(uri.pathname.replace(/^\/+/, '')).trim();
  if (uri.host !== 'current' || city.length === 0) {
    throw new AppError(404, 'resource_not_found', `Resource not found: ${uri.toString()}`);
  }

  const units = uri.searchParams.get('units') === 'imperial' ? 'imperial' : 'metric';
  const weather = await getCurrentWeather(city, units, {
    settings: context.settings.tools,
    signal: context.signal,
    logger: context.logger
  });
  return jsonContent(uri.toString(), weather);
}

const schemeReaders: Record<string, SchemeReader> = {
  'http:': readHttp,
  'https:': readHttp,
  'server:': readServer,
  'weather:': readWeather
};

// This function validates one URI and returns its normalized content.
export async function readResource(rawUri: string, context: ResourceContext): Promise<McpResourceContent> {
  let uri: URL;
  try {
    uri = new URL(rawUri);
  } catch {
    throw new AppError(400, 'invalid_params', `Resource URI is not a valid absolute URI: ${rawUri}`);
  }

  const reader = schemeReaders[uri.protocol];
  if (!reader) {
    throw new AppError(400, 'unsupported_resource_scheme', `Unsupported resource scheme: ${uri.protocol}`, {
      supportedSchemes: Object.keys(schemeReaders)
    });
  }

  context.logger.debug(
    {
      event: 'resource_read_started',
      uri: rawUri,
      scheme: uri.protocol
    },
    'resource_read_started'
  );

  return reader(uri, context);
}
