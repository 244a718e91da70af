// This module queries the configured web search API and reduces results to title, url, and snippet.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { ToolSettings } from '../config/settings.js';
import { AppError } from '../utils/errors.js';
import { fetchJson } from '../utils/http.js';

export interface WebSearchContext {
  settings: ToolSettings;
  signal?: AbortSignal;
  logger?: FastifyBaseLogger;
}

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

const searchResponseSchema = z.object({
  web: z
    .object({
      results: z
        .array(
          z.object({
            title: z.string(),
            url: z.string(),
            description: z.string().optional()
          })
        )
        .default([])
    })
    .optional()
});

// This helper removes highlight markup that search APIs embed in snippets.
function stripMarkup(value: string): string {
  return value.replace(/<[^>]+>/g, '').replace(/\s+/g, ' ').trim();
}

export async function searchWeb(query: string, count: number, context: WebSearchContext): Promise<WebSearchResult[]> {
  const apiKey = context.settings.searchApiKey;
  if (!apiKey) {
    throw new AppError(503, 'tool_not_configured', 'SEARCH_API_KEY is required for web search.');
  }

  const url = new URL(context.settings.searchApiUrl);
  url.searchParams.set('q', query);
  url.searchParams.set('count', String(count));

  const payload = await fetchJson(url, {
    label: 'Search API',
    timeoutMs: context.settings.timeoutMs,
    signal: context.signal,
    logger: context.logger,
    headers: {
      'X-Subscription-Token': apiKey
    }
  });

  const parsed = searchResponseSchema.safeParse(payload);
  if (!parsed.success) {
    throw new AppError(502, 'tool_parse_error', 'Search API response has an unexpected shape.', parsed.error.flatten());
  }

  return (parsed.data.web?.results ?? []).slice(0, count).map((entry) => ({
    title: stripMarkup(entry.title),
    url: entry.url,
    snippet: stripMarkup(entry.description ?? '')
  }));
}
