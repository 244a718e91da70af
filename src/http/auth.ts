// This module resolves the caller-supplied AI provider API key from request headers.

import type { IncomingHttpHeaders } from 'node:http';

// This helper extracts bearer tokens from Authorization headers.
export function extractBearerToken(authHeader: string | undefined): string | null {
  if (!authHeader) {
    return null;
  }

  const [scheme, token] = authHeader.split(' ', 2);
  if (!scheme || !token || scheme.toLowerCase() !== 'bearer') {
    return null;
  }

  return token;
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const header = Array.isArray(value) ? value[0] : value;
  const trimmed = header?.trim();
  return trimmed ? trimmed : undefined;
}

// Precedence: Authorization bearer, then x-api-key, then api-key.
export function extractProviderApiKey(headers: IncomingHttpHeaders): string | null {
  return (
    extractBearerToken(firstHeader(headers.authorization)) ??
    firstHeader(headers['x-api-key']) ??
    firstHeader(headers['api-key']) ??
    null
  );
}

// This helper applies the deployment-wide fallback key when the request carries none.
export function resolveProviderApiKey(headers: IncomingHttpHeaders, fallbackApiKey: string | null): string | null {
  return extractProviderApiKey(headers) ?? fallbackApiKey;
}
