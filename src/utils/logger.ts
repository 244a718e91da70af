// This module configures pino for the gateway and shapes payloads so transcripts and provider keys stay out of logs.

import { createHash } from 'node:crypto';
import pino, { type LoggerOptions } from 'pino';
import { MCP_SERVER_NAME } from '../version.js';
import { AppError } from './errors.js';

const LIMITS = {
  depth: 5,
  stringLength: 1024,
  arrayItems: 30,
  objectKeys: 30,
  causeDepth: 3
} as const;

// Removed by pino before serialization; sanitizeForLog covers nested payloads.
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers["x-api-key"]',
  'req.headers["api-key"]',
  'headers.authorization',
  'headers["x-api-key"]',
  'headers["api-key"]',
  '*.authorization',
  '*.apiKey',
  '*.token',
  '*.password'
];

// Token counters such as promptTokens or maxTokens stay readable; bearer material does not.
const SENSITIVE_KEY_PATTERNS: readonly RegExp[] = [
  /^token$/,
  /_token$/,
  /password/,
  /authorization/,
  /cookie/,
  /secret/,
  /api[-_]?key/
];

function isSensitiveKey(key: string): boolean {
  const normalized = key.toLowerCase();
  return SENSITIVE_KEY_PATTERNS.some((pattern) => pattern.test(normalized));
}

function clip(value: string): string {
  const overflow = value.length - LIMITS.stringLength;
  return overflow > 0 ? `${value.slice(0, LIMITS.stringLength)}...[truncated:${overflow}]` : value;
}

// A short digest lets two log lines be correlated without revealing the key itself.
function fingerprint(value: unknown): string {
  const serialized = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return `[redacted:${createHash('sha256').update(serialized).digest('hex').slice(0, 12)}]`;
}

function sanitizeArray(values: unknown[], depth: number): unknown[] {
  const kept = values.slice(0, LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
  const dropped = values.length - LIMITS.arrayItems;
  return dropped > 0 ? [...kept, `[truncated-items:${dropped}]`] : kept;
}

function sanitizeRecord(source: object, depth: number): Record<string, unknown> {
  const entries = Object.entries(source);
  const target: Record<string, unknown> = {};

  for (const [key, entryValue] of entries.slice(0, LIMITS.objectKeys)) {
    target[key] = isSensitiveKey(key) ? fingerprint(entryValue) : sanitizeForLog(entryValue, depth + 1);
  }

  if (entries.length > LIMITS.objectKeys) {
    target.__truncatedKeys = entries.length - LIMITS.objectKeys;
  }

  return target;
}

export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (value === null || value === undefined || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }

  if (depth > LIMITS.depth) {
    return '[depth-limited]';
  }

  if (typeof value === 'string') {
    return clip(value);
  }

  if (value instanceof Date) {
    return value.toISOString();
  }

  if (Array.isArray(value)) {
    return sanitizeArray(value, depth);
  }

  if (typeof value === 'object') {
    return sanitizeRecord(value, depth);
  }

  return String(value);
}

// Provider and fetch failures often wrap a lower-level cause; a few levels of it are kept.
export function errorForLog(error: unknown, depth = 0): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const shaped: Record<string, unknown> = {
    name: error.name,
    message: error.message,
    stack: error.stack
  };

  if (error instanceof AppError) {
    shaped.code = error.code;
    shaped.statusCode = error.statusCode;
  }

  if (error.cause !== undefined && depth < LIMITS.causeDepth) {
    shaped.cause = errorForLog(error.cause, depth + 1);
  }

  return shaped;
}

export function buildLoggerOptions(level: string): LoggerOptions {
  return {
    level,
    base: {
      service: MCP_SERVER_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}
