// This utility module keeps JSON parsing of model-produced payloads safe and explicit.

export interface ParsedToolArguments {
  arguments: Record<string, unknown>;
  malformed: boolean;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// This helper parses a tool call argument string; anything that is not a JSON object degrades to {}.
export function parseToolArguments(raw: string): ParsedToolArguments {
  if (raw.trim().length === 0) {
    return { arguments: {}, malformed: false };
  }

  try {
    const parsed = JSON.parse(raw) as unknown;
    if (isPlainObject(parsed)) {
      return { arguments: parsed, malformed: false };
    }
    return { arguments: {}, malformed: true };
  } catch {
    return { arguments: {}, malformed: true };
  }
}
