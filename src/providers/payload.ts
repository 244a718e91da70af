// This module validates provider response bodies so wire-format drift surfaces as one upstream error.

import type { z } from 'zod';
import type { ProviderKind, TokenUsage } from '../types/domain.js';
import { AppError } from '../utils/errors.js';

export function parseProviderPayload<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  provider: ProviderKind
): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new AppError(
      502,
      'upstream_parse_error',
      `Provider ${provider} returned a response with an unexpected shape.`,
      result.error.flatten()
    );
  }
  return result.data;
}

export function buildUsage(promptTokens: number | undefined, completionTokens: number | undefined, total?: number): TokenUsage {
  const prompt = promptTokens ?? 0;
  const completion = completionTokens ?? 0;
  return {
    promptTokens: prompt,
    completionTokens: completion,
    totalTokens: total ?? prompt + completion
  };
}
