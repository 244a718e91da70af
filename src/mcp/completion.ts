// This module answers completion/complete for prompt arguments.

import { isPlainObject } from '../utils/json.js';
import { AppError } from '../utils/errors.js';
import { findPrompt } from './prompts.js';

export const MAX_COMPLETION_VALUES = 100;

export interface CompletionValues {
  values: string[];
  total: number;
  hasMore: boolean;
}

// This function filters the candidate list of one prompt argument by case-insensitive prefix.
export function completePromptArgument(params: Record<string, unknown>): CompletionValues {
  const ref = params.ref;
  const argument = params.argument;

  if (!isPlainObject(ref) || typeof ref.type !== 'string') {
    throw new AppError(400, 'invalid_params', 'completion/complete requires params.ref with a type.');
  }
  if (ref.type !== 'ref/prompt') {
    throw new AppError(400, 'invalid_params', `Completion for ${ref.type} is not supported; only ref/prompt is.`);
  }
  if (typeof ref.name !== 'string') {
    throw new AppError(400, 'invalid_params', 'completion/complete requires params.ref.name.');
  }
  if (!isPlainObject(argument) || typeof argument.name !== 'string') {
    throw new AppError(400, 'invalid_params', 'completion/complete requires params.argument.name.');
  }

  const prompt = findPrompt(ref.name);
  if (!prompt) {
    throw new AppError(400, 'invalid_params', `Unknown prompt: ${ref.name}`);
  }

  const prefix = typeof argument.value === 'string' ? argument.value.toLowerCase() : '';
  // Own keys only: names such as toString must not resolve through the prototype.
  const candidates = Object.hasOwn(prompt.completions, argument.name) ? prompt.completions[argument.name] : [];
  const matches = candidates.filter((candidate) => candidate.toLowerCase().startsWith(prefix));

  return {
    values: matches.slice(0, MAX_COMPLETION_VALUES),
    total: matches.length,
    hasMore: matches.length > MAX_COMPLETION_VALUES
  };
}
