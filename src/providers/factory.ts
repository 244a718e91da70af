// This module is the single place where a provider wire format is selected from configuration.

import type { ProviderConfig, ProviderKind } from '../types/domain.js';
import { AnthropicProvider } from './anthropic.js';
import { AzureOpenAiProvider } from './azure-openai.js';
import { OpenAiProvider } from './openai.js';
import type { Provider } from './types.js';

export function createProvider(kind: ProviderKind): Provider {
  switch (kind) {
    case 'openai':
      return new OpenAiProvider();
    case 'azure-openai':
      return new AzureOpenAiProvider();
    case 'anthropic':
      return new AnthropicProvider();
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unsupported provider kind: ${String(exhaustive)}`);
    }
  }
}

// This helper applies a per-request model override without touching the shared deployment config.
export function withModelOverride(config: ProviderConfig, model: string | undefined): ProviderConfig {
  if (!model || model === config.model) {
    return config;
  }
  return { ...config, model };
}
