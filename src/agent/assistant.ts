// This module assembles a completion client for the deployment's provider and one caller key.

import type { FastifyBaseLogger } from 'fastify';
import { CompletionClient } from '../providers/completion-client.js';
import { createProvider, withModelOverride } from '../providers/factory.js';
import type { GatewayRuntime } from '../runtime.js';

export function buildCompletionClient(
  runtime: GatewayRuntime,
  apiKey: string,
  model: string | undefined,
  logger: FastifyBaseLogger
): CompletionClient {
  const config = withModelOverride(runtime.settings.provider, model);
  return new CompletionClient({
    provider: createProvider(config.kind),
    config,
    apiKey,
    toolSpecCache: runtime.toolSpecCache,
    logger
  });
}
