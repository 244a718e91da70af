// This module holds the process-wide, read-only collaborators shared by every inbound request.

import type { AppSettings } from './config/settings.js';
import type { ProviderToolSpec } from './providers/types.js';
import { TtlCache } from './utils/ttl-cache.js';

export interface GatewayRuntime {
  settings: AppSettings;
  toolSpecCache: TtlCache<ProviderToolSpec[]>;
}

export function createGatewayRuntime(settings: AppSettings): GatewayRuntime {
  return {
    settings,
    toolSpecCache: new TtlCache<ProviderToolSpec[]>({
      ttlMs: settings.toolCache.ttlMs,
      maxEntries: settings.toolCache.maxEntries
    })
  };
}
