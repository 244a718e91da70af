// This module adapts the OpenAI dialect to Azure OpenAI deployments, which differ only in routing and auth.

import type { ProviderConfig, ProviderKind } from '../types/domain.js';
import { OpenAiProvider } from './openai.js';

export class AzureOpenAiProvider extends OpenAiProvider {
  public override readonly kind: ProviderKind = 'azure-openai';

  // The configured model names the deployment, so it travels in the path instead of the body.
  protected override buildUrl(config: ProviderConfig): string {
    const deployment = encodeURIComponent(config.model);
    const apiVersion = encodeURIComponent(config.apiVersion);
    return `${config.baseUrl}/openai/deployments/${deployment}/chat/completions?api-version=${apiVersion}`;
  }

  protected override buildAuthHeaders(apiKey: string): Record<string, string> {
    return { 'api-key': apiKey };
  }

  protected override includeModelInBody(): boolean {
    return false;
  }
}
