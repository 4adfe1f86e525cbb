/**
 * LLM Provider factory.
 *
 * Selects the active provider based on the LLM_PROVIDER setting.
 * Defaults to "openai".
 *
 * Environment variables:
 *   LLM_PROVIDER  - "anthropic" | "openai" | "azure-openai" | "gemini"  (default: "openai")
 *   LLM_MODEL     - Model identifier override (provider-specific)
 *   LLM_API_KEY   - API key (falls back to provider-specific vars:
 *                    ANTHROPIC_API_KEY, OPENAI_API_KEY, AZURE_OPENAI_API_KEY, GOOGLE_API_KEY)
 */

import { AnthropicProvider } from './anthropic';
import { AzureOpenAIProvider } from './azure-openai';
import { GeminiProvider } from './gemini';
import { OpenAIProvider } from './openai';
import { LLM_PROVIDER_NAMES, type AzureOpenAIOptions, type LLMProvider, type LLMProviderName } from './types';

export type {
  AzureOpenAIOptions,
  LLMCompletionRequest,
  LLMCompletionResponse,
  LLMProvider,
  LLMProviderName,
  LLMProviderOptions,
} from './types';
export { LLM_PROVIDER_NAMES } from './types';
export { AnthropicProvider, AzureOpenAIProvider, GeminiProvider, OpenAIProvider };

// ── Factory ─────────────────────────────────────────────────────────────────

const PROVIDERS: Record<LLMProviderName, new (options?: AzureOpenAIOptions) => LLMProvider> = {
  anthropic: AnthropicProvider,
  openai: OpenAIProvider,
  'azure-openai': AzureOpenAIProvider,
  gemini: GeminiProvider,
};

export function isProviderName(value: string): value is LLMProviderName {
  return LLM_PROVIDER_NAMES.some((name) => name === value);
}

let cachedProvider: LLMProvider | null = null;
let cachedProviderName: string | null = null;

/**
 * Return the configured LLM provider singleton.
 * The provider is lazily initialised on first call and cached.
 * Asking for a different provider replaces the cached instance.
 */
export function getLLMProvider(
  name: string = process.env.LLM_PROVIDER || 'openai',
  options: AzureOpenAIOptions = {},
): LLMProvider {
  if (cachedProvider && cachedProviderName === name) {
    return cachedProvider;
  }

  if (!isProviderName(name)) {
    throw new Error(
      `Unsupported LLM_PROVIDER: "${name}". ` +
      `Supported values: ${LLM_PROVIDER_NAMES.join(', ')}`,
    );
  }

  const ProviderClass = PROVIDERS[name];
  cachedProvider = new ProviderClass(options);
  cachedProviderName = name;
  return cachedProvider;
}

/** Reset the cached provider (useful for testing or runtime reconfiguration). */
export function resetProvider(): void {
  cachedProvider = null;
  cachedProviderName = null;
}
