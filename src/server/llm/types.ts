/**
 * LLM Provider abstraction.
 *
 * Defines a provider-agnostic interface so the SQL generator can work with
 * any LLM backend (Anthropic, OpenAI, Azure OpenAI, Google Gemini).
 */

export interface LLMCompletionRequest {
  /** System prompt providing context and instructions. */
  system: string;
  /** The user's message / question. */
  userMessage: string;
  /** Maximum tokens in the response. */
  maxTokens?: number;
}

export interface LLMCompletionResponse {
  /** The text content returned by the model. */
  text: string;
  /** Provider-specific model identifier that was used. */
  model: string;
  /** Token usage stats (when available from the provider). */
  usage?: {
    inputTokens?: number;
    outputTokens?: number;
  };
}

/**
 * All LLM providers must implement this interface.
 */
export interface LLMProvider {
  /** Provider identifier (e.g. "anthropic", "openai", "gemini"). */
  readonly name: string;

  /**
   * Send a completion request and return the model's text response.
   * Throws on network / auth / rate-limit errors.
   */
  complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}

/**
 * Settings shared by every provider. Anything left out falls back to the
 * environment (`LLM_API_KEY`, `LLM_MODEL`, then the provider's own key).
 */
export interface LLMProviderOptions {
  apiKey?: string;
  model?: string;
  /** Sampling temperature; SQL generation wants 0. */
  temperature?: number;
  /** Request timeout handed to the SDK client. */
  timeoutMs?: number;
}

export interface AzureOpenAIOptions extends LLMProviderOptions {
  endpoint?: string;
  deployment?: string;
  apiVersion?: string;
}

/** Supported provider identifiers. */
export const LLM_PROVIDER_NAMES = ['anthropic', 'openai', 'azure-openai', 'gemini'] as const;

export type LLMProviderName = (typeof LLM_PROVIDER_NAMES)[number];

/** Temperature used when none is configured. */
export const DEFAULT_TEMPERATURE = 0;

/** Completion budget when the request sets none. */
export const DEFAULT_MAX_TOKENS = 1024;
