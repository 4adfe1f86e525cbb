import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMProvider,
  type LLMProviderOptions,
} from './types';

const DEFAULT_MODEL = 'gemini-2.5-pro';

export class GeminiProvider implements LLMProvider {
  readonly name = 'gemini' as const;
  private ai: import('@google/genai').GoogleGenAI | null = null;

  constructor(private readonly options: LLMProviderOptions = {}) {}

  private async getAI() {
    if (!this.ai) {
      const { GoogleGenAI } = await import('@google/genai');
      this.ai = new GoogleGenAI({
        apiKey: this.options.apiKey || process.env.LLM_API_KEY || process.env.GOOGLE_API_KEY,
        ...(this.options.timeoutMs ? { httpOptions: { timeout: this.options.timeoutMs } } : {}),
      });
    }
    return this.ai;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const ai = await this.getAI();
    const model = this.options.model || process.env.LLM_MODEL || DEFAULT_MODEL;

    const response = await ai.models.generateContent({
      model,
      config: {
        maxOutputTokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
        temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
        systemInstruction: request.system,
      },
      contents: request.userMessage,
    });

    const text = response.text;
    if (!text) {
      throw new Error('No text response received from Gemini');
    }

    return {
      text,
      model,
      usage: {
        inputTokens: response.usageMetadata?.promptTokenCount,
        outputTokens: response.usageMetadata?.candidatesTokenCount,
      },
    };
  }
}
