import {
  DEFAULT_MAX_TOKENS,
  DEFAULT_TEMPERATURE,
  type AzureOpenAIOptions,
  type LLMCompletionRequest,
  type LLMCompletionResponse,
  type LLMProvider,
} from './types';

const DEFAULT_API_VERSION = '2024-06-01';

/**
 * Chat completions against an Azure OpenAI deployment. The deployment name
 * stands in for the model identifier.
 */
export class AzureOpenAIProvider implements LLMProvider {
  readonly name = 'azure-openai' as const;
  private client: import('openai').AzureOpenAI | null = null;

  constructor(private readonly options: AzureOpenAIOptions = {}) {}

  private deployment(): string {
    const deployment =
      this.options.deployment ||
      this.options.model ||
      process.env.AZURE_OPENAI_DEPLOYMENT ||
      process.env.LLM_MODEL;
    if (!deployment) {
      throw new Error('AZURE_OPENAI_DEPLOYMENT is required for the azure-openai provider');
    }
    return deployment;
  }

  private async getClient() {
    if (!this.client) {
      const endpoint = this.options.endpoint || process.env.AZURE_OPENAI_ENDPOINT;
      if (!endpoint) {
        throw new Error('AZURE_OPENAI_ENDPOINT is required for the azure-openai provider');
      }
      const { AzureOpenAI } = await import('openai');
      this.client = new AzureOpenAI({
        apiKey: this.options.apiKey || process.env.LLM_API_KEY || process.env.AZURE_OPENAI_API_KEY,
        endpoint,
        apiVersion:
          this.options.apiVersion || process.env.AZURE_OPENAI_API_VERSION || DEFAULT_API_VERSION,
        deployment: this.deployment(),
        timeout: this.options.timeoutMs,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  async complete(request: LLMCompletionRequest): Promise<LLMCompletionResponse> {
    const client = await this.getClient();
    const model = this.deployment();

    const response = await client.chat.completions.create({
      model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
      messages: [
        { role: 'system', content: request.system },
        { role: 'user', content: request.userMessage },
      ],
    });

    const text = response.choices[0]?.message?.content;
    if (!text) {
      throw new Error('No text response received from Azure OpenAI');
    }

    return {
      text,
      model,
      usage: {
        inputTokens: response.usage?.prompt_tokens,
        outputTokens: response.usage?.completion_tokens,
      },
    };
  }
}
