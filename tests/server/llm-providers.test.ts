import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { LLMCompletionRequest } from '../../src/server/llm/types';

// Hoist all mock functions so they're available during vi.mock factory execution
const {
  mockAnthropicCreate,
  mockAnthropicCtor,
  mockOpenAICreate,
  mockOpenAICtor,
  mockAzureCtor,
  mockGeminiGenerate,
  mockGeminiCtor,
} = vi.hoisted(() => ({
  mockAnthropicCreate: vi.fn(),
  mockAnthropicCtor: vi.fn(),
  mockOpenAICreate: vi.fn(),
  mockOpenAICtor: vi.fn(),
  mockAzureCtor: vi.fn(),
  mockGeminiGenerate: vi.fn(),
  mockGeminiCtor: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: function MockAnthropic(options: unknown) {
    mockAnthropicCtor(options);
    return { messages: { create: mockAnthropicCreate } };
  },
}));

vi.mock('openai', () => ({
  default: function MockOpenAI(options: unknown) {
    mockOpenAICtor(options);
    return { chat: { completions: { create: mockOpenAICreate } } };
  },
  AzureOpenAI: function MockAzureOpenAI(options: unknown) {
    mockAzureCtor(options);
    return { chat: { completions: { create: mockOpenAICreate } } };
  },
}));

vi.mock('@google/genai', () => ({
  GoogleGenAI: function MockGoogleGenAI(options: unknown) {
    mockGeminiCtor(options);
    return { models: { generateContent: mockGeminiGenerate } };
  },
}));

import {
  AnthropicProvider,
  AzureOpenAIProvider,
  GeminiProvider,
  OpenAIProvider,
} from '../../src/server/llm';

const ENV_KEYS = [
  'LLM_MODEL',
  'LLM_API_KEY',
  'ANTHROPIC_API_KEY',
  'OPENAI_API_KEY',
  'AZURE_OPENAI_API_KEY',
  'AZURE_OPENAI_ENDPOINT',
  'AZURE_OPENAI_DEPLOYMENT',
  'AZURE_OPENAI_API_VERSION',
  'GOOGLE_API_KEY',
];

const request: LLMCompletionRequest = {
  system: 'You translate questions into SQL.',
  userMessage: 'User intent:\nopen invoices',
};

const saved: Record<string, string | undefined> = {};

beforeEach(() => {
  vi.clearAllMocks();
  for (const key of ENV_KEYS) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    if (saved[key] === undefined) delete process.env[key];
    else process.env[key] = saved[key];
  }
});

// ── Anthropic Provider ──────────────────────────────────────────────────────

describe('AnthropicProvider', () => {
  it('should return text and usage from the Anthropic response', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      content: [{ type: 'text', text: 'SELECT id FROM stg_account_move' }],
      usage: { input_tokens: 100, output_tokens: 50 },
    });

    const provider = new AnthropicProvider({ apiKey: 'test-key' });
    const result = await provider.complete(request);

    expect(result).toEqual({
      text: 'SELECT id FROM stg_account_move',
      model: 'claude-sonnet-4-5-20250929',
      usage: { inputTokens: 100, outputTokens: 50 },
    });
    expect(provider.name).toBe('anthropic');
  });

  it('should send the system prompt, temperature 0 and the default token budget', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }], usage: {} });

    await new AnthropicProvider().complete(request);

    expect(mockAnthropicCreate).toHaveBeenCalledWith({
      model: 'claude-sonnet-4-5-20250929',
      max_tokens: 1024,
      temperature: 0,
      system: 'You translate questions into SQL.',
      messages: [{ role: 'user', content: 'User intent:\nopen invoices' }],
    });
  });

  it('should build the client from options before the environment', async () => {
    process.env.ANTHROPIC_API_KEY = 'env-key';
    mockAnthropicCreate.mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }], usage: {} });

    await new AnthropicProvider({ apiKey: 'test-key', timeoutMs: 5000 }).complete(request);

    expect(mockAnthropicCtor).toHaveBeenCalledWith({ apiKey: 'test-key', timeout: 5000, maxRetries: 0 });
  });

  it('should fall back to ANTHROPIC_API_KEY', async () => {
    process.env.ANTHROPIC_API_KEY = 'test-key';
    mockAnthropicCreate.mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }], usage: {} });

    await new AnthropicProvider().complete(request);

    expect(mockAnthropicCtor).toHaveBeenCalledWith(expect.objectContaining({ apiKey: 'test-key' }));
  });

  it('should throw when no text block is returned', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      content: [{ type: 'tool_use', id: 'tool_1' }],
      usage: {},
    });

    await expect(new AnthropicProvider().complete(request)).rejects.toThrow(
      'No text response received from Anthropic',
    );
  });

  it('should use the model from LLM_MODEL', async () => {
    process.env.LLM_MODEL = 'claude-haiku-test';
    mockAnthropicCreate.mockResolvedValueOnce({ content: [{ type: 'text', text: 'ok' }], usage: {} });

    const result = await new AnthropicProvider().complete(request);

    expect(result.model).toBe('claude-haiku-test');
  });

  it('should reuse one client across calls', async () => {
    mockAnthropicCreate.mockResolvedValue({ content: [{ type: 'text', text: 'ok' }], usage: {} });
    const provider = new AnthropicProvider();

    await provider.complete(request);
    await provider.complete(request);

    expect(mockAnthropicCtor).toHaveBeenCalledOnce();
  });
});

// ── OpenAI Provider ─────────────────────────────────────────────────────────

describe('OpenAIProvider', () => {
  it('should return text and usage from the OpenAI response', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      choices: [{ message: { content: 'SELECT id FROM stg_res_partner' } }],
      usage: { prompt_tokens: 80, completion_tokens: 30 },
    });

    const provider = new OpenAIProvider();
    const result = await provider.complete(request);

    expect(result).toEqual({
      text: 'SELECT id FROM stg_res_partner',
      model: 'gpt-4o',
      usage: { inputTokens: 80, outputTokens: 30 },
    });
    expect(provider.name).toBe('openai');
  });

  it('should send system and user messages', async () => {
    mockOpenAICreate.mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });

    await new OpenAIProvider({ model: 'gpt-4o-mini', temperature: 0.2 }).complete({ ...request, maxTokens: 256 });

    expect(mockOpenAICreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      max_tokens: 256,
      temperature: 0.2,
      messages: [
        { role: 'system', content: 'You translate questions into SQL.' },
        { role: 'user', content: 'User intent:\nopen invoices' },
      ],
    });
  });

  it('should prefer LLM_API_KEY over OPENAI_API_KEY', async () => {
    process.env.LLM_API_KEY = 'test-key';
    process.env.OPENAI_API_KEY = 'other-key';
    mockOpenAICreate.mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });

    await new OpenAIProvider().complete(request);

    expect(mockOpenAICtor).toHaveBeenCalledWith({ apiKey: 'test-key', timeout: undefined, maxRetries: 0 });
  });

  it('should throw when no text is in the response', async () => {
    mockOpenAICreate.mockResolvedValueOnce({ choices: [{ message: { content: null } }] });

    await expect(new OpenAIProvider().complete(request)).rejects.toThrow('No text response received from OpenAI');
  });

  it('should throw when there are no choices', async () => {
    mockOpenAICreate.mockResolvedValueOnce({ choices: [] });

    await expect(new OpenAIProvider().complete(request)).rejects.toThrow('No text response received from OpenAI');
  });
});

// ── Azure OpenAI Provider ───────────────────────────────────────────────────

describe('AzureOpenAIProvider', () => {
  it('should call the configured deployment', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      choices: [{ message: { content: 'SELECT id FROM stg_res_company' } }],
      usage: { prompt_tokens: 40, completion_tokens: 9 },
    });

    const provider = new AzureOpenAIProvider({
      apiKey: 'test-key',
      endpoint: 'https://example.openai.azure.com',
      deployment: 'sql-gen',
    });
    const result = await provider.complete(request);

    expect(result).toEqual({
      text: 'SELECT id FROM stg_res_company',
      model: 'sql-gen',
      usage: { inputTokens: 40, outputTokens: 9 },
    });
    expect(provider.name).toBe('azure-openai');
    expect(mockAzureCtor).toHaveBeenCalledWith({
      apiKey: 'test-key',
      endpoint: 'https://example.openai.azure.com',
      apiVersion: '2024-06-01',
      deployment: 'sql-gen',
      timeout: undefined,
      maxRetries: 0,
    });
    expect(mockOpenAICreate).toHaveBeenCalledWith(expect.objectContaining({ model: 'sql-gen' }));
  });

  it('should read the endpoint, deployment and version from the environment', async () => {
    process.env.AZURE_OPENAI_ENDPOINT = 'https://env.openai.azure.com';
    process.env.AZURE_OPENAI_DEPLOYMENT = 'env-deployment';
    process.env.AZURE_OPENAI_API_VERSION = '2024-10-21';
    process.env.AZURE_OPENAI_API_KEY = 'test-key';
    mockOpenAICreate.mockResolvedValueOnce({ choices: [{ message: { content: 'ok' } }] });

    await new AzureOpenAIProvider().complete(request);

    expect(mockAzureCtor).toHaveBeenCalledWith(
      expect.objectContaining({
        apiKey: 'test-key',
        endpoint: 'https://env.openai.azure.com',
        apiVersion: '2024-10-21',
        deployment: 'env-deployment',
      }),
    );
  });

  it('should require an endpoint', async () => {
    await expect(new AzureOpenAIProvider({ deployment: 'sql-gen' }).complete(request)).rejects.toThrow(
      'AZURE_OPENAI_ENDPOINT is required for the azure-openai provider',
    );
    expect(mockOpenAICreate).not.toHaveBeenCalled();
  });

  it('should require a deployment', async () => {
    await expect(
      new AzureOpenAIProvider({ endpoint: 'https://example.openai.azure.com' }).complete(request),
    ).rejects.toThrow('AZURE_OPENAI_DEPLOYMENT is required for the azure-openai provider');
  });

  it('should throw when no text is in the response', async () => {
    mockOpenAICreate.mockResolvedValueOnce({ choices: [{ message: { content: '' } }] });

    await expect(
      new AzureOpenAIProvider({ endpoint: 'https://example.openai.azure.com', deployment: 'd' }).complete(request),
    ).rejects.toThrow('No text response received from Azure OpenAI');
  });
});

// ── Gemini Provider ─────────────────────────────────────────────────────────

describe('GeminiProvider', () => {
  it('should return text and usage from the Gemini response', async () => {
    mockGeminiGenerate.mockResolvedValueOnce({
      text: 'SELECT id FROM stg_res_currency',
      usageMetadata: { promptTokenCount: 120, candidatesTokenCount: 40 },
    });

    const provider = new GeminiProvider();
    const result = await provider.complete(request);

    expect(result).toEqual({
      text: 'SELECT id FROM stg_res_currency',
      model: 'gemini-2.5-pro',
      usage: { inputTokens: 120, outputTokens: 40 },
    });
    expect(provider.name).toBe('gemini');
  });

  it('should pass the system instruction and token budget in config', async () => {
    mockGeminiGenerate.mockResolvedValueOnce({ text: 'ok' });

    await new GeminiProvider().complete({ ...request, maxTokens: 512 });

    expect(mockGeminiGenerate).toHaveBeenCalledWith({
      model: 'gemini-2.5-pro',
      config: {
        maxOutputTokens: 512,
        temperature: 0,
        systemInstruction: 'You translate questions into SQL.',
      },
      contents: 'User intent:\nopen invoices',
    });
  });

  it('should pass the timeout as http options', async () => {
    mockGeminiGenerate.mockResolvedValueOnce({ text: 'ok' });

    await new GeminiProvider({ apiKey: 'test-key', timeoutMs: 30000 }).complete(request);

    expect(mockGeminiCtor).toHaveBeenCalledWith({ apiKey: 'test-key', httpOptions: { timeout: 30000 } });
  });

  it('should throw when no text is returned', async () => {
    mockGeminiGenerate.mockResolvedValueOnce({ text: undefined });

    await expect(new GeminiProvider().complete(request)).rejects.toThrow('No text response received from Gemini');
  });
});
