import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { BaseAIProvider, ProviderParseError } from '../base';
import { HttpError, TimeoutError } from '../../utils/fetch';
import type { AIProviderConfig, AIProviderResponse, GenerationRequest } from '../../types';

class TestProvider extends BaseAIProvider {
  readonly name = 'Test Provider';

  async generate(request: GenerationRequest): Promise<AIProviderResponse> {
    const data = await this.makeRequest<{ content?: string }>('/test', {
      prompt: request.userMessage,
    });
    return this.toResponse(data.content);
  }
}

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

describe('BaseAIProvider', () => {
  let provider: TestProvider;
  let config: AIProviderConfig;
  let fetchMock: Mock<typeof fetch>;

  const request: GenerationRequest = { userMessage: 'Hello', systemPrompt: 'Be brief' };

  beforeEach(() => {
    config = {
      apiKey: 'test-api-key',
      model: 'test-model',
      maxTokens: 100,
      temperature: 0.8,
      topP: 0.9,
      baseUrl: 'https://api.test.com',
      timeout: 5000,
    };
    provider = new TestProvider(config);
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('isConfigured', () => {
    it('should return true when API key is present', () => {
      expect(provider.isConfigured).toBe(true);
    });

    it('should return false when API key is empty', () => {
      const emptyProvider = new TestProvider({ ...config, apiKey: '' });
      expect(emptyProvider.isConfigured).toBe(false);
    });
  });

  describe('health', () => {
    it('should follow the credential check without a network call', async () => {
      expect(await provider.health()).toBe(true);
      expect(await new TestProvider({ ...config, apiKey: '' }).health()).toBe(false);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('makeRequest', () => {
    it('should post JSON with bearer auth to the endpoint', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ content: '  Hi there  ' }));

      const result = await provider.generate(request);

      expect(result).toEqual({ content: 'Hi there', usage: undefined });
      expect(fetchMock).toHaveBeenCalledWith(
        'https://api.test.com/test',
        expect.objectContaining({
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: 'Bearer test-api-key',
          },
          body: JSON.stringify({ prompt: 'Hello' }),
        })
      );
    });

    it('should throw HttpError with status and body on non-2xx', async () => {
      fetchMock.mockResolvedValue(
        new Response('rate limited', { status: 429, statusText: 'Too Many Requests' })
      );

      const error = await provider.generate(request).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(HttpError);
      expect(error).toMatchObject({ status: 429, body: 'rate limited' });
      expect(error).toHaveProperty('message', 'HTTP 429 Too Many Requests: rate limited');
    });

    it('should throw TimeoutError when the request is aborted by the timer', async () => {
      const slow = new TestProvider({ ...config, timeout: 10 });
      fetchMock.mockImplementation(
        (_url, init) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('aborted'), { name: 'AbortError' }));
            });
          })
      );

      await expect(slow.generate(request)).rejects.toThrow(TimeoutError);
      await expect(slow.generate(request)).rejects.toThrow('Request timeout after 10ms');
    });

    it('should pass transport errors through unchanged', async () => {
      fetchMock.mockRejectedValue(new TypeError('fetch failed'));
      await expect(provider.generate(request)).rejects.toThrow('fetch failed');
    });
  });

  describe('toResponse', () => {
    it('should return blank text as an empty reply', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ content: '   ' }));

      expect(await provider.generate(request)).toEqual({ content: '', usage: undefined });
    });

    it('should reject a non-string field', async () => {
      fetchMock.mockResolvedValue(jsonResponse({ content: 42 }));

      await expect(provider.generate(request)).rejects.toThrow(ProviderParseError);
    });

    it('should reject a missing field', async () => {
      fetchMock.mockResolvedValue(jsonResponse({}));

      await expect(provider.generate(request)).rejects.toThrow('Unable to parse Test Provider response');
    });
  });
});
