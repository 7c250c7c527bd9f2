import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { OpenAIProvider } from '../openai';
import { ProviderParseError } from '../base';
import type { AIProviderConfig, GenerationRequest } from '../../types';

const jsonResponse = (body: unknown, status = 200): Response =>
  new Response(JSON.stringify(body), { status });

describe('OpenAIProvider', () => {
  let fetchMock: Mock<typeof fetch>;
  const config: AIProviderConfig = {
    apiKey: 'test-key',
    model: 'gpt-test',
    maxTokens: 150,
    temperature: 0.8,
    topP: 0.9,
    baseUrl: 'https://api.openai.test/v1',
    timeout: 5000,
  };
  const request: GenerationRequest = { userMessage: 'What is a tree?', systemPrompt: 'Be a shell.' };

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send system and user messages to chat completions', async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({
        choices: [{ message: { content: 'A tree is a tall plant.' } }],
        usage: { prompt_tokens: 20, completion_tokens: 6, total_tokens: 26 },
      })
    );

    const result = await new OpenAIProvider(config).generate(request);

    expect(result).toEqual({
      content: 'A tree is a tall plant.',
      usage: { promptTokens: 20, completionTokens: 6, totalTokens: 26 },
    });
    expect(fetchMock).toHaveBeenCalledWith(
      'https://api.openai.test/v1/chat/completions',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: 'Bearer test-key',
        },
        body: JSON.stringify({
          model: 'gpt-test',
          messages: [
            { role: 'system', content: 'Be a shell.' },
            { role: 'user', content: 'What is a tree?' },
          ],
          max_tokens: 150,
          temperature: 0.8,
        }),
      })
    );
  });

  it('should treat a null message content as a parse failure', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] }));

    await expect(new OpenAIProvider(config).generate(request)).rejects.toThrow(ProviderParseError);
  });

  it('should treat an empty choice list as a parse failure', async () => {
    fetchMock.mockResolvedValue(jsonResponse({ choices: [] }));

    await expect(new OpenAIProvider(config).generate(request)).rejects.toThrow(
      'Unable to parse OpenAI response'
    );
  });
});
