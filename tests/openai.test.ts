import { describe, it, expect, vi } from 'vitest';
import {
  resolveApiKey,
  sendRequest,
  type ChatCompletionChunk,
  type ChatStreamClient,
  type OpenAiChatInput,
} from '../src/openai.js';
import { MissingApiKeyError } from '../src/errors.js';

function chunk(content: string | null): ChatCompletionChunk {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'gpt-4o',
    choices: [{ index: 0, delta: { content }, finish_reason: null }],
  };
}

async function* stream(...chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  yield* chunks;
}

function fakeChatClient(source: () => AsyncIterable<ChatCompletionChunk>): ChatStreamClient {
  return { createStream: vi.fn(async () => source()) };
}

function sink() {
  const written: string[] = [];
  return { written, write: (text: string) => written.push(text) };
}

const input: OpenAiChatInput = {
  model: 'gpt-4o',
  maxTokens: 512,
  systemPrompt: 'You are an AWS diagnostic assistant.',
  userPrompt: '<data>\nInformation: [App Description]\nshop\n</data>\n\n',
};

describe('OpenAI', () => {
  describe('resolveApiKey()', () => {
    it('should prefer the environment variable', () => {
      expect(resolveApiKey('test-secret-config', { OPENAI_API_KEY: 'test-secret-env' })).toBe('test-secret-env');
    });

    it('should fall back to the configured key', () => {
      expect(resolveApiKey('test-secret-config', {})).toBe('test-secret-config');
      expect(resolveApiKey('test-secret-config', { OPENAI_API_KEY: '' })).toBe('test-secret-config');
    });

    it('should fail when no key is available', () => {
      expect(() => resolveApiKey(undefined, {})).toThrow(MissingApiKeyError);
      expect(() => resolveApiKey(undefined, {})).toThrow('OPENAI_API_KEY variable is not set');
    });
  });

  describe('sendRequest()', () => {
    it('should send the system and user prompts as a streaming request', async () => {
      const client = fakeChatClient(() => stream());

      await sendRequest(client, input, sink());

      expect(client.createStream).toHaveBeenCalledWith({
        model: 'gpt-4o',
        max_tokens: 512,
        stream: true,
        messages: [
          { role: 'system', content: 'You are an AWS diagnostic assistant.' },
          { role: 'user', content: '<data>\nInformation: [App Description]\nshop\n</data>\n\n' },
        ],
      });
    });

    it('should echo and accumulate every delta', async () => {
      const client = fakeChatClient(() => stream(chunk('## Diagnosis\n'), chunk(null), chunk('CPU is fine.')));
      const out = sink();

      const text = await sendRequest(client, input, out);

      expect(text).toBe('## Diagnosis\nCPU is fine.');
      expect(out.written).toEqual(['## Diagnosis\n', 'CPU is fine.']);
    });

    it('should keep a stream failure in the text instead of throwing', async () => {
      async function* failing(): AsyncGenerator<ChatCompletionChunk> {
        yield chunk('Partial');
        throw new Error('connection reset');
      }
      const out = sink();

      const text = await sendRequest(fakeChatClient(failing), input, out);

      expect(text).toBe('Partialerror: connection reset\n');
      expect(out.written).toEqual(['Partial', 'error: connection reset\n']);
    });

    it('should propagate a rejected request', async () => {
      const client: ChatStreamClient = {
        createStream: vi.fn(async () => {
          throw new Error('401 Incorrect API key provided');
        }),
      };

      await expect(sendRequest(client, input, sink())).rejects.toThrow('401 Incorrect API key provided');
    });
  });
});
