/**
 * OpenAI chat completion streaming.
 */

import OpenAI from 'openai';
import type { OpenAiSettings } from './context.js';
import { MissingApiKeyError } from './errors.js';
import { createLogger } from './logger.js';
import { traced } from './tracer.js';

const logger = createLogger('openai');

export const OPENAI_API_KEY = 'OPENAI_API_KEY';

export type ChatCompletionChunk = OpenAI.Chat.Completions.ChatCompletionChunk;
export type ChatCompletionStreamParams = OpenAI.Chat.Completions.ChatCompletionCreateParamsStreaming;

export interface OpenAiChatInput {
  model: string;
  maxTokens: number;
  systemPrompt: string;
  userPrompt: string;
}

/**
 * The one capability the request needs from the OpenAI SDK.
 */
export interface ChatStreamClient {
  createStream(params: ChatCompletionStreamParams): Promise<AsyncIterable<ChatCompletionChunk>>;
}

export interface TextSink {
  write(chunk: string): unknown;
}

/**
 * The environment variable wins over the configured key.
 *
 * @throws MissingApiKeyError when neither is set.
 */
export function resolveApiKey(configured: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const fromEnv = env[OPENAI_API_KEY];
  if (fromEnv) {
    return fromEnv;
  }
  if (configured) {
    return configured;
  }
  throw new MissingApiKeyError(OPENAI_API_KEY);
}

/**
 * Build a ChatStreamClient on the OpenAI SDK, resolving the API key.
 */
export function createChatStreamClient(
  settings: Pick<OpenAiSettings, 'apiKey'>,
  env: NodeJS.ProcessEnv = process.env
): ChatStreamClient {
  const client = new OpenAI({ apiKey: resolveApiKey(settings.apiKey, env) });
  return {
    createStream: (params) => client.chat.completions.create(params),
  };
}

/**
 * Stream a chat completion, echoing each delta to `out` as it arrives.
 *
 * A failure while reading the stream is written and kept in the returned
 * text as `error: <message>` rather than thrown.
 *
 * @returns The accumulated response text.
 */
export async function sendRequest(
  client: ChatStreamClient,
  input: OpenAiChatInput,
  out: TextSink = process.stdout
): Promise<string> {
  return traced(
    'llm.chat.completion',
    { 'llm.model': input.model, 'llm.max_tokens': input.maxTokens },
    async (setAttributes) => {
      const stream = await client.createStream({
        model: input.model,
        max_tokens: input.maxTokens,
        stream: true,
        messages: [
          { role: 'system', content: input.systemPrompt },
          { role: 'user', content: input.userPrompt },
        ],
      });

      let text = '';
      try {
        for await (const chunk of stream) {
          for (const choice of chunk.choices) {
            const content = choice.delta.content;
            if (content) {
              out.write(content);
              text += content;
            }
          }
        }
      } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        logger.debug(`stream interrupted: ${message}`);
        const line = `error: ${message}\n`;
        out.write(line);
        text += line;
      }

      setAttributes({ 'llm.response_length': text.length });
      return text;
    }
  );
}
