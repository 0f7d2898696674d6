import Groq from 'groq-sdk';
import { groqConfig } from '../../config/services';
import type { ChatMessage } from '../../models/types';

export type GeneratorFailure = 'unavailable' | 'timeout' | 'malformed';

export class GeneratorError extends Error {
  constructor(
    public kind: GeneratorFailure,
    message: string,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'GeneratorError';
  }
}

export interface GenerateOptions {
  signal?: AbortSignal;
  json?: boolean;
}

/** Streaming text completion used for interviewer replies and evaluations. */
export interface TextGenerator {
  streamChat(messages: ChatMessage[], options?: GenerateOptions): AsyncIterable<string>;
  complete(messages: ChatMessage[], options?: GenerateOptions): Promise<string>;
}

const toGroqMessages = (messages: ChatMessage[]) =>
  messages.map((message) => {
    switch (message.role) {
      case 'system':
        return { role: 'system' as const, content: message.content };
      case 'user':
        return { role: 'user' as const, content: message.content };
      case 'assistant':
        return { role: 'assistant' as const, content: message.content };
    }
  });

const classify = (signal?: AbortSignal): GeneratorFailure =>
  signal?.aborted ? 'timeout' : 'unavailable';

export class GroqTextGenerator implements TextGenerator {
  private groq: Groq;

  constructor(
    private config: typeof groqConfig = groqConfig,
    client?: Groq
  ) {
    this.groq = client ?? new Groq({ apiKey: config.apiKey });
  }

  private async openStream(messages: ChatMessage[], signal?: AbortSignal) {
    try {
      return await this.groq.chat.completions.create(
        {
          messages: toGroqMessages(messages),
          model: this.config.model,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
          stream: true,
        },
        { signal, maxRetries: 1 }
      );
    } catch (error) {
      throw new GeneratorError(classify(signal), 'Failed to open completion stream', error);
    }
  }

  async *streamChat(messages: ChatMessage[], options: GenerateOptions = {}): AsyncIterable<string> {
    const { signal } = options;
    const stream = await this.openStream(messages, signal);

    try {
      for await (const chunk of stream) {
        if (!Array.isArray(chunk.choices)) {
          throw new GeneratorError('malformed', 'Completion chunk has no choices');
        }
        const token = chunk.choices[0]?.delta?.content;
        if (token) {
          yield token;
        }
      }
    } catch (error) {
      if (error instanceof GeneratorError) throw error;
      throw new GeneratorError(classify(signal), 'Completion stream failed', error);
    }
  }

  async complete(messages: ChatMessage[], options: GenerateOptions = {}): Promise<string> {
    const { signal, json } = options;
    try {
      const completion = await this.groq.chat.completions.create(
        {
          messages: toGroqMessages(messages),
          model: this.config.model,
          temperature: 0.3,
          max_tokens: 1000,
          ...(json ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal }
      );

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new GeneratorError('malformed', 'No content in completion response');
      }
      return content;
    } catch (error) {
      if (error instanceof GeneratorError) throw error;
      throw new GeneratorError(classify(signal), 'Completion request failed', error);
    }
  }
}
