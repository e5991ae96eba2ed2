import fetch, { Response } from 'node-fetch';
import { z } from 'zod';
import {
  ChatCompletionRequest,
  ChatCompletionResult,
  IChatCompletionClient,
} from '../../core/interfaces/IChatCompletionClient.js';
import { ProviderError } from '../../core/errors.js';

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string(),
        }),
      })
    )
    .min(1, 'response contained no choices'),
});

const ProviderErrorBodySchema = z.object({
  error: z.object({ message: z.string() }),
});

/**
 * Client for OpenAI-compatible chat completion APIs.
 * One request per call; retries are left to the caller.
 */
export class OpenAiApiClient implements IChatCompletionClient {
  constructor(
    private apiKey: string,
    private baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(request),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ProviderError(`Provider request failed: ${reason}`, error);
    }

    const text = await res.text();

    if (!res.ok) {
      throw new ProviderError(
        `Provider returned HTTP ${res.status}: ${this.extractErrorMessage(text) ?? res.statusText}`
      );
    }

    let body: unknown;
    try {
      body = JSON.parse(text);
    } catch (error) {
      throw new ProviderError('Malformed provider response: body is not JSON', error);
    }

    const parsed = ChatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      const details = parsed.error.errors
        .map((err) => `${err.path.join('.') || 'body'}: ${err.message}`)
        .join('; ');
      throw new ProviderError(`Malformed provider response: ${details}`, parsed.error);
    }

    return {
      model: parsed.data.model ?? request.model,
      content: parsed.data.choices[0].message.content,
    };
  }

  private extractErrorMessage(text: string): string | undefined {
    try {
      const parsed = ProviderErrorBodySchema.safeParse(JSON.parse(text));
      return parsed.success ? parsed.data.error.message : text || undefined;
    } catch {
      return text || undefined;
    }
  }
}
