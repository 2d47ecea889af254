// src/services/llm-client.ts: multi-modal completion client (prompt text + one image)
import OpenAI from 'openai';
import type { ForecastImage } from '@/types/forecast';
import { isConfiguredCredential, PLACEHOLDER_CREDENTIALS } from './providers/credentials';

export interface CompletionResponse {
  text: string;
}

export interface MultimodalCompletionClient {
  complete(input: readonly [prompt: string, image: ForecastImage]): Promise<CompletionResponse>;
}

export interface OpenAiVisionClientOptions {
  apiKey?: string;
  model: string;
  maxTokens?: number;
  temperature?: number;
}

export function toDataUrl(image: ForecastImage): string {
  return `data:${image.mimeType};base64,${image.data.toString('base64')}`;
}

export class OpenAiVisionClient implements MultimodalCompletionClient {
  private client: OpenAI | null = null;

  constructor(private readonly options: OpenAiVisionClientOptions) {}

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = this.options.apiKey;
      if (!isConfiguredCredential(apiKey, PLACEHOLDER_CREDENTIALS.openai)) {
        throw new Error('Missing OPENAI_API_KEY. Set it in .env or pass it when starting the server.');
      }
      this.client = new OpenAI({ apiKey });
    }
    return this.client;
  }

  async complete([prompt, image]: readonly [string, ForecastImage]): Promise<CompletionResponse> {
    const res = await this.getClient().chat.completions.create({
      model: this.options.model,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: prompt },
            { type: 'image_url', image_url: { url: toDataUrl(image) } },
          ],
        },
      ],
      temperature: this.options.temperature ?? 0.5,
      max_tokens: this.options.maxTokens ?? 512,
    });
    const text = res.choices[0]?.message?.content;
    if (!text) throw new Error('Model returned no text');
    return { text };
  }
}
