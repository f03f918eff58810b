/**
 * OpenAI Vision Provider - chat completions API, also works with compatible gateways
 */

import type { ImageRegion, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';
import { isRecord } from '../../utils/guards.js';

/**
 * Text of the first choice of a chat completion response
 */
export function extractChatCompletionText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices)) return null;
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  return typeof first.message.content === 'string' ? first.message.content : null;
}

export class OpenAIVisionProvider extends BaseCloudVisionProvider {
  readonly name: string;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-openai`;
    this.baseUrl = config.baseUrl || 'https://api.openai.com/v1';

    if (!this.apiKey) {
      throw new CloudVisionError(
        'OpenAI API key is required. Set OPENAI_API_KEY or provide apiKey in config.',
        'openai',
        401,
        false
      );
    }
  }

  async analyze(region: ImageRegion, instruction: string, signal?: AbortSignal): Promise<string> {
    const { base64, mimeType } = this.encodeImage(region);

    const body = await this.requestWithRetry(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        max_tokens: this.config.options?.maxTokens || 512,
        temperature: this.config.options?.temperature ?? 0.1,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: instruction },
              { type: 'image_url', image_url: { url: `data:${mimeType};base64,${base64}` } },
            ],
          },
        ],
      }),
    }, signal);

    const text = extractChatCompletionText(body);
    if (text === null) {
      throw new CloudVisionError('Unexpected chat completion response shape', this.name, 0, false);
    }
    return text;
  }
}
