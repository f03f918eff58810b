/**
 * Anthropic Vision Provider - messages API
 */

import type { ImageRegion, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';
import { isRecord } from '../../utils/guards.js';

/**
 * Concatenated text blocks of a messages API response
 */
export function extractMessageText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.content)) return null;
  const texts: string[] = [];
  for (const block of body.content) {
    if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
      texts.push(block.text);
    }
  }
  return texts.length > 0 ? texts.join('\n') : null;
}

export class AnthropicVisionProvider extends BaseCloudVisionProvider {
  readonly name: string;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.model = config.model;
    this.name = `${config.model}-anthropic`;
    this.baseUrl = config.baseUrl || 'https://api.anthropic.com/v1';

    if (!this.apiKey) {
      throw new CloudVisionError(
        'Anthropic API key is required. Set ANTHROPIC_API_KEY or provide apiKey in config.',
        'anthropic',
        401,
        false
      );
    }
  }

  async analyze(region: ImageRegion, instruction: string, signal?: AbortSignal): Promise<string> {
    const { base64, mimeType } = this.encodeImage(region);

    const requestBody: Record<string, unknown> = {
      model: this.model,
      max_tokens: this.config.options?.maxTokens || 512,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image', source: { type: 'base64', media_type: mimeType, data: base64 } },
            { type: 'text', text: instruction },
          ],
        },
      ],
    };

    // temperature 0 is the API default; only send an explicit value
    if (this.config.options?.temperature && this.config.options.temperature > 0) {
      requestBody.temperature = this.config.options.temperature;
    }

    const body = await this.requestWithRetry(`${this.baseUrl}/messages`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': this.apiKey,
        'anthropic-version': '2023-06-01',
      },
      body: JSON.stringify(requestBody),
    }, signal);

    const text = extractMessageText(body);
    if (text === null) {
      throw new CloudVisionError('Unexpected messages response shape', this.name, 0, false);
    }
    return text;
  }
}
