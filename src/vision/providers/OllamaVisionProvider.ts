/**
 * Ollama Vision Provider - local models through /api/generate
 */

import type { ImageRegion, VisionModelConfig } from '../types.js';
import { BaseCloudVisionProvider, CloudVisionError } from './BaseCloudVisionProvider.js';
import { isRecord } from '../../utils/guards.js';

export class OllamaVisionProvider extends BaseCloudVisionProvider {
  readonly name: string;
  private baseUrl: string;
  private model: string;

  constructor(config: VisionModelConfig) {
    super(config);
    this.baseUrl = config.baseUrl || 'http://localhost:11434';
    this.model = config.model;
    this.name = `${config.model}-ollama`;
  }

  async analyze(region: ImageRegion, instruction: string, signal?: AbortSignal): Promise<string> {
    const { base64 } = this.encodeImage(region);

    const body = await this.requestWithRetry(`${this.baseUrl}/api/generate`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.model,
        prompt: instruction,
        images: [base64],
        stream: false,
        options: {
          temperature: this.config.options?.temperature ?? 0.1,
          num_predict: this.config.options?.maxTokens ?? 512,
        },
      }),
    }, signal);

    if (!isRecord(body) || typeof body.response !== 'string') {
      throw new CloudVisionError('Unexpected Ollama response shape', this.name, 0, false);
    }
    return body.response;
  }
}
