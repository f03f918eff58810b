/**
 * Base Cloud Vision Provider
 *
 * Shared functionality for vision API providers including:
 * - Rate limiting (sliding window)
 * - Exponential backoff retry logic
 * - Base64 encoding of region crops
 */

import { setTimeout as sleep } from 'timers/promises';
import type { ImageRegion, VisionModelConfig, VisionOracle } from '../types.js';
import { logger } from '../../utils/logger.js';

/**
 * Simple rate limiter using sliding window
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private maxRequests: number;
  private windowMs: number;

  constructor(maxRequests: number = 60, windowMs: number = 60000) {
    this.maxRequests = maxRequests;
    this.windowMs = windowMs;
  }

  async waitForSlot(signal?: AbortSignal): Promise<void> {
    const now = Date.now();
    this.timestamps = this.timestamps.filter(t => now - t < this.windowMs);

    if (this.timestamps.length >= this.maxRequests) {
      const oldestTimestamp = this.timestamps[0];
      const waitTime = this.windowMs - (now - oldestTimestamp) + 10;
      if (waitTime > 0) {
        await sleep(waitTime, undefined, { signal });
      }
      const afterWait = Date.now();
      this.timestamps = this.timestamps.filter(t => afterWait - t < this.windowMs);
    }

    this.timestamps.push(Date.now());
  }
}

/**
 * Vision provider error with retry information
 */
export class CloudVisionError extends Error {
  constructor(
    message: string,
    public provider: string,
    public statusCode: number,
    public retryable: boolean = false
  ) {
    super(message);
    this.name = 'CloudVisionError';
  }
}

/**
 * Base class for HTTP vision providers (OpenAI-compatible, Anthropic, Ollama)
 */
export abstract class BaseCloudVisionProvider implements VisionOracle {
  abstract readonly name: string;
  protected config: VisionModelConfig;
  protected apiKey: string;
  protected rateLimiter: RateLimiter;
  protected timeout: number;
  protected maxRetries: number;
  protected retryBaseDelayMs = 1000;

  constructor(config: VisionModelConfig) {
    this.config = config;
    this.apiKey = config.apiKey || '';
    this.timeout = config.options?.timeout || 60000;
    this.maxRetries = config.options?.maxRetries ?? 3;
    this.rateLimiter = new RateLimiter(config.options?.requestsPerMinute || 60, 60000);
  }

  /**
   * Send one crop with its instruction; resolves to the model's reply text.
   * An aborted signal cancels the request and any pending retry.
   */
  abstract analyze(region: ImageRegion, instruction: string, signal?: AbortSignal): Promise<string>;

  protected encodeImage(region: ImageRegion): { base64: string; mimeType: string } {
    return { base64: region.data.toString('base64'), mimeType: region.mimeType };
  }

  /**
   * Make HTTP request with rate limiting and retry logic.
   * Resolves to the parsed JSON body; callers narrow it.
   * Once the caller's signal aborts, no further attempt is made.
   */
  protected async requestWithRetry(
    url: string,
    options: RequestInit,
    signal?: AbortSignal,
    retryCount: number = 0
  ): Promise<unknown> {
    if (signal?.aborted) {
      throw this.cancelled();
    }
    await this.pause(this.rateLimiter.waitForSlot(signal), signal);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);
    const cancel = () => controller.abort();
    signal?.addEventListener('abort', cancel, { once: true });

    try {
      const response = await fetch(url, {
        ...options,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        const errorText = await response.text();
        const retryable = response.status === 429 || response.status >= 500;

        if (retryable && retryCount < this.maxRetries) {
          const delay = Math.pow(2, retryCount) * this.retryBaseDelayMs;
          logger.warn(`${this.name}: Request failed with ${response.status}, retrying in ${delay}ms...`);
          await this.pause(sleep(delay, undefined, { signal }), signal);
          return this.requestWithRetry(url, options, signal, retryCount + 1);
        }

        throw new CloudVisionError(`API error: ${response.status} - ${errorText}`, this.name, response.status, retryable);
      }

      const body: unknown = await response.json();
      return body;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof CloudVisionError) {
        throw error;
      }

      if (signal?.aborted) {
        throw this.cancelled();
      }

      if (error instanceof Error && error.name === 'AbortError') {
        if (retryCount < this.maxRetries) {
          logger.warn(`${this.name}: Request timeout, retrying...`);
          await this.pause(sleep(this.retryBaseDelayMs, undefined, { signal }), signal);
          return this.requestWithRetry(url, options, signal, retryCount + 1);
        }
        throw new CloudVisionError(`Request timeout after ${this.timeout}ms`, this.name, 0, true);
      }

      throw new CloudVisionError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        this.name,
        0,
        true
      );
    } finally {
      signal?.removeEventListener('abort', cancel);
    }
  }

  /**
   * Await a wait that the caller's signal may cut short
   */
  private async pause(wait: Promise<void>, signal: AbortSignal | undefined): Promise<void> {
    try {
      await wait;
    } catch (error) {
      if (signal?.aborted) {
        throw this.cancelled();
      }
      throw error;
    }
  }

  private cancelled(): CloudVisionError {
    return new CloudVisionError('Request cancelled', this.name, 0, false);
  }
}
