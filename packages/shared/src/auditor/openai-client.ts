/**
 * OpenAI Model Client
 *
 * Chat completions with temperature 0 and a single attempt per request.
 */

import OpenAI from 'openai';
import { config } from '../config';
import { MalformedResponseError, describeError } from '../errors';
import { logger } from '../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../metrics';
import type { ModelClient, ModelCompletion, ModelRequest } from './types';

export interface OpenAiModelClientOptions {
  apiKey?: string;
  /** Client-wide default; each request also carries its own timeout */
  timeoutMs?: number;
  /** Preconfigured SDK instance; apiKey and timeoutMs are ignored when set */
  openai?: OpenAI;
}

export class OpenAiModelClient implements ModelClient {
  private readonly openai: OpenAI;

  constructor(options: OpenAiModelClientOptions = {}) {
    this.openai =
      options.openai ??
      new OpenAI({
        apiKey: options.apiKey || process.env.OPENAI_API_KEY || config.openaiApiKey,
        timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
        maxRetries: 0,
      });
  }

  async complete(request: ModelRequest): Promise<ModelCompletion> {
    const startTime = Date.now();

    try {
      const response = await this.openai.chat.completions.create(
        {
          model: request.model,
          messages: [
            { role: 'system', content: request.systemPrompt },
            { role: 'user', content: request.userPrompt },
          ],
          temperature: 0,
        },
        { timeout: request.timeoutMs }
      );

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new MalformedResponseError('Empty response from OpenAI');
      }

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'success' });

      logger.info('OpenAI completion received', {
        model: response.model,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return {
        text: content,
        model: response.model || request.model,
        requestId: response.id,
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'error' });

      // The auditor classifies and reports the failure
      logger.warn('OpenAI completion failed', {
        model: request.model,
        duration_seconds: duration,
        error: describeError(error),
      });

      throw error;
    }
  }
}
