/**
 * Local LLM Provider (Ollama)
 *
 * Talks to a local Ollama server (https://ollama.ai/).
 *
 * Usage:
 * 1. Install Ollama: https://ollama.ai/download
 * 2. Pull a model: ollama pull llama3
 * 3. Optionally set OLLAMA_API_URL (default http://localhost:11434),
 *    OLLAMA_MODEL (default llama3) and OLLAMA_TIMEOUT
 */

import type { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { getEnv } from '../../config/env.js';
import { ExternalServiceError, errorMessage } from '../../types/errors.js';

export interface OllamaConfig {
  apiUrl: string;
  model: string;
  timeout: number;
}

interface OllamaRequestOptions {
  temperature: number;
  num_predict?: number;
}

const usageFields = {
  model: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
};

const chatResponseSchema = z.object({
  ...usageFields,
  message: z.object({ content: z.string() }).optional(),
});

const generateResponseSchema = z.object({
  ...usageFields,
  response: z.string().optional(),
});

type UsageFields = z.infer<typeof generateResponseSchema>;

function toUsage(data: UsageFields): LLMResponse['usage'] {
  if (!data.eval_count) {
    return undefined;
  }
  const promptTokens = data.prompt_eval_count || 0;
  return {
    promptTokens,
    completionTokens: data.eval_count,
    totalTokens: promptTokens + data.eval_count,
  };
}

export class LocalLLMProvider implements LLMProvider {
  private config: OllamaConfig;
  private client: AxiosInstance;

  /**
   * @param config - overrides for the environment-derived Ollama settings
   * @param httpConfig - extra axios settings merged into the HTTP client
   */
  constructor(config?: Partial<OllamaConfig>, httpConfig?: AxiosRequestConfig) {
    const env = getEnv();
    this.config = {
      apiUrl: env.OLLAMA_API_URL,
      model: env.OLLAMA_MODEL,
      timeout: env.OLLAMA_TIMEOUT,
      ...config,
    };

    this.client = createHttpClient({
      baseURL: this.config.apiUrl,
      timeout: this.config.timeout || HTTP_TIMEOUTS.STANDARD,
      headers: {
        'Content-Type': 'application/json',
      },
      ...httpConfig,
    });
  }

  getName(): string {
    return 'ollama';
  }

  async isAvailable(): Promise<boolean> {
    try {
      // Listing models is the cheapest call that proves Ollama is running
      const response = await this.client.get('/api/tags', { timeout: HTTP_TIMEOUTS.SHORT });
      return response.status === 200;
    } catch (error) {
      logger.debug({ error: errorMessage(error), apiUrl: this.config.apiUrl }, 'Ollama not available');
      return false;
    }
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const model = options?.model || this.config.model;
    const requestOptions: OllamaRequestOptions = {
      temperature: options?.temperature ?? 0.7,
      ...(options?.max_tokens ? { num_predict: options.max_tokens } : {}),
    };

    try {
      try {
        return await this.chat(model, messages, requestOptions);
      } catch (chatError) {
        // Older Ollama builds and some models only serve the generate endpoint
        logger.debug({ error: errorMessage(chatError) }, 'Chat endpoint failed, trying generate endpoint');
        return await this.complete(model, messages, requestOptions);
      }
    } catch (error) {
      logger.debug({ error: errorMessage(error), model, apiUrl: this.config.apiUrl }, 'Error calling Ollama');
      throw new ExternalServiceError(
        'Ollama',
        `Failed to generate completion from Ollama: ${errorMessage(error)}`,
        {
          reason: 'completion_failed',
          provider: 'ollama',
          model,
          apiUrl: this.config.apiUrl,
        }
      );
    }
  }

  private async chat(
    model: string,
    messages: LLMMessage[],
    options: OllamaRequestOptions
  ): Promise<LLMResponse> {
    const response = await this.client.post('/api/chat', {
      model,
      messages: messages.map((msg) => ({ role: msg.role, content: msg.content })),
      options,
      stream: false,
    });

    const data = chatResponseSchema.parse(response.data);
    const content = data.message?.content.trim();
    if (!content) {
      throw new ExternalServiceError('Ollama', 'Empty response from Ollama chat endpoint', {
        reason: 'empty_response',
        endpoint: 'chat',
      });
    }

    return { content, model: data.model || model, usage: toUsage(data) };
  }

  private async complete(
    model: string,
    messages: LLMMessage[],
    options: OllamaRequestOptions
  ): Promise<LLMResponse> {
    const response = await this.client.post('/api/generate', {
      model,
      prompt: this.formatMessagesForOllama(messages),
      options,
      stream: false,
    });

    const data = generateResponseSchema.parse(response.data);
    const content = data.response?.trim();
    if (!content) {
      throw new ExternalServiceError('Ollama', 'Empty response from Ollama', {
        reason: 'empty_response',
        endpoint: 'generate',
      });
    }

    return { content, model: data.model || model, usage: toUsage(data) };
  }

  /**
   * Format messages into a single prompt for the Ollama generate endpoint
   */
  private formatMessagesForOllama(messages: LLMMessage[]): string {
    return messages
      .map((msg) => {
        const rolePrefix =
          msg.role === 'system'
            ? 'System: '
            : msg.role === 'assistant'
            ? 'Assistant: '
            : 'User: ';
        return `${rolePrefix}${msg.content}`;
      })
      .join('\n\n') + '\n\nAssistant:';
  }

  getConfig(): OllamaConfig {
    return { ...this.config };
  }
}
