import type { LLMProvider } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';

/**
 * Yes/no classifier for short text snippets.
 *
 * `ask` resolves with the verdict or rejects when no verdict could be
 * obtained (transport failure, empty or malformed reply). Callers decide
 * how a rejection is counted.
 */
export interface ClassificationOracle {
  ask(instruction: string, text: string): Promise<boolean>;
}

/**
 * Oracle backed by an LLM: the instruction goes in as the system message,
 * the snippet as the user message. Only a reply of `true` (any case,
 * surrounding whitespace ignored) is a positive verdict.
 */
export class LlmClassificationOracle implements ClassificationOracle {
  constructor(private readonly provider: LLMProvider) {}

  async ask(instruction: string, text: string): Promise<boolean> {
    const response = await this.provider.generate(
      [
        { role: 'system', content: instruction },
        { role: 'user', content: text },
      ],
      { temperature: 0 }
    );
    return response.content.trim().toLowerCase() === 'true';
  }

  /**
   * Probe the provider, warning when it cannot be reached. A run may go on
   * without it; every question then fails and counts as a negative answer.
   */
  async checkAvailability(): Promise<boolean> {
    const available = await this.provider.isAvailable();
    if (!available) {
      logger.warn(
        { provider: this.getName() },
        `LLM provider "${this.getName()}" is not reachable; oracle answers will count as negative`
      );
    }
    return available;
  }

  getName(): string {
    return this.provider.getName();
  }
}
