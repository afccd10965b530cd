/**
 * Environment Variable Validation
 *
 * Centralized validation of all environment variables. Values are parsed by
 * hand with defaults; every problem is collected and reported in one error.
 */

// Load dotenv early to ensure environment variables are available
import * as dotenv from 'dotenv';
dotenv.config();

import { ConfigurationError } from '../types/errors.js';
import { isLogLevel, logger } from '../utils/logger.js';

/**
 * Helper function to safely parse a number from string with default
 */
function parseNumericEnv(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const num = parseInt(value, 10);
  return isNaN(num) ? defaultValue : num;
}

const NODE_ENVS: readonly string[] = ['development', 'production', 'test'];

/**
 * Environment configuration type
 *
 * NODE_ENV, LOG_LEVEL and LOG_PRETTY belong to the logger, which reads them
 * before anything else loads; they are only checked here.
 */
export interface Env {
  // Ollama / Local LLM Configuration
  OLLAMA_API_URL: string;
  OLLAMA_MODEL: string;
  OLLAMA_TIMEOUT: number;

  // Classification Configuration
  HEURISTIC_TABLES_PATH?: string;
  CLASSIFY_CONCURRENCY: number;
}

let validatedEnv: Env | null = null;

/**
 * Validate and return environment variables
 * @throws {ConfigurationError} If validation fails
 */
export function validateEnv(): Env {
  if (validatedEnv) {
    return validatedEnv;
  }

  const errors: string[] = [];

  const nodeEnv = process.env.NODE_ENV || 'development';
  if (!NODE_ENVS.includes(nodeEnv)) {
    errors.push(`NODE_ENV: Invalid value "${nodeEnv}". Must be development, production, or test.`);
  }

  const logLevel = process.env.LOG_LEVEL;
  if (logLevel && !isLogLevel(logLevel.toLowerCase())) {
    errors.push(`LOG_LEVEL: Invalid value "${logLevel}". Must be a pino level or silent.`);
  }

  const ollamaApiUrl = process.env.OLLAMA_API_URL || 'http://localhost:11434';
  try {
    new URL(ollamaApiUrl);
  } catch {
    errors.push(`OLLAMA_API_URL: Invalid value "${ollamaApiUrl}". Must be an absolute URL.`);
  }

  const ollamaTimeout = parseNumericEnv(process.env.OLLAMA_TIMEOUT, 30000);
  if (ollamaTimeout < 1) {
    errors.push(`OLLAMA_TIMEOUT: Invalid value "${process.env.OLLAMA_TIMEOUT}". Must be greater than 0.`);
  }

  const concurrency = parseNumericEnv(process.env.CLASSIFY_CONCURRENCY, 1);
  if (concurrency < 1) {
    errors.push(`CLASSIFY_CONCURRENCY: Invalid value "${process.env.CLASSIFY_CONCURRENCY}". Must be at least 1.`);
  }
  // Warning for high values (each slot may hold an open LLM request)
  if (concurrency > 16) {
    logger.warn(`CLASSIFY_CONCURRENCY (${concurrency}) is greater than 16. A local Ollama instance will queue most of these requests.`);
  }

  if (errors.length > 0) {
    throw new ConfigurationError(
      `Environment variable validation failed:\n${errors.map(e => `  - ${e}`).join('\n')}\n\n` +
      `Please check your .env file or environment variables.`,
      { errors }
    );
  }

  validatedEnv = {
    // Ollama / Local LLM Configuration
    OLLAMA_API_URL: ollamaApiUrl,
    OLLAMA_MODEL: process.env.OLLAMA_MODEL || 'llama3',
    OLLAMA_TIMEOUT: ollamaTimeout,

    // Classification Configuration
    HEURISTIC_TABLES_PATH: process.env.HEURISTIC_TABLES_PATH,
    CLASSIFY_CONCURRENCY: concurrency,
  };

  return validatedEnv;
}

/**
 * Get validated environment variables
 * Validates on first call, then returns cached result
 */
export function getEnv(): Env {
  return validateEnv();
}

/**
 * Reset validated environment cache
 * Used for testing to allow re-validation after env vars change
 */
export function resetEnv(): void {
  validatedEnv = null;
}
