/**
 * Centralized HTTP Client Configuration
 *
 * Provides shared HTTP/HTTPS agents with connection pooling and a factory
 * function for creating configured axios instances with consistent timeouts
 * and timeout monitoring.
 */

import axios, { type AxiosError, type AxiosInstance, type AxiosRequestConfig } from 'axios';
import https from 'https';
import http from 'http';
import { logger } from '../utils/logger.js';

// HTTP timeout constants for different scenarios
export const HTTP_TIMEOUTS = {
  SHORT: 5000,      // 5 seconds - quick API calls
  STANDARD: 30000,  // 30 seconds - standard operations
} as const;

const httpAgent = new http.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
  timeout: 60000,
});

const httpsAgent = new https.Agent({
  keepAlive: true,
  keepAliveMsecs: 30000,
  maxSockets: 16,
  maxFreeSockets: 4,
  timeout: 60000,
});

interface RequestTiming {
  startTime: number;
  timeout: number;
  warningTimer: NodeJS.Timeout;
}

/**
 * Create a configured axios instance with connection pooling and default settings
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config?: AxiosRequestConfig): AxiosInstance {
  const client = axios.create({
    timeout: HTTP_TIMEOUTS.STANDARD,
    httpAgent,
    httpsAgent,
    ...config,
  });

  // Request configs are mutable objects shared with the response, so they key the timings
  const timings = new WeakMap<object, RequestTiming>();

  const finish = (requestConfig: object | undefined): RequestTiming | undefined => {
    if (!requestConfig) {
      return undefined;
    }
    const timing = timings.get(requestConfig);
    if (timing) {
      clearTimeout(timing.warningTimer);
      timings.delete(requestConfig);
    }
    return timing;
  };

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = HTTP_TIMEOUTS.STANDARD;
      logger.debug(
        { url: requestConfig.url, method: requestConfig.method },
        'HTTP request without explicit timeout, using default STANDARD timeout (30s)'
      );
    }

    const timeout = requestConfig.timeout;
    const startTime = Date.now();
    const warningThreshold = timeout * 0.8;

    const warningTimer = setTimeout(() => {
      logger.warn(
        {
          url: requestConfig.url,
          method: requestConfig.method,
          elapsed: Date.now() - startTime,
          timeout,
        },
        'HTTP request approaching timeout (80% threshold)'
      );
    }, warningThreshold);
    warningTimer.unref();

    timings.set(requestConfig, { startTime, timeout, warningTimer });
    return requestConfig;
  });

  client.interceptors.response.use(
    (response) => {
      const timing = finish(response.config);
      if (timing) {
        const duration = Date.now() - timing.startTime;
        if (duration > timing.timeout * 0.5) {
          logger.debug(
            { url: response.config.url, method: response.config.method, duration, timeout: timing.timeout },
            'HTTP request completed'
          );
        }
      }
      return response;
    },
    (error: AxiosError) => {
      const timing = finish(error.config);
      const isTimeout = error.code === 'ECONNABORTED' || error.message?.includes('timeout');
      if (timing && isTimeout) {
        logger.error(
          {
            url: error.config?.url,
            method: error.config?.method,
            duration: Date.now() - timing.startTime,
            timeout: timing.timeout,
          },
          'HTTP request timed out'
        );
      }
      return Promise.reject(error);
    }
  );

  return client;
}

/**
 * Close HTTP agents and free up connections
 * This should be called during shutdown so idle keep-alive sockets do not linger
 */
export function closeHttpAgents(): void {
  httpAgent.destroy();
  httpsAgent.destroy();
  logger.debug('HTTP agents destroyed');
}
