import axios, { type AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import type { RetryConfig } from './config.js';

export type Sleep = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function isTimeoutError(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

/** Delay before retry number `retry` (1-based): backoffFactor × 2^(retry − 1) seconds. */
export function backoffDelayMs(backoffFactor: number, retry: number): number {
  return Math.round(backoffFactor * Math.pow(2, retry - 1) * 1000);
}

export function describeBody(data: unknown): string {
  if (data === undefined || data === null) {
    return '';
  }
  if (typeof data === 'string') {
    return data;
  }
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  try {
    return JSON.stringify(data);
  } catch {
    return String(data);
  }
}

export interface RetryContext {
  endpoint: string;
  policy: RetryConfig;
  logger: Logger;
  sleep?: Sleep;
}

/**
 * Sends the request up to `policy.attempts` times. Retryable statuses and
 * timeouts wait out the backoff and try again; once attempts run out the last
 * response is returned (or the last timeout rethrown) for the caller to map.
 * Any other transport failure is rethrown immediately.
 */
export async function requestWithRetry<T>(
  send: () => Promise<AxiosResponse<T>>,
  context: RetryContext
): Promise<AxiosResponse<T>> {
  const { endpoint, policy, logger } = context;
  const wait = context.sleep ?? sleep;
  const attempts = Math.max(1, policy.attempts);

  for (let attempt = 1; ; attempt += 1) {
    const isLast = attempt >= attempts;
    let response: AxiosResponse<T>;
    try {
      response = await send();
    } catch (error) {
      if (!isTimeoutError(error) || isLast) {
        throw error;
      }
      const delayMs = backoffDelayMs(policy.backoffFactor, attempt);
      logger.warn({ endpoint, attempt, delayMs }, 'Request timed out, retrying');
      await wait(delayMs);
      continue;
    }

    if (!policy.statuses.includes(response.status) || isLast) {
      return response;
    }

    const delayMs = backoffDelayMs(policy.backoffFactor, attempt);
    logger.warn({ endpoint, attempt, status: response.status, delayMs }, 'Retryable response status, retrying');
    await wait(delayMs);
  }
}
