import type { z, ZodTypeAny } from 'zod';
import { createLogger } from '@quarry/utils';

const logger = createLogger({ name: 'gateway:http', service: 'gateway' });

/**
 * Non-2xx answer from the gateway, with the body kept for classification
 */
export class GatewayHttpError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    readonly path: string
  ) {
    super(`Gateway API error: ${status} on ${path}${body ? `: ${body.slice(0, 200)}` : ''}`);
    this.name = 'GatewayHttpError';
  }
}

export interface GatewayRequestOptions {
  method?: 'GET' | 'POST';
  timeoutMs: number;
}

/**
 * Thin REST client for the Client Portal gateway
 *
 * Every request is bounded by an AbortSignal timeout; the gateway is known to
 * leave broad history requests hanging. Timeouts reject with a DOMException
 * named 'TimeoutError'.
 */
export class GatewayRestClient {
  private baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  get url(): string {
    return this.baseUrl;
  }

  /**
   * Issue a request and validate the JSON body against `schema`
   */
  async request<S extends ZodTypeAny>(
    path: string,
    schema: S,
    options: GatewayRequestOptions
  ): Promise<z.output<S>> {
    const method = options.method ?? 'GET';
    const signal = AbortSignal.timeout(options.timeoutMs);

    logger.debug({ method, path, timeoutMs: options.timeoutMs }, 'Making gateway request');

    const response = await fetch(`${this.baseUrl}${path}`, {
      method,
      headers: { Accept: 'application/json' },
      signal,
    });

    const text = await response.text();

    if (!response.ok) {
      logger.debug({ method, path, status: response.status, body: text }, 'Gateway request failed');
      throw new GatewayHttpError(response.status, text, path);
    }

    const body: unknown = text === '' ? {} : JSON.parse(text);
    return schema.parse(body);
  }
}
