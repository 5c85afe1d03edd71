import axios, { AxiosInstance } from 'axios';
import { TransportError } from '../errors.js';
import { logger } from '../logger.js';
import { delay } from '../utils.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean;

export interface TransportRequest {
  method: HttpMethod;
  path: string;
  params?: Record<string, QueryValue>;
  data?: Record<string, unknown>;
  headers?: Record<string, string>;
  // Only idempotent requests may be re-sent after a connection reset.
  retryable: boolean;
}

export interface TransportResponse {
  status: number;
  data: unknown;
}

export interface TransportOptions {
  maxRetries: number;
  retryDelayMs: number;
}

/**
 * Sends one request to HEMIS. Any response that arrives is returned as is,
 * whatever its status; only a missing response becomes a TransportError.
 */
export class HttpTransport {
  constructor(
    private readonly client: AxiosInstance,
    private readonly options: TransportOptions
  ) {}

  async send(request: TransportRequest): Promise<TransportResponse> {
    const maxAttempts = request.retryable ? this.options.maxRetries + 1 : 1;

    for (let attempt = 1; ; attempt++) {
      logger.debug(
        { method: request.method, path: request.path, attempt },
        'Sending HEMIS request'
      );
      try {
        const response = await this.client.request({
          method: request.method,
          url: request.path,
          params: request.params,
          data: request.data,
          headers: request.headers,
        });
        return { status: response.status, data: response.data };
      } catch (error: unknown) {
        if (axios.isAxiosError(error) && error.code === 'ECONNRESET' && attempt < maxAttempts) {
          logger.warn(
            `Connection reset on ${request.method} ${request.path} (attempt ${attempt}/${maxAttempts}), retrying in ${this.options.retryDelayMs}ms`
          );
          await delay(this.options.retryDelayMs);
          continue;
        }
        throw toTransportError(request, error);
      }
    }
  }
}

function toTransportError(request: TransportRequest, error: unknown): TransportError {
  const target = `${request.method} ${request.path}`;
  if (axios.isAxiosError(error)) {
    const code = error.code;
    const reason =
      code === 'ECONNABORTED' || code === 'ETIMEDOUT' ? 'timed out' : `failed: ${error.message}`;
    return new TransportError(`Request ${target} ${reason}`, code, { cause: error });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request ${target} failed: ${message}`, undefined, { cause: error });
}
