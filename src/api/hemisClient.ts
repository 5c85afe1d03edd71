import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { logger } from '../logger.js';

export interface HemisClientOptions {
  baseUrl: string;
  timeoutMs: number;
  // Replaces axios's HTTP adapter; tests use it to stand in for the upstream.
  adapter?: AxiosAdapter;
}

export function createHemisClient(options: HemisClientOptions): AxiosInstance {
  const instance = axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    headers: {
      Accept: 'application/json',
    },
    // Every received status is handed back for classification.
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });

  instance.interceptors.response.use(
    response => {
      if (response.status >= 400) {
        logger.debug(
          { status: response.status, url: response.config.url },
          'HEMIS API returned an error status'
        );
      }
      return response;
    },
    (error: AxiosError) => {
      logger.warn(
        { code: error.code, url: error.config?.url },
        `HEMIS API request failed: ${error.message}`
      );
      return Promise.reject(error);
    }
  );

  return instance;
}
