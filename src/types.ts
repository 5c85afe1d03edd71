export interface Credentials {
  baseUrl: string;
  login: string;
  secret: string;
}

export interface HemisConfig extends Credentials {
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
  tokenTtlSeconds?: number;
}

/**
 * Wrapper HEMIS puts around every response body.
 */
export interface HemisEnvelope<T = unknown> {
  success: boolean;
  error?: string | null;
  data: T;
  code?: number;
}

export type ErrorKind =
  | 'ConfigurationError'
  | 'UnknownTool'
  | 'InvalidArguments'
  | 'AuthenticationFailed'
  | 'UpstreamError'
  | 'TransportError';

export interface SuccessResult<T = unknown> {
  status: 'success';
  payload: T;
}

export interface FailureResult {
  status: 'failure';
  errorKind: ErrorKind;
  message: string;
  upstreamStatus?: number;
}

export type NormalizedResult<T = unknown> = SuccessResult<T> | FailureResult;

export type ToolArguments = Record<string, unknown>;
