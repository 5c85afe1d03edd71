import { ErrorKind } from './types.js';

export class HemisError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly upstreamStatus?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'HemisError';
  }
}

export class ConfigurationError extends HemisError {
  constructor(message: string) {
    super('ConfigurationError', message);
    this.name = 'ConfigurationError';
  }
}

export class UnknownToolError extends HemisError {
  constructor(public readonly toolName: string) {
    super('UnknownTool', `Unknown tool: ${toolName}`);
    this.name = 'UnknownToolError';
  }
}

export class InvalidArgumentsError extends HemisError {
  constructor(message: string) {
    super('InvalidArguments', message);
    this.name = 'InvalidArgumentsError';
  }
}

export class AuthenticationFailedError extends HemisError {
  constructor(message: string, upstreamStatus?: number) {
    super('AuthenticationFailed', message, upstreamStatus);
    this.name = 'AuthenticationFailedError';
  }
}

export class UpstreamError extends HemisError {
  constructor(message: string, upstreamStatus: number) {
    super('UpstreamError', message, upstreamStatus);
    this.name = 'UpstreamError';
  }
}

// No response was received: timeout, refused connection, DNS failure.
export class TransportError extends HemisError {
  constructor(
    message: string,
    public readonly code?: string,
    options?: { cause?: unknown }
  ) {
    super('TransportError', message, undefined, options);
    this.name = 'TransportError';
  }
}
