import { AxiosAdapter } from 'axios';
import { CredentialStore } from './api/credentials.js';
import { isHemisEnvelope, unwrapPayload, upstreamMessage } from './api/envelope.js';
import { createHemisClient } from './api/hemisClient.js';
import { SessionManager } from './api/session.js';
import { HttpTransport, TransportResponse } from './api/transport.js';
import {
  AuthenticationFailedError,
  HemisError,
  TransportError,
  UnknownToolError,
  UpstreamError,
} from './errors.js';
import { logger } from './logger.js';
import { catalogue as defaultCatalogue, EndpointCatalogue } from './tools/index.js';
import { buildRequest, EndpointRequest } from './tools/request.js';
import { EndpointSpec } from './tools/types.js';
import { HemisConfig, NormalizedResult, ToolArguments } from './types.js';

// Initial attempt plus one re-login after the upstream rejects the token.
const MAX_AUTH_ATTEMPTS = 2;

/**
 * Runs tool invocations against HEMIS. `invoke` always resolves: every
 * failure is reported through the result's `errorKind`.
 */
export class Dispatcher {
  constructor(
    private readonly catalogue: EndpointCatalogue,
    private readonly session: SessionManager,
    private readonly transport: HttpTransport
  ) {}

  async invoke(toolName: string, args: ToolArguments = {}): Promise<NormalizedResult> {
    try {
      const spec = this.catalogue.get(toolName);
      if (!spec) {
        throw new UnknownToolError(toolName);
      }

      const request = buildRequest(spec, args);
      const response = spec.authenticated
        ? await this.sendAuthenticated(spec, request)
        : await this.transport.send(request);

      return { status: 'success', payload: this.normalize(spec, request, response) };
    } catch (error: unknown) {
      const failure = toHemisError(error);
      logger.warn({ tool: toolName, errorKind: failure.kind }, failure.message);
      return {
        status: 'failure',
        errorKind: failure.kind,
        message: failure.message,
        ...(failure.upstreamStatus !== undefined ? { upstreamStatus: failure.upstreamStatus } : {}),
      };
    }
  }

  private async sendAuthenticated(
    spec: EndpointSpec,
    request: EndpointRequest
  ): Promise<TransportResponse> {
    let rejection: AuthenticationFailedError | undefined;

    for (let attempt = 1; attempt <= MAX_AUTH_ATTEMPTS; attempt++) {
      let token: string;
      try {
        token = await this.session.ensureValid();
      } catch (error: unknown) {
        if (!(error instanceof AuthenticationFailedError)) {
          throw error;
        }
        rejection = error;
        continue;
      }

      const response = await this.transport.send({
        ...request,
        headers: { Authorization: `Bearer ${token}` },
      });
      if (response.status !== 401) {
        return response;
      }

      this.session.invalidate(token);
      rejection = new AuthenticationFailedError(`HEMIS rejected the token for '${spec.name}'`, 401);
      if (spec.mutating) {
        // The request reached HEMIS once already; it is not re-sent.
        break;
      }
      logger.info(`HEMIS rejected the token for '${spec.name}', logging in again`);
    }

    throw rejection ?? new AuthenticationFailedError(`Could not authenticate for '${spec.name}'`);
  }

  private normalize(spec: EndpointSpec, request: EndpointRequest, response: TransportResponse): unknown {
    const { status, data } = response;
    if (status < 200 || status >= 300) {
      throw new UpstreamError(
        `HEMIS returned status ${status} for '${spec.name}'${upstreamMessage(data)}`,
        status
      );
    }
    if (isHemisEnvelope(data) && !data.success) {
      const code = typeof data.code === 'number' ? data.code : status;
      throw new UpstreamError(
        `HEMIS reported a failure for '${spec.name}'${upstreamMessage(data)}`,
        code
      );
    }
    return unwrapPayload(spec.envelope, data, request.params);
  }
}

function toHemisError(error: unknown): HemisError {
  if (error instanceof HemisError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransportError(`Request could not complete: ${message}`, undefined, { cause: error });
}

export interface DispatcherOptions {
  catalogue?: EndpointCatalogue;
  adapter?: AxiosAdapter;
  now?: () => number;
}

/**
 * Wire credentials, transport, session and catalogue into a dispatcher.
 */
export function createDispatcher(config: HemisConfig, options: DispatcherOptions = {}): Dispatcher {
  const credentials = new CredentialStore(config);
  const client = createHemisClient({
    baseUrl: config.baseUrl,
    timeoutMs: config.timeoutMs,
    adapter: options.adapter,
  });
  const transport = new HttpTransport(client, {
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
  });
  const session = new SessionManager(credentials, transport, {
    tokenTtlSeconds: config.tokenTtlSeconds,
    now: options.now,
  });
  return new Dispatcher(options.catalogue ?? defaultCatalogue, session, transport);
}
