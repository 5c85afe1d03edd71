import { z } from 'zod';
import { AuthenticationFailedError } from '../errors.js';
import { logger } from '../logger.js';
import { isRecord } from '../utils.js';
import { CredentialStore } from './credentials.js';
import { upstreamMessage } from './envelope.js';
import { HttpTransport } from './transport.js';

export const LOGIN_PATH = 'auth/login';

// A token this close to its expiry is treated as already expired.
const EXPIRY_MARGIN_MS = 30_000;

interface Session {
  token: string;
  obtainedAt: number;
  expiresAt?: number;
}

export interface SessionManagerOptions {
  // Lifetime assumed for tokens the upstream issues without an expiry.
  tokenTtlSeconds?: number;
  now?: () => number;
}

// An expiry that cannot be read is treated as absent; only the token is required.
const expiryField = z.union([z.number(), z.string()]).nullish().catch(undefined);

const LoginPayloadSchema = z
  .object({
    token: z.string().min(1),
    expiresAt: expiryField,
    expires_at: expiryField,
    expires_in: z.number().nullish().catch(undefined),
  })
  .passthrough();

type LoginPayload = z.infer<typeof LoginPayloadSchema>;

/**
 * Owns the bearer token for the configured student. Logins are collapsed so
 * that concurrent callers share a single request to the upstream.
 */
export class SessionManager {
  private session: Session | null = null;
  private pendingLogin: Promise<string> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly credentials: CredentialStore,
    private readonly transport: HttpTransport,
    private readonly options: SessionManagerOptions = {}
  ) {
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolve to a token that is present and not known to be expired, logging
   * in first when necessary.
   */
  async ensureValid(): Promise<string> {
    const current = this.session;
    if (current && !this.isExpired(current)) {
      return current.token;
    }
    if (current) {
      logger.info('HEMIS token expired, logging in again');
      this.session = null;
    }

    if (!this.pendingLogin) {
      // The promise settles on its own even if every waiting caller gives up.
      this.pendingLogin = this.login().finally(() => {
        this.pendingLogin = null;
      });
    }
    return this.pendingLogin;
  }

  /**
   * Drop the current token. With `staleToken`, only that token is dropped, so a
   * late rejection cannot discard a token obtained after it.
   */
  invalidate(staleToken?: string): void {
    if (!this.session) {
      return;
    }
    if (staleToken !== undefined && this.session.token !== staleToken) {
      return;
    }
    logger.info('HEMIS token invalidated');
    this.session = null;
  }

  hasToken(): boolean {
    return this.session !== null && !this.isExpired(this.session);
  }

  private isExpired(session: Session): boolean {
    return session.expiresAt !== undefined && this.now() >= session.expiresAt - EXPIRY_MARGIN_MS;
  }

  private async login(): Promise<string> {
    const { login, secret } = this.credentials.get();
    logger.info('Logging in to HEMIS');

    const response = await this.transport.send({
      method: 'POST',
      path: LOGIN_PATH,
      data: { login, password: secret },
      retryable: false,
    });

    if (response.status === 401 || response.status === 403) {
      throw new AuthenticationFailedError('HEMIS rejected the configured login or password', response.status);
    }
    if (response.status < 200 || response.status >= 300) {
      throw new AuthenticationFailedError(
        `HEMIS login failed with status ${response.status}${upstreamMessage(response.data)}`,
        response.status
      );
    }

    const body = response.data;
    if (isRecord(body) && body.success === false) {
      throw new AuthenticationFailedError(
        `HEMIS login was refused${upstreamMessage(body)}`,
        response.status
      );
    }

    const candidate = isRecord(body) && isRecord(body.data) ? body.data : body;
    const parsed = LoginPayloadSchema.safeParse(candidate);
    if (!parsed.success) {
      throw new AuthenticationFailedError('HEMIS login response did not contain a token', response.status);
    }

    const obtainedAt = this.now();
    this.session = {
      token: parsed.data.token,
      obtainedAt,
      expiresAt: this.resolveExpiry(parsed.data, obtainedAt),
    };
    logger.info(
      { expiresAt: this.session.expiresAt ? new Date(this.session.expiresAt).toISOString() : 'unknown' },
      'Logged in to HEMIS'
    );
    return parsed.data.token;
  }

  private resolveExpiry(payload: LoginPayload, obtainedAt: number): number | undefined {
    const absolute = toEpochMs(payload.expiresAt) ?? toEpochMs(payload.expires_at);
    if (absolute !== undefined) {
      return absolute;
    }
    if (payload.expires_in !== undefined && payload.expires_in !== null) {
      return obtainedAt + payload.expires_in * 1000;
    }
    if (this.options.tokenTtlSeconds !== undefined) {
      return obtainedAt + this.options.tokenTtlSeconds * 1000;
    }
    return undefined;
  }
}

/**
 * Epoch milliseconds from a numeric timestamp, a digit string or a date
 * string. Numbers below 1e12 are epoch seconds.
 */
function toEpochMs(value: number | string | null | undefined): number | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (/^\d+(\.\d+)?$/.test(trimmed)) {
      return toEpochMs(Number(trimmed));
    }
    const parsed = Date.parse(trimmed);
    return Number.isNaN(parsed) ? undefined : parsed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value < 1e12 ? value * 1000 : value;
  }
  return undefined;
}
