import { ConfigurationError } from '../errors.js';
import { Credentials } from '../types.js';

/**
 * Holds the one principal this process logs in as. Validated once at
 * construction and never changed afterwards.
 */
export class CredentialStore {
  private readonly credentials: Readonly<Credentials>;

  constructor(credentials: Credentials) {
    const missing = (['baseUrl', 'login', 'secret'] as const).filter(
      field => credentials[field].trim() === ''
    );
    if (missing.length > 0) {
      throw new ConfigurationError(`Missing credentials: ${missing.join(', ')}`);
    }

    let url: URL;
    try {
      url = new URL(credentials.baseUrl);
    } catch {
      throw new ConfigurationError(`Invalid HEMIS base URL: ${credentials.baseUrl}`);
    }
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new ConfigurationError(`HEMIS base URL must use http or https: ${credentials.baseUrl}`);
    }

    this.credentials = Object.freeze({
      baseUrl: credentials.baseUrl,
      login: credentials.login,
      secret: credentials.secret,
    });
  }

  get(): Readonly<Credentials> {
    return this.credentials;
  }
}
