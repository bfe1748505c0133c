import { ConfigurationError, ValidationError } from '../errors';
import { loadSecretStore } from './secretStore';

export const CLIENT_ID_KEY = 'NAVER_CLIENT_ID';
export const CLIENT_SECRET_KEY = 'NAVER_CLIENT_SECRET';

export type CredentialSource = 'session' | 'secret-store' | 'environment' | 'none';

export interface ApiCredentials {
  clientId: string;
  clientSecret: string;
  source: CredentialSource;
}

export interface CredentialProviderOptions {
  secretsFile: string;
  env?: NodeJS.ProcessEnv;
}

export class CredentialProvider {
  private readonly secretsFile: string;
  private readonly env: NodeJS.ProcessEnv;
  private sessionOverride: { clientId: string; clientSecret: string } | null = null;

  constructor(options: CredentialProviderOptions) {
    this.secretsFile = options.secretsFile;
    this.env = options.env ?? process.env;
  }

  /**
   * Session override first, then the secret store, then the environment.
   * Each value falls back independently and defaults to an empty string.
   */
  resolve(): ApiCredentials {
    if (this.sessionOverride) {
      return { ...this.sessionOverride, source: 'session' };
    }

    const store = loadSecretStore(this.secretsFile);
    const storedId = store[CLIENT_ID_KEY];
    const clientId = storedId || this.env[CLIENT_ID_KEY] || '';
    const clientSecret = store[CLIENT_SECRET_KEY] || this.env[CLIENT_SECRET_KEY] || '';

    let source: CredentialSource = 'none';
    if (storedId) source = 'secret-store';
    else if (clientId) source = 'environment';

    return { clientId, clientSecret, source };
  }

  isConfigured(): boolean {
    const { clientId, clientSecret } = this.resolve();
    return Boolean(clientId && clientSecret);
  }

  apply(clientId: string, clientSecret: string): void {
    const id = clientId.trim();
    const secret = clientSecret.trim();
    if (!id) throw new ValidationError('clientId', 'clientId must be non-empty');
    if (!secret) throw new ValidationError('clientSecret', 'clientSecret must be non-empty');
    this.sessionOverride = { clientId: id, clientSecret: secret };
    console.log({ source: 'session' }, 'Credentials applied to the running session');
  }

  clear(): void {
    this.sessionOverride = null;
  }

  authHeaders(contentJson = false): Record<string, string> {
    const { clientId, clientSecret } = this.resolve();
    if (!clientId || !clientSecret) {
      throw new ConfigurationError(
        `${CLIENT_ID_KEY} / ${CLIENT_SECRET_KEY} are not set.\n` +
          `• Option A: put both keys in ${this.secretsFile}\n` +
          `• Option B: set the environment variables ${CLIENT_ID_KEY} and ${CLIENT_SECRET_KEY}\n` +
          '• Option C: enter them in the credentials panel for this session'
      );
    }

    const headers: Record<string, string> = {
      'X-Naver-Client-Id': clientId,
      'X-Naver-Client-Secret': clientSecret
    };
    if (contentJson) headers['Content-Type'] = 'application/json';
    return headers;
  }
}
