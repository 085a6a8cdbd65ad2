import type { Logger } from 'pino';
import type { CfCli } from '../lib/cfCli.js';
import { AuthenticationError, errorMessage } from '../lib/errors.js';

export interface Credentials {
  username?: string;
  password?: string;
}

export interface Authenticator<TSession> {
  authenticate(credentials: Credentials): Promise<TSession>;
}

/**
 * Authenticated Cloud Foundry CLI. The CLI keeps the token in its own
 * config directory, so the handle is just the targeted client.
 */
export interface CfSession {
  readonly apiEndpoint: string;
  readonly cli: CfCli;
}

export class CfAuthenticator implements Authenticator<CfSession> {
  constructor(
    private readonly cli: CfCli,
    private readonly apiEndpoint: string,
    private readonly logger: Logger
  ) {}

  async authenticate(credentials: Credentials): Promise<CfSession> {
    const { username, password } = credentials;

    // Checked before any command runs
    if (!username || !password) {
      throw new AuthenticationError('Cloud.gov credentials not found: CF_USERNAME and CF_PASSWORD are required');
    }

    try {
      await this.cli.setApi(this.apiEndpoint);
      await this.cli.auth(username, password);
    } catch (error: unknown) {
      throw new AuthenticationError(
        `Failed to authenticate against ${this.apiEndpoint}: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    this.logger.info({ apiEndpoint: this.apiEndpoint }, 'Authenticated with Cloud Foundry');

    return { apiEndpoint: this.apiEndpoint, cli: this.cli };
  }
}
