import { createLogger } from './logger.js';
import type {
  AuthAttempt,
  AuthMethod,
  AuthOutcome,
  PasswordAuthenticator,
  PublicKeyAuthenticator
} from './types.js';

/**
 * Turns transport authentication requests into calls to the configured
 * authenticators. Methods without an authenticator are never advertised and
 * always come back `unsupported`.
 */
export class AuthenticationDelegate {
  readonly supportedMethods: readonly AuthMethod[];
  private logger = createLogger('AuthenticationDelegate');

  constructor(
    private readonly passwordAuthenticator?: PasswordAuthenticator,
    private readonly publicKeyAuthenticator?: PublicKeyAuthenticator
  ) {
    const methods: AuthMethod[] = [];
    if (passwordAuthenticator) methods.push('password');
    if (publicKeyAuthenticator) methods.push('publickey');
    this.supportedMethods = Object.freeze(methods);
  }

  async authenticate(attempt: AuthAttempt): Promise<AuthOutcome> {
    switch (attempt.method) {
      case 'password': {
        const authenticator = this.passwordAuthenticator;
        if (!authenticator) return 'unsupported';

        const { username, password } = attempt;
        return this.decide(attempt, () => authenticator(username, password));
      }

      case 'publickey': {
        const authenticator = this.publicKeyAuthenticator;
        if (!authenticator) return 'unsupported';

        if (attempt.signed && !attempt.credential.verify(attempt.signed)) {
          this.logger.warn(`Bad signature from ${attempt.username}`, {
            algorithm: attempt.credential.algorithm
          });
          return 'failure';
        }

        const { username, credential } = attempt;
        return this.decide(attempt, () => authenticator(username, credential));
      }

      default:
        return 'unsupported';
    }
  }

  private async decide(attempt: AuthAttempt, authenticator: () => boolean | Promise<boolean>): Promise<AuthOutcome> {
    try {
      const accepted = await authenticator();
      this.logger.debug(`${attempt.method} attempt for ${attempt.username}: ${accepted ? 'accepted' : 'rejected'}`);
      return accepted ? 'success' : 'failure';
    } catch (error) {
      this.logger.error(`Authenticator failed for ${attempt.username}:`, error);
      return 'failure';
    }
  }
}
