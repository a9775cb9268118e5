/**
 * SSH Console - a one-command-per-connection SSH server
 */

export { SSHConsole } from './ssh-console.js';
export { HostKey, PublicKeyCredential } from './keys.js';
export { Output } from './output.js';
export { CommandHandler, INPUT_NOT_ACCEPTED } from './command-handler.js';
export type { CommandHandlerOptions, HandlerState } from './command-handler.js';
export { AuthenticationDelegate } from './auth-delegate.js';
export { authorizedKeysAuthenticator, staticPasswordAuthenticator } from './authenticators.js';
export { ConsoleError, ErrorCode, ErrorFactory, ErrorMessages } from './errors.js';
export { configureLogging, createLogger, logger, renderLine } from './logger.js';
export type { LoggingOptions, LogFields } from './logger.js';
export type {
  AuthAttempt,
  AuthMethod,
  AuthOutcome,
  ChannelSink,
  CommandRunner,
  Environment,
  LateEnvironmentPolicy,
  PasswordAuthenticator,
  PublicKeyAuthenticator,
  ServerConfig,
  ServerState,
  SignedRequest
} from './types.js';
