/**
 * Type definitions for SSH Console
 */

import type { HostKey, PublicKeyCredential } from './keys.js';
import type { Output } from './output.js';

// Environment captured from `env` channel requests
export type Environment = Record<string, string>;

// Authentication Types
export type AuthMethod = 'password' | 'publickey';

export type AuthOutcome = 'success' | 'failure' | 'unsupported';

export interface SignedRequest {
  blob: Buffer;
  signature: Buffer;
}

export type AuthAttempt =
  | { method: 'password'; username: string; password: string }
  | { method: 'publickey'; username: string; credential: PublicKeyCredential; signed?: SignedRequest }
  | { method: 'none' | 'hostbased' | 'keyboard-interactive'; username: string };

/**
 * Decides a password attempt. Called at most once per attempt; the returned
 * value (or promise) is the attempt's only completion.
 */
export type PasswordAuthenticator = (username: string, password: string) => boolean | Promise<boolean>;

/**
 * Decides a public key attempt. Same contract as {@link PasswordAuthenticator}.
 */
export type PublicKeyAuthenticator = (
  username: string,
  credential: PublicKeyCredential
) => boolean | Promise<boolean>;

/**
 * Handles the single command of an exec channel.
 *
 * Runs on the event loop; hand anything slow off to your own worker. The
 * session's hold on `output` is dropped when this returns, or when the
 * returned promise settles. Use `output.retain()` to keep writing after that.
 */
export type CommandRunner = (
  command: string,
  output: Output,
  username: string | undefined,
  environment: Readonly<Environment>
) => void | Promise<void>;

// What env requests do once the command has been dispatched
export type LateEnvironmentPolicy = 'ignore' | 'reject';

// Server Configuration
export interface ServerConfig {
  host: string;
  port: number;
  hostKeys: HostKey[];
  passwordAuthenticator?: PasswordAuthenticator;
  publicKeyAuthenticator?: PublicKeyAuthenticator;
  lateEnvironment?: LateEnvironmentPolicy;
}

export type ServerState = 'created' | 'listening' | 'stopped';

// The channel end a command writes to
export interface ChannelSink {
  readonly closed: boolean;
  write(text: string, done?: () => void): void;
  writeError(text: string, done?: () => void): void;
  /**
   * Flushes pending writes, then closes the channel, reporting `exitStatus`
   * when one is given. Idempotent.
   */
  close(exitStatus?: number): void;
}
