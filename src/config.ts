/**
 * Configuration module for the SSH Console example application
 */

import dotenv from 'dotenv';
import { homedir } from 'os';
import { join } from 'path';
import { DEFAULT_LOG_FORMAT } from './logger.js';
import type { LateEnvironmentPolicy } from './types.js';

export interface AppConfig {
  // Listener configuration
  host: string;
  port: number;
  hostKey: string;

  // Authentication configuration
  authorizedKeysFile: string;
  username: string;
  password: string;

  // Protocol configuration
  lateEnvironment: LateEnvironmentPolicy;

  // Logging configuration
  logLevel: string;
  logFile?: string;
  logFormat: string;
}

export class ConfigManager {
  private readonly config: AppConfig;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.config = this.readConfig();
  }

  private readConfig(): AppConfig {
    return {
      host: this.getEnv('SSH_CONSOLE_HOST', '0.0.0.0'),
      port: this.getIntEnv('SSH_CONSOLE_PORT', 2222),
      hostKey: this.getEnv('SSH_CONSOLE_HOST_KEY', ''),

      authorizedKeysFile: this.getEnv(
        'SSH_CONSOLE_AUTHORIZED_KEYS',
        join(homedir(), '.ssh', 'authorized_keys')
      ),
      username: this.getEnv('SSH_CONSOLE_USERNAME', ''),
      password: this.getEnv('SSH_CONSOLE_PASSWORD', ''),

      lateEnvironment: this.getLateEnvironment('SSH_CONSOLE_LATE_ENV', 'ignore'),

      logLevel: this.getEnv('SSH_CONSOLE_LOG_LEVEL', 'INFO'),
      logFile: this.getEnv('SSH_CONSOLE_LOG_FILE', ''),
      logFormat: this.getEnv('SSH_CONSOLE_LOG_FORMAT', DEFAULT_LOG_FORMAT)
    };
  }

  private getEnv(key: string, defaultValue: string): string {
    return this.env[key] || defaultValue;
  }

  private getIntEnv(key: string, defaultValue: number): number {
    const value = this.env[key];
    if (value === undefined) return defaultValue;

    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  }

  private getLateEnvironment(key: string, defaultValue: LateEnvironmentPolicy): LateEnvironmentPolicy {
    const value = this.env[key]?.toLowerCase();
    if (value === 'ignore' || value === 'reject') {
      return value;
    }
    return defaultValue;
  }

  getConfig(): AppConfig {
    return { ...this.config };
  }
}

/**
 * Reads `.env` into `process.env`, then the application configuration.
 * Only the echo entry point calls this; the library never touches the
 * environment.
 */
export function loadConfig(): AppConfig {
  dotenv.config();
  return new ConfigManager().getConfig();
}
