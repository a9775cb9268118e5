#!/usr/bin/env node

/**
 * Echo - example SSH Console application
 *
 * Answers every command with `echo: <command>`. The command `exit` says
 * goodbye and shuts the server down.
 *
 *   ssh -p 2222 localhost hello world
 */

import { SSHConsole } from './ssh-console.js';
import { HostKey } from './keys.js';
import { authorizedKeysAuthenticator, staticPasswordAuthenticator } from './authenticators.js';
import { configureLogging, logger } from './logger.js';
import { loadConfig, type AppConfig } from './config.js';
import { ErrorFactory } from './errors.js';
import type { CommandRunner } from './types.js';

// CLI argument parsing
function parseArguments(): {
  help: boolean;
  generateKey: boolean;
} {
  const args = process.argv.slice(2);
  const result = {
    help: false,
    generateKey: false
  };

  for (const arg of args) {
    switch (arg) {
      case '--help':
      case '-h':
        result.help = true;
        break;
      case '--generate-key':
      case '-g':
        result.generateKey = true;
        break;
    }
  }

  return result;
}

// Print help information
function printHelp(): void {
  console.log('Echo - SSH Console example');
  console.log('');
  console.log('Usage: node dist/echo.js [options]');
  console.log('');
  console.log('Options:');
  console.log('  -h, --help          Show this help message');
  console.log('  -g, --generate-key  Print a new host key and exit');
  console.log('');
  console.log('Environment Variables:');
  console.log('  SSH_CONSOLE_HOST             Bind address (default: 0.0.0.0)');
  console.log('  SSH_CONSOLE_PORT             Bind port (default: 2222)');
  console.log('  SSH_CONSOLE_HOST_KEY         Host key, "ed25519 <base64>"');
  console.log('  SSH_CONSOLE_AUTHORIZED_KEYS  authorized_keys file (default: ~/.ssh/authorized_keys)');
  console.log('  SSH_CONSOLE_USERNAME         Username for password login');
  console.log('  SSH_CONSOLE_PASSWORD         Password for password login');
  console.log('  SSH_CONSOLE_LATE_ENV         ignore | reject env requests after exec (default: ignore)');
  console.log('  SSH_CONSOLE_LOG_LEVEL        Log level, or "silent" (default: INFO)');
  console.log('  SSH_CONSOLE_LOG_FILE         Log file path (optional)');
  console.log('  SSH_CONSOLE_LOG_FORMAT       Line template (default: %timestamp% - %module% - %level% - %message%)');
}

/**
 * Builds the echo runner. `onExit` is called after the goodbye has been
 * written.
 */
export function createEchoRunner(onExit: () => void): CommandRunner {
  return (command, output) => {
    const trimmed = command.trim();

    if (trimmed === 'exit') {
      output.write('Goodbye\r\n');
      onExit();
      return;
    }
    output.write(`echo: ${trimmed}\r\n`);
  };
}

/**
 * Host key from configuration, or a throwaway one which is logged so it can
 * be saved.
 */
export function resolveHostKey(appConfig: Pick<AppConfig, 'hostKey'>): HostKey {
  if (appConfig.hostKey) {
    return HostKey.fromString(appConfig.hostKey);
  }

  const hostKey = HostKey.generate();
  logger.warn('No SSH_CONSOLE_HOST_KEY configured, using a generated key');
  logger.warn(`Set SSH_CONSOLE_HOST_KEY="${hostKey.toString()}" to keep it`);
  return hostKey;
}

export function createConsole(appConfig: AppConfig): SSHConsole {
  const passwordAuthenticator = appConfig.username && appConfig.password
    ? staticPasswordAuthenticator(appConfig.username, appConfig.password)
    : undefined;

  return new SSHConsole({
    host: appConfig.host,
    port: appConfig.port,
    hostKeys: [resolveHostKey(appConfig)],
    passwordAuthenticator,
    publicKeyAuthenticator: authorizedKeysAuthenticator(appConfig.authorizedKeysFile),
    lateEnvironment: appConfig.lateEnvironment
  });
}

// Main application entry point
async function main(): Promise<void> {
  const args = parseArguments();

  if (args.help) {
    printHelp();
    process.exit(0);
  }

  if (args.generateKey) {
    console.log(HostKey.generate().toString());
    process.exit(0);
  }

  const config = loadConfig();
  configureLogging({
    level: config.logLevel,
    file: config.logFile,
    format: config.logFormat
  });

  try {
    const sshConsole = createConsole(config);

    let signalExit = () => {};
    const exited = new Promise<void>(resolve => {
      signalExit = () => resolve();
    });

    await sshConsole.listen(createEchoRunner(() => signalExit()));
    await exited;
    await sshConsole.stop();

    logger.info('Echo is done.');
  } catch (error) {
    logger.error('Echo failed:', error);

    if (ErrorFactory.isConsoleError(error)) {
      console.error(`[${error.code}] ${error.message}`);
      if (error.details) {
        console.error('Details:', error.details);
      }
    }

    process.exit(1);
  }
}

// Start the application if this is the main module
if (require.main === module) {
  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection:', reason);
    process.exit(1);
  });

  // Handle uncaught exceptions
  process.on('uncaughtException', (error) => {
    logger.error('Uncaught Exception:', error);
    process.exit(1);
  });

  main().catch((error) => {
    logger.error('Application failed to start:', error);
    process.exit(1);
  });
}
