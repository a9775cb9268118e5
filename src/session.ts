import type { ServerChannel, Session } from 'ssh2';
import { createLogger } from './logger.js';
import { CommandHandler, type CommandHandlerOptions } from './command-handler.js';
import type { ChannelSink } from './types.js';

const logger = createLogger('Session');

/**
 * {@link ChannelSink} over an accepted ssh2 exec channel.
 */
export class StreamSink implements ChannelSink {
  private closing = false;
  private ended = false;

  constructor(private readonly stream: ServerChannel) {
    stream.on('close', () => {
      this.ended = true;
    });
    stream.on('error', (error: Error) => {
      logger.error('Channel error:', error);
    });
  }

  get closed(): boolean {
    return this.closing || this.ended;
  }

  write(text: string, done?: () => void): void {
    if (this.closed) {
      done?.();
      return;
    }
    this.stream.write(text, () => done?.());
  }

  writeError(text: string, done?: () => void): void {
    if (this.closed) {
      done?.();
      return;
    }
    this.stream.stderr.write(text, () => done?.());
  }

  close(exitStatus?: number): void {
    if (this.closed) return;
    this.closing = true;
    if (exitStatus !== undefined) {
      this.stream.exit(exitStatus);
    }
    this.stream.end();
  }
}

/**
 * Wires one ssh2 session channel to a {@link CommandHandler}. Only `env` and
 * `exec` requests are honoured.
 */
export function attachSession(session: Session, options: CommandHandlerOptions): CommandHandler {
  const handler = new CommandHandler(options);

  session.on('env', (accept, reject, info) => {
    if (handler.env(info.key, info.val)) {
      accept?.();
    } else {
      reject?.();
    }
  });

  session.on('exec', (accept, reject, info) => {
    if (handler.state !== 'awaiting-exec') {
      reject?.();
      return;
    }

    const stream = accept();
    const sink = new StreamSink(stream);
    stream.on('data', (chunk: Buffer) => handler.data(chunk));
    handler.exec(info.command, sink);
  });

  session.on('pty', (_accept, reject) => {
    logger.debug('Refusing pty request');
    reject?.();
  });

  session.on('shell', (_accept, reject) => {
    logger.debug('Refusing shell request');
    reject?.();
  });

  session.on('subsystem', (_accept, reject, info) => {
    logger.debug(`Refusing subsystem request: ${info.name}`);
    reject?.();
  });

  session.on('window-change', (_accept, reject, info) => {
    logger.debug(`Refusing window-change request: ${info.cols}x${info.rows}`);
    reject?.();
  });

  session.on('signal', (_accept, reject, info) => {
    logger.debug(`Refusing signal request: ${info.name}`);
    reject?.();
  });

  session.on('x11', (_accept, reject) => {
    logger.debug('Refusing x11 request');
    reject?.();
  });

  session.on('auth-agent', (_accept, reject) => {
    logger.debug('Refusing auth-agent request');
    reject?.();
  });

  return handler;
}
