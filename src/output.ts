import { createLogger } from './logger.js';
import type { ChannelSink } from './types.js';

/**
 * Where a command sends its results.
 *
 * Writes may be buffered until the channel closes; end lines with `"\r\n"`
 * so terminal clients render them. The channel is flushed and closed when
 * the last holder lets go: the session holds one reference until the
 * runner returns, and {@link Output.retain} hands out more.
 */
export class Output {
  private references = 1;
  private sessionReleased = false;
  private finished = false;
  private logger = createLogger('Output');

  constructor(
    private readonly sink: ChannelSink,
    private readonly onClose?: () => void
  ) {}

  get closed(): boolean {
    return this.finished || this.sink.closed;
  }

  write(text: string): void {
    if (this.closed) {
      this.logger.debug('Dropping write to closed channel', { length: text.length });
      return;
    }
    this.sink.write(text);
  }

  writeError(text: string): void {
    if (this.closed) {
      this.logger.debug('Dropping error write to closed channel', { length: text.length });
      return;
    }
    this.sink.writeError(text);
  }

  /**
   * Takes another reference. The returned function drops it; calling it
   * more than once has no further effect.
   */
  retain(): () => void {
    if (this.finished) {
      this.logger.warn('Output retained after it was closed');
      return () => undefined;
    }

    this.references++;
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.drop();
    };
  }

  /** Holds the output while `fn` runs, releasing it however `fn` ends. */
  async hold<T>(fn: (output: Output) => T | Promise<T>): Promise<T> {
    const release = this.retain();
    try {
      return await fn(this);
    } finally {
      release();
    }
  }

  /** Drops the session's reference. */
  release(): void {
    if (this.sessionReleased) return;
    this.sessionReleased = true;
    this.drop();
  }

  private drop(): void {
    this.references--;
    if (this.references === 0) {
      this.finish();
    }
  }

  private finish(): void {
    if (this.finished) return;
    this.finished = true;
    if (!this.sink.closed) {
      this.sink.close(0);
    }
    this.onClose?.();
  }
}
