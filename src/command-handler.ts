import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { Output } from './output.js';
import type {
  ChannelSink,
  CommandRunner,
  Environment,
  LateEnvironmentPolicy
} from './types.js';

export const INPUT_NOT_ACCEPTED = 'Input Not Accepted\r\n';

export type HandlerState = 'awaiting-exec' | 'dispatched' | 'closed';

export interface CommandHandlerOptions {
  runner: CommandRunner;
  username?: string;
  lateEnvironment?: LateEnvironmentPolicy;
}

/**
 * Per-channel state machine for the exec-only protocol: collect `env`
 * requests, dispatch exactly one `exec`, refuse every byte of input.
 */
export class CommandHandler {
  private currentState: HandlerState = 'awaiting-exec';
  private readonly environment = new Map<string, string>();
  private sink?: ChannelSink;
  private madeOutput = false;
  private current?: Output;
  private logger = createLogger('CommandHandler');

  constructor(private readonly options: CommandHandlerOptions) {}

  get state(): HandlerState {
    return this.currentState;
  }

  get username(): string | undefined {
    return this.options.username;
  }

  /**
   * Applies an `env` request. Returns whether the request should be
   * answered with success.
   */
  env(name: string, value: string): boolean {
    if (this.currentState === 'awaiting-exec') {
      this.environment.set(name, value);
      return true;
    }

    const policy = this.options.lateEnvironment ?? 'ignore';
    this.logger.debug(`env ${name} after dispatch (${policy})`);
    return policy === 'ignore';
  }

  /**
   * Dispatches the channel's command to the runner. Only the first call
   * does anything; later ones return false.
   */
  exec(command: string, sink: ChannelSink): boolean {
    if (this.currentState !== 'awaiting-exec') {
      this.logger.warn(`Refusing second exec on channel: ${command}`);
      return false;
    }

    this.currentState = 'dispatched';
    this.sink = sink;

    const output = this.output();
    const environment = this.snapshot();
    this.logger.info(`Dispatching command: ${command}`, { username: this.username });

    let result: void | Promise<void>;
    try {
      result = this.options.runner(command, output, this.username, environment);
    } catch (error) {
      this.logger.error(`Command failed: ${command}`, error);
      output.release();
      return true;
    }

    if (result instanceof Promise) {
      void result
        .catch((error: unknown) => {
          this.logger.error(`Command failed: ${command}`, error);
        })
        .finally(() => output.release());
    } else {
      output.release();
    }

    return true;
  }

  /**
   * Inbound channel data. Input is never accepted: the client is told so on
   * stderr and the channel is closed, without an exit status, once that
   * write completes.
   */
  data(chunk: Buffer): void {
    const error = ErrorFactory.inputNotAccepted(chunk.length);
    this.logger.warn(error.message, error.details);

    const sink = this.sink;
    if (!sink) return;

    this.currentState = 'closed';
    sink.writeError(INPUT_NOT_ACCEPTED, () => sink.close());
  }

  /**
   * The channel's output. Created on first use; asking for a new one after
   * the first was released is a programming error.
   *
   * @throws {ConsoleError} OUTPUT_ALREADY_CREATED
   */
  output(): Output {
    if (this.current && !this.current.closed) {
      return this.current;
    }
    if (this.madeOutput) {
      throw ErrorFactory.outputAlreadyCreated();
    }

    const sink = this.sink;
    if (!sink) {
      throw ErrorFactory.internalError('output requested before exec');
    }

    this.madeOutput = true;
    this.current = new Output(sink, () => {
      this.currentState = 'closed';
    });
    return this.current;
  }

  private snapshot(): Environment {
    return Object.fromEntries(this.environment);
  }
}
