import { Server, type AuthContext, type ClientInfo, type Connection } from 'ssh2';
import { createServer, type AddressInfo, type Server as NetServer, type Socket } from 'net';
import { createLogger } from './logger.js';
import { ErrorFactory } from './errors.js';
import { AuthenticationDelegate } from './auth-delegate.js';
import { PublicKeyCredential } from './keys.js';
import { attachSession } from './session.js';
import type { AuthAttempt, CommandRunner, ServerConfig, ServerState } from './types.js';

function toAttempt(ctx: AuthContext): AuthAttempt {
  switch (ctx.method) {
    case 'password':
      return { method: 'password', username: ctx.username, password: ctx.password };
    case 'publickey':
      return {
        method: 'publickey',
        username: ctx.username,
        credential: new PublicKeyCredential(ctx.key.algo, ctx.key.data),
        signed: ctx.signature && ctx.blob ? { blob: ctx.blob, signature: ctx.signature } : undefined
      };
    default:
      return { method: ctx.method, username: ctx.username };
  }
}

/**
 * An SSH server that runs exactly one command per session channel and
 * accepts no input.
 */
export class SSHConsole {
  private readonly config: Readonly<ServerConfig>;
  private readonly delegate: AuthenticationDelegate;
  private readonly connections = new Set<Connection>();
  private readonly sockets = new Set<Socket>();
  private server?: NetServer;
  private currentState: ServerState = 'created';
  private logger = createLogger('SSHConsole');

  constructor(config: ServerConfig) {
    if (config.hostKeys.length === 0) {
      throw ErrorFactory.missingHostKey();
    }
    if (!Number.isInteger(config.port) || config.port < 0 || config.port > 65535) {
      throw ErrorFactory.invalidConfig('port', config.port);
    }

    this.config = Object.freeze({ ...config, hostKeys: [...config.hostKeys] });
    this.delegate = new AuthenticationDelegate(
      config.passwordAuthenticator,
      config.publicKeyAuthenticator
    );
  }

  get state(): ServerState {
    return this.currentState;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /** The bound address, once listening. */
  address(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  /**
   * Binds and starts accepting connections; resolves once bound.
   *
   * @throws {ConsoleError} ALREADY_LISTENING when called twice
   */
  async listen(runner: CommandRunner): Promise<void> {
    if (this.currentState !== 'created') {
      throw ErrorFactory.alreadyListening(this.currentState);
    }
    this.currentState = 'listening';

    const sshServer = new Server(
      { hostKeys: this.config.hostKeys.map(key => key.toOpenSSH()) },
      (client, info) => this.accept(client, info, runner)
    );
    sshServer.on('error', (error: Error) => {
      this.logger.error('SSH server error:', error);
    });

    // Sockets are tracked from accept, before the SSH handshake
    const server = createServer((socket) => {
      this.sockets.add(socket);
      socket.once('close', () => this.sockets.delete(socket));
      sshServer.injectSocket(socket);
    });
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.config.port, this.config.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (error) {
      this.logger.error(`Failed to listen on ${this.config.host}:${this.config.port}:`, error);
      this.currentState = 'stopped';
      this.server = undefined;
      throw error;
    }

    server.on('error', (error: Error) => {
      this.logger.error('Server error:', error);
    });

    const bound = this.address();
    this.logger.info(`SSH console listening on ${bound?.address ?? this.config.host}:${bound?.port ?? this.config.port}`);
  }

  /**
   * Closes the listening socket and every connection, including peers that
   * have not finished the handshake, and waits for them to go. Later calls
   * do nothing.
   */
  async stop(): Promise<void> {
    const server = this.server;
    this.server = undefined;

    if (this.currentState !== 'listening' || !server) {
      this.currentState = 'stopped';
      return;
    }
    this.currentState = 'stopped';

    this.logger.info(`Stopping SSH console (${this.connections.size} open connections, ${this.sockets.size} sockets)`);
    const closed = new Promise<void>((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });

    for (const connection of this.connections) {
      connection.end();
    }
    // Peers that ignore the disconnect, or never spoke SSH, keep close() waiting
    for (const socket of this.sockets) {
      socket.destroy();
    }

    await closed;
    this.connections.clear();
    this.sockets.clear();
    this.logger.info('SSH console stopped');
  }

  private accept(client: Connection, info: ClientInfo, runner: CommandRunner): void {
    const peer = `${info.ip}:${info.port}`;
    let username: string | undefined;

    this.connections.add(client);
    this.logger.info(`Client connected from ${peer}`);

    client.on('authentication', (ctx) => {
      void this.delegate.authenticate(toAttempt(ctx)).then((outcome) => {
        if (outcome === 'success') {
          username = ctx.username;
          ctx.accept();
          return;
        }
        if (ctx.method !== 'none') {
          this.logger.info(`Authentication ${outcome} for ${ctx.username} (${ctx.method}) from ${peer}`);
        }
        ctx.reject([...this.delegate.supportedMethods]);
      }).catch((error: unknown) => {
        this.logger.error(`Failed to answer authentication from ${peer}:`, error);
      });
    });

    client.on('ready', () => {
      this.logger.info(`Client ${username ?? 'unknown'} authenticated from ${peer}`);

      client.on('session', (accept) => {
        attachSession(accept(), {
          runner,
          username,
          lateEnvironment: this.config.lateEnvironment
        });
      });

      client.on('tcpip', (_accept, reject) => {
        this.refuseChannel('direct-tcpip', reject);
      });

      client.on('openssh.streamlocal', (_accept, reject) => {
        this.refuseChannel('direct-streamlocal@openssh.com', reject);
      });
    });

    client.on('error', (error: Error) => {
      this.logger.error(`Connection error from ${peer}:`, error);
      client.end();
    });

    client.on('close', () => {
      this.connections.delete(client);
      this.logger.info(`Client disconnected from ${peer}`);
    });
  }

  private refuseChannel(channelType: string, reject: () => void): void {
    const error = ErrorFactory.invalidChannelType(channelType);
    this.logger.warn(error.message, error.details);
    reject();
  }
}
