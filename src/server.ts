import { chmodSync, existsSync, mkdirSync, unlinkSync } from 'fs';
import { createServer, type Server, type Socket } from 'net';
import { dirname } from 'path';
import { sendToDaemon } from './client/daemon-client.js';
import { SOCKET_MAX_REQUEST_BYTES, SOCKET_READ_TIMEOUT_MS } from './constants.js';
import {
  decodeRequestLine,
  encodeResponse,
  INVALID_INPUT,
  type DaemonRequest,
  type DaemonResponse,
} from './types/protocol.js';
import { DaemonError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

export type RequestHandler = (request: DaemonRequest) => Promise<DaemonResponse>;

export interface SocketServerOptions {
  readonly socketPath: string;
  readonly handler: RequestHandler;
  readonly readTimeoutMs?: number;
  readonly maxRequestBytes?: number;
}

/**
 * Line-delimited JSON over a Unix domain socket: one request line in, one
 * response line out, then the connection is closed.
 */
export class SocketServer {
  private server: Server | null = null;
  private readonly connections = new Set<Socket>();
  private readonly readTimeoutMs: number;
  private readonly maxRequestBytes: number;

  constructor(private readonly options: SocketServerOptions) {
    this.readTimeoutMs = options.readTimeoutMs ?? SOCKET_READ_TIMEOUT_MS;
    this.maxRequestBytes = options.maxRequestBytes ?? SOCKET_MAX_REQUEST_BYTES;
  }

  get socketPath(): string {
    return this.options.socketPath;
  }

  async start(): Promise<void> {
    const { socketPath } = this.options;
    await this.clearStaleSocket();
    mkdirSync(dirname(socketPath), { recursive: true });

    // Half-open so a client that ends its side after writing still gets a reply.
    const server = createServer({ allowHalfOpen: true }, (socket) => this.onConnection(socket));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(new DaemonError('BIND_FAILED', `Cannot listen on ${socketPath}: ${error.message}`, { cause: error }));
      };
      server.once('error', onError);
      server.listen(socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      logger.error({ error }, 'Socket server error');
    });
    this.server = server;

    try {
      chmodSync(socketPath, 0o600);
    } catch (error) {
      logger.warn({ socketPath, error }, 'Failed to restrict socket permissions');
    }
    logger.info({ socketPath }, 'Listening');
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const socket of this.connections) socket.destroy();
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

    try {
      if (existsSync(this.options.socketPath)) unlinkSync(this.options.socketPath);
    } catch (error) {
      logger.warn({ socketPath: this.options.socketPath, error }, 'Failed to remove socket');
    }
    logger.info('Socket server stopped');
  }

  /** Remove a leftover socket file, unless a live daemon still answers on it. */
  private async clearStaleSocket(): Promise<void> {
    const { socketPath } = this.options;
    if (!existsSync(socketPath)) return;

    const reply = await sendToDaemon(socketPath, { cli: 'ping' }, this.readTimeoutMs);
    if (reply) {
      throw new DaemonError('ALREADY_RUNNING', `Another daemon is listening on ${socketPath}`);
    }
    try {
      unlinkSync(socketPath);
    } catch (error) {
      throw new DaemonError('BIND_FAILED', `Cannot remove stale socket ${socketPath}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private onConnection(socket: Socket): void {
    this.connections.add(socket);
    let buffer = '';
    let done = false;

    const finish = (line: string | null): void => {
      if (done) return;
      done = true;
      socket.setTimeout(0);
      this.respond(socket, line).catch((error: unknown) => {
        logger.error({ error }, 'Failed to answer request');
        socket.destroy();
      });
    };

    socket.setEncoding('utf-8');
    socket.setTimeout(this.readTimeoutMs);

    socket.on('data', (chunk: string) => {
      if (done) return;
      buffer += chunk;
      const newline = buffer.indexOf('\n');
      if (newline >= 0) {
        finish(buffer.slice(0, newline));
      } else if (Buffer.byteLength(buffer) > this.maxRequestBytes) {
        finish(null);
      }
    });
    socket.on('end', () => finish(buffer));
    socket.on('timeout', () => {
      logger.debug('Client sent no complete request in time');
      finish(null);
    });
    socket.on('error', (error) => {
      logger.debug({ error: error.message }, 'Client connection error');
    });
    socket.on('close', () => {
      this.connections.delete(socket);
    });
  }

  private async respond(socket: Socket, line: string | null): Promise<void> {
    const response = await this.answer(line);
    if (!socket.destroyed) socket.end(encodeResponse(response));
  }

  private async answer(line: string | null): Promise<DaemonResponse> {
    if (line === null || line.trim() === '') return { ok: false, error: INVALID_INPUT };

    const decoded = decodeRequestLine(line);
    if (!decoded.ok) return { ok: false, error: decoded.error };

    try {
      return await this.options.handler(decoded.request);
    } catch (error) {
      logger.error({ error }, 'Request handler failed');
      return { ok: false, error: errorMessage(error) };
    }
  }
}
