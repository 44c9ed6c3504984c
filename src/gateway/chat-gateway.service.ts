/**
 * Chat Gateway
 * WebSocket listener on its own port. The handshake is authenticated
 * before the upgrade completes; refused clients get a plain HTTP answer
 * (401 or 429) and never see a WebSocket.
 */

import {
  Injectable,
  Logger,
  OnApplicationBootstrap,
  OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { createServer, type IncomingMessage, type Server } from 'http';
import type { Duplex } from 'stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { ConfigStoreService } from '../config-store/config-store.service';
import { PipelineWorkflowService } from '../orchestrator/workflow/pipeline-workflow.service';
import { ConversationHistoryService } from '../history/conversation-history.service';
import { ChatConnection, type OutboundSocket } from './chat-connection';
import { ConnectionRateLimiter } from './auth/connection-rate-limiter';
import { extractCredentials, verifyHandshake } from './auth/handshake-auth';
import { readNumber, readString } from '../shared/utils/config-readers';

export interface GatewayOptions {
  host: string;
  port: number;
  sharedSecret: string | null;
  toleranceSeconds: number;
  maxMessageBytes: number;
  connectionsPerSecond: number;
}

export function readGatewayOptions(configService: ConfigService): GatewayOptions {
  const secret = configService.get<string>('GATEWAY_SHARED_SECRET');
  return {
    host: readString(configService, 'GATEWAY_HOST', '0.0.0.0'),
    port: readNumber(configService, 'GATEWAY_PORT', 8080),
    sharedSecret: secret && secret.length > 0 ? secret : null,
    toleranceSeconds: readNumber(configService, 'GATEWAY_AUTH_TOLERANCE_SECONDS', 300),
    maxMessageBytes: readNumber(configService, 'GATEWAY_MAX_MESSAGE_BYTES', 1024 * 1024),
    connectionsPerSecond: readNumber(configService, 'GATEWAY_CONNECTIONS_PER_SECOND', 10),
  };
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data);
  }
  return Buffer.from(data);
}

function rejectUpgrade(socket: Duplex, status: number, statusText: string, body: string): void {
  // Destroy only once the answer is flushed
  socket.once('finish', () => socket.destroy());
  socket.end(
    `HTTP/1.1 ${status} ${statusText}\r\n` +
      'Connection: close\r\n' +
      'Content-Type: text/plain; charset=utf-8\r\n' +
      `Content-Length: ${Buffer.byteLength(body)}\r\n` +
      `\r\n${body}`,
  );
}

@Injectable()
export class ChatGatewayService implements OnApplicationBootstrap, OnApplicationShutdown {
  private readonly logger = new Logger(ChatGatewayService.name);
  private readonly options: GatewayOptions;
  private readonly limiter: ConnectionRateLimiter;
  private readonly connections = new Map<OutboundSocket, ChatConnection>();
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;

  constructor(
    configService: ConfigService,
    private readonly configStore: ConfigStoreService,
    private readonly workflow: PipelineWorkflowService,
    private readonly history: ConversationHistoryService,
  ) {
    this.options = readGatewayOptions(configService);
    this.limiter = new ConnectionRateLimiter(this.options.connectionsPerSecond);
  }

  async onApplicationBootstrap(): Promise<void> {
    const wss = new WebSocketServer({
      noServer: true,
      // Hard ceiling; frames between max and 4x max get a protocol error reply
      maxPayload: this.options.maxMessageBytes * 4,
    });
    const server = createServer((_req, res) => {
      res.writeHead(426, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end('WebSocket upgrade required');
    });
    server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      try {
        this.handleUpgrade(wss, request, socket, head);
      } catch (error) {
        this.logger.error(
          `[Gateway] status=refused reason=upgrade_failed error=${error instanceof Error ? error.message : String(error)}`,
        );
        rejectUpgrade(socket, 400, 'Bad Request', 'bad upgrade request');
      }
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.server = server;
    this.wss = wss;
    this.logger.log(
      `🔌 Chat gateway listening on ws://${this.options.host}:${this.options.port} (auth ${this.options.sharedSecret ? 'enabled' : 'disabled'})`,
    );
  }

  async onApplicationShutdown(): Promise<void> {
    for (const [socket, connection] of this.connections) {
      connection.markClosed();
      socket.close(1001, 'server shutting down');
    }
    this.connections.clear();

    const wss = this.wss;
    const server = this.server;
    this.wss = null;
    this.server = null;

    if (wss) {
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }
    if (server) {
      await new Promise<void>((resolve, reject) =>
        server.close((error) => (error ? reject(error) : resolve())),
      );
    }
  }

  get activeConnections(): number {
    return this.connections.size;
  }

  /**
   * Admits or refuses one upgrade request. Refusals are answered on the raw
   * socket; accepted sockets are handed to `ws`.
   */
  handleUpgrade(
    wss: WebSocketServer,
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer,
  ): void {
    const remote = request.socket.remoteAddress ?? 'unknown';

    if (!this.limiter.tryAcquire()) {
      this.logger.warn(`[Gateway] remote=${remote} status=refused reason=rate_limited`);
      rejectUpgrade(socket, 429, 'Too Many Requests', 'too many connections');
      return;
    }

    const verdict = verifyHandshake(
      extractCredentials(request.url, request.headers),
      this.options.sharedSecret,
      this.options.toleranceSeconds,
      Math.floor(Date.now() / 1000),
    );
    if (!verdict.accepted) {
      this.logger.warn(
        `[Gateway] remote=${remote} status=refused code=${verdict.error.code} reason="${verdict.error.message}"`,
      );
      rejectUpgrade(socket, 401, 'Unauthorized', verdict.error.message);
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
      const connection = this.attach(ws, remote, verdict.authenticated);
      ws.on('message', (data: RawData, isBinary: boolean) => {
        connection.receive(toBuffer(data), isBinary);
      });
      ws.on('close', (code: number) => {
        void this.detach(ws, connection, code);
      });
      ws.on('error', (error: Error) => {
        this.logger.warn(
          `[Gateway] conversation=${connection.conversationId} status=socket_error error=${error.message}`,
        );
      });
    });
  }

  attach(socket: OutboundSocket, remote: string, authenticated: boolean): ChatConnection {
    const connection = new ChatConnection(
      socket,
      // Snapshot taken per message, so a reload applies from the next message on
      (query) => this.workflow.handle(query, this.configStore.current()),
      {
        conversationId: randomUUID(),
        maxMessageBytes: this.options.maxMessageBytes,
      },
    );
    this.connections.set(socket, connection);

    this.logger.log(
      `[Gateway] remote=${remote} conversation=${connection.conversationId} status=connected authenticated=${authenticated} active=${this.activeConnections}`,
    );
    return connection;
  }

  /**
   * Stops replies, then releases the conversation's history once the
   * requests already running have finished writing it.
   */
  async detach(socket: OutboundSocket, connection: ChatConnection, code: number): Promise<void> {
    connection.markClosed();
    this.connections.delete(socket);
    this.logger.log(
      `[Gateway] conversation=${connection.conversationId} status=disconnected code=${code} active=${this.activeConnections}`,
    );

    await connection.idle();
    await this.history.release(connection.conversationId);
  }
}
