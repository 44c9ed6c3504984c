/**
 * Chat Connection
 * One per accepted socket. Frames are handled strictly one after another,
 * so answers leave in the order the questions arrived.
 *
 * When the socket closes mid-request the running pipeline finishes (its
 * cache and history writes included) and the answer is dropped; frames
 * queued behind it are skipped.
 */

import { Logger } from '@nestjs/common';
import { WebSocket } from 'ws';
import {
  MalformedMessageError,
  OversizedMessageError,
  ProtocolError,
} from './errors/gateway-errors';
import {
  decodeMessage,
  encodeError,
  encodeResponse,
} from './protocol/message-codec';
import type { PipelineResult, Query } from '../orchestrator/types/pipeline.types';

/** The part of a WebSocket a connection writes to */
export interface OutboundSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type QueryHandler = (query: Query) => Promise<PipelineResult>;

export interface ChatConnectionOptions {
  conversationId: string;
  maxMessageBytes: number;
}

export class ChatConnection {
  private readonly logger = new Logger(ChatConnection.name);
  private queue: Promise<void> = Promise.resolve();
  private closed = false;
  private received = 0;

  constructor(
    private readonly socket: OutboundSocket,
    private readonly handler: QueryHandler,
    private readonly options: ChatConnectionOptions,
  ) {}

  get conversationId(): string {
    return this.options.conversationId;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Queues one inbound frame behind those already received.
   */
  receive(data: Buffer, isBinary: boolean): void {
    const sequence = ++this.received;
    this.queue = this.queue.then(() => this.process(data, isBinary, sequence));
  }

  /**
   * Socket went away; nothing more is sent.
   */
  markClosed(): void {
    this.closed = true;
  }

  /**
   * Resolves once every frame received so far has been handled.
   */
  idle(): Promise<void> {
    return this.queue;
  }

  private async process(data: Buffer, isBinary: boolean, sequence: number): Promise<void> {
    if (this.closed) {
      this.logger.debug(
        `[Connection] conversation=${this.conversationId} seq=${sequence} status=skipped reason=closed`,
      );
      return;
    }

    try {
      if (data.byteLength > this.options.maxMessageBytes) {
        throw new OversizedMessageError(data.byteLength, this.options.maxMessageBytes);
      }
      if (isBinary) {
        throw new MalformedMessageError('binary frames are not accepted');
      }

      const message = decodeMessage(data.toString('utf8'));
      const result = await this.handler({
        conversationId: this.conversationId,
        text: message.text,
      });

      if (this.closed) {
        this.logger.log(
          `[Connection] conversation=${this.conversationId} seq=${sequence} status=discarded reason=closed`,
        );
        return;
      }

      this.send(encodeResponse(result.text, message.format, this.conversationId));
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.rejectAndClose(error, sequence);
        return;
      }
      this.logger.error(
        `[Connection] conversation=${this.conversationId} seq=${sequence} status=failed error=${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private rejectAndClose(error: ProtocolError, sequence: number): void {
    this.logger.warn(
      `[Connection] conversation=${this.conversationId} seq=${sequence} status=closing code=${error.code} error=${error.message}`,
    );
    this.send(encodeError(error.code, error.message));
    this.closed = true;
    this.socket.close(error.closeCode, error.code);
  }

  private send(data: string): void {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return;
    }
    this.socket.send(data);
  }
}
