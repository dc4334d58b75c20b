import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { WebSocket, WebSocketServer } from 'ws';

import { PublisherBindError } from './publisher.errors';
import { EnrichedEvent } from '../enrichment/enrichment.types';

/**
 * Fan-out endpoint. Every connected WebSocket client receives every message
 * as one text frame; nobody has to be listening and nobody acknowledges.
 *
 * Each subscriber may hold up to `highWaterMark` unsent frames. Beyond that,
 * messages for that subscriber are dropped instead of queued, so a stalled
 * consumer never holds up the serial loop.
 */
@Injectable()
export class PublisherService {
  private readonly logger = new Logger(PublisherService.name);
  private readonly host: string;
  private readonly requestedPort: number;
  private readonly highWaterMark: number;
  private readonly outstanding = new Map<WebSocket, number>();
  private server?: WebSocketServer;
  private dropped = 0;

  constructor(configService: ConfigService) {
    this.host = configService.get<string>('publisher.host', '0.0.0.0');
    this.requestedPort = configService.get<number>('publisher.port', 4020);
    this.highWaterMark = configService.get<number>('publisher.highWaterMark', 1000);
  }

  get bound(): boolean {
    return Boolean(this.server);
  }

  /** Port actually bound; differs from the configured one when that was 0. */
  get port(): number | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  get subscriberCount(): number {
    return this.outstanding.size;
  }

  get droppedCount(): number {
    return this.dropped;
  }

  async bind(): Promise<void> {
    if (this.server) {
      return;
    }

    this.server = await new Promise<WebSocketServer>((resolve, reject) => {
      const server = new WebSocketServer({ host: this.host, port: this.requestedPort });
      const handleError = (err: Error) => {
        server.close();
        reject(
          new PublisherBindError(
            `Unable to bind publisher on ${this.host}:${this.requestedPort}: ${err.message}`,
            { cause: err },
          ),
        );
      };

      server.once('error', handleError);
      server.once('listening', () => {
        server.off('error', handleError);
        server.on('error', (err: Error) => {
          this.logger.error(`Publisher server error: ${err.message}`);
        });
        server.on('connection', (socket: WebSocket) => this.attach(socket));
        resolve(server);
      });
    });

    this.logger.log(`Publisher bound to ws://${this.host}:${this.port ?? this.requestedPort}`);
  }

  /** Returns how many subscribers the message was handed to. */
  publish(event: EnrichedEvent): number {
    if (!this.server) {
      this.logger.debug('Publisher not bound; message discarded');
      return 0;
    }

    const message = JSON.stringify(event);
    let delivered = 0;
    for (const [socket, pending] of this.outstanding) {
      if (socket.readyState !== WebSocket.OPEN) {
        continue;
      }
      if (pending >= this.highWaterMark) {
        this.dropped += 1;
        continue;
      }
      this.outstanding.set(socket, pending + 1);
      socket.send(message, (err) => this.settle(socket, err));
      delivered += 1;
    }

    this.logger.debug(`Published: ${message}`);
    return delivered;
  }

  async close(): Promise<void> {
    const server = this.server;
    this.server = undefined;
    if (!server) {
      return;
    }

    for (const socket of this.outstanding.keys()) {
      socket.terminate();
    }
    this.outstanding.clear();

    await new Promise<void>((resolve) => {
      server.close((err) => {
        if (err) {
          this.logger.warn(`Publisher close reported: ${err.message}`);
        }
        resolve();
      });
    });
    this.logger.log('Publisher closed');
  }

  private attach(socket: WebSocket): void {
    this.outstanding.set(socket, 0);
    this.logger.debug(`Subscriber connected (${this.outstanding.size} total)`);

    socket.on('error', (err: Error) => {
      this.logger.warn(`Subscriber error: ${err.message}`);
    });
    socket.on('close', () => {
      this.outstanding.delete(socket);
      this.logger.debug(`Subscriber disconnected (${this.outstanding.size} total)`);
    });
  }

  private settle(socket: WebSocket, err?: Error): void {
    const pending = this.outstanding.get(socket);
    if (pending !== undefined) {
      this.outstanding.set(socket, Math.max(0, pending - 1));
    }
    if (err) {
      this.logger.debug(`Delivery to subscriber failed: ${err.message}`);
    }
  }
}
