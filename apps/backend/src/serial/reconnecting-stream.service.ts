import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as delay } from 'node:timers/promises';
import { BehaviorSubject, Observable } from 'rxjs';

import { describeError, TransportError } from './serial.errors';
import { LINE_READER, LineReader, SerialConnectionOptions, StreamState } from './serial.types';

/**
 * Supervises a {@link LineReader}: CLOSED -> CONNECTING -> STREAMING, and on
 * any transport failure BACKOFF -> CONNECTING again, forever. Only the abort
 * signal handed to {@link records} ends the sequence.
 */
@Injectable()
export class ReconnectingStreamService {
  private readonly logger = new Logger(ReconnectingStreamService.name);
  private readonly state$ = new BehaviorSubject<StreamState>('closed');
  private readonly connection: SerialConnectionOptions;
  private readonly reconnectDelayMs: number;

  constructor(
    @Inject(LINE_READER) private readonly reader: LineReader,
    configService: ConfigService,
  ) {
    this.connection = {
      path: configService.get<string>('serial.device', '/dev/ttyACM0'),
      baudRate: configService.get<number>('serial.baudRate', 115200),
    };
    this.reconnectDelayMs = configService.get<number>('serial.reconnectDelayMs', 5000);
  }

  get state(): StreamState {
    return this.state$.value;
  }

  getStateStream(): Observable<StreamState> {
    return this.state$.asObservable();
  }

  async *records(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    try {
      while (!signal?.aborted) {
        this.transition('connecting');
        try {
          await this.reader.open(this.connection);
        } catch (error) {
          this.logger.error(
            `Serial connection error: ${describeError(error)}. Reconnecting in ${this.reconnectDelayMs}ms...`,
          );
          await this.backoff(signal);
          continue;
        }

        this.transition('streaming');
        try {
          while (!signal?.aborted) {
            const line = await this.reader.readLine();
            if (line) {
              yield line;
            }
          }
        } catch (error) {
          if (!(error instanceof TransportError)) {
            throw error;
          }
          this.logger.error(
            `Serial connection error: ${error.message}. Reconnecting in ${this.reconnectDelayMs}ms...`,
          );
        } finally {
          await this.reader.close();
        }

        await this.backoff(signal);
      }
    } finally {
      this.transition('closed');
    }
  }

  private async backoff(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return;
    }
    this.transition('backoff');
    try {
      await delay(this.reconnectDelayMs, undefined, { signal });
    } catch (error) {
      if (!signal?.aborted) {
        throw error;
      }
    }
  }

  private transition(next: StreamState): void {
    if (this.state$.value === next) {
      return;
    }
    this.logger.debug(`Serial stream ${this.state$.value} -> ${next}`);
    this.state$.next(next);
  }
}
