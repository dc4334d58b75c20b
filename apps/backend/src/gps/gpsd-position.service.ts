import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import net from 'node:net';
import { firstValueFrom, Observable, of, Subject, timeout } from 'rxjs';

import { DEFAULT_FIX, PositionFix, PositionMode, PositionSource } from './gps.types';
import { parseTpvReport, WATCH_COMMAND } from './gpsd-report';

@Injectable()
export class GpsdPositionService implements PositionSource {
  private readonly logger = new Logger(GpsdPositionService.name);
  private readonly fixes$ = new Subject<PositionFix>();
  private readonly host: string;
  private readonly port: number;
  private readonly fixTimeoutMs: number;
  private socket?: net.Socket;
  private buffer = '';
  private latest?: PositionFix;
  private cachedFix: PositionFix = { ...DEFAULT_FIX };
  private activeMode: PositionMode = 'continuous';

  constructor(configService: ConfigService) {
    this.host = configService.get<string>('gps.host', '127.0.0.1');
    this.port = configService.get<number>('gps.port', 2947);
    this.fixTimeoutMs = configService.get<number>('gps.fixTimeoutMs', 5000);
  }

  get mode(): PositionMode {
    return this.activeMode;
  }

  get connected(): boolean {
    return Boolean(this.socket);
  }

  getFixStream(): Observable<PositionFix> {
    return this.fixes$.asObservable();
  }

  async open(mode: PositionMode): Promise<void> {
    this.activeMode = mode;
    this.latest = undefined;
    this.cachedFix = { ...DEFAULT_FIX };

    try {
      await this.connect();
    } catch (error) {
      this.logger.warn(
        `gpsd unavailable at ${this.host}:${this.port} (${
          error instanceof Error ? error.message : String(error)
        }); using default position`,
      );
      return;
    }

    if (mode === 'fixed') {
      this.cachedFix = await this.waitForFix();
      this.logger.log(
        `Stationary position captured: ${this.cachedFix.lat}, ${this.cachedFix.lon}`,
      );
      await this.close();
    }
  }

  currentFix(): PositionFix {
    if (this.activeMode === 'fixed') {
      return { ...this.cachedFix };
    }
    const fix = this.latest ?? DEFAULT_FIX;
    this.latest = undefined;
    return { ...fix };
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = undefined;
    this.buffer = '';
    if (!socket) {
      return;
    }
    socket.removeAllListeners('data');
    socket.removeAllListeners('close');
    await new Promise<void>((resolve) => {
      if (socket.destroyed) {
        resolve();
        return;
      }
      socket.once('close', () => resolve());
      socket.destroy();
    });
  }

  private connect(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const socket = net.connect({ host: this.host, port: this.port });
      const timer = setTimeout(() => {
        handleError(new Error(`connection timed out after ${this.fixTimeoutMs}ms`));
      }, this.fixTimeoutMs);
      const handleError = (err: Error) => {
        clearTimeout(timer);
        socket.destroy();
        reject(err);
      };

      socket.once('error', handleError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.off('error', handleError);
        socket.setEncoding('utf8');
        socket.on('data', (chunk: Buffer | string) => this.handleData(chunk.toString()));
        socket.on('error', (err: Error) => {
          this.logger.warn(`gpsd connection error: ${err.message}`);
        });
        socket.on('close', () => {
          if (this.socket === socket) {
            this.logger.warn('gpsd disconnected; positions fall back to the default fix');
            this.socket = undefined;
          }
        });
        socket.write(WATCH_COMMAND);
        this.socket = socket;
        this.logger.log(`Connected to gpsd at ${this.host}:${this.port}`);
        resolve();
      });
    });
  }

  private handleData(chunk: string): void {
    this.buffer += chunk;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    for (const line of lines) {
      const fix = parseTpvReport(line.trim());
      if (fix) {
        this.latest = fix;
        this.fixes$.next(fix);
      }
    }
  }

  private waitForFix(): Promise<PositionFix> {
    if (this.latest) {
      return Promise.resolve(this.latest);
    }
    return firstValueFrom(
      this.fixes$.pipe(
        timeout({
          first: this.fixTimeoutMs,
          with: () => {
            this.logger.warn(`No GPS fix within ${this.fixTimeoutMs}ms; using default position`);
            return of({ ...DEFAULT_FIX });
          },
        }),
      ),
      { defaultValue: { ...DEFAULT_FIX } },
    );
  }
}
