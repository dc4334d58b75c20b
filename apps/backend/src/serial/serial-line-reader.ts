import { Logger } from '@nestjs/common';
import { ReadlineParser } from '@serialport/parser-readline';
import { OpenOptions, SerialPortStream } from '@serialport/stream';

import { describeError, TransportIOError, TransportOpenError } from './serial.errors';
import { LineReader, SerialConnectionOptions } from './serial.types';

export type SerialBinding = OpenOptions['binding'];

interface PendingRead {
  resolve: (line: string | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

/**
 * Newline-framed reader over a serial port.
 *
 * The port is read in flowing mode; decoded lines are buffered until
 * `readLine` asks for them, so nothing is lost between two reads.
 */
export class SerialLineReader implements LineReader {
  private readonly logger = new Logger(SerialLineReader.name);
  private port?: SerialPortStream;
  private lineParser?: ReadlineParser;
  private readonly lines: string[] = [];
  private pending?: PendingRead;
  private failure?: TransportIOError;
  private path = '';

  constructor(
    private readonly binding: SerialBinding,
    private readonly readTimeoutMs = 1000,
  ) {}

  get stream(): SerialPortStream | undefined {
    return this.port;
  }

  async open({ path, baudRate }: SerialConnectionOptions): Promise<void> {
    await this.close();
    this.path = path;
    this.failure = undefined;

    const port = new SerialPortStream({
      binding: this.binding,
      path,
      baudRate,
      autoOpen: false,
    });

    try {
      await new Promise<void>((resolve, reject) => {
        port.open((err) => {
          if (err) {
            reject(err);
            return;
          }
          resolve();
        });
      });
    } catch (error) {
      throw new TransportOpenError(`Unable to open ${path}: ${describeError(error)}`, path, {
        cause: error,
      });
    }

    const lineParser = port.pipe(new ReadlineParser({ delimiter: '\n', encoding: 'utf8' }));
    lineParser.on('data', (data: string | Buffer) => this.enqueue(data.toString()));
    lineParser.on('error', (err: Error) => {
      this.fail(new TransportIOError(`Serial parser error: ${err.message}`, path, { cause: err }));
    });
    port.on('error', (err: Error) => {
      this.fail(new TransportIOError(`Serial port error: ${err.message}`, path, { cause: err }));
    });
    port.on('close', () => {
      this.fail(new TransportIOError(`Serial port ${path} closed`, path));
    });

    this.port = port;
    this.lineParser = lineParser;
    this.logger.log(`Connected to ${path} at ${baudRate} baud`);
  }

  readLine(): Promise<string | null> {
    const next = this.lines.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (!this.port) {
      return Promise.reject(new TransportIOError('Serial port is not open', this.path));
    }
    if (this.pending) {
      return Promise.reject(new Error('A read is already pending on this serial port'));
    }

    return new Promise<string | null>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = undefined;
        resolve(null);
      }, this.readTimeoutMs);
      this.pending = { resolve, reject, timer };
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    this.port = undefined;
    this.lines.length = 0;
    this.takePending()?.resolve(null);

    if (this.lineParser) {
      this.lineParser.removeAllListeners();
      this.lineParser = undefined;
    }
    if (!port) {
      return;
    }

    port.removeAllListeners();
    port.on('error', (err: Error) => {
      this.logger.debug(`Ignoring error on released port ${this.path}: ${err.message}`);
    });
    if (!port.isOpen) {
      return;
    }

    await new Promise<void>((resolve) => {
      port.close((err) => {
        if (err) {
          this.logger.debug(`Serial close reported: ${err.message}`);
        }
        resolve();
      });
    });
  }

  private enqueue(data: string): void {
    const line = data.trim();
    if (!line) {
      return;
    }
    this.logger.debug(`Raw data: ${line}`);
    const pending = this.takePending();
    if (pending) {
      pending.resolve(line);
      return;
    }
    this.lines.push(line);
  }

  private fail(error: TransportIOError): void {
    if (this.failure) {
      return;
    }
    this.failure = error;
    this.takePending()?.reject(error);
  }

  private takePending(): PendingRead | undefined {
    const pending = this.pending;
    if (pending) {
      clearTimeout(pending.timer);
      this.pending = undefined;
    }
    return pending;
  }
}
