export const LINE_READER = Symbol('LINE_READER');

export type StreamState = 'closed' | 'connecting' | 'streaming' | 'backoff';

export interface SerialConnectionOptions {
  path: string;
  baudRate: number;
}

/**
 * Transport for newline-terminated sensor records.
 *
 * `readLine` resolves with the next trimmed, non-empty line, with `null` when
 * nothing arrived within the read timeout, and rejects with a
 * `TransportIOError` once the connection is unusable. `open` rejects with a
 * `TransportOpenError`.
 */
export interface LineReader {
  open(options: SerialConnectionOptions): Promise<void>;
  readLine(): Promise<string | null>;
  close(): Promise<void>;
}
