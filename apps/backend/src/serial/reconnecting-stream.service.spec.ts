import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { ReconnectingStreamService } from './reconnecting-stream.service';
import { TransportIOError, TransportOpenError } from './serial.errors';
import { StreamState } from './serial.types';
import { FakeLineReader } from '../testing/fake-line-reader';

const DEVICE = '/dev/ttyFAKE0';

function createStream(reader: FakeLineReader, reconnectDelayMs = 20): ReconnectingStreamService {
  const config = new ConfigService({
    serial: { device: DEVICE, baudRate: 9600, reconnectDelayMs },
  });
  return new ReconnectingStreamService(reader, config);
}

async function take(records: AsyncGenerator<string>, count: number): Promise<string[]> {
  const lines: string[] = [];
  while (lines.length < count) {
    const next = await records.next();
    if (next.done) {
      break;
    }
    lines.push(next.value);
  }
  return lines;
}

describe('ReconnectingStreamService', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('opens the configured device and yields non-empty lines in order', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader);
    reader.push('{"type":"nodeMsg"}', '', '{"type":"nodeAlert"}');

    const records = stream.records();
    await expect(take(records, 2)).resolves.toEqual(['{"type":"nodeMsg"}', '{"type":"nodeAlert"}']);
    expect(reader.opened).toEqual([{ path: DEVICE, baudRate: 9600 }]);
    expect(stream.state).toBe('streaming');

    await records.return();
  });

  it('keeps streaming after a transport failure once the backoff has elapsed', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader, 20);
    const states: StreamState[] = [];
    const subscription = stream.getStateStream().subscribe((state) => states.push(state));
    reader.push('first', new TransportIOError('device unplugged', DEVICE), 'second');

    const records = stream.records();
    await expect(take(records, 1)).resolves.toEqual(['first']);
    const failedAt = Date.now();
    await expect(take(records, 1)).resolves.toEqual(['second']);

    expect(Date.now() - failedAt).toBeGreaterThanOrEqual(15);
    expect(reader.opened).toHaveLength(2);
    expect(reader.closeCount).toBe(1);
    expect(states).toEqual(['closed', 'connecting', 'streaming', 'backoff', 'connecting', 'streaming']);
    expect(errorSpy).toHaveBeenCalledWith(
      'Serial connection error: device unplugged. Reconnecting in 20ms...',
    );

    subscription.unsubscribe();
    await records.return();
  });

  it('goes straight from connecting to backoff when the device cannot be opened', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader, 5);
    const states: StreamState[] = [];
    const subscription = stream.getStateStream().subscribe((state) => states.push(state));
    reader.failNextOpen(new TransportOpenError('Unable to open /dev/ttyFAKE0: busy', DEVICE));
    reader.failNextOpen(new TransportOpenError('Unable to open /dev/ttyFAKE0: busy', DEVICE));
    reader.push('recovered');

    const records = stream.records();
    await expect(take(records, 1)).resolves.toEqual(['recovered']);

    expect(reader.opened).toHaveLength(3);
    expect(states).toEqual([
      'closed',
      'connecting',
      'backoff',
      'connecting',
      'backoff',
      'connecting',
      'streaming',
    ]);
    expect(errorSpy).toHaveBeenCalledTimes(2);

    subscription.unsubscribe();
    await records.return();
  });

  it('ends the sequence and releases the reader when aborted', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader);
    const controller = new AbortController();
    reader.push('only');

    const records = stream.records(controller.signal);
    await expect(take(records, 1)).resolves.toEqual(['only']);
    controller.abort();

    await expect(records.next()).resolves.toEqual({ done: true, value: undefined });
    expect(reader.closeCount).toBe(1);
    expect(stream.state).toBe('closed');
  });

  it('does not wait out the backoff once aborted', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader, 60_000);
    const controller = new AbortController();
    reader.failNextOpen(new TransportOpenError('Unable to open /dev/ttyFAKE0: missing', DEVICE));

    const records = stream.records(controller.signal);
    const pending = records.next();
    setTimeout(() => controller.abort(), 20);

    await expect(pending).resolves.toEqual({ done: true, value: undefined });
    expect(stream.state).toBe('closed');
  });

  it('closes the reader when the consumer stops early', async () => {
    const reader = new FakeLineReader();
    const stream = createStream(reader);
    reader.push('a', 'b', 'c');

    const seen: string[] = [];
    for await (const line of stream.records()) {
      seen.push(line);
      if (seen.length === 2) {
        break;
      }
    }

    expect(seen).toEqual(['a', 'b']);
    expect(reader.closeCount).toBe(1);
    expect(stream.state).toBe('closed');
  });
});
