import { ContactLockState, ParseError, SensorEvent } from './enrichment.types';

export const NODE_MESSAGE = 'nodeMsg';
export const NODE_ALERT = 'nodeAlert';

const CONTACT_LOCK_MARKERS: ReadonlyArray<readonly [string, ContactLockState]> = [
  ['NEW CONTACT LOCK', 'acquired'],
  ['LOCK UPDATE', 'updated'],
  ['LOST CONTACT LOCK', 'lost'],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function decodeSensorEvent(line: string): SensorEvent {
  let decoded: unknown;
  try {
    decoded = JSON.parse(line);
  } catch (error) {
    throw new ParseError(
      `Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`,
      line,
      { cause: error },
    );
  }
  if (!isRecord(decoded)) {
    throw new ParseError('Failed to parse JSON: expected an object', line);
  }
  return decoded;
}

export function eventType(event: SensorEvent): string {
  return typeof event.type === 'string' ? event.type : '';
}

/** `msg.stat` of an alert, or an empty string when any level is missing. */
export function alertStatus(event: SensorEvent): string {
  const msg = event.msg;
  if (!isRecord(msg)) {
    return '';
  }
  return typeof msg.stat === 'string' ? msg.stat : '';
}

export function classifyContactLock(status: string): ContactLockState | undefined {
  for (const [marker, state] of CONTACT_LOCK_MARKERS) {
    if (status.includes(marker)) {
      return state;
    }
  }
  return undefined;
}
