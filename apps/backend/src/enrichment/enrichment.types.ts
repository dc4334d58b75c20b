import { PositionFix } from '../gps/gps.types';

/** Decoded sensor message; fields are whatever the device sent. */
export type SensorEvent = Record<string, unknown>;

export type EnrichedEvent = Readonly<
  SensorEvent & {
    gps_lat: number;
    gps_lon: number;
  }
>;

export type ContactLockState = 'acquired' | 'updated' | 'lost';

export class ParseError extends Error {
  constructor(
    message: string,
    readonly line: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'ParseError';
  }
}

export type EnrichResult =
  | { ok: true; event: EnrichedEvent; fix: PositionFix; contact?: ContactLockState }
  | { ok: false; error: ParseError };
