export const POSITION_SOURCE = Symbol('POSITION_SOURCE');

/**
 * `continuous` polls the daemon on every query; `fixed` samples once at
 * startup and reuses that snapshot for the lifetime of the process.
 */
export type PositionMode = 'continuous' | 'fixed';

export interface PositionFix {
  lat: number;
  lon: number;
}

export const DEFAULT_FIX: Readonly<PositionFix> = Object.freeze({ lat: 0, lon: 0 });

export interface PositionSource {
  readonly mode: PositionMode;
  open(mode: PositionMode): Promise<void>;
  /** Never blocks. Always returns a fresh copy. */
  currentFix(): PositionFix;
  close(): Promise<void>;
}
