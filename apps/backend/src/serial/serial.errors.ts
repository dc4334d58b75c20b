export class TransportError extends Error {
  constructor(
    message: string,
    readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The device could not be opened (absent, busy, permission denied). */
export class TransportOpenError extends TransportError {}

/** The connection stopped being usable while streaming. */
export class TransportIOError extends TransportError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
