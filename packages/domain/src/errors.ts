export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/** The price feed failed or sent something unreadable. */
export class PriceAcquisitionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PriceAcquisitionError";
  }
}

/** No usable hourly price remained after normalisation. */
export class EmptyDataError extends Error {
  constructor(message = "No price data available") {
    super(message);
    this.name = "EmptyDataError";
  }
}

export class ScheduleInvariantError extends Error {
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "ScheduleInvariantError";
    this.details = details;
  }
}
