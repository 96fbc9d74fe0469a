export const TrackerErrorCode = {
  StoreUnavailable: "STORE_UNAVAILABLE",
  NotFound: "NOT_FOUND",
  AlreadyTerminal: "ALREADY_TERMINAL",
  ClockSkewDetected: "CLOCK_SKEW_DETECTED",
  InvalidParams: "INVALID_PARAMS"
} as const;

export type TrackerErrorCode = (typeof TrackerErrorCode)[keyof typeof TrackerErrorCode];

export class TrackerError extends Error {
  constructor(
    readonly code: TrackerErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TrackerError";
  }
}

export function isTrackerError(e: unknown, code?: TrackerErrorCode): e is TrackerError {
  return e instanceof TrackerError && (code === undefined || e.code === code);
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
