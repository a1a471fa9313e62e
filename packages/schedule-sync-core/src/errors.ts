export class ScheduleSyncError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "ScheduleSyncError";
  }
}

/** Unreadable or invalid config document. Fatal, never repaired automatically. */
export class ConfigError extends ScheduleSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/** Malformed schedule entry. The entry is skipped and reported. */
export class InvalidTimeError extends ScheduleSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidTimeError";
  }
}

export class GatewayError extends ScheduleSyncError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GatewayError";
  }
}

export class AmbiguousTargetError extends ScheduleSyncError {
  constructor(
    message: string,
    public readonly matches: string[]
  ) {
    super(message);
    this.name = "AmbiguousTargetError";
  }
}

export class NotFoundError extends ScheduleSyncError {
  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
