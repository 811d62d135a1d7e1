export class NudgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = "NudgeError";
  }
}

/** Missing or invalid configuration. Fatal before the loop starts. */
export class ConfigError extends NudgeError {
  constructor(message: string, cause?: Error) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export class CheckError extends NudgeError {
  constructor(
    public readonly check: string,
    message: string,
    cause?: Error,
  ) {
    super(message, "CHECK_ERROR", cause);
    this.name = "CheckError";
  }
}

export class NotifyError extends NudgeError {
  constructor(message: string, cause?: Error) {
    super(message, "NOTIFY_ERROR", cause);
    this.name = "NotifyError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
