export enum ErrorCodes {
  READINESS_TIMEOUT = "READINESS_TIMEOUT",
  INVALID_CONFIGURATION = "INVALID_CONFIGURATION"
}

export class AppError extends Error {
  readonly code: ErrorCodes | string;
  readonly details?: unknown;

  constructor(code: ErrorCodes | string, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class TimeoutExceededError extends AppError {
  constructor(
    public readonly description: string,
    public readonly timeout: number,
    public readonly attempts: number
  ) {
    super(
      ErrorCodes.READINESS_TIMEOUT,
      `Timed out after ${timeout}ms waiting for ${description} to become ready (${attempts} attempts)`,
      { description, timeout, attempts }
    );
  }
}
