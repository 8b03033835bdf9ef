export class AirQualityError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "AirQualityError";
  }
}

export class ValidationError extends AirQualityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "VALIDATION_FAILED", details);
    this.name = "ValidationError";
  }
}

export class EmptyDatasetError extends AirQualityError {
  constructor(
    message = "Dataset has no rows",
    details?: Record<string, unknown>,
  ) {
    super(message, "EMPTY_DATASET", details);
    this.name = "EmptyDatasetError";
  }
}

export class ServiceError extends AirQualityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "SERVICE_UNAVAILABLE", details);
    this.name = "ServiceError";
  }
}

export class CheckpointCorruptError extends AirQualityError {
  constructor(sessionId: string, reason: string) {
    super(
      `Checkpoint for ${sessionId} is corrupt: ${reason}`,
      "CHECKPOINT_CORRUPT",
      { sessionId },
    );
    this.name = "CheckpointCorruptError";
  }
}

export class SessionBusyError extends AirQualityError {
  constructor(sessionId: string) {
    super(`Session ${sessionId} is already executing`, "SESSION_BUSY", {
      sessionId,
    });
    this.name = "SessionBusyError";
  }
}

export class UnknownSessionError extends AirQualityError {
  constructor(sessionId: string) {
    super(`Unknown session: ${sessionId}`, "UNKNOWN_SESSION", { sessionId });
    this.name = "UnknownSessionError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
