export class TelemetryError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "TelemetryError";
  }
}

export class DeviceQueryError extends TelemetryError {
  constructor(
    public readonly deviceId: string,
    reason: string,
    cause?: Error,
    public readonly deviceName: string | null = null
  ) {
    super(`Device query failed: ${deviceId}: ${reason}`, "DEVICE_QUERY_FAILED", {
      deviceId,
      reason,
      cause: cause?.message,
    });
    this.name = "DeviceQueryError";
  }
}

export class SourceUnavailableError extends TelemetryError {
  constructor(
    public readonly sourceId: string,
    reason: string,
    cause?: Error
  ) {
    super(`Source unavailable: ${sourceId}: ${reason}`, "SOURCE_UNAVAILABLE", {
      sourceId,
      reason,
      cause: cause?.message,
    });
    this.name = "SourceUnavailableError";
  }
}

export class InvalidReadingError extends TelemetryError {
  constructor(metric: string, value: number, deviceId?: string) {
    super(`Invalid reading for ${metric}: ${value}`, "INVALID_READING", {
      metric,
      value,
      deviceId,
    });
    this.name = "InvalidReadingError";
  }
}

export class CapacityInvariantViolation extends TelemetryError {
  constructor(size: number, capacity: number) {
    super(
      `Series holds ${size} entries, capacity is ${capacity}`,
      "CAPACITY_INVARIANT_VIOLATION",
      { size, capacity }
    );
    this.name = "CapacityInvariantViolation";
  }
}

export class ConfigError extends TelemetryError {
  constructor(message: string, issues?: string[]) {
    super(`Invalid configuration: ${message}`, "INVALID_CONFIG", { issues });
    this.name = "ConfigError";
  }
}

/**
 * Plain-object form of an unknown thrown value, for structured log fields.
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof TelemetryError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      details: error.details,
    };
  }
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return { value: String(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
