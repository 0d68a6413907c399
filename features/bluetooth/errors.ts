import type { SessionState } from "./types";

// ============================================================================
// TRANSPORT ERRORS
// ============================================================================

export type TransportErrorCode =
  | "CONNECT_FAILED"
  | "DISCOVERY_FAILED"
  | "WRITE_FAILED"
  | "DESCRIPTOR_FAILED"
  | "CONNECTION_LOST"
  | "UNKNOWN_CHARACTERISTIC"
  | "SCAN_FAILED";

export class TransportError extends Error {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.code = code;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export type ConfigurationErrorCode = "CHARACTERISTICS_NOT_FOUND" | "STEP_FAILED";

/**
 * The handshake could not complete. `CHARACTERISTICS_NOT_FOUND` means the
 * device was reached but does not speak the protocol; `STEP_FAILED` names
 * the state whose write or descriptor operation failed.
 */
export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;
  readonly step: SessionState | null;

  private constructor(
    code: ConfigurationErrorCode,
    message: string,
    step: SessionState | null,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConfigurationError";
    this.code = code;
    this.step = step;
  }

  static characteristicsNotFound(serviceUuids: readonly string[]): ConfigurationError {
    const seen = serviceUuids.length > 0 ? serviceUuids.join(", ") : "none";
    return new ConfigurationError(
      "CHARACTERISTICS_NOT_FOUND",
      `Notify/write characteristics not found (services: ${seen})`,
      null,
    );
  }

  static stepFailed(step: SessionState, cause: unknown): ConfigurationError {
    const reason = cause instanceof Error ? cause.message : String(cause);
    return new ConfigurationError("STEP_FAILED", `Step ${step} failed: ${reason}`, step, cause);
  }
}

// ============================================================================
// NORMALISATION
// ============================================================================

export interface ErrorInfo {
  code: string;
  message: string;
  timestamp: number;
}

export function toErrorInfo(err: unknown): ErrorInfo {
  if (err instanceof TransportError || err instanceof ConfigurationError) {
    return { code: err.code, message: err.message, timestamp: Date.now() };
  }
  if (err instanceof Error) {
    return { code: "UNKNOWN", message: err.message, timestamp: Date.now() };
  }
  return { code: "UNKNOWN", message: String(err), timestamp: Date.now() };
}
