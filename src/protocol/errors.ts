import { ErrorStatus } from "./types.js";

export type ProbeErrorCode =
  | "HANDSHAKE_FAILED"
  | "NOT_CONNECTED"
  | "ALREADY_CONNECTED"
  | "CONNECTION_FAILED"
  | "TIMEOUT"
  | "CONNECTION_CLOSED"
  | "IO_ERROR"
  | "PROTOCOL_ERROR"
  | "UNRECOGNIZED_STATUS"
  | "SEQUENCE_ABORTED"
  | "POWER_UP_FAILED"
  | "INVALID_ARGUMENT"
  | "MALFORMED_FRAME"
  | "INVALID_CONFIG";

export interface ProbeErrorOptions {
  operation?: string;
  status?: number;
  suggestion?: string;
  cause?: unknown;
}

// Shape returned to tool callers
export interface ProbeErrorInfo {
  error: true;
  code: ProbeErrorCode;
  message: string;
  operation?: string;
  status?: string;
  suggestion?: string;
}

export class ProbeError extends Error {
  readonly code: ProbeErrorCode;
  readonly operation?: string;
  readonly status?: number;
  readonly suggestion?: string;

  constructor(code: ProbeErrorCode, message: string, options: ProbeErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ProbeError";
    this.code = code;
    this.operation = options.operation;
    this.status = options.status;
    this.suggestion = options.suggestion;
  }

  toJSON(): ProbeErrorInfo {
    return {
      error: true,
      code: this.code,
      message: this.message,
      ...(this.operation !== undefined && { operation: this.operation }),
      ...(this.status !== undefined && { status: hexByte(this.status) }),
      ...(this.suggestion !== undefined && { suggestion: this.suggestion }),
    };
  }
}

export function isProbeError(error: unknown): error is ProbeError {
  return error instanceof ProbeError;
}

export function hexByte(value: number): string {
  return `0x${value.toString(16).padStart(2, "0")}`;
}

export function describeErrorStatus(status: number): string {
  switch (status) {
    case ErrorStatus.Command:
      return "command error";
    case ErrorStatus.Swd:
      return "SWD error";
    case ErrorStatus.Timeout:
      return "probe timeout";
    case ErrorStatus.Network:
      return "probe network error";
    case ErrorStatus.Api:
      return "API error";
    default:
      return "unknown error";
  }
}

export function getErrorSuggestion(status: number): string {
  switch (status) {
    case ErrorStatus.Swd:
      return "The target rejected the transfer (NACK, FAULT or WAIT). Clear sticky faults with an ABORT write, or line reset and re-attach";
    case ErrorStatus.Timeout:
      return "The target did not answer in time. Check power and wiring, or lower the SWD speed";
    case ErrorStatus.Command:
    case ErrorStatus.Api:
      return "The probe did not accept the command - this is likely a protocol bug";
    case ErrorStatus.Network:
      return "The probe lost its network link. Reconnect";
    default:
      return "Check the probe logs for more details";
  }
}

// Attach the operation name to an error escaping a transaction
export function withOperation(error: unknown, operation: string): ProbeError {
  if (isProbeError(error)) {
    if (error.operation !== undefined) return error;
    return new ProbeError(error.code, `${operation}: ${error.message}`, {
      operation,
      status: error.status,
      suggestion: error.suggestion,
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProbeError("IO_ERROR", `${operation}: ${message}`, { operation, cause: error });
}
