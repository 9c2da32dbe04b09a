import type { ErrorKind, PatientId } from "./types";

/**
 * Base class for every failure the service reports to callers.
 *
 * `kind` is the machine-readable category and `status` the HTTP status the
 * HTTP layer answers with.
 */
export class PatientApiError extends Error {
  readonly kind: ErrorKind;
  readonly status: number;

  constructor(kind: ErrorKind, status: number, message: string) {
    super(message);
    this.name = "PatientApiError";
    this.kind = kind;
    this.status = status;
  }
}

export class ValidationError extends PatientApiError {
  constructor(
    public readonly field: string,
    public readonly reason: string
  ) {
    super("validation", 400, `Invalid ${field}: ${reason}`);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends PatientApiError {
  constructor(public readonly patientId: PatientId) {
    super("not_found", 404, "Patient not found.");
    this.name = "NotFoundError";
  }
}

export class ConflictError extends PatientApiError {
  constructor(public readonly patientId: PatientId) {
    super("conflict", 400, "Patient with this ID already exists.");
    this.name = "ConflictError";
  }
}

export class InvalidArgumentError extends PatientApiError {
  constructor(message: string) {
    super("invalid_argument", 400, message);
    this.name = "InvalidArgumentError";
  }
}

export class StoreIoError extends PatientApiError {
  constructor(
    public readonly path: string,
    public readonly error: unknown
  ) {
    const reason = error instanceof Error ? error.message : String(error);
    super("store_io", 500, `Patient store I/O failed for ${path}: ${reason}`);
    this.name = "StoreIoError";
  }
}

export class StoreFormatError extends PatientApiError {
  constructor(
    public readonly path: string,
    reason: string
  ) {
    super("store_format", 500, `Patient store ${path} is malformed: ${reason}`);
    this.name = "StoreFormatError";
  }
}
