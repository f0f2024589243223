export enum ErrorCode {
  ENUMERATION = "ENUMERATION",
  FINGERPRINT = "FINGERPRINT",
  PROVIDER = "PROVIDER",
  STORE = "STORE",
  CONFIG = "CONFIG",
  METADATA_PERSIST = "METADATA_PERSIST",
  PROJECT_NOT_FOUND = "PROJECT_NOT_FOUND",
  FILE_NOT_FOUND = "FILE_NOT_FOUND"
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export class VecsyncError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "VecsyncError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** An unreadable path met while walking a project; the walk continues. */
export class EnumerationError extends VecsyncError {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    super(ErrorCode.ENUMERATION, `Cannot read ${path}: ${formatErrorMessage(cause)}`, cause);
    this.name = "EnumerationError";
  }
}

export class FingerprintError extends VecsyncError {
  constructor(
    public readonly path: string,
    cause?: unknown
  ) {
    super(ErrorCode.FINGERPRINT, `Cannot fingerprint ${path}: ${formatErrorMessage(cause)}`, cause);
    this.name = "FingerprintError";
  }
}

export class ProviderError extends VecsyncError {
  public readonly retryable: boolean;

  constructor(message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(ErrorCode.PROVIDER, message, options?.cause);
    this.name = "ProviderError";
    this.retryable = options?.retryable ?? true;
  }
}

export class StoreError extends VecsyncError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORE, cause === undefined ? message : `${message}: ${formatErrorMessage(cause)}`, cause);
    this.name = "StoreError";
  }
}

export class ConfigError extends VecsyncError {
  constructor(message: string) {
    super(ErrorCode.CONFIG, message);
    this.name = "ConfigError";
  }
}

export class MetadataPersistError extends VecsyncError {
  constructor(
    public readonly projectId: string,
    cause?: unknown
  ) {
    super(
      ErrorCode.METADATA_PERSIST,
      `Failed to persist metadata for ${projectId}: ${formatErrorMessage(cause)}`,
      cause
    );
    this.name = "MetadataPersistError";
  }
}

export class ProjectNotFoundError extends VecsyncError {
  constructor(ref: string) {
    super(ErrorCode.PROJECT_NOT_FOUND, `Project not registered: ${ref}`);
    this.name = "ProjectNotFoundError";
  }
}

export class FileNotFoundError extends VecsyncError {
  constructor(public readonly path: string) {
    super(ErrorCode.FILE_NOT_FOUND, `File not found: ${path}`);
    this.name = "FileNotFoundError";
  }
}
