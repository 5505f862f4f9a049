export type FailureKind = "manifest" | "network" | "io" | "naming_conflict" | "cancelled" | "archive_corruption";

export class ManifestError extends Error {
  readonly kind = "manifest" as const;

  constructor(message: string, public readonly manifestPath?: string) {
    super(manifestPath ? `${manifestPath}: ${message}` : message);
    this.name = "ManifestError";
  }
}

export class NetworkError extends Error {
  readonly kind = "network" as const;

  constructor(message: string, public readonly statusCode?: number, public cause?: unknown) {
    super(message);
    this.name = "NetworkError";
  }
}

export class IOError extends Error {
  readonly kind = "io" as const;

  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "IOError";
  }
}

export class NamingConflictError extends Error {
  readonly kind = "naming_conflict" as const;

  constructor(public readonly fileName: string, public readonly claimants: string[]) {
    super(`destination ${fileName} is claimed by ${claimants.join(", ")}`);
    this.name = "NamingConflictError";
  }
}

export class CancelledError extends Error {
  readonly kind = "cancelled" as const;

  constructor(message = "cancelled") {
    super(message);
    this.name = "CancelledError";
  }
}

export class ArchiveCorruptionError extends Error {
  readonly kind = "archive_corruption" as const;

  constructor(message: string, public cause?: unknown) {
    super(message);
    this.name = "ArchiveCorruptionError";
  }
}

export type ArchiverError =
  | ManifestError
  | NetworkError
  | IOError
  | NamingConflictError
  | CancelledError
  | ArchiveCorruptionError;

export function isArchiverError(error: unknown): error is ArchiverError {
  return (
    error instanceof ManifestError ||
    error instanceof NetworkError ||
    error instanceof IOError ||
    error instanceof NamingConflictError ||
    error instanceof CancelledError ||
    error instanceof ArchiveCorruptionError
  );
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps anything thrown inside a worker to a failure kind. Errors that are not
 * part of the taxonomy are filesystem or runtime failures and count as I/O.
 */
export function toFailure(error: unknown): { kind: FailureKind; message: string } {
  if (isArchiverError(error)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "io", message: errorMessage(error) };
}
