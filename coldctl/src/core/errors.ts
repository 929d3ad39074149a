export type ArchiveErrorCode =
  | "InvalidInputPath"
  | "EmptyFileSet"
  | "SizeLimitExceeded"
  | "DuplicateArchiveExists"
  | "IntegrityMismatch"
  | "BackendUnavailable"
  | "ObjectAlreadyExists"
  | "TransferFailed"
  | "RestoreUnsupported"
  | "RestoreTimeout"
  | "ManifestNotFound"
  | "InvalidManifest"
  | "InvalidConfig"
  | "LockHeld";

/** When an integrity mismatch was detected. */
export type IntegrityPhase = "BuildTime" | "TransferTime" | "RestoreTime";

/**
 * Error raised by archive and restore operations.
 * `subject` names the offending path, archive id or remote locator.
 */
export class ArchiveError extends Error {
  readonly code: ArchiveErrorCode;
  readonly subject: string | null;
  readonly phase: IntegrityPhase | null;

  constructor(
    code: ArchiveErrorCode,
    message: string,
    opts: { subject?: string; phase?: IntegrityPhase; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "ArchiveError";
    this.code = code;
    this.subject = opts.subject ?? null;
    this.phase = opts.phase ?? null;
  }

  /** Only a restore that is still pending is worth trying again later. */
  get retryable(): boolean {
    return this.code === "RestoreTimeout";
  }
}

export function isArchiveError(e: unknown, code?: ArchiveErrorCode): e is ArchiveError {
  return e instanceof ArchiveError && (code === undefined || e.code === code);
}

export function integrityMismatch(phase: IntegrityPhase, message: string, subject: string): ArchiveError {
  return new ArchiveError("IntegrityMismatch", message, { phase, subject });
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
