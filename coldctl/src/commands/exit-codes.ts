import { isArchiveError, type ArchiveErrorCode } from "../core/errors.js";

/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  OPERATION_FAILED: 1,
  INTEGRITY_FAILED: 2,
  INVALID_ARGS: 3,
  CONCURRENT_CONFLICT: 4,
  RESTORE_PENDING: 5,
  RESTORE_UNSUPPORTED: 6,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const BY_CODE: Record<ArchiveErrorCode, ExitCode> = {
  InvalidInputPath: EXIT.INVALID_ARGS,
  EmptyFileSet: EXIT.INVALID_ARGS,
  SizeLimitExceeded: EXIT.INVALID_ARGS,
  ManifestNotFound: EXIT.INVALID_ARGS,
  InvalidManifest: EXIT.INVALID_ARGS,
  InvalidConfig: EXIT.INVALID_ARGS,
  DuplicateArchiveExists: EXIT.CONCURRENT_CONFLICT,
  ObjectAlreadyExists: EXIT.CONCURRENT_CONFLICT,
  LockHeld: EXIT.CONCURRENT_CONFLICT,
  IntegrityMismatch: EXIT.INTEGRITY_FAILED,
  BackendUnavailable: EXIT.OPERATION_FAILED,
  TransferFailed: EXIT.OPERATION_FAILED,
  RestoreTimeout: EXIT.RESTORE_PENDING,
  RestoreUnsupported: EXIT.RESTORE_UNSUPPORTED,
};

export function exitCodeFor(error: unknown): ExitCode {
  return isArchiveError(error) ? BY_CODE[error.code] : EXIT.OPERATION_FAILED;
}
