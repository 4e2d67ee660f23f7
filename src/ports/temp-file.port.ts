import type { ResultAsync } from 'neverthrow';
import type { FsError } from './fs-error.js';

export interface CreateTempFileRequest {
  /** Absolute path prefix; the file is `<prefix><random><suffix>`. */
  readonly prefix: string;
  readonly suffix: string;
  /** Written as UTF-8. */
  readonly contents: string;
}

/**
 * Port: uniquely named files that outlive the call that made them.
 *
 * Guarantees:
 * - the returned path did not exist before the call (exclusive create)
 * - the file is never removed by the port; the caller owns cleanup
 */
export interface TempFilePort {
  createTempFile(request: CreateTempFileRequest): ResultAsync<string, FsError>;
}
