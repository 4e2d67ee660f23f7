import { errAsync, okAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { CreateTempFileRequest, TempFilePort } from '../../src/ports/temp-file.port.js';
import type { FsError } from '../../src/ports/fs-error.js';

/**
 * In-memory TempFilePort. Names are `<prefix><n><suffix>` with n = 1, 2, ...
 */
export class InMemoryTempFiles implements TempFilePort {
  readonly files = new Map<string, string>();
  private counter = 0;
  private failure: FsError | null = null;

  /** Make every following call fail with `error`. */
  failWith(error: FsError): void {
    this.failure = error;
  }

  createTempFile(request: CreateTempFileRequest): ResultAsync<string, FsError> {
    if (this.failure) return errAsync(this.failure);

    this.counter++;
    const filePath = `${request.prefix}${this.counter}${request.suffix}`;
    this.files.set(filePath, request.contents);
    return okAsync(filePath);
  }
}
