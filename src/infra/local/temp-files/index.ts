import * as fs from 'fs/promises';
import { randomBytes } from 'crypto';
import { ResultAsync as RA } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { CreateTempFileRequest, TempFilePort } from '../../../ports/temp-file.port.js';
import type { FsError } from '../../../ports/fs-error.js';
import { isAlreadyExists, mapFsError } from '../../../ports/fs-error.js';

const MAX_NAME_ATTEMPTS = 100;

export function randomTempName(): string {
  return randomBytes(6).toString('hex');
}

/**
 * Node adapter for TempFilePort.
 * Files are created with `wx` (fail if present) and mode 0600, and are never cleaned up here.
 */
export class NodeTempFiles implements TempFilePort {
  constructor(private readonly nextName: () => string = randomTempName) {}

  createTempFile(request: CreateTempFileRequest): ResultAsync<string, FsError> {
    return RA.fromPromise(this.createExclusive(request), (e) => mapFsError(e, `${request.prefix}*${request.suffix}`));
  }

  private async createExclusive({ prefix, suffix, contents }: CreateTempFileRequest): Promise<string> {
    for (let attempt = 0; attempt < MAX_NAME_ATTEMPTS; attempt++) {
      const candidate = `${prefix}${this.nextName()}${suffix}`;
      try {
        await fs.writeFile(candidate, contents, { encoding: 'utf8', flag: 'wx', mode: 0o600 });
        return candidate;
      } catch (e) {
        if (!isAlreadyExists(e)) throw e;
      }
    }
    throw Object.assign(new Error(`No free temporary file name after ${MAX_NAME_ATTEMPTS} attempts`), {
      code: 'EEXIST',
    });
  }
}
