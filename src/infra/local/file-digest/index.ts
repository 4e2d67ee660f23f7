import { createHash, getHashes } from 'crypto';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { ResultAsync as RA, errAsync } from 'neverthrow';
import type { ResultAsync } from 'neverthrow';
import type { FileDigestPort } from '../../../ports/file-digest.port.js';
import { DIGEST_CHUNK_BYTES } from '../../../ports/file-digest.port.js';
import type { DigestError } from '../../../errors/app-error.js';
import { Err } from '../../../errors/factories.js';
import { mapFsError } from '../../../ports/fs-error.js';

function hashFile(filePath: string, algorithm: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const hash = createHash(algorithm);
    const stream = createReadStream(filePath, { highWaterMark: DIGEST_CHUNK_BYTES });
    stream.on('data', (chunk: Buffer | string) => hash.update(chunk));
    stream.on('error', reject);
    stream.on('end', () => resolve(hash.digest('hex')));
  });
}

export class LocalFileDigest implements FileDigestPort {
  digest(filePath: string, algorithm: string): ResultAsync<string, DigestError> {
    const normalized = algorithm.toLowerCase();
    if (!getHashes().includes(normalized)) {
      return errAsync(Err.unsupportedDigestAlgorithm(algorithm));
    }
    return RA.fromPromise(hashFile(filePath, normalized), (e) => Err.digestFailed(filePath, mapFsError(e, filePath)));
  }
}

export function md5File(port: FileDigestPort, filePath: string): ResultAsync<string, DigestError> {
  return port.digest(filePath, 'md5');
}

export function fileSize(filePath: string): ResultAsync<number, DigestError> {
  return RA.fromPromise(stat(filePath), (e) => Err.digestFailed(filePath, mapFsError(e, filePath))).map((s) => s.size);
}
