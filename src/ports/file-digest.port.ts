import type { ResultAsync } from 'neverthrow';
import type { DigestError } from '../errors/app-error.js';

/** Bytes read per chunk when hashing a file (256 KiB). */
export const DIGEST_CHUNK_BYTES = 262_144;

/**
 * Port: checksum of a file's contents.
 *
 * `algorithm` is any name the platform hash implementation knows
 * (`md5`, `sha1`, `sha256`, ...). Result is lower-case hex.
 */
export interface FileDigestPort {
  digest(filePath: string, algorithm: string): ResultAsync<string, DigestError>;
}
