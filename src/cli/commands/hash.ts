/**
 * Hash Command
 *
 * Prints a file's checksum, plus its size in human units.
 */

import type { ResultAsync } from 'neverthrow';
import type { CliResult } from '../types/cli-result.js';
import { failure, misuse, success } from '../types/cli-result.js';
import type { DigestError } from '../../errors/app-error.js';
import { formatAppError } from '../../errors/formatter.js';
import type { FileDigestPort } from '../../ports/file-digest.port.js';
import { humanBytes } from '../../utils/human-bytes.js';
import { formatKeyValue } from '../output-formatter.js';

export interface HashCommandDeps {
  readonly digest: FileDigestPort['digest'];
  readonly sizeOf: (filePath: string) => ResultAsync<number, DigestError>;
}

export interface HashCommandOptions {
  readonly algorithm?: string;
}

export const DEFAULT_HASH_ALGORITHM = 'md5';

export async function executeHashCommand(
  filePath: string,
  options: HashCommandOptions,
  deps: HashCommandDeps
): Promise<CliResult> {
  const algorithm = options.algorithm ?? DEFAULT_HASH_ALGORITHM;
  const result = await deps.digest(filePath, algorithm).andThen((hex) => deps.sizeOf(filePath).map((size) => ({ hex, size })));

  return result.match(
    ({ hex, size }) =>
      success({
        message: hex,
        details: [formatKeyValue('algorithm', algorithm.toLowerCase()), formatKeyValue('size', humanBytes(size))],
      }),
    (error) =>
      error._tag === 'UnsupportedDigestAlgorithm'
        ? misuse(error.message, ['Try md5, sha1 or sha256'])
        : failure(formatAppError(error))
  );
}
