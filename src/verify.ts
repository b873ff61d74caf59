import { fsa } from '@linzjs/s3fs';
import { IntegrityError } from './errors.js';
import { digestOf, hashFile, parseHash } from './hash.js';
import type { LogType } from './log.js';

export interface VerifyOptions {
  dependency: string;
  logger: LogType;
  /** Fail when no expected hash is declared instead of skipping verification */
  requireHash?: boolean;
}

export type VerifyResult = { verified: false } | { verified: true; hash: string };

/**
 * Check a downloaded archive against its expected hash.
 *
 * Without an expected hash the check is skipped, the archive is then trusted as downloaded.
 */
export async function verifyArchive(
  filePath: string,
  expectedHash: string | undefined,
  opts: VerifyOptions,
): Promise<VerifyResult> {
  if (expectedHash == null) {
    if (opts.requireHash) throw new IntegrityError(opts.dependency, 'No expected hash declared');
    opts.logger.warn({ path: filePath }, 'Verify:Skipped');
    return { verified: false };
  }

  const expected = parseHash(expectedHash);
  if (expected == null) {
    throw new IntegrityError(opts.dependency, `Unsupported hash format "${expectedHash}"`, {
      expected: expectedHash,
    });
  }

  const actual = await hashFile(fsa.readStream(filePath), expected.algorithm);
  if (!digestOf(actual).equals(expected.digest)) {
    throw new IntegrityError(opts.dependency, `Hash mismatch for ${filePath}`, { expected: expectedHash, actual });
  }

  opts.logger.info({ path: filePath, hash: actual }, 'Verify:Done');
  return { verified: true, hash: actual };
}
