import { createHash } from 'crypto';
import { Readable } from 'stream';

export type HashAlgorithm = 'sha256' | 'sha512';
export const HashAlgorithms: HashAlgorithm[] = ['sha256', 'sha512'];

/** Byte length of each supported digest */
const DigestLength: Record<HashAlgorithm, number> = { sha256: 32, sha512: 64 };

export interface ParsedHash {
  algorithm: HashAlgorithm;
  digest: Buffer;
}

export async function hashFile(stream: Readable, algorithm: HashAlgorithm = 'sha256'): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash(algorithm);
    stream.on('data', (chunk) => hash.update(chunk));
    stream.on('end', () => resolve(`${algorithm}-${hash.digest('base64')}`));
    stream.on('error', (err) => reject(err));
  });
}

function isAlgorithm(x: string): x is HashAlgorithm {
  return x === 'sha256' || x === 'sha512';
}

/**
 * Parse an expected hash into its algorithm and raw digest
 *
 * Supports the formats published next to most release archives:
 * - `sha256-<base64>` subresource integrity style, as produced by {@link hashFile}
 * - `sha512:<hex>`
 * - bare hex, where the algorithm is inferred from the digest length
 *
 * @returns null if the hash is not in a known format
 */
export function parseHash(input: string): ParsedHash | null {
  const hash = input.trim();

  const sri = /^(sha256|sha512)-([A-Za-z0-9+/]+={0,2})$/.exec(hash);
  if (sri) return checkLength(sri[1], Buffer.from(sri[2], 'base64'));

  const prefixed = /^(sha256|sha512):([0-9a-fA-F]+)$/.exec(hash);
  if (prefixed) return checkLength(prefixed[1], Buffer.from(prefixed[2], 'hex'));

  if (/^[0-9a-fA-F]+$/.test(hash)) {
    if (hash.length === 64) return { algorithm: 'sha256', digest: Buffer.from(hash, 'hex') };
    if (hash.length === 128) return { algorithm: 'sha512', digest: Buffer.from(hash, 'hex') };
  }
  return null;
}

function checkLength(algorithm: string, digest: Buffer): ParsedHash | null {
  if (!isAlgorithm(algorithm)) return null;
  if (digest.length !== DigestLength[algorithm]) return null;
  return { algorithm, digest };
}

/** Convert a `sha256-<base64>` hash back into its raw digest */
export function digestOf(hash: string): Buffer {
  return Buffer.from(hash.slice(hash.indexOf('-') + 1), 'base64');
}
