/**
 * Check a downloaded binary against the registry before it is run.
 */

import * as crypto from 'node:crypto'
import * as fs from 'node:fs'
import { DigestMismatchError } from './errors.js'
import { resolveExpectedDigest } from './resolve.js'
import type { ResolveDigestOptions, ResolvedDigest } from './resolve.js'

/**
 * Compute the SHA-256 digest of the file at `filePath`, streaming it from disk.
 *
 * @returns Lowercase hex-encoded digest.
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256')
  const chunks: AsyncIterable<unknown> = fs.createReadStream(filePath)
  for await (const chunk of chunks) {
    if (typeof chunk === 'string' || chunk instanceof Uint8Array) {
      hash.update(chunk)
    }
  }
  return hash.digest('hex')
}

/**
 * Hash `filePath` and compare it with the registry's digest for `version`
 * on this host.
 *
 * @throws {@link DigestMismatchError} when the digests differ.
 * @throws Any error of {@link resolveExpectedDigest}.
 */
export async function verifyBinary(
  filePath: string,
  version: string,
  options?: ResolveDigestOptions,
): Promise<ResolvedDigest> {
  const expected = await resolveExpectedDigest(version, options)
  const actual = await hashFile(filePath)
  if (actual !== expected.digest) {
    throw new DigestMismatchError(filePath, expected.digest, actual)
  }
  return expected
}
