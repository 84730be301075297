/**
 * Digest lookup and in-memory extension of a loaded registry.
 */

import { PLATFORM_KEYS } from '../platform.js'
import { normalizeVersion, validateRegistry } from './schema.js'
import type { PlatformKey } from '../platform.js'
import type { PlatformChecksums, Registry } from './types.js'

/**
 * Return the expected digest for `version` on `platformKey`, or `undefined`
 * when the registry has no entry for the version or no digest for that
 * platform.
 *
 * `2.31.1` and `v2.31.1` resolve identically.
 */
export function getExpectedDigest(
  registry: Registry,
  version: string,
  platformKey: PlatformKey,
): string | undefined {
  const entry = registry.versions.get(normalizeVersion(version))
  const digest = entry?.[platformKey]
  if (digest === undefined || digest.trim() === '') return undefined
  return digest
}

/**
 * Add (or replace) the checksums for `version` in a loaded registry.
 *
 * @remarks
 * The new entry is validated on its own, in a single-entry scratch registry
 * held to the same rules as a full document. Only when that passes is it
 * merged into `registry.versions`, under the normalized version. On failure
 * `registry` is left untouched. Nothing is written to disk.
 *
 * @throws {@link RegistryValidationError} when the entry is invalid.
 */
export function extendRegistry(
  registry: Registry,
  version: string,
  checksums: PlatformChecksums,
): void {
  const normalized = normalizeVersion(version)
  const scratch: Registry = {
    schemaVersion: registry.schemaVersion,
    versions: new Map([[normalized, checksums]]),
  }
  validateRegistry(scratch)

  const stored: PlatformChecksums = {}
  for (const platform of PLATFORM_KEYS) {
    const digest = checksums[platform]
    if (digest !== undefined && digest.trim() !== '') {
      stored[platform] = digest
    }
  }
  registry.versions.set(normalized, stored)
}
