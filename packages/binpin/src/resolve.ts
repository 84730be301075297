/**
 * Top-level digest resolution for the current host.
 *
 * @packageDocumentation
 */

import { UnsupportedVersionError } from './errors.js'
import { currentPlatformKey } from './platform.js'
import { getExpectedDigest } from './registry/lookup.js'
import { normalizeVersion } from './registry/schema.js'
import { loadOrBootstrapRegistry } from './registry/store.js'
import type { RegistryLocationOptions } from './config.js'
import type { HostPlatform, PlatformKey } from './platform.js'

/**
 * Options for {@link expectedDigestForCurrentPlatform}.
 * @public
 */
export interface ResolveDigestOptions extends RegistryLocationOptions {
  /** Host to resolve for. Defaults to the running process. */
  host?: HostPlatform | undefined
}

/**
 * A resolved expected digest and what it was resolved against.
 * @public
 */
export interface ResolvedDigest {
  /** Normalized version. */
  version: string
  platformKey: PlatformKey
  digest: string
  /** Registry file the digest came from. */
  registryPath: string
}

/**
 * Resolve the expected digest for `version` with full provenance.
 *
 * Locates the registry (bootstrapping the bundled one when the default
 * location is empty), loads and validates it, derives the platform key and
 * looks the digest up. Any failure stops the sequence with its own error.
 *
 * @throws {@link UnsupportedPlatformError} when the host is outside the matrix.
 * @throws {@link UnsupportedVersionError} when the registry has no digest for
 * the version on this platform.
 */
export async function resolveExpectedDigest(
  version: string,
  options?: ResolveDigestOptions,
): Promise<ResolvedDigest> {
  const { registry, path } = await loadOrBootstrapRegistry(options)
  const platformKey = currentPlatformKey(options?.host)
  const normalized = normalizeVersion(version)
  const digest = getExpectedDigest(registry, normalized, platformKey)
  if (digest === undefined) {
    throw new UnsupportedVersionError(normalized, platformKey)
  }
  return { version: normalized, platformKey, digest, registryPath: path }
}

/**
 * Expected SHA-256 digest of the CLI binary for `version` on this host.
 *
 * @example
 * ```ts
 * const sha = await expectedDigestForCurrentPlatform('v2.31.1')
 * ```
 */
export async function expectedDigestForCurrentPlatform(
  version: string,
  options?: ResolveDigestOptions,
): Promise<string> {
  const { digest } = await resolveExpectedDigest(version, options)
  return digest
}
