/**
 * Registry document fixtures.
 */

import * as crypto from 'node:crypto'
import type { PlatformChecksums } from 'binpin'

/**
 * A well-formed, deterministic SHA-256 digest derived from `seed`. Not the
 * digest of any real binary.
 * @public
 */
export function fakeDigest(seed: string): string {
  return crypto.createHash('sha256').update(seed).digest('hex')
}

/**
 * Options for {@link registryYaml}.
 * @public
 */
export interface RegistryYamlOptions {
  /** Written as `schema_version`. Defaults to 1. */
  schemaVersion?: number | undefined
  /** Written as `generated_at` when given. */
  generatedAt?: string | undefined
}

/**
 * Render a registry document in the on-disk layout, quoting every version
 * key and digest exactly as given (nothing is validated or normalized).
 *
 * @example
 * ```ts
 * registryYaml({ '2.31.1': { linux_amd64: fakeDigest('a') } })
 * ```
 * @public
 */
export function registryYaml(
  versions: Record<string, PlatformChecksums>,
  options?: RegistryYamlOptions,
): string {
  const lines = [`schema_version: ${String(options?.schemaVersion ?? 1)}`]
  if (options?.generatedAt !== undefined) {
    lines.push(`generated_at: "${options.generatedAt}"`)
  }
  const entries = Object.entries(versions)
  if (entries.length === 0) {
    lines.push('versions: {}')
    return lines.join('\n') + '\n'
  }
  lines.push('versions:')
  for (const [version, checksums] of entries) {
    const platforms = Object.entries(checksums)
    if (platforms.length === 0) {
      lines.push(`  "${version}": {}`)
      continue
    }
    lines.push(`  "${version}":`)
    for (const [platform, digest] of platforms) {
      lines.push(`    ${platform}: "${digest}"`)
    }
  }
  return lines.join('\n') + '\n'
}
