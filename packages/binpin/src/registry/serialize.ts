/**
 * Render a registry back to its YAML document form.
 */

import { stringify } from 'yaml'
import { PLATFORM_KEYS } from '../platform.js'
import type { Registry } from './types.js'

function compareVersions(a: string, b: string): number {
  const left = a.split('.').map(Number)
  const right = b.split('.').map(Number)
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0)
    if (diff !== 0) return diff
  }
  return 0
}

/**
 * Serialize `registry` as a YAML document that {@link loadRegistry} accepts.
 *
 * Versions are written in ascending semantic order, platforms in
 * {@link PLATFORM_KEYS} order, digests double-quoted.
 */
export function serializeRegistry(registry: Registry): string {
  const versions: Record<string, Record<string, string>> = {}
  for (const version of [...registry.versions.keys()].sort(compareVersions)) {
    const checksums = registry.versions.get(version) ?? {}
    const entry: Record<string, string> = {}
    for (const platform of PLATFORM_KEYS) {
      const digest = checksums[platform]
      if (digest !== undefined) {
        entry[platform] = digest
      }
    }
    versions[version] = entry
  }

  const document: Record<string, unknown> = { schema_version: registry.schemaVersion }
  if (registry.generatedAt !== undefined) {
    document.generated_at = registry.generatedAt
  }
  document.versions = versions

  return stringify(document, { defaultStringType: 'QUOTE_DOUBLE', defaultKeyType: 'PLAIN' })
}
