/**
 * Registry decoding and validation.
 *
 * Validation is exhaustive: every broken rule in every version entry is
 * collected, and a single {@link RegistryValidationError} reports them all.
 *
 * @packageDocumentation
 */

import { RegistryValidationError } from '../errors.js'
import { PLATFORM_KEYS } from '../platform.js'
import { SCHEMA_VERSION } from './types.js'
import type { PlatformChecksums, Registry, RegistryViolation } from './types.js'

const SEMVER_LIKE = /^\d+\.\d+\.\d+$/
const HEX_SHA256 = /^[a-f0-9]{64}$/

/** Fields of a registry before any rule has been applied. */
interface RegistryCandidate {
  schemaVersion: unknown
  versions: unknown
}

/**
 * Strip surrounding whitespace and one leading `v`: `" v2.31.1"` → `"2.31.1"`.
 *
 * Every entry point (validation, lookup, extension) goes through this, so a
 * registry never holds two spellings of the same version.
 */
export function normalizeVersion(version: string): string {
  const trimmed = version.trim()
  return trimmed.startsWith('v') ? trimmed.slice(1) : trimmed
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeValue(value: unknown): string {
  return typeof value === 'number' ? String(value) : JSON.stringify(value)
}

function versionEntries(versions: unknown, violations: RegistryViolation[]): [string, unknown][] | null {
  if (versions instanceof Map) {
    const entries: [string, unknown][] = []
    for (const [key, value] of versions) {
      entries.push([String(key), value])
    }
    return entries
  }
  if (versions === undefined || versions === null) return []
  if (isObject(versions)) return Object.entries(versions)
  violations.push({
    code: 'invalid-document',
    message: 'versions must be a mapping of version to platform checksums',
  })
  return null
}

/**
 * Check one version entry, returning the populated checksums (or `null` when
 * the entry is unusable).
 */
function inspectEntry(
  key: string,
  value: unknown,
  violations: RegistryViolation[],
): PlatformChecksums | null {
  // a key with no body (`"9.9.9":`) parses to null
  const entry: unknown = value ?? {}
  if (!isObject(entry)) {
    violations.push({
      code: 'invalid-entry',
      message: `version ${key}: expected a mapping of platform checksums`,
      version: key,
    })
    return null
  }

  const checksums: PlatformChecksums = {}
  let populated = false
  let valid = true
  for (const platform of PLATFORM_KEYS) {
    const raw = entry[platform]
    if (raw === undefined || raw === null) continue
    if (typeof raw === 'string' && raw.trim() === '') continue
    populated = true
    if (typeof raw !== 'string' || !HEX_SHA256.test(raw)) {
      valid = false
      violations.push({
        code: 'invalid-checksum',
        message: `version ${key}: invalid ${platform} checksum (must be 64 hex chars)`,
        version: key,
        platform,
      })
      continue
    }
    checksums[platform] = raw
  }

  if (!populated) {
    violations.push({
      code: 'no-checksums',
      message: `version ${key}: no platform checksums provided`,
      version: key,
    })
    return null
  }
  return valid ? checksums : null
}

/**
 * Apply every registry rule to `candidate`, appending each failure to
 * `violations` and returning the entries keyed by normalized version.
 */
function inspect(
  candidate: RegistryCandidate,
  violations: RegistryViolation[],
): Map<string, PlatformChecksums> {
  const { schemaVersion } = candidate
  if (schemaVersion === undefined || schemaVersion === null) {
    violations.push({
      code: 'schema-version',
      message: `missing schema_version (expected ${String(SCHEMA_VERSION)})`,
    })
  } else if (schemaVersion !== SCHEMA_VERSION) {
    violations.push({
      code: 'schema-version',
      message: `unexpected schema_version=${describeValue(schemaVersion)} (expected ${String(SCHEMA_VERSION)})`,
    })
  }

  const versions = new Map<string, PlatformChecksums>()
  const entries = versionEntries(candidate.versions, violations)
  if (entries === null) return versions

  if (entries.length === 0) {
    violations.push({ code: 'empty-versions', message: 'versions map is empty' })
    return versions
  }

  // normalized version -> spelling first seen in the document
  const spellings = new Map<string, string>()
  for (const [key, value] of entries) {
    const normalized = normalizeVersion(key)
    const keyValid = SEMVER_LIKE.test(normalized)
    if (!keyValid) {
      violations.push({
        code: 'invalid-version-key',
        message: `invalid version key '${key}' (expected semantic version like 2.31.1)`,
        version: key,
      })
    }

    const checksums = inspectEntry(key, value, violations)

    if (!keyValid) continue
    const previous = spellings.get(normalized)
    if (previous !== undefined) {
      violations.push({
        code: 'duplicate-version-key',
        message: `duplicate version key '${key}' (already defined as '${previous}')`,
        version: key,
      })
      continue
    }
    spellings.set(normalized, key)
    if (checksums !== null) {
      versions.set(normalized, checksums)
    }
  }
  return versions
}

/**
 * List every rule the in-memory `registry` breaks. An empty array means the
 * registry is valid.
 */
export function registryViolations(registry: Registry): RegistryViolation[] {
  const violations: RegistryViolation[] = []
  inspect(
    {
      schemaVersion: registry.schemaVersion,
      versions: registry.versions,
    },
    violations,
  )
  return violations
}

/**
 * Validate an in-memory registry.
 *
 * @throws {@link RegistryValidationError} listing every violation.
 */
export function validateRegistry(registry: Registry): void {
  const violations = registryViolations(registry)
  if (violations.length > 0) {
    throw new RegistryValidationError(violations)
  }
}

/**
 * Turn a parsed YAML document into a validated {@link Registry}.
 *
 * @remarks
 * Document keys are snake_case (`schema_version`, `generated_at`,
 * `versions`); unrecognised keys are ignored. An empty document is treated
 * as an empty mapping. Version keys are stored normalized.
 *
 * @param document - The value produced by the YAML parser.
 * @param path - Source file, recorded on the error for diagnostics.
 * @throws {@link RegistryValidationError} listing every violation.
 */
export function decodeRegistry(document: unknown, path?: string): Registry {
  const source = document ?? {}
  if (!isObject(source)) {
    throw new RegistryValidationError(
      [{ code: 'invalid-document', message: 'registry document must be a mapping' }],
      path,
    )
  }

  const violations: RegistryViolation[] = []
  const versions = inspect(
    {
      schemaVersion: source.schema_version,
      versions: source.versions,
    },
    violations,
  )
  if (violations.length > 0) {
    throw new RegistryValidationError(violations, path)
  }

  const registry: Registry = { schemaVersion: SCHEMA_VERSION, versions }
  if (typeof source.generated_at === 'string') {
    registry.generatedAt = source.generated_at
  }
  return registry
}
