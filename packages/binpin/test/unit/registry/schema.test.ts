import { describe, it, expect } from 'vitest'
import {
  decodeRegistry,
  normalizeVersion,
  registryViolations,
  validateRegistry,
} from '../../../src/registry/schema.js'
import { RegistryValidationError } from '../../../src/errors.js'
import type { Registry } from '../../../src/registry/types.js'
import { digest } from '../../helpers/registry.js'

const A = digest('a')
const B = digest('b')

/** Run `fn` and return the validation error it throws. */
function validationError(fn: () => unknown): RegistryValidationError {
  try {
    fn()
  } catch (err) {
    if (err instanceof RegistryValidationError) return err
    throw err
  }
  throw new Error('expected RegistryValidationError')
}

// ---------------------------------------------------------------------------
// normalizeVersion
// ---------------------------------------------------------------------------

describe('normalizeVersion', () => {
  it('strips one leading v', () => {
    expect(normalizeVersion('v2.31.1')).toBe('2.31.1')
    expect(normalizeVersion('vv2.31.1')).toBe('v2.31.1')
  })

  it('leaves an unprefixed version alone', () => {
    expect(normalizeVersion('2.31.1')).toBe('2.31.1')
  })

  it('trims surrounding whitespace first', () => {
    expect(normalizeVersion('  v2.31.1 ')).toBe('2.31.1')
  })
})

// ---------------------------------------------------------------------------
// decodeRegistry
// ---------------------------------------------------------------------------

describe('decodeRegistry', () => {
  it('decodes a valid document', () => {
    const registry = decodeRegistry({
      schema_version: 1,
      generated_at: '2025-07-28T00:00:00Z',
      versions: { '2.31.1': { linux_amd64: A, darwin_arm64: B } },
    })
    expect(registry.schemaVersion).toBe(1)
    expect(registry.generatedAt).toBe('2025-07-28T00:00:00Z')
    expect(registry.versions.get('2.31.1')).toEqual({ linux_amd64: A, darwin_arm64: B })
  })

  it('stores version keys normalized', () => {
    const registry = decodeRegistry({ schema_version: 1, versions: { 'v3.0.0': { linux_amd64: A } } })
    expect([...registry.versions.keys()]).toEqual(['3.0.0'])
  })

  it('ignores unrecognised keys', () => {
    const registry = decodeRegistry({
      schema_version: 1,
      maintainer: 'someone',
      versions: { '1.0.0': { linux_amd64: A, freebsd_amd64: 'not-a-digest' } },
    })
    expect(registry.versions.get('1.0.0')).toEqual({ linux_amd64: A })
  })

  it('ignores a non-string generated_at', () => {
    const registry = decodeRegistry({ schema_version: 1, generated_at: 7, versions: { '1.0.0': { linux_amd64: A } } })
    expect(registry.generatedAt).toBeUndefined()
  })

  it('treats blank checksum fields as absent', () => {
    const registry = decodeRegistry({
      schema_version: 1,
      versions: { '1.0.0': { linux_amd64: A, linux_arm64: '   ', darwin_amd64: null } },
    })
    expect(registry.versions.get('1.0.0')).toEqual({ linux_amd64: A })
  })

  it('rejects an unexpected schema_version', () => {
    const err = validationError(() =>
      decodeRegistry({ schema_version: 2, versions: { '1.0.0': { linux_amd64: A } } }),
    )
    expect(err.violations).toEqual([
      { code: 'schema-version', message: 'unexpected schema_version=2 (expected 1)' },
    ])
    expect(err.message).toBe('schema validation failed: unexpected schema_version=2 (expected 1)')
  })

  it('quotes a string schema_version in the message', () => {
    const err = validationError(() =>
      decodeRegistry({ schema_version: '1', versions: { '1.0.0': { linux_amd64: A } } }),
    )
    expect(err.violations[0]?.message).toBe('unexpected schema_version="1" (expected 1)')
  })

  it('reports a missing schema_version', () => {
    const err = validationError(() => decodeRegistry({ versions: { '1.0.0': { linux_amd64: A } } }))
    expect(err.violations[0]?.message).toBe('missing schema_version (expected 1)')
  })

  it('rejects an empty versions map', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1, versions: {} }))
    expect(err.violations).toEqual([{ code: 'empty-versions', message: 'versions map is empty' }])
  })

  it('treats missing versions as empty', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1 }))
    expect(err.violations.map((v) => v.code)).toEqual(['empty-versions'])
  })

  it('rejects versions that is not a mapping', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1, versions: ['2.31.1'] }))
    expect(err.violations).toEqual([
      {
        code: 'invalid-document',
        message: 'versions must be a mapping of version to platform checksums',
      },
    ])
  })

  it('rejects a version key without a patch component', () => {
    const err = validationError(() =>
      decodeRegistry({ schema_version: 1, versions: { '2.31': { linux_amd64: A } } }),
    )
    expect(err.violations).toEqual([
      {
        code: 'invalid-version-key',
        message: "invalid version key '2.31' (expected semantic version like 2.31.1)",
        version: '2.31',
      },
    ])
  })

  it('rejects an entry with no checksums', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1, versions: { '9.9.9': {} } }))
    expect(err.violations).toEqual([
      { code: 'no-checksums', message: 'version 9.9.9: no platform checksums provided', version: '9.9.9' },
    ])
  })

  it('rejects an entry whose only checksums are blank', () => {
    const err = validationError(() =>
      decodeRegistry({ schema_version: 1, versions: { '9.9.9': { linux_amd64: ' ' } } }),
    )
    expect(err.violations.map((v) => v.code)).toEqual(['no-checksums'])
  })

  it('rejects malformed checksums', () => {
    const err = validationError(() =>
      decodeRegistry({
        schema_version: 1,
        versions: { '1.0.0': { linux_amd64: A.toUpperCase(), windows_amd64: 12345 } },
      }),
    )
    expect(err.violations).toEqual([
      {
        code: 'invalid-checksum',
        message: 'version 1.0.0: invalid linux_amd64 checksum (must be 64 hex chars)',
        version: '1.0.0',
        platform: 'linux_amd64',
      },
      {
        code: 'invalid-checksum',
        message: 'version 1.0.0: invalid windows_amd64 checksum (must be 64 hex chars)',
        version: '1.0.0',
        platform: 'windows_amd64',
      },
    ])
  })

  it('rejects an entry that is not a mapping', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1, versions: { '1.0.0': A } }))
    expect(err.violations).toEqual([
      {
        code: 'invalid-entry',
        message: 'version 1.0.0: expected a mapping of platform checksums',
        version: '1.0.0',
      },
    ])
  })

  it('treats an entry with no body as having no checksums', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 1, versions: { '1.0.0': null } }))
    expect(err.violations).toEqual([
      {
        code: 'no-checksums',
        message: 'version 1.0.0: no platform checksums provided',
        version: '1.0.0',
      },
    ])
  })

  it('rejects two spellings of the same version', () => {
    const err = validationError(() =>
      decodeRegistry({
        schema_version: 1,
        versions: { '2.31.1': { linux_amd64: A }, 'v2.31.1': { linux_amd64: B } },
      }),
    )
    expect(err.violations).toEqual([
      {
        code: 'duplicate-version-key',
        message: "duplicate version key 'v2.31.1' (already defined as '2.31.1')",
        version: 'v2.31.1',
      },
    ])
  })

  it('lists every violation in one error', () => {
    const err = validationError(() =>
      decodeRegistry({
        schema_version: 2,
        versions: {
          '2.31': { linux_amd64: A },
          '9.9.9': {},
          '1.0.0': { linux_amd64: 'xyz', darwin_arm64: B.toUpperCase() },
        },
      }),
    )
    const messages = [
      'unexpected schema_version=2 (expected 1)',
      "invalid version key '2.31' (expected semantic version like 2.31.1)",
      'version 9.9.9: no platform checksums provided',
      'version 1.0.0: invalid linux_amd64 checksum (must be 64 hex chars)',
      'version 1.0.0: invalid darwin_arm64 checksum (must be 64 hex chars)',
    ]
    expect(err.violations.map((v) => v.message)).toEqual(messages)
    expect(err.message).toBe(`schema validation failed: ${messages.join('; ')}`)
  })

  it('treats an empty document as an empty mapping', () => {
    const err = validationError(() => decodeRegistry(null))
    expect(err.violations.map((v) => v.message)).toEqual([
      'missing schema_version (expected 1)',
      'versions map is empty',
    ])
  })

  it('rejects a document that is not a mapping', () => {
    const err = validationError(() => decodeRegistry(['schema_version', 1], '/tmp/registry.yaml'))
    expect(err.violations).toEqual([
      { code: 'invalid-document', message: 'registry document must be a mapping' },
    ])
    expect(err.path).toBe('/tmp/registry.yaml')
  })

  it('records the source path on the error', () => {
    const err = validationError(() => decodeRegistry({ schema_version: 3, versions: {} }, '/etc/reg.yaml'))
    expect(err.path).toBe('/etc/reg.yaml')
  })
})

// ---------------------------------------------------------------------------
// validateRegistry / registryViolations
// ---------------------------------------------------------------------------

describe('validateRegistry', () => {
  function registry(versions: Registry['versions']): Registry {
    return { schemaVersion: 1, versions }
  }

  it('accepts a valid in-memory registry', () => {
    const valid = registry(new Map([['2.31.1', { linux_amd64: A }]]))
    expect(registryViolations(valid)).toEqual([])
    expect(() => {
      validateRegistry(valid)
    }).not.toThrow()
  })

  it('applies the same rules as document decoding', () => {
    const invalid = registry(new Map([['2.31', { linux_amd64: 'nope' }]]))
    expect(registryViolations(invalid).map((v) => v.code)).toEqual([
      'invalid-version-key',
      'invalid-checksum',
    ])
    expect(() => {
      validateRegistry(invalid)
    }).toThrow(RegistryValidationError)
  })

  it('rejects an empty registry', () => {
    expect(registryViolations(registry(new Map()))).toEqual([
      { code: 'empty-versions', message: 'versions map is empty' },
    ])
  })
})
