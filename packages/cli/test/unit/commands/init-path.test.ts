import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import { BUNDLED_REGISTRY_YAML } from 'binpin'
import { TestRegistryDir } from '@binpin/test-helpers'
import { initCommand } from '../../../src/commands/init.js'
import { pathCommand } from '../../../src/commands/path.js'
import { captureOutput, disableTTY, useRegistryDir } from '../../helpers/io.js'
import type { CapturedOutput } from '../../helpers/io.js'

describe('initCommand', () => {
  let dir: TestRegistryDir
  let output: CapturedOutput

  beforeEach(async () => {
    dir = await TestRegistryDir.create()
    useRegistryDir(dir)
    output = captureOutput()
  })

  afterEach(async () => {
    await dir.cleanup()
  })

  it('installs the bundled registry', async () => {
    expect(await initCommand([])).toBe(0)
    expect(output.stdout).toBe(`Installed bundled checksum registry at ${dir.defaultPath}\n`)
    expect(await fs.readFile(dir.defaultPath, 'utf8')).toBe(BUNDLED_REGISTRY_YAML)
  })

  it('reports an existing registry on the second run', async () => {
    await initCommand([])
    output.stdout = ''
    expect(await initCommand([])).toBe(0)
    expect(output.stdout).toBe(`Checksum registry already present at ${dir.defaultPath}\n`)
  })

  it('does nothing when the override is set', async () => {
    const override = path.join(dir.root, 'custom.yaml')
    vi.stubEnv('BINPIN_REGISTRY_FILE', override)
    expect(await initCommand([])).toBe(0)
    expect(output.stdout).toBe(`BINPIN_REGISTRY_FILE is set (${override}); nothing to install\n`)
    await expect(fs.access(dir.defaultPath)).rejects.toThrow()
  })
})

describe('pathCommand', () => {
  let dir: TestRegistryDir
  let output: CapturedOutput
  let restoreTTY: () => void

  beforeEach(async () => {
    dir = await TestRegistryDir.create()
    useRegistryDir(dir)
    output = captureOutput()
    restoreTTY = disableTTY()
  })

  afterEach(async () => {
    restoreTTY()
    await dir.cleanup()
  })

  it('prints the default path', () => {
    expect(pathCommand([])).toBe(0)
    expect(output.stdout).toBe(`${dir.defaultPath} (default)\n`)
  })

  it('prints the override', () => {
    vi.stubEnv('BINPIN_REGISTRY_FILE', '/etc/binpin/registry.yaml')
    expect(pathCommand([])).toBe(0)
    expect(output.stdout).toBe('/etc/binpin/registry.yaml (from BINPIN_REGISTRY_FILE)\n')
  })
})
