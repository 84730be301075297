import { parseArgs } from 'node:util'
import { extendRegistry, loadOrBootstrapRegistry, serializeRegistry } from 'binpin'
import type { PlatformChecksums } from 'binpin'
import { formatError } from '../output.js'
import { registryOptions } from '../registry-options.js'

/**
 * Validate a new version entry against the loaded registry and print the
 * extended document. The registry file itself is left untouched; redirect
 * the output to persist it.
 */
export async function addCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      file: { type: 'string' },
      linux_amd64: { type: 'string' },
      linux_arm64: { type: 'string' },
      darwin_amd64: { type: 'string' },
      darwin_arm64: { type: 'string' },
      windows_amd64: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  })

  const version = positionals[0]
  if (version === undefined) {
    process.stderr.write('Error: a version is required\n')
    process.stderr.write(
      'Usage: binpin add <version> --<platform_key> <sha256>... [--file <path>]\n',
    )
    return 1
  }

  const checksums: PlatformChecksums = {}
  if (values.linux_amd64 !== undefined) checksums.linux_amd64 = values.linux_amd64
  if (values.linux_arm64 !== undefined) checksums.linux_arm64 = values.linux_arm64
  if (values.darwin_amd64 !== undefined) checksums.darwin_amd64 = values.darwin_amd64
  if (values.darwin_arm64 !== undefined) checksums.darwin_arm64 = values.darwin_arm64
  if (values.windows_amd64 !== undefined) checksums.windows_amd64 = values.windows_amd64

  try {
    const { registry } = await loadOrBootstrapRegistry(registryOptions(values.file))
    extendRegistry(registry, version, checksums)
    process.stdout.write(serializeRegistry(registry))
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
