import { parseArgs } from 'node:util'
import { PLATFORM_KEYS, loadOrBootstrapRegistry } from 'binpin'
import { bold, formatError } from '../output.js'
import { registryOptions } from '../registry-options.js'

export async function listCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      file: { type: 'string' },
    },
    strict: true,
  })

  try {
    const { registry } = await loadOrBootstrapRegistry(registryOptions(values.file))
    const versions = [...registry.versions.keys()].sort((a, b) =>
      a.localeCompare(b, 'en', { numeric: true }),
    )
    for (const version of versions) {
      const checksums = registry.versions.get(version) ?? {}
      const platforms = PLATFORM_KEYS.filter((key) => checksums[key] !== undefined)
      process.stdout.write(`${bold(version)}  ${platforms.join(', ')}\n`)
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
