import { parseArgs } from 'node:util'
import { loadOrBootstrapRegistry } from 'binpin'
import { formatError } from '../output.js'
import { registryOptions } from '../registry-options.js'

export async function validateCommand(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      file: { type: 'string' },
    },
    strict: true,
  })

  try {
    const { registry, path } = await loadOrBootstrapRegistry(registryOptions(values.file))
    const count = registry.versions.size
    process.stdout.write(`OK ${path} (${String(count)} version${count === 1 ? '' : 's'})\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
