import { REGISTRY_FILE_ENV, bootstrapRegistry } from 'binpin'
import { formatError } from '../output.js'

export async function initCommand(_args: string[]): Promise<number> {
  try {
    const result = await bootstrapRegistry()
    switch (result.status) {
      case 'written':
        process.stdout.write(`Installed bundled checksum registry at ${result.path}\n`)
        break
      case 'exists':
        process.stdout.write(`Checksum registry already present at ${result.path}\n`)
        break
      case 'override':
        process.stdout.write(`${REGISTRY_FILE_ENV} is set (${result.path}); nothing to install\n`)
        break
    }
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
