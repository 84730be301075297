import { parseArgs } from 'node:util'
import {
  PLATFORM_KEYS,
  UnsupportedVersionError,
  currentPlatformKey,
  getExpectedDigest,
  isPlatformKey,
  loadOrBootstrapRegistry,
  normalizeVersion,
} from 'binpin'
import { formatError } from '../output.js'
import { registryOptions } from '../registry-options.js'

export async function digestCommand(args: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args,
    options: {
      platform: { type: 'string' },
      file: { type: 'string' },
    },
    allowPositionals: true,
    strict: true,
  })

  const version = positionals[0]
  if (version === undefined) {
    process.stderr.write('Error: a version is required\n')
    process.stderr.write('Usage: binpin digest <version> [--platform <key>] [--file <path>]\n')
    return 1
  }

  const platform = values.platform
  if (platform !== undefined && !isPlatformKey(platform)) {
    process.stderr.write(
      `Error: unknown platform key '${platform}' (expected one of ${PLATFORM_KEYS.join(', ')})\n`,
    )
    return 1
  }

  try {
    const { registry } = await loadOrBootstrapRegistry(registryOptions(values.file))
    const platformKey = platform ?? currentPlatformKey()
    const digest = getExpectedDigest(registry, version, platformKey)
    if (digest === undefined) {
      throw new UnsupportedVersionError(normalizeVersion(version), platformKey)
    }
    process.stdout.write(`${digest}\n`)
    return 0
  } catch (err) {
    process.stderr.write(`${formatError(err)}\n`)
    return 1
  }
}
