/**
 * Isolated registry locations for consumer tests.
 */

import * as fs from 'node:fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { REGISTRY_FILE_ENV, getDefaultRegistryPath } from 'binpin'
import type { HostPlatform, ResolveDigestOptions } from 'binpin'

/**
 * Options for creating a {@link TestRegistryDir}.
 * @public
 */
export interface TestRegistryDirOptions {
  /** Host the returned options resolve for. Defaults to linux/amd64. */
  host?: HostPlatform | undefined
}

/**
 * A throwaway config root for exercising registry resolution and bootstrap.
 *
 * @remarks
 * The directory stands in for both `$XDG_CONFIG_HOME` and the home
 * directory, so nothing outside it is ever read or written. {@link options}
 * is ready to pass to any binpin operation that locates the registry.
 *
 * @example
 * ```ts
 * const dir = await TestRegistryDir.create()
 * try {
 *   const digest = await expectedDigestForCurrentPlatform('2.31.1', dir.options)
 * } finally {
 *   await dir.cleanup()
 * }
 * ```
 *
 * @public
 */
export class TestRegistryDir {
  /** Root of the temporary directory. */
  readonly root: string

  /** Location options pointing binpin at {@link root}. */
  readonly options: ResolveDigestOptions

  private constructor(root: string, host: HostPlatform) {
    this.root = root
    this.options = {
      env: { XDG_CONFIG_HOME: path.join(root, 'config') },
      platform: 'linux',
      homedir: root,
      host,
    }
  }

  /**
   * Create a fresh, empty config root.
   * @public
   */
  static async create(options?: TestRegistryDirOptions): Promise<TestRegistryDir> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'binpin-test-'))
    return new TestRegistryDir(root, options?.host ?? { os: 'linux', arch: 'amd64' })
  }

  /** Where bootstrap installs the bundled registry for {@link options}. */
  get defaultPath(): string {
    return getDefaultRegistryPath(this.options)
  }

  /**
   * Write `text` to the default registry path, creating directories.
   * @public
   */
  async writeDefault(text: string): Promise<string> {
    const target = this.defaultPath
    await fs.mkdir(path.dirname(target), { recursive: true })
    await fs.writeFile(target, text, 'utf8')
    return target
  }

  /**
   * Write `text` to `fileName` under {@link root} and return options that name
   * it through the override variable.
   * @public
   */
  async writeOverride(fileName: string, text: string): Promise<ResolveDigestOptions> {
    const target = path.join(this.root, fileName)
    await fs.writeFile(target, text, 'utf8')
    return this.withOverride(target)
  }

  /**
   * Options naming `filePath` through the override variable, without writing it.
   * @public
   */
  withOverride(filePath: string): ResolveDigestOptions {
    return { ...this.options, env: { ...this.options.env, [REGISTRY_FILE_ENV]: filePath } }
  }

  /**
   * Remove the directory and everything in it.
   * @public
   */
  async cleanup(): Promise<void> {
    await fs.rm(this.root, { recursive: true, force: true })
  }
}
