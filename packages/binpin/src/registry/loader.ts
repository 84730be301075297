/**
 * Read, parse and validate a registry document.
 */

import * as fs from 'node:fs/promises'
import { parse } from 'yaml'
import { RegistryParseError, RegistryReadError } from '../errors.js'
import { decodeRegistry } from './schema.js'
import type { Registry } from './types.js'

/**
 * Parse registry YAML and validate it.
 *
 * @param text - The document text.
 * @param source - Where the text came from; carried on any error.
 * @throws {@link RegistryParseError} for malformed YAML (duplicate keys included).
 * @throws {@link RegistryValidationError} when any rule is broken.
 */
export function parseRegistry(text: string, source: string): Registry {
  let document: unknown
  try {
    document = parse(text, { logLevel: 'error' })
  } catch (err) {
    throw new RegistryParseError(source, err)
  }
  return decodeRegistry(document, source)
}

/**
 * Load the registry at `filePath`. Nothing partial is ever returned: the
 * result is a fully validated registry or an error.
 *
 * @throws {@link RegistryReadError} when the file cannot be read.
 */
export async function loadRegistry(filePath: string): Promise<Registry> {
  let text: string
  try {
    text = await fs.readFile(filePath, 'utf8')
  } catch (err) {
    throw new RegistryReadError(filePath, err)
  }
  return parseRegistry(text, filePath)
}
