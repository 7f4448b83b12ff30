import fs from "node:fs/promises"
import path from "node:path"
import type { RawSource, ResourceLocator } from "../../ports/resource-locator"
import { FileSource, isNotFound } from "../file/file-source"

export type DirectoryResourceLocatorOptions = {
  /**
   * Directories searched for resources, in precedence order (lowest first).
   * Relative roots resolve against `cwd`.
   *
   * @default ["."]
   */
  roots?: readonly string[]

  /**
   * @default process.cwd()
   */
  cwd?: string
}

/**
 * Resolves logical names against an ordered list of resource roots.
 *
 * The same name may exist under several roots; every regular file found is
 * returned, in root order.
 */
export class DirectoryResourceLocator implements ResourceLocator {
  readonly name: string
  private readonly roots: readonly string[]

  constructor(opts: DirectoryResourceLocatorOptions = {}) {
    const cwd = opts.cwd ?? process.cwd()

    this.roots = (opts.roots ?? ["."]).map((root) => path.resolve(cwd, root))
    this.name = `directory:${this.roots.join(path.delimiter)}`
  }

  async locate(logicalName: string): Promise<RawSource[]> {
    const candidates = this.roots.map((root) => path.join(root, logicalName))
    const found = await Promise.all(candidates.map(isFile))

    return candidates.filter((_, i) => found[i]).map((file) => new FileSource(file))
  }
}

async function isFile(file: string): Promise<boolean> {
  try {
    const stat = await fs.stat(file)
    return stat.isFile()
  } catch (err) {
    if (isNotFound(err)) return false
    throw err
  }
}
