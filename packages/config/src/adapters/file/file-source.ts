import fs from "node:fs/promises"
import type { RawSource } from "../../ports/resource-locator"

/**
 * A UTF-8 file on disk. `id` is the path it was created with.
 */
export class FileSource implements RawSource {
  constructor(readonly id: string) {}

  async read(): Promise<string> {
    return fs.readFile(this.id, "utf-8")
  }
}

/**
 * True for errors meaning "nothing at this path".
 */
export function isNotFound(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false
  return err.code === "ENOENT" || err.code === "ENOTDIR"
}
