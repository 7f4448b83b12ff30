import type { RawSource, ResourceLocator } from "../../ports/resource-locator"

export type MemoryResources = Readonly<Record<string, string | readonly string[]>>

/**
 * Serves documents held in memory. A name mapped to a list yields one source
 * per element, in list order.
 *
 * @example
 * ```typescript
 * const locator = new MemoryResourceLocator({
 *   "shop-web-configuration.yaml": "web:\n  port: 8080\n",
 * })
 * ```
 */
export class MemoryResourceLocator implements ResourceLocator {
  readonly name = "memory"
  private readonly resources: Map<string, readonly string[]>

  constructor(resources: MemoryResources = {}) {
    this.resources = new Map(
      Object.entries(resources).map(([name, docs]) => [name, typeof docs === "string" ? [docs] : docs]),
    )
  }

  async locate(logicalName: string): Promise<RawSource[]> {
    const docs = this.resources.get(logicalName) ?? []

    return docs.map((text, i) => ({
      id: `memory:${logicalName}#${i}`,
      read: async () => text,
    }))
  }
}
