import { getAtPath, leafPaths } from "./merge/paths"
import { isPlainObject } from "./merge/plain-object"

/**
 * Records which layer last supplied each leaf of the merged configuration.
 */
export class Provenance {
  // Insertion order is recency: a re-recorded path moves to the end.
  private readonly leaves = new Map<string, string>()
  private readonly layers: string[] = []

  /**
   * @param base - The merged value `document` is merged onto. A `null` leaf
   * over a mapping or sequence in `base` changes nothing and is not recorded.
   */
  record(layer: string, document: unknown, base?: unknown): void {
    if (!this.layers.includes(layer)) this.layers.push(layer)

    for (const leaf of leafPaths(document)) {
      if (isAbsentOverContainer(document, base, leaf)) continue

      for (const existing of [...this.leaves.keys()]) {
        if (isPrefix(leaf, existing) || isPrefix(existing, leaf)) {
          this.leaves.delete(existing)
        }
      }

      this.leaves.set(leaf, layer)
    }
  }

  /**
   * The most recent layer that supplied `path`, a value beneath it, or a
   * value it sits beneath. `undefined` when no layer touched it.
   */
  layerFor(path: string): string | undefined {
    let found: string | undefined

    for (const [leaf, layer] of this.leaves) {
      if (leaf === path || isPrefix(path, leaf) || isPrefix(leaf, path)) {
        found = layer
      }
    }

    return found
  }

  /**
   * Layers that still own at least one leaf, in the order they were merged.
   */
  layersUsed(): string[] {
    const owning = new Set(this.leaves.values())
    return this.layers.filter((layer) => owning.has(layer))
  }
}

function isAbsentOverContainer(document: unknown, base: unknown, leaf: string): boolean {
  const path = leaf.split(".")
  if (getAtPath(document, path) !== null) return false

  const existing = getAtPath(base, path)
  return isPlainObject(existing) || Array.isArray(existing)
}

function isPrefix(ancestor: string, path: string): boolean {
  return path.startsWith(`${ancestor}.`)
}
