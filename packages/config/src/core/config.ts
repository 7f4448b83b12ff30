import type { IConfig } from "../ports/config"
import type { ConfigMap } from "../ports/validator"
import { hasPath, leafPaths } from "./merge/paths"
import type { Provenance } from "./provenance"

export class Config<T extends ConfigMap> implements IConfig<T> {
  constructor(
    private readonly data: T,
    private readonly provenance: Provenance,
    private readonly merged: ConfigMap,
  ) {
    deepFreeze(this.data)
  }

  get value(): T {
    return this.data
  }

  get<K extends keyof T & string>(key: K): T[K] {
    return this.data[key]
  }

  keys(): (keyof T & string)[] {
    return Object.keys(this.data) as Array<keyof T & string>
  }

  explain(path: string): string {
    if (!hasPath(this.data, path.split("."))) return "default"

    return this.provenance.layerFor(path) ?? "default"
  }

  sourcesUsed(): string[] {
    return this.provenance.layersUsed()
  }

  unknownKeys(): string[] {
    return leafPaths(this.merged).filter((path) => !hasPath(this.data, path.split(".")))
  }
}

function deepFreeze(value: unknown): void {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) return

  Object.freeze(value)

  for (const child of Object.values(value)) {
    deepFreeze(child)
  }
}
