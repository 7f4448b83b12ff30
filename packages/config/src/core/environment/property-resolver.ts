import { UnresolvedPropertyError } from "../errors"
import type { EnvironmentSnapshot } from "./capture-environment"

/**
 * Where a lookup came from, for error reporting.
 */
export type ResolveSite = {
  /** The full `${...}` reference */
  expansion: string
  /** The text the reference was found in */
  source: string
}

export class PropertyResolver {
  constructor(private readonly snapshot: EnvironmentSnapshot) {}

  static from(values: Record<string, string>): PropertyResolver {
    return new PropertyResolver(new Map(Object.entries(values)))
  }

  has(name: string): boolean {
    return this.snapshot.has(name)
  }

  keys(): string[] {
    return [...this.snapshot.keys()].sort()
  }

  /**
   * Looks up `name`, falling back to `defaultValue` when it is absent.
   * An empty default is still a default.
   *
   * @throws UnresolvedPropertyError when the name is absent and there is no default
   */
  resolve(name: string, defaultValue?: string, site?: ResolveSite): string {
    const value = this.snapshot.get(name)
    if (value !== undefined) return value
    if (defaultValue !== undefined) return defaultValue

    throw new UnresolvedPropertyError({
      property: name,
      expansion: site?.expansion ?? `\${${name}}`,
      knownKeys: this.keys(),
      source: site?.source ?? "",
    })
  }
}
