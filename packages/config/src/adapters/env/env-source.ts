import type { PropertySource } from "../../ports/source"

export type EnvSourceOptions = {
  /**
   * Only variables named with this prefix are read, and the prefix is cut
   * from their property names: with "SHOP_", `SHOP_DB_HOST` becomes `${DB_HOST}`.
   */
  prefix?: string
  /** @default process.env */
  env?: Record<string, string | undefined>
}

/**
 * Environment variables as `${NAME}` properties.
 */
export class EnvSource implements PropertySource {
  readonly name: string

  constructor(private readonly options: EnvSourceOptions = {}) {
    this.name = options.prefix ? `env:${options.prefix}` : "env"
  }

  async load(): Promise<Record<string, string | undefined>> {
    const env = this.options.env ?? process.env
    const prefix = this.options.prefix ?? ""
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(env)) {
      if (key.startsWith(prefix)) values[key.slice(prefix.length)] = value
    }

    return values
  }
}
