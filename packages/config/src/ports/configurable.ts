import type { ConfigMap, SchemaFragment } from "./validator"

/**
 * A component that receives the assembled configuration.
 */
export interface Configurable<T extends ConfigMap = ConfigMap> {
  apply(config: T): void | Promise<void>
}

/**
 * A component that declares the schema fragment for its configuration slice.
 */
export interface SchemaProvider {
  readonly configSchema: SchemaFragment
}
