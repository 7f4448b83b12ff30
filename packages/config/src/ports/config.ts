import type { ConfigMap } from "./validator"

/**
 * Assembled, validated configuration with provenance.
 *
 * @typeParam T - The shape of the configuration value.
 *
 * @example
 * ```typescript
 * const config = await assembleConfiguration({
 *   prefix: "shop",
 *   profiles: ["web"],
 *   schemas: [{ web: { port: positiveIntegerFromString() } }],
 * })
 *
 * config.value.web           // { port: 9090 }
 * config.explain("web.port") // "resource:/srv/app/shop-web-local-configuration.yaml"
 * ```
 */
export interface IConfig<T extends ConfigMap = ConfigMap> {
  /** Full validated config object, deeply frozen */
  readonly value: T

  get<K extends keyof T & string>(key: K): T[K]

  keys(): (keyof T & string)[]

  /**
   * Explains which layer provided the final value at a dotted path.
   *
   * For a path naming a mapping, the answer is the layer that most recently
   * supplied any value beneath it.
   *
   * @returns The layer name (e.g. "resource:/srv/app/shop-configuration.yaml",
   * "file:/etc/shop.yaml", "overrides", "args"), or "default" when the value
   * came from a schema default.
   */
  explain(path: string): string

  /**
   * Names of the layers that contributed at least one surviving value, in
   * merge order.
   */
  sourcesUsed(): string[]

  /**
   * Dotted paths present in the merged input but dropped by validation.
   *
   * Always empty under a strict schema, where unknown keys are errors.
   */
  unknownKeys(): string[]
}
