export type ConfigMap = Record<string, unknown>

/**
 * A schema fragment declared by one component. Fragments are deep-merged into
 * the effective schema; the leaves are opaque to the engine and only
 * interpreted by the ConfigValidator.
 */
export type SchemaFragment = Readonly<Record<string, unknown>>

export type FieldIssue = Readonly<{
  /** Path from the configuration root to the offending value */
  path: readonly string[]
  code: string
  message: string
  /** Expected type, when the validator reports one */
  expected?: string
}>

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; issues: readonly FieldIssue[] }

/**
 * Coerces and validates the merged configuration against the merged schema.
 *
 * Implementations report every violation, not only the first, and never
 * return a partially coerced value.
 */
export interface ConfigValidator<T extends ConfigMap = ConfigMap> {
  validate(config: ConfigMap, schema: ConfigMap): ValidationResult<T>
}
