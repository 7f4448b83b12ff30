/**
 * A source of string-keyed properties used to expand `${NAME}` references.
 *
 * A PropertySource is responsible only for *loading* raw values.
 * Sources are evaluated in order; later sources shadow earlier ones.
 */
export interface PropertySource {
  /**
   * Human-readable name for debugging.
   * Example: "env", "dotenv:.env", "object:properties"
   */
  readonly name: string

  /**
   * Load property values.
   *
   * - Values are flat strings
   * - Returning undefined for a key means "value not provided"
   */
  load(): Promise<Record<string, string | undefined>>
}
