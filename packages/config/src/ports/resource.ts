/**
 * Names a component's configuration slice. `null` is the global layer.
 */
export type Profile = string | null

/**
 * Names an environment overlay such as "local" or "production".
 * `null` is the base layer.
 */
export type Variant = string | null

/**
 * Parses expanded document text into a tree of plain objects, arrays and
 * scalars. Throws on malformed input.
 */
export type ConfigParser = (text: string) => unknown

/**
 * File extension (without the dot) to parser.
 *
 * Iteration order is not part of the contract: when two extensions exist for
 * the same profile and variant, their relative merge order is unspecified.
 */
export type ExtensionTable = Readonly<Record<string, ConfigParser>>

export type ResourcePathInput = Readonly<{
  prefix: string
  profile: Profile
  variant: Variant
  extension: string
}>

export type ResourcePathTemplate = (input: ResourcePathInput) => string

export type ResourceEntry = Readonly<{
  profile: Profile
  variant: Variant
  extension: string
  parser: ConfigParser
  logicalName: string
}>
