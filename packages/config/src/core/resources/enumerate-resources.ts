import type {
  ExtensionTable,
  Profile,
  ResourceEntry,
  ResourcePathTemplate,
  Variant,
} from "../../ports/resource"

export const DEFAULT_VARIANTS: readonly Variant[] = [null, "local"]

/**
 * `prefix-profile-variant-configuration.ext`, skipping absent parts.
 *
 * @example
 * ```typescript
 * defaultResourcePath({ prefix: "shop", profile: "web", variant: null, extension: "yaml" })
 * // "shop-web-configuration.yaml"
 * ```
 */
export const defaultResourcePath: ResourcePathTemplate = ({ prefix, profile, variant, extension }) => {
  const parts = [prefix, profile, variant, "configuration"].filter(
    (part): part is string => part !== null && part !== "",
  )

  return `${parts.join("-")}.${extension}`
}

export type EnumerateResourcesOptions = {
  prefix: string
  profiles?: readonly Profile[]
  variants?: readonly Variant[]
  extensions: ExtensionTable
  resourcePath?: ResourcePathTemplate
}

/**
 * Every candidate resource, lowest precedence first: profile, then variant,
 * then extension. The global (`null`) profile always comes last, and the base
 * (`null`) variant is added in front when the caller leaves it out.
 *
 * Entries are produced whether or not anything exists behind them.
 */
export function enumerateResources(options: EnumerateResourcesOptions): ResourceEntry[] {
  const resourcePath = options.resourcePath ?? defaultResourcePath
  const profiles = withGlobalProfile(options.profiles ?? [])
  const variants = withBaseVariant(options.variants ?? DEFAULT_VARIANTS)
  const entries: ResourceEntry[] = []

  for (const profile of profiles) {
    for (const variant of variants) {
      for (const [extension, parser] of Object.entries(options.extensions)) {
        entries.push({
          profile,
          variant,
          extension,
          parser,
          logicalName: resourcePath({ prefix: options.prefix, profile, variant, extension }),
        })
      }
    }
  }

  return entries
}

function withGlobalProfile(profiles: readonly Profile[]): Profile[] {
  return [...unique(profiles.filter((profile) => profile !== null)), null]
}

function withBaseVariant(variants: readonly Variant[]): Variant[] {
  const distinct = unique(variants)
  return distinct.includes(null) ? distinct : [null, ...distinct]
}

function unique<T>(values: readonly T[]): T[] {
  return [...new Set(values)]
}
