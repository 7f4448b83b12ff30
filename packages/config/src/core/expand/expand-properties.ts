import type { PropertyResolver } from "../environment/property-resolver"

// `${NAME}` or `${NAME:default}`; the body may not open another reference.
const REFERENCE = /\$\{((?:(?!\$\{)[^}\r\n])*)\}/g

/**
 * Rewrites every property reference in `text`. Applied once to raw document
 * text, before any parser sees it, so substituted values are never expanded
 * again.
 *
 * @example
 * ```typescript
 * const resolver = PropertyResolver.from({ DB_HOST: "prod" })
 * expandProperties("jdbc://${DB_HOST}:${DB_PORT:5432}", resolver)
 * // "jdbc://prod:5432"
 * ```
 */
export function expandProperties(text: string, resolver: PropertyResolver): string {
  return text.replace(REFERENCE, (expansion, body: string) => {
    const { name, defaultValue } = splitReference(body)

    return resolver.resolve(name, defaultValue, { expansion, source: text })
  })
}

/**
 * Splits on the first ":" that is not the leading character. With no such
 * colon there is no default.
 */
export function splitReference(body: string): { name: string; defaultValue?: string } {
  const colon = body.indexOf(":", 1)
  if (colon === -1) return { name: body }

  return { name: body.slice(0, colon), defaultValue: body.slice(colon + 1) }
}
