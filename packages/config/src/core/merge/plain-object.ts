import type { ConfigMap } from "../../ports/validator"

/**
 * True for object literals and `Object.create(null)` objects. Arrays, class
 * instances, Dates, Maps and schema objects are not plain.
 */
export function isPlainObject(value: unknown): value is ConfigMap {
  if (typeof value !== "object" || value === null) return false
  if (Array.isArray(value)) return false

  const proto = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Sets an own, enumerable property, even for keys such as "__proto__".
 */
export function defineEntry(target: ConfigMap, key: string, value: unknown): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  })
}
