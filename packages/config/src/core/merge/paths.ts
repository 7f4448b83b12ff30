import type { ConfigMap } from "../../ports/validator"
import { defineEntry, isPlainObject } from "./plain-object"

/**
 * Returns a copy of `map` with `value` stored at `path`, creating (or
 * replacing non-mapping values with) intermediate mappings as needed.
 */
export function setAtPath(map: ConfigMap, path: readonly string[], value: unknown): ConfigMap {
  const [head, ...rest] = path
  if (head === undefined) return map

  const result: ConfigMap = { ...map }

  if (!rest.length) {
    defineEntry(result, head, value)
    return result
  }

  const current = Object.hasOwn(map, head) ? map[head] : undefined
  defineEntry(result, head, setAtPath(isPlainObject(current) ? current : {}, rest, value))

  return result
}

/**
 * The value at `path`, or `undefined` when any segment is missing.
 */
export function getAtPath(value: unknown, path: readonly string[]): unknown {
  let current = value

  for (const segment of path) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) return undefined
    current = current[segment]
  }

  return current
}

export function hasPath(value: unknown, path: readonly string[]): boolean {
  let current = value

  for (const segment of path) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) return false
    current = current[segment]
  }

  return true
}

/**
 * Dotted paths of every non-mapping value in the tree. Sequences are leaves;
 * empty mappings contribute nothing.
 */
export function leafPaths(value: unknown, prefix = ""): string[] {
  if (!isPlainObject(value)) return prefix ? [prefix] : []

  const paths: string[] = []

  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue
    paths.push(...leafPaths(child, prefix ? `${prefix}.${key}` : key))
  }

  return paths
}
