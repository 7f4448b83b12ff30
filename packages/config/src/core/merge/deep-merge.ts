import type { ConfigMap } from "../../ports/validator"
import { MergeConflictError, type ValueKind } from "../errors"
import { defineEntry, isPlainObject } from "./plain-object"

/**
 * Merges `incoming` onto `existing`, recursively. Never mutates either side,
 * and the result shares no mapping or sequence with them.
 *
 * Dispatch is on the existing value:
 * - mapping: key-wise merge; shared keys recurse, one-sided keys pass through
 * - sequence: `existing` followed by `incoming` (values accumulate)
 * - anything else: `incoming` replaces `existing`
 *
 * An absent incoming value (`undefined` or `null`, e.g. a YAML section whose
 * children are all commented out) leaves a mapping or sequence untouched;
 * `null` still replaces a scalar. Any other incoming value whose kind differs
 * from an existing mapping or sequence raises a MergeConflictError.
 */
export function deepMerge(existing: unknown, incoming: unknown, path: readonly string[] = []): unknown {
  if (incoming === undefined) return cloneTree(existing)

  if (isPlainObject(existing)) {
    if (incoming === null) return cloneMap(existing)
    if (!isPlainObject(incoming)) {
      throw new MergeConflictError({ path, existing: "mapping", incoming: kindOf(incoming) })
    }

    const result = cloneMap(existing)

    for (const [key, value] of Object.entries(incoming)) {
      if (value === undefined) continue

      const shared = Object.hasOwn(existing, key)
      defineEntry(result, key, shared ? deepMerge(existing[key], value, [...path, key]) : cloneTree(value))
    }

    return result
  }

  if (Array.isArray(existing)) {
    if (incoming === null) return existing.map(cloneTree)
    if (!Array.isArray(incoming)) {
      throw new MergeConflictError({ path, existing: "sequence", incoming: kindOf(incoming) })
    }

    return [...existing, ...incoming].map(cloneTree)
  }

  return cloneTree(incoming)
}

/**
 * Left fold of deepMerge over `documents`; later documents take precedence.
 */
export function mergeAll(documents: readonly unknown[]): ConfigMap {
  let merged: ConfigMap = {}

  for (const document of documents) {
    const next = deepMerge(merged, document)
    merged = isPlainObject(next) ? next : {}
  }

  return merged
}

export function kindOf(value: unknown): ValueKind {
  if (value === null) return "null"
  if (Array.isArray(value)) return "sequence"
  if (isPlainObject(value)) return "mapping"
  return "scalar"
}

/**
 * Copies every mapping and sequence in the tree. Other values, schema
 * objects included, are shared.
 */
export function cloneTree(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneTree)
  if (isPlainObject(value)) return cloneMap(value)
  return value
}

function cloneMap(map: ConfigMap): ConfigMap {
  const copy: ConfigMap = {}

  for (const [key, value] of Object.entries(map)) {
    defineEntry(copy, key, cloneTree(value))
  }

  return copy
}
