import { z } from "zod"

// Configuration values arrive as strings from CLI arguments and property
// expansion, or already typed from YAML and JSON. Each helper accepts both.

const TRUE_WORDS = new Set(["true", "1", "yes"])
const FALSE_WORDS = new Set(["false", "0", "no"])

function toNumber(value: unknown): unknown {
  if (typeof value !== "string" || !value.trim()) return value
  return Number(value.trim())
}

function toBoolean(value: unknown): unknown {
  if (typeof value !== "string") return value

  const word = value.trim().toLowerCase()
  if (TRUE_WORDS.has(word)) return true
  if (FALSE_WORDS.has(word)) return false
  return value
}

function toList(value: unknown): unknown {
  if (typeof value !== "string") return value

  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item !== "")
}

export function numberFromString() {
  return z.preprocess(toNumber, z.number())
}

export function integerFromString() {
  return z.preprocess(toNumber, z.number().int())
}

export function positiveIntegerFromString() {
  return z.preprocess(toNumber, z.number().int().positive())
}

/**
 * Accepts booleans and the words true/false, 1/0 and yes/no (any case).
 */
export function booleanFromString() {
  return z.preprocess(toBoolean, z.boolean())
}

/**
 * One of a fixed set of tokens. Surrounding whitespace is ignored.
 *
 * @example
 * ```typescript
 * keywordFromString(["debug", "info", "warn"]).parse(" info ") // "info"
 * ```
 */
export function keywordFromString<const T extends readonly [string, ...string[]]>(values: T) {
  return z.preprocess((value) => (typeof value === "string" ? value.trim() : value), z.enum(values))
}

/**
 * A comma-separated string, or an array, validated item by item.
 *
 * @example
 * ```typescript
 * listFromString(z.string()).parse("a, b,,c") // ["a", "b", "c"]
 * ```
 */
export function listFromString<T extends z.ZodType>(item: T) {
  return z.preprocess(toList, z.array(item))
}
