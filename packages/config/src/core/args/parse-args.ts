import type { ConfigMap } from "../../ports/validator"
import { InvalidArgumentError } from "../errors"
import { setAtPath } from "../merge/paths"

const ASSIGNMENT = /^([^=]+)=(.*)$/

export type ParsedArgs = {
  /** Paths given with `--load`, in encounter order */
  additionalFiles: string[]
  /** Nested map built from `a/b/c=value` tokens; values stay strings */
  overrides: ConfigMap
}

/**
 * Parses command-line configuration arguments.
 *
 * - `--load <path>` queues a file to merge after the enumerated resources
 * - `a/b/c=value` sets a nested override; the last token for a path wins
 *
 * @example
 * ```typescript
 * parseArgs(["--load", "local.yaml", "web/port=7777"])
 * // { additionalFiles: ["local.yaml"], overrides: { web: { port: "7777" } } }
 * ```
 *
 * @throws InvalidArgumentError for a token that is neither form
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const additionalFiles: string[] = []
  let overrides: ConfigMap = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (token === undefined) continue

    if (token === "--load") {
      const file = argv[i + 1]
      if (file === undefined) {
        throw new InvalidArgumentError({ token, reason: "Missing path after `--load'." })
      }

      additionalFiles.push(file)
      i++
      continue
    }

    overrides = mergeArgValue(overrides, token)
  }

  return { additionalFiles, overrides }
}

/**
 * Applies a single `a/b/c=value` token to `map`, returning a new map.
 */
export function mergeArgValue(map: ConfigMap, token: string): ConfigMap {
  const match = ASSIGNMENT.exec(token)
  const key = match?.[1]
  const value = match?.[2]

  if (key === undefined || value === undefined) {
    throw new InvalidArgumentError({ token })
  }

  return setAtPath(map, key.split("/"), value)
}
