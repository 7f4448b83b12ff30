import type { ConfigMap, SchemaFragment } from "../../ports/validator"
import { mergeAll } from "../merge/deep-merge"

/**
 * Deep-merges component schema fragments in order. Mapping branches merge;
 * a later leaf replaces an earlier one.
 */
export function mergeSchemas(fragments: readonly SchemaFragment[]): ConfigMap {
  return mergeAll(fragments)
}
