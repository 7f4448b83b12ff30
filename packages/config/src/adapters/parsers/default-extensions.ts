import type { ExtensionTable } from "../../ports/resource"
import { parseJson } from "./json-parser"
import { parseYaml } from "./yaml-parser"

export const defaultExtensions: ExtensionTable = Object.freeze({
  yaml: parseYaml,
  json: parseJson,
})
