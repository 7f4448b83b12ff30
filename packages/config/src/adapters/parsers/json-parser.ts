import type { ConfigParser } from "../../ports/resource"

export const parseJson: ConfigParser = (text) => {
  // An empty file is an empty document, as it is for YAML.
  if (!text.trim()) return null
  return JSON.parse(text)
}
