import YAML from "yaml"
import type { ConfigParser } from "../../ports/resource"

export const parseYaml: ConfigParser = (text) => YAML.parse(text)
