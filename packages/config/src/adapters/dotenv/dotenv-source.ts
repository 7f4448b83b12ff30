import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { PropertySource } from "../../ports/source"
import { isNotFound } from "../file/file-source"

export type DotenvSourceOptions = {
  /** Absolute, or relative to `cwd`, e.g. ".env" or "config/.env.local" */
  file: string

  /** When false, a missing file supplies no properties instead of failing */
  required: boolean

  /** @default process.cwd() */
  cwd?: string
}

/**
 * A .env file as `${NAME}` properties. Assembly ranks it beneath the real
 * environment. Values are never written to `process.env`.
 */
export class DotenvSource implements PropertySource {
  readonly name: string
  private readonly path: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
    this.path = path.resolve(opts.cwd ?? process.cwd(), opts.file)
  }

  async load(): Promise<Record<string, string>> {
    let text: string

    try {
      text = await fs.readFile(this.path, "utf8")
    } catch (err) {
      if (isNotFound(err) && !this.opts.required) return {}
      throw err
    }

    return parse(text)
  }
}
