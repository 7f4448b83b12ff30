import type { PropertySource } from "../../ports/source"

/**
 * Caller-supplied properties. Values are converted with `String()`;
 * `null` and `undefined` values are treated as absent.
 */
export class ObjectSource implements PropertySource {
  readonly name: string

  constructor(
    label: string,
    private readonly obj: Readonly<Record<string, unknown>>,
  ) {
    this.name = `object:${label}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const values: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.obj)) {
      values[key] = value === null || value === undefined ? undefined : String(value)
    }

    return values
  }
}
