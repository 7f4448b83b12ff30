import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { ObjectSource } from "../../adapters/object/object-source"
import { captureEnvironment } from "../../core/environment/capture-environment"
import { PropertyResolver } from "../../core/environment/property-resolver"
import { expandProperties } from "../../core/expand/expand-properties"
import type { PropertySource } from "../source"

export type PropertySourceHarness = {
  name: string
  /** Builds the source inside a fresh temp directory */
  make: (dir: string) => Promise<PropertySource>
  /** Properties the source must supply, exactly as strings */
  provides: Record<string, string>
}

export function describePropertySourceContract(h: PropertySourceHarness) {
  describe(`${h.name} (PropertySource contract)`, () => {
    let dir: string
    let source: PropertySource

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "property-source-"))
      source = await h.make(dir)
    })

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true })
    })

    it("names itself for diagnostics", () => {
      expect(source.name).toMatch(/\S/)
    })

    it("loads a plain record of string values", async () => {
      const values = await source.load()

      expect(Object.getPrototypeOf(values)).toBe(Object.prototype)
      for (const value of Object.values(values)) {
        expect(value === undefined || typeof value === "string").toBe(true)
      }
      expect(values).toMatchObject(h.provides)
    })

    it("hands out a fresh record on every load", async () => {
      const first = await source.load()
      first.ADDED_BY_CALLER = "x"

      const second = await source.load()

      expect(second).not.toHaveProperty("ADDED_BY_CALLER")
      expect(second).toMatchObject(h.provides)
    })

    it("resolves every provided property in ${NAME} references", async () => {
      const resolver = new PropertyResolver(await captureEnvironment([source]))

      for (const [name, value] of Object.entries(h.provides)) {
        expect(expandProperties(`[\${${name}}]`, resolver)).toBe(`[${value}]`)
      }
    })

    it("shadows an earlier source only for the names it provides", async () => {
      const earlier = new ObjectSource("earlier", { ONLY_IN_EARLIER: "kept" })
      const snapshot = await captureEnvironment([earlier, source])

      expect(snapshot.get("ONLY_IN_EARLIER")).toBe("kept")
      for (const [name, value] of Object.entries(h.provides)) {
        expect(snapshot.get(name)).toBe(value)
      }
    })
  })
}
