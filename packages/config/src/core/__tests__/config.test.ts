import { Config } from "../config"
import { Provenance } from "../provenance"

describe("Config", () => {
  const merged = {
    web: { port: "9090", stale: "x" },
    db: { host: "db.internal" },
  }
  const data = {
    web: { port: 9090, host: "localhost" },
    db: { host: "db.internal" },
  }

  const provenance = new Provenance()
  provenance.record("resource:/srv/shop-configuration.yaml", { web: { port: 8080 }, db: { host: "x" } })
  provenance.record("resource:/srv/shop-local-configuration.yaml", { db: { host: "db.internal" } })
  provenance.record("args", { web: { port: "9090", stale: "x" } })

  const config = new Config(data, provenance, merged)

  describe("get", () => {
    it("returns value by key", () => {
      expect(config.get("web")).toEqual({ port: 9090, host: "localhost" })
    })

    it("returns correct type for each key", () => {
      const port: number = config.get("web").port
      const host: string = config.get("db").host

      expect(typeof port).toBe("number")
      expect(typeof host).toBe("string")
    })
  })

  describe("keys", () => {
    it("returns all top-level keys", () => {
      expect(config.keys()).toEqual(["web", "db"])
    })
  })

  describe("explain", () => {
    it("returns the last layer that supplied a leaf", () => {
      expect(config.explain("web.port")).toBe("args")
      expect(config.explain("db.host")).toBe("resource:/srv/shop-local-configuration.yaml")
    })

    it("returns the most recent layer beneath a mapping", () => {
      expect(config.explain("web")).toBe("args")
      expect(config.explain("db")).toBe("resource:/srv/shop-local-configuration.yaml")
    })

    it("returns 'default' for a value filled by the schema", () => {
      expect(config.explain("web.host")).toBe("default")
    })

    it("returns 'default' for a path that is not in the value", () => {
      expect(config.explain("web.stale")).toBe("default")
    })
  })

  describe("sourcesUsed", () => {
    it("lists layers that still own a value, in merge order", () => {
      expect(config.sourcesUsed()).toEqual(["resource:/srv/shop-local-configuration.yaml", "args"])
    })
  })

  describe("unknownKeys", () => {
    it("returns merged paths the validated value dropped", () => {
      expect(config.unknownKeys()).toEqual(["web.stale"])
    })

    it("returns empty array when nothing was dropped", () => {
      expect(new Config(data, new Provenance(), { web: { port: "1" } }).unknownKeys()).toEqual([])
    })
  })

  describe("immutability", () => {
    it("value is deeply frozen", () => {
      expect(Object.isFrozen(config.value)).toBe(true)
      expect(Object.isFrozen(config.value.web)).toBe(true)
      expect(Reflect.set(config.value.web, "port", 1)).toBe(false)
      expect(config.value.web.port).toBe(9090)
    })
  })
})
