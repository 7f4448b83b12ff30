import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { DirectoryResourceLocator } from "../directory-resource-locator"

describe("DirectoryResourceLocator behavior", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "directory-locator-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("defaults to cwd as the only root", async () => {
    await fs.writeFile(path.join(cwd, "app-configuration.yaml"), "a: 1\n")

    const sources = await new DirectoryResourceLocator({ cwd }).locate("app-configuration.yaml")

    expect(sources.map((s) => s.id)).toEqual([path.join(cwd, "app-configuration.yaml")])
  })

  it("returns duplicates in root order", async () => {
    for (const root of ["defaults", "site"]) {
      await fs.mkdir(path.join(cwd, root))
      await fs.writeFile(path.join(cwd, root, "app-configuration.yaml"), `from: ${root}\n`)
    }

    const locator = new DirectoryResourceLocator({ roots: ["site", "defaults"], cwd })
    const sources = await locator.locate("app-configuration.yaml")

    expect(sources.map((s) => s.id)).toEqual([
      path.join(cwd, "site", "app-configuration.yaml"),
      path.join(cwd, "defaults", "app-configuration.yaml"),
    ])
  })

  it("skips roots that do not exist", async () => {
    await fs.writeFile(path.join(cwd, "app-configuration.yaml"), "a: 1\n")

    const locator = new DirectoryResourceLocator({ roots: ["missing", "."], cwd })

    expect(await locator.locate("app-configuration.yaml")).toHaveLength(1)
  })

  it("ignores directories with the resource's name", async () => {
    await fs.mkdir(path.join(cwd, "app-configuration.yaml"))

    expect(await new DirectoryResourceLocator({ cwd }).locate("app-configuration.yaml")).toEqual([])
  })

  it("resolves names with subdirectories", async () => {
    await fs.mkdir(path.join(cwd, "conf"))
    await fs.writeFile(path.join(cwd, "conf", "app.yaml"), "a: 1\n")

    const [source] = await new DirectoryResourceLocator({ cwd }).locate("conf/app.yaml")

    expect(await source?.read()).toBe("a: 1\n")
  })

  it("names itself after its roots", () => {
    const locator = new DirectoryResourceLocator({ roots: ["a", "b"], cwd })

    expect(locator.name).toBe(`directory:${path.join(cwd, "a")}${path.delimiter}${path.join(cwd, "b")}`)
  })
})
