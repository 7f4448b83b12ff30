import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { FileSource, isNotFound } from "../file-source"

describe("FileSource", () => {
  let cwd: string

  beforeEach(async () => {
    cwd = await fs.mkdtemp(path.join(os.tmpdir(), "file-source-test-"))
  })

  afterEach(async () => {
    await fs.rm(cwd, { recursive: true, force: true })
  })

  it("reads UTF-8 text", async () => {
    const file = path.join(cwd, "app.yaml")
    await fs.writeFile(file, "name: café\n")

    expect(await new FileSource(file).read()).toBe("name: café\n")
  })

  it("fails with a not-found error for a missing file", async () => {
    const read = new FileSource(path.join(cwd, "missing.yaml")).read()

    await expect(read.catch((err: unknown) => isNotFound(err))).resolves.toBe(true)
  })
})

describe("isNotFound", () => {
  it("ignores other errors and non-errors", () => {
    expect(isNotFound(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false)
    expect(isNotFound({ code: "ENOENT" })).toBe(false)
    expect(isNotFound(Object.assign(new Error("gone"), { code: "ENOTDIR" }))).toBe(true)
  })
})
