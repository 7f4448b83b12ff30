import { ObjectSource } from "../object-source"

describe("ObjectSource behavior", () => {
  it("names itself after its label", () => {
    expect(new ObjectSource("process-properties", {}).name).toBe("object:process-properties")
  })

  it("stringifies non-string values", async () => {
    const source = new ObjectSource("properties", { PORT: 8080, DEBUG: true, HOST: "localhost" })

    expect(await source.load()).toEqual({ PORT: "8080", DEBUG: "true", HOST: "localhost" })
  })

  it("treats null and undefined as absent", async () => {
    const source = new ObjectSource("properties", { A: null, B: undefined, C: "" })
    const result = await source.load()

    expect(result.A).toBeUndefined()
    expect(result.B).toBeUndefined()
    expect(result.C).toBe("")
  })
})
