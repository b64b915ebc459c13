import { MemoryFragmentReader } from "../memory-fragment-reader"

describe("MemoryFragmentReader behavior", () => {
  it("normalizes the keys it is given", async () => {
    const reader = new MemoryFragmentReader({ "./conf/../main.config": "x = 1" })

    await expect(reader.read("main.config")).resolves.toBe("x = 1")
  })

  it("resolves relative refs to relative identities", () => {
    const reader = new MemoryFragmentReader()

    expect(reader.resolve("main.config")).toBe("main.config")
    expect(reader.resolve("base.config", "main.config")).toBe("base.config")
    expect(reader.resolve("nested/a.config", "conf/b.config")).toBe("conf/nested/a.config")
  })

  it("keeps absolute refs as they are", () => {
    const reader = new MemoryFragmentReader()

    expect(reader.resolve("/etc/pipeline/site.config", "conf/b.config")).toBe(
      "/etc/pipeline/site.config",
    )
  })
})
