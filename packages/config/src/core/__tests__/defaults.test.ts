import { buildDefaultsLayer, DEFAULT_CONFIGURATION } from "../defaults"
import { ParseError } from "../errors"
import { resolveConfig } from "../resolve/resolve"

describe("buildDefaultsLayer", () => {
  it("builds the built-in defaults", () => {
    const layer = buildDefaultsLayer()
    const config = resolveConfig(layer.root, layer.selectors, "any", { attempt: 1 })

    expect(layer.provenance).toBe("defaults")
    expect(config.value).toEqual({
      "process.cpus": 1,
      "process.memory": "1GB",
      "process.errorStrategy": "retry",
    })
    expect(config.sourcesUsed()).toEqual(["defaults"])
  })

  it("stops retrying after the seventh attempt", () => {
    const layer = buildDefaultsLayer(DEFAULT_CONFIGURATION)
    const strategy = (attempt: number) =>
      resolveConfig(layer.root, [], "any", { attempt }).get("process.errorStrategy")

    expect(strategy(7)).toBe("retry")
    expect(strategy(8)).toBe("ignore")
  })

  it("takes replacement text with blocks and selectors", () => {
    const layer = buildDefaultsLayer('executor = "local"\nprocess { $fastqc.cpus = 2 }')

    expect(layer.selectors.map((selector) => selector.pattern)).toEqual(["fastqc"])
    expect(resolveConfig(layer.root, layer.selectors, "fastqc", { attempt: 1 }).value).toEqual({
      executor: "local",
      "process.cpus": 2,
    })
  })

  it("rejects includes", () => {
    const run = () => buildDefaultsLayer('process { includeConfig "x.config" }')

    expect(run).toThrow(ParseError)
    expect(run).toThrow("<defaults>:1:11: defaults cannot include fragments")
  })

  it("rejects profiles", () => {
    expect(() => buildDefaultsLayer("\nprofiles { p { } }")).toThrow(
      "<defaults>:2:1: defaults cannot declare profiles",
    )
  })

  it("reports syntax errors against the defaults", () => {
    expect(() => buildDefaultsLayer("cpus = ")).toThrow(/^<defaults>:1:/)
  })
})
