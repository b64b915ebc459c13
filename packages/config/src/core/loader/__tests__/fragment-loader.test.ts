import type { Logger } from "@pipeconf/logger"
import { mock } from "vitest-mock-extended"
import { MemoryFragmentReader } from "../../../adapters/memory/memory-fragment-reader"
import type { ConfigMapping, Scalar } from "../../../ports/config-node"
import type { FragmentReader } from "../../../ports/fragment-reader"
import type { Layer } from "../../../ports/layer"
import {
  CyclicIncludeError,
  FragmentReadError,
  MissingFragmentError,
  ParseError,
} from "../../errors"
import { merge } from "../../merge/merge-engine"
import { EMPTY_MAPPING, walkLeaves } from "../../tree/config-tree"
import { FragmentLoader } from "../fragment-loader"

function flat(mapping: ConfigMapping): Record<string, Scalar> {
  const result: Record<string, Scalar> = {}

  for (const [key, leaf] of walkLeaves(mapping)) {
    result[key] = leaf.kind === "static" ? leaf.value : leaf.evaluate({ attempt: 1 })
  }

  return result
}

function summary(layers: readonly Layer[]) {
  return layers.map((layer) => [layer.provenance, flat(layer.root)])
}

function load(fragments: Record<string, string>, root = "main.config") {
  return new FragmentLoader(new MemoryFragmentReader(fragments)).load(root)
}

describe("FragmentLoader", () => {
  it("turns a single fragment into one layer", async () => {
    const loaded = await load({ "main.config": 'process { cpus = 2; memory = "2GB" }' })

    expect(summary(loaded.layers)).toEqual([
      ["fragment:main.config", { "process.cpus": 2, "process.memory": "2GB" }],
    ])
    expect(loaded.fragments).toEqual(["main.config"])
    expect(loaded.profiles).toEqual([])
  })

  describe("includes", () => {
    it("splits the including fragment around the include", async () => {
      const loaded = await load({
        "main.config": `
          process.cpus = 1
          includeConfig "base.config"
          process.memory = "8GB"
        `,
        "base.config": 'process { cpus = 4; memory = "2GB" }',
      })

      expect(summary(loaded.layers)).toEqual([
        ["fragment:main.config", { "process.cpus": 1 }],
        ["fragment:base.config", { "process.cpus": 4, "process.memory": "2GB" }],
        ["fragment:main.config", { "process.memory": "8GB" }],
      ])
    })

    it("lets the included fragment override what precedes it and not what follows", async () => {
      const loaded = await load({
        "main.config": `
          process.cpus = 1
          includeConfig "base.config"
          process.memory = "8GB"
        `,
        "base.config": 'process { cpus = 4; memory = "2GB" }',
      })

      expect(flat(merge(loaded.layers.map((layer) => layer.root)))).toEqual({
        "process.cpus": 4,
        "process.memory": "8GB",
      })
    })

    it("orders later includes above earlier ones", async () => {
      const loaded = await load({
        "main.config": 'includeConfig "a.config"\nincludeConfig "b.config"',
        "a.config": "x = 1",
        "b.config": "x = 2",
      })

      expect(summary(loaded.layers)).toEqual([
        ["fragment:a.config", { x: 1 }],
        ["fragment:b.config", { x: 2 }],
      ])
    })

    it("places an include inside a block under that block's path", async () => {
      const loaded = await load({
        "main.config": 'process { includeConfig "resources.config" }',
        "resources.config": "cpus = 2\nmemory = 4.GB",
      })

      expect(summary(loaded.layers)).toEqual([
        ["fragment:main.config", {}],
        ["fragment:resources.config", { "process.cpus": 2, "process.memory": "4GB" }],
      ])
    })

    it("resolves include paths relative to the including fragment", async () => {
      const loaded = await load({
        "main.config": 'includeConfig "conf/base.config"',
        "conf/base.config": 'includeConfig "extra.config"',
        "conf/extra.config": "x = 1",
      })

      expect(loaded.fragments).toEqual(["main.config", "conf/base.config", "conf/extra.config"])
      expect(summary(loaded.layers)).toEqual([["fragment:conf/extra.config", { x: 1 }]])
    })

    it("reads a fragment included twice only once", async () => {
      const reader = new MemoryFragmentReader({
        "main.config": 'includeConfig "left.config"\nincludeConfig "right.config"',
        "left.config": 'includeConfig "shared.config"\nside = "left"',
        "right.config": 'includeConfig "shared.config"\nside = "right"',
        "shared.config": "shared = true",
      })
      const read = vi.spyOn(reader, "read")

      const loaded = await new FragmentLoader(reader).load("main.config")

      expect(loaded.fragments).toEqual([
        "main.config",
        "left.config",
        "shared.config",
        "right.config",
      ])
      expect(read).toHaveBeenCalledTimes(4)
      expect(flat(merge(loaded.layers.map((layer) => layer.root)))).toEqual({
        shared: true,
        side: "right",
      })
    })

    it("fails on a cycle, naming its path", async () => {
      const run = load({
        "a.config": 'includeConfig "b.config"',
        "b.config": 'includeConfig "a.config"',
      }, "a.config")

      await expect(run).rejects.toBeInstanceOf(CyclicIncludeError)
      await expect(run).rejects.toMatchObject({
        message: "Cyclic include: a.config -> b.config -> a.config",
        cycle: ["a.config", "b.config", "a.config"],
      })
    })

    it("fails on a fragment including itself", async () => {
      await expect(load({ "main.config": 'includeConfig "main.config"' })).rejects.toMatchObject({
        code: "cyclic_include",
        cycle: ["main.config", "main.config"],
      })
    })

    it("fails on a cycle reached through a profile", async () => {
      await expect(
        load({
          "main.config": 'profiles { p { includeConfig "p.config" } }',
          "p.config": 'includeConfig "main.config"',
        }),
      ).rejects.toMatchObject({ cycle: ["main.config", "p.config", "main.config"] })
    })

    it("fails on a missing include, naming the including fragment", async () => {
      const run = load({ "main.config": 'x = 1\nincludeConfig "nope.config"' })

      await expect(run).rejects.toBeInstanceOf(MissingFragmentError)
      await expect(run).rejects.toMatchObject({
        message: "Configuration fragment not found: nope.config (included from main.config:2:1)",
        context: { fragment: "nope.config", includedFrom: "main.config" },
      })
    })

    it("fails on a missing root fragment", async () => {
      await expect(load({})).rejects.toMatchObject({
        message: "Configuration fragment not found: main.config",
        code: "missing_fragment",
      })
    })

    it("wraps other read failures with their cause", async () => {
      const reader = mock<FragmentReader>()
      const cause = new Error("EACCES: permission denied")

      reader.resolve.mockImplementation((ref) => ref)
      reader.read.mockRejectedValue(cause)

      const run = new FragmentLoader(reader).load("main.config")

      await expect(run).rejects.toBeInstanceOf(FragmentReadError)
      await expect(run).rejects.toMatchObject({
        message: "Failed to read configuration fragment main.config: EACCES: permission denied",
        cause,
      })
    })

    it("reports parse errors in the included fragment", async () => {
      await expect(
        load({
          "main.config": 'includeConfig "bad.config"',
          "bad.config": "\ncpus = two",
        }),
      ).rejects.toThrow("bad.config:2:8: unquoted value 'two'; strings must be quoted")
    })
  })

  describe("profiles", () => {
    const fragments = {
      "main.config": `
        profiles {
          oneida { process.memory = 4.GB }
          incd {
            process.memory = 4.GB
            process.$chewbbaca.queue = "chewBBACA"
          }
        }
        includeConfig "more.config"
      `,
      "more.config": `
        profiles {
          oneida { process.clusterOptions = "--qos=oneida" }
          local { includeConfig "local.config" }
        }
      `,
      "local.config": 'executor = "local"',
    }

    it("collects profiles in first-declaration order", async () => {
      const loaded = await load(fragments)

      expect(loaded.profiles.map(([name]) => name)).toEqual(["oneida", "incd", "local"])
      expect(loaded.layers).toEqual([])
    })

    it("merges a profile declared twice in declaration order", async () => {
      const loaded = await load(fragments)
      const oneida = new Map(loaded.profiles).get("oneida")

      expect(oneida?.provenance).toBe("profile:oneida")
      expect(flat(oneida?.root ?? EMPTY_MAPPING)).toEqual({
        "process.memory": "4GB",
        "process.clusterOptions": "--qos=oneida",
      })
    })

    it("extracts selectors declared in a profile", async () => {
      const loaded = await load(fragments)
      const incd = new Map(loaded.profiles).get("incd")

      expect(flat(incd?.root ?? EMPTY_MAPPING)).toEqual({ "process.memory": "4GB" })
      expect(incd?.selectors.map((selector) => selector.pattern)).toEqual(["chewbbaca"])
      expect(incd?.selectors[0]?.declaredBy).toBe("profile:incd")
      expect(flat(incd?.selectors[0]?.overrides ?? EMPTY_MAPPING)).toEqual({
        "process.queue": "chewBBACA",
      })
    })

    it("inlines includes inside a profile into that profile", async () => {
      const loaded = await load(fragments)
      const local = new Map(loaded.profiles).get("local")

      expect(loaded.fragments).toEqual(["main.config", "more.config", "local.config"])
      expect([...walkLeaves(local?.root ?? EMPTY_MAPPING)]).toEqual([
        ["executor", { kind: "static", value: "local", origin: "profile:local" }],
      ])
    })

    it("inlines includes inside a profile block under the block path", async () => {
      const loaded = await load({
        "main.config": 'profiles { big { process { includeConfig "big.config" } } }',
        "big.config": "memory = 16.GB",
      })

      expect(flat(new Map(loaded.profiles).get("big")?.root ?? EMPTY_MAPPING)).toEqual({
        "process.memory": "16GB",
      })
    })

    it("rejects profiles in a fragment included inside a profile", async () => {
      await expect(
        load({
          "main.config": 'profiles { p { includeConfig "inner.config" } }',
          "inner.config": "profiles { q { } }",
        }),
      ).rejects.toThrow("inner.config:1:1: profiles cannot be nested inside a profile")
    })

    it("rejects profiles in a fragment included inside a block", async () => {
      await expect(
        load({
          "main.config": 'process { includeConfig "inner.config" }',
          "inner.config": "profiles { q { } }",
        }),
      ).rejects.toThrow("inner.config:1:1: profiles can only be declared at the top level")
    })
  })

  describe("selectors", () => {
    it("groups selector overrides per layer", async () => {
      const loaded = await load({
        "main.config": `
          process {
            cpus = 1
            $fastqc.cpus = 4
            $fastqc { memory = 2.GB }
          }
        `,
      })
      const [layer] = loaded.layers

      expect(layer?.selectors).toHaveLength(1)
      expect(flat(layer?.selectors[0]?.overrides ?? EMPTY_MAPPING)).toEqual({
        "process.cpus": 4,
        "process.memory": "2GB",
      })
    })

    it("scopes an include inside a selector block to that selector", async () => {
      const loaded = await load({
        "main.config": 'process { $fastqc { includeConfig "fastqc.config" } }',
        "fastqc.config": "cpus = 2",
      })
      const included = loaded.layers.find((layer) => layer.provenance === "fragment:fastqc.config")

      expect(flat(included?.root ?? EMPTY_MAPPING)).toEqual({})
      expect(included?.selectors[0]?.pattern).toBe("fastqc")
      expect(flat(included?.selectors[0]?.overrides ?? EMPTY_MAPPING)).toEqual({ "process.cpus": 2 })
    })

    it("rejects a selector in a fragment included inside a selector", async () => {
      await expect(
        load({
          "main.config": 'process { $fastqc { includeConfig "fastqc.config" } }',
          "fastqc.config": "$other.cpus = 2",
        }),
      ).rejects.toThrow("fastqc.config:1:1: selectors cannot be nested")
    })
  })

  it("logs each fragment read at debug", async () => {
    const logger = mock<Logger>()

    await new FragmentLoader(new MemoryFragmentReader({ "main.config": "x = 1" }), logger).load(
      "main.config",
    )

    expect(logger.debug).toHaveBeenCalledWith("Read configuration fragment", {
      fragment: "main.config",
      bytes: 5,
    })
  })
})
