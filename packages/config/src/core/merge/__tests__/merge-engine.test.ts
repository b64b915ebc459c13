import type { ConfigMapping, ConfigNode, Scalar } from "../../../ports/config-node"
import type { Provenance } from "../../../ports/layer"
import { createMapping, EMPTY_MAPPING, walkLeaves } from "../../tree/config-tree"
import { merge, mergeNodes } from "../merge-engine"

type Tree = { [key: string]: Scalar | Tree }

function tree(shape: Tree, origin: Provenance = "defaults"): ConfigMapping {
  return createMapping(
    Object.entries(shape).map(([key, value]): [string, ConfigNode] => [
      key,
      typeof value === "object"
        ? tree(value, origin)
        : { kind: "static", value, origin },
    ]),
  )
}

function flat(mapping: ConfigMapping): Array<[string, Scalar, Provenance]> {
  return [...walkLeaves(mapping)].map(([key, leaf]) => [
    key,
    leaf.kind === "static" ? leaf.value : leaf.expression,
    leaf.origin,
  ])
}

describe("merge", () => {
  it("unions keys of nested mappings, later values winning", () => {
    const defaults = tree({ process: { cpus: 1, memory: "1GB" } })
    const profile = tree({ process: { memory: "4GB", queue: "normal" } }, "profile:oneida")

    expect(flat(merge([defaults, profile]))).toEqual([
      ["process.cpus", 1, "defaults"],
      ["process.memory", "4GB", "profile:oneida"],
      ["process.queue", "normal", "profile:oneida"],
    ])
  })

  it("replaces a mapping with a scalar and a scalar with a mapping", () => {
    const base = tree({ a: { b: 1 }, c: 2 })
    const override = tree({ a: 3, c: { d: 4 } }, "fragment:x")

    expect(flat(merge([base, override]))).toEqual([
      ["a", 3, "fragment:x"],
      ["c.d", 4, "fragment:x"],
    ])
  })

  it("applies layers in order", () => {
    const layers = [tree({ x: 1 }), tree({ x: 2 }), tree({ x: 3 })]

    expect(flat(merge(layers))).toEqual([["x", 3, "defaults"]])
    expect(flat(merge([...layers].reverse()))).toEqual([["x", 1, "defaults"]])
  })

  it("keeps base key order and appends new keys", () => {
    const merged = merge([tree({ b: 1, a: 1 }), tree({ c: 2, a: 2 })])

    expect([...merged.entries.keys()]).toEqual(["b", "a", "c"])
  })

  it("returns an empty mapping for no layers", () => {
    expect(merge([])).toBe(EMPTY_MAPPING)
  })

  it("is idempotent", () => {
    const x = tree({ process: { cpus: 2, env: { A: "1" } }, executor: "slurm" })

    expect(flat(merge([x, x]))).toEqual(flat(x))
    expect(flat(merge([merge([x]), x]))).toEqual(flat(merge([x])))
  })

  it("is deterministic", () => {
    const layers = [tree({ a: { b: 1 } }), tree({ a: { c: 2 }, d: 3 }, "profile:p")]

    expect(flat(merge(layers))).toEqual(flat(merge(layers)))
  })

  it("leaves its inputs untouched", () => {
    const base = tree({ process: { cpus: 1 } })
    const override = tree({ process: { cpus: 4 } })

    merge([base, override])

    expect(flat(base)).toEqual([["process.cpus", 1, "defaults"]])
  })

  it("treats dynamic values as opaque leaves", () => {
    const dynamic: ConfigNode = {
      kind: "dynamic",
      expression: "task.attempt",
      origin: "fragment:x",
      evaluate: (ctx) => ctx.attempt,
    }

    expect(mergeNodes(tree({ a: 1 }), dynamic)).toBe(dynamic)
    expect(mergeNodes(dynamic, tree({ a: 1 }))).toEqual(tree({ a: 1 }))
  })
})
