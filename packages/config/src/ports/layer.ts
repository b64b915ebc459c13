import type { ConfigMapping } from "./config-node"

/**
 * Where a layer, or a single value, came from.
 *
 * @example "defaults", "fragment:/etc/pipeline/main.config", "profile:incd", "selector:chewbbaca"
 */
export type Provenance =
  | "defaults"
  | `fragment:${string}`
  | `profile:${string}`
  | `selector:${string}`

/**
 * Overrides scoped to one process.
 *
 * `overrides` is rooted at the top of the configuration tree: `$fastqc.cpus`
 * written inside `process { }` is stored as `{ process: { cpus } }`.
 */
export interface Selector {
  /** Process identifier the overrides apply to (exact match) */
  readonly pattern: string
  readonly overrides: ConfigMapping
  /** Layer whose text declared the selector */
  readonly declaredBy: Provenance
}

export interface Layer {
  readonly provenance: Provenance
  readonly root: ConfigMapping
  /** Selectors declared in this layer, in declaration order */
  readonly selectors: readonly Selector[]
}

/**
 * Layers in precedence order, lowest first: defaults, fragments in include
 * order, then active profiles in request order.
 *
 * `selectors` holds the selectors of all those layers in the same order; they
 * are applied after every layer, whichever layer declared them.
 */
export interface LayerStack {
  readonly layers: readonly Layer[]
  readonly selectors: readonly Selector[]
}
