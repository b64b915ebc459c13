import type { Provenance } from "./layer"

export type Scalar = string | number | boolean

/**
 * Per-evaluation input of a {@link DynamicValue}.
 */
export interface RuntimeContext {
  /** Retry attempt of the task, starting at 1 */
  readonly attempt: number
}

export interface StaticValue {
  readonly kind: "static"
  readonly value: Scalar
  /** Layer (or selector) that set this value */
  readonly origin: Provenance
}

/**
 * A value computed from the runtime context at resolve time.
 *
 * `evaluate` is pure: no I/O and no shared mutable state, so concurrent
 * resolutions at different attempts never interfere.
 */
export interface DynamicValue {
  readonly kind: "dynamic"
  /** Expression text as written in the fragment */
  readonly expression: string
  readonly origin: Provenance
  evaluate(ctx: RuntimeContext): Scalar
}

export interface ConfigMapping {
  readonly kind: "mapping"
  /** Keys in first-declaration order */
  readonly entries: ReadonlyMap<string, ConfigNode>
}

export type ConfigLeaf = StaticValue | DynamicValue

export type ConfigNode = ConfigLeaf | ConfigMapping
