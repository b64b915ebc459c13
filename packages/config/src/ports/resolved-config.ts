import type { Scalar } from "./config-node"
import type { Provenance } from "./layer"

/**
 * Final configuration of one process at one attempt.
 *
 * Keys are dotted paths into the configuration tree and every value is a
 * scalar: no dynamic value or selector is left to interpret.
 *
 * @example
 * ```typescript
 * const engine = await loadConfiguration({ root: "main.config", profiles: ["incd"] })
 * const config = engine.resolve("chewbbaca", 1)
 *
 * config.get("process.queue")     // "chewBBACA"
 * config.explain("process.queue") // "selector:chewbbaca"
 * config.scope("process")         // { cpus: 1, memory: "4GB", queue: "chewBBACA", ... }
 * ```
 */
export interface IResolvedConfig {
  readonly process: string
  readonly attempt: number

  /** Full flat mapping, frozen */
  readonly value: Readonly<Record<string, Scalar>>

  /** Patterns of the selectors applied, in application order */
  readonly selectorsApplied: readonly string[]

  get(key: string): Scalar | undefined

  has(key: string): boolean

  /**
   * Value of a key the caller cannot do without.
   *
   * @throws MissingKeyError when no layer set `key`.
   */
  require(key: string): Scalar

  keys(): string[]

  /**
   * Entries under `prefix` with the prefix stripped.
   *
   * @example config.scope("process") // { cpus: 1, memory: "1GB" }
   */
  scope(prefix: string): Record<string, Scalar>

  /**
   * Layer or selector that provided the final value of `key`, or `undefined`
   * when the key is absent.
   */
  explain(key: string): Provenance | undefined

  /**
   * Distinct provenances that supplied at least one final value, in key order.
   */
  sourcesUsed(): Provenance[]
}
