import type { Scalar } from "../../ports/config-node"
import type { Provenance } from "../../ports/layer"
import type { IResolvedConfig } from "../../ports/resolved-config"
import { MissingKeyError } from "../errors"

export class ResolvedConfig implements IResolvedConfig {
  readonly value: Readonly<Record<string, Scalar>>
  readonly selectorsApplied: readonly string[]

  constructor(
    readonly process: string,
    readonly attempt: number,
    private readonly values: ReadonlyMap<string, Scalar>,
    private readonly origins: ReadonlyMap<string, Provenance>,
    selectorsApplied: readonly string[],
  ) {
    this.value = Object.freeze(Object.fromEntries(values))
    this.selectorsApplied = Object.freeze([...selectorsApplied])
  }

  get(key: string): Scalar | undefined {
    return this.values.get(key)
  }

  has(key: string): boolean {
    return this.values.has(key)
  }

  require(key: string): Scalar {
    const value = this.values.get(key)

    if (value === undefined) throw new MissingKeyError(this.process, [key])

    return value
  }

  keys(): string[] {
    return [...this.values.keys()]
  }

  scope(prefix: string): Record<string, Scalar> {
    const head = `${prefix}.`

    return Object.fromEntries(
      [...this.values]
        .filter(([key]) => key.startsWith(head))
        .map(([key, value]) => [key.slice(head.length), value]),
    )
  }

  explain(key: string): Provenance | undefined {
    return this.origins.get(key)
  }

  sourcesUsed(): Provenance[] {
    return [...new Set(this.origins.values())]
  }
}
