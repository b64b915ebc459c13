import type { ISettings } from "../../ports/settings"

export class HostSettings<T extends Record<string, unknown>> implements ISettings<T> {
  readonly value: Readonly<T>

  constructor(
    data: T,
    private readonly provenance: ReadonlyMap<string, string>,
    private readonly provided: ReadonlySet<string>,
  ) {
    this.value = Object.freeze({ ...data })
  }

  explain<K extends keyof T & string>(key: K): string {
    return this.provenance.get(key) ?? "default"
  }

  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  unknownKeys(): string[] {
    return [...this.provided].filter((key) => !(key in this.value))
  }
}
