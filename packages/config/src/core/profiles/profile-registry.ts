import type { Layer } from "../../ports/layer"
import { UnknownProfileError } from "../errors"

/**
 * Named profiles found while loading, each a layer of its own.
 *
 * The registry is a value: build one per load and pass it along.
 */
export class ProfileRegistry {
  private readonly profiles: ReadonlyMap<string, Layer>

  constructor(profiles: Iterable<readonly [name: string, layer: Layer]>) {
    this.profiles = new Map(profiles)
  }

  /** Profile names in declaration order */
  names(): string[] {
    return [...this.profiles.keys()]
  }

  has(name: string): boolean {
    return this.profiles.has(name)
  }

  get(name: string): Layer | undefined {
    return this.profiles.get(name)
  }

  /**
   * Layers of the requested profiles in request order, later ones taking
   * precedence when merged.
   *
   * @throws UnknownProfileError for the first name no fragment declared.
   */
  activate(names: readonly string[]): Layer[] {
    return names.map((name) => {
      const layer = this.profiles.get(name)

      if (!layer) throw new UnknownProfileError(name, this.names())

      return layer
    })
  }
}
