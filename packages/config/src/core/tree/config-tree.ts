import type { ConfigLeaf, ConfigMapping, ConfigNode } from "../../ports/config-node"
import type { Layer, Provenance, Selector } from "../../ports/layer"
import { ParseError } from "../errors"
import {
  isSelectorSegment,
  type PathSegment,
  SELECTOR_SIGIL,
  type SourceLocation,
  type ValueNode,
} from "../syntax/ast"

export function createMapping(entries: Iterable<readonly [string, ConfigNode]>): ConfigMapping {
  const mapping: ConfigMapping = { kind: "mapping", entries: new Map(entries) }

  return Object.freeze(mapping)
}

export const EMPTY_MAPPING = createMapping([])

export function isMapping(node: ConfigNode): node is ConfigMapping {
  return node.kind === "mapping"
}

/**
 * Leaves of `mapping` with their dotted keys, depth first in key order.
 * Empty mappings contribute nothing.
 */
export function* walkLeaves(
  mapping: ConfigMapping,
  prefix = "",
): Generator<[key: string, leaf: ConfigLeaf]> {
  for (const [key, node] of mapping.entries) {
    const path = prefix ? `${prefix}.${key}` : key

    if (isMapping(node)) {
      yield* walkLeaves(node, path)
    } else {
      yield [path, node]
    }
  }
}

function createLeaf(value: ValueNode, origin: Provenance): ConfigLeaf {
  const leaf: ConfigLeaf =
    value.kind === "scalar"
      ? { kind: "static", value: value.value, origin }
      : {
          kind: "dynamic",
          expression: value.expression.source,
          origin,
          evaluate: value.expression.evaluate,
        }

  return Object.freeze(leaf)
}

/**
 * Mutable mapping used while a layer is built. Within one draft a later
 * assignment replaces an earlier one, a mapping replacing a leaf included.
 */
class MappingDraft {
  private readonly entries = new Map<string, ConfigLeaf | MappingDraft>()

  get size(): number {
    return this.entries.size
  }

  set(path: readonly string[], leaf: ConfigLeaf): void {
    const [key, ...rest] = path

    if (key === undefined) return

    if (rest.length === 0) {
      this.entries.set(key, leaf)
    } else {
      this.child(key).set(rest, leaf)
    }
  }

  ensure(path: readonly string[]): void {
    const [key, ...rest] = path

    if (key === undefined) return

    this.child(key).ensure(rest)
  }

  build(): ConfigMapping {
    return createMapping(
      [...this.entries].map(([key, node]): [string, ConfigNode] => [
        key,
        node instanceof MappingDraft ? node.build() : node,
      ]),
    )
  }

  private child(key: string): MappingDraft {
    const existing = this.entries.get(key)

    if (existing instanceof MappingDraft) return existing

    const draft = new MappingDraft()

    this.entries.set(key, draft)
    return draft
  }
}

export type StatementSite = {
  readonly fragment: string
  readonly location: SourceLocation
}

type Target = {
  readonly draft: MappingDraft
  readonly path: readonly string[]
}

/**
 * Collects the assignments that make up one {@link Layer}.
 *
 * Paths may carry one selector segment; what follows it, together with what
 * precedes it, becomes an override of that selector rooted at the top of
 * the tree.
 */
export class LayerDraft {
  private readonly root = new MappingDraft()
  private readonly selectors = new Map<string, MappingDraft>()

  constructor(readonly provenance: Provenance) {}

  get isEmpty(): boolean {
    return this.root.size === 0 && this.selectors.size === 0
  }

  assign(path: readonly PathSegment[], value: ValueNode, site: StatementSite): void {
    const { draft, path: keys, pattern } = this.locate(path, site)

    if (keys.length === 0) {
      throw new ParseError(
        site.fragment,
        site.location,
        `selector '${SELECTOR_SIGIL}${pattern}' needs a key to set`,
      )
    }

    const origin: Provenance = pattern === undefined ? this.provenance : `selector:${pattern}`

    draft.set(keys, createLeaf(value, origin))
  }

  /** Records a (possibly empty) block at `path` */
  declare(path: readonly PathSegment[], site: StatementSite): void {
    const { draft, path: keys } = this.locate(path, site)

    draft.ensure(keys)
  }

  build(): Layer {
    const selectors = [...this.selectors].map(([pattern, draft]): Selector =>
      Object.freeze({
        pattern,
        overrides: draft.build(),
        declaredBy: this.provenance,
      }),
    )
    const layer: Layer = {
      provenance: this.provenance,
      root: this.root.build(),
      selectors: Object.freeze(selectors),
    }

    return Object.freeze(layer)
  }

  private locate(
    path: readonly PathSegment[],
    site: StatementSite,
  ): Target & { pattern?: string } {
    const selectorSegments = path.filter(isSelectorSegment)
    const [segment, ...nested] = selectorSegments

    if (segment === undefined) return { draft: this.root, path }

    if (nested.length > 0) {
      throw new ParseError(site.fragment, site.location, "selectors cannot be nested")
    }

    const pattern = segment.slice(SELECTOR_SIGIL.length)
    let draft = this.selectors.get(pattern)

    if (!draft) {
      draft = new MappingDraft()
      this.selectors.set(pattern, draft)
    }

    return { draft, path: path.filter((part) => part !== segment), pattern }
  }
}
