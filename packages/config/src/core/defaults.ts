import type { Layer } from "../ports/layer"
import { ParseError } from "./errors"
import type { PathSegment, Statement } from "./syntax/ast"
import { parseFragment } from "./syntax/parser"
import { LayerDraft } from "./tree/config-tree"

export const DEFAULTS_FRAGMENT = "<defaults>"

/** Lowest layer of every stack unless the host supplies its own */
export const DEFAULT_CONFIGURATION = `
process {
    cpus = 1
    memory = "1GB"
    errorStrategy = { task.attempt <= 7 ? "retry" : "ignore" }
}
`

/**
 * Parses defaults text into the `defaults` layer. Defaults stand alone: they
 * can neither include fragments nor declare profiles.
 */
export function buildDefaultsLayer(text: string = DEFAULT_CONFIGURATION): Layer {
  const draft = new LayerDraft("defaults")

  apply(parseFragment(text, DEFAULTS_FRAGMENT), [], draft)

  return draft.build()
}

function apply(
  statements: readonly Statement[],
  prefix: readonly PathSegment[],
  draft: LayerDraft,
): void {
  for (const statement of statements) {
    const site = { fragment: DEFAULTS_FRAGMENT, location: statement.location }

    switch (statement.kind) {
      case "assign":
        draft.assign([...prefix, ...statement.path], statement.value, site)
        break

      case "block": {
        const path = [...prefix, ...statement.path]

        draft.declare(path, site)
        apply(statement.body, path, draft)
        break
      }

      case "include":
        throw new ParseError(DEFAULTS_FRAGMENT, statement.location, "defaults cannot include fragments")

      case "profiles":
        throw new ParseError(DEFAULTS_FRAGMENT, statement.location, "defaults cannot declare profiles")
    }
  }
}
