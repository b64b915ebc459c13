import type { ConfigMapping, ConfigNode } from "../../ports/config-node"
import { createMapping, EMPTY_MAPPING, isMapping } from "../tree/config-tree"

/**
 * Deep merge of two nodes, `override` winning.
 *
 * Two mappings merge key by key: keys of `base` keep their position and keys
 * new in `override` follow in their own order. Any other pair, a shape
 * mismatch included, resolves to `override` as a whole.
 */
export function mergeNodes(base: ConfigNode, override: ConfigNode): ConfigNode {
  if (!isMapping(base) || !isMapping(override)) return override

  return mergeMappings(base, override)
}

export function mergeMappings(base: ConfigMapping, override: ConfigMapping): ConfigMapping {
  if (override.entries.size === 0) return base
  if (base.entries.size === 0) return override

  const merged = new Map(base.entries)

  for (const [key, node] of override.entries) {
    const existing = merged.get(key)

    merged.set(key, existing === undefined ? node : mergeNodes(existing, node))
  }

  return createMapping(merged)
}

/**
 * Merges mappings lowest precedence first. The result shares unchanged
 * subtrees with its inputs, which are never modified.
 */
export function merge(mappings: Iterable<ConfigMapping>): ConfigMapping {
  let result = EMPTY_MAPPING

  for (const mapping of mappings) {
    result = mergeMappings(result, mapping)
  }

  return result
}
