import type { ConfigMapping, RuntimeContext, Scalar } from "../../ports/config-node"
import type { Provenance, Selector } from "../../ports/layer"
import { merge } from "../merge/merge-engine"
import { matchSelectors } from "../selectors/selector-matcher"
import { walkLeaves } from "../tree/config-tree"
import { ResolvedConfig } from "./resolved-config"

export function assertRuntimeContext(ctx: RuntimeContext): void {
  if (!Number.isInteger(ctx.attempt) || ctx.attempt < 1) {
    throw new RangeError(`attempt must be a positive integer (got ${ctx.attempt})`)
  }
}

/**
 * Configuration of `processName` at `ctx.attempt`: the base tree with the
 * matching selectors merged over it, every dynamic value evaluated, flattened
 * to dotted keys.
 *
 * Reads only its arguments and allocates everything it returns, so any number
 * of resolutions may run side by side.
 */
export function resolveConfig(
  base: ConfigMapping,
  selectors: readonly Selector[],
  processName: string,
  ctx: RuntimeContext,
): ResolvedConfig {
  if (!processName) {
    throw new RangeError("process name must be a non-empty string")
  }

  assertRuntimeContext(ctx)

  const matched = matchSelectors(processName, selectors)
  const tree = merge([base, ...matched.map((selector) => selector.overrides)])
  const values = new Map<string, Scalar>()
  const origins = new Map<string, Provenance>()

  for (const [key, leaf] of walkLeaves(tree)) {
    values.set(key, leaf.kind === "static" ? leaf.value : leaf.evaluate(ctx))
    origins.set(key, leaf.origin)
  }

  return new ResolvedConfig(processName, ctx.attempt, values, origins, [
    ...new Set(matched.map((selector) => selector.pattern)),
  ])
}
