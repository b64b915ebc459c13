import type { Selector } from "../../ports/layer"

/**
 * Selectors that apply to `processName`, in the order given.
 *
 * Patterns are exact process identifiers: `$chewbbaca` applies to
 * `chewbbaca` and to nothing else. No match is the common case.
 */
export function matchSelectors(
  processName: string,
  selectors: readonly Selector[],
): Selector[] {
  return selectors.filter((selector) => selector.pattern === processName)
}
