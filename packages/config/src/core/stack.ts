import type { Layer, LayerStack } from "../ports/layer"

export function buildLayerStack(
  defaults: Layer,
  fragments: readonly Layer[],
  profiles: readonly Layer[],
): LayerStack {
  const layers = Object.freeze([defaults, ...fragments, ...profiles])
  const stack: LayerStack = {
    layers,
    selectors: Object.freeze(layers.flatMap((layer) => layer.selectors)),
  }

  return Object.freeze(stack)
}
