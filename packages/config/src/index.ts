export {
  DEFAULT_ENV_PREFIX,
  EnvSource,
  type EnvSourceOptions,
} from "./adapters/env/env-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { FsFragmentReader, type FsFragmentReaderOptions } from "./adapters/fs/fs-fragment-reader"
export { MemoryFragmentReader } from "./adapters/memory/memory-fragment-reader"
export { buildDefaultsLayer, DEFAULT_CONFIGURATION } from "./core/defaults"
export {
  directivesSchema,
  type ErrorStrategy,
  errorStrategies,
  type ProcessDirectives,
  readDirectives,
} from "./core/directives/directives"
export {
  type ComponentDirectives,
  type DirectiveValue,
  renderDirectives,
} from "./core/directives/render-directives"
export { type CompiledExpression, createDynamicValue } from "./core/dynamic/expression"
export {
  type Dimension,
  type DurationUnit,
  parseDuration,
  parseQuantity,
  parseSize,
  type Quantity,
  type SizeUnit,
  type Unit,
} from "./core/dynamic/quantity"
export {
  ConfigEngine,
  type LoadConfigurationOptions,
  loadConfiguration,
  type ResolveOptions,
} from "./core/engine"
export {
  CyclicIncludeError,
  FragmentReadError,
  InvalidDirectivesError,
  InvalidDynamicValueError,
  MissingFragmentError,
  MissingKeyError,
  ParseError,
  UnknownProfileError,
} from "./core/errors"
export { FragmentLoader, type LoadedFragments } from "./core/loader/fragment-loader"
export { merge, mergeMappings, mergeNodes } from "./core/merge/merge-engine"
export { ProfileRegistry } from "./core/profiles/profile-registry"
export { resolveConfig } from "./core/resolve/resolve"
export { ResolvedConfig } from "./core/resolve/resolved-config"
export { matchSelectors } from "./core/selectors/selector-matcher"
export { HostSettings } from "./core/settings/host-settings"
export {
  type LoadFromSettingsOptions,
  type LoadSettingsOptions,
  loadConfigurationFromSettings,
  loadSettings,
  type Settings,
  settingsSchema,
} from "./core/settings/load-settings"
export { buildLayerStack } from "./core/stack"
export type { SourceLocation } from "./core/syntax/ast"
export { parseFragment } from "./core/syntax/parser"
export { walkLeaves } from "./core/tree/config-tree"
export type {
  ConfigLeaf,
  ConfigMapping,
  ConfigNode,
  DynamicValue,
  RuntimeContext,
  Scalar,
  StaticValue,
} from "./ports/config-node"
export type { FragmentReader } from "./ports/fragment-reader"
export type { Layer, LayerStack, Provenance, Selector } from "./ports/layer"
export type { IResolvedConfig } from "./ports/resolved-config"
export type { ISettings } from "./ports/settings"
export type { SettingsSource } from "./ports/settings-source"
