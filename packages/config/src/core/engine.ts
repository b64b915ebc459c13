import { type Logger, NullLogger } from "@pipeconf/logger"
import { FsFragmentReader } from "../adapters/fs/fs-fragment-reader"
import type { ConfigMapping, RuntimeContext } from "../ports/config-node"
import type { FragmentReader } from "../ports/fragment-reader"
import type { LayerStack } from "../ports/layer"
import { buildDefaultsLayer } from "./defaults"
import { type ProcessDirectives, readDirectives } from "./directives/directives"
import { MissingKeyError } from "./errors"
import { FragmentLoader } from "./loader/fragment-loader"
import { merge } from "./merge/merge-engine"
import { ProfileRegistry } from "./profiles/profile-registry"
import { resolveConfig } from "./resolve/resolve"
import type { ResolvedConfig } from "./resolve/resolved-config"
import { buildLayerStack } from "./stack"

export type LoadConfigurationOptions = {
  /** Root fragment, resolved by the reader (relative to its cwd for the filesystem) */
  root: string

  /** Profiles to activate, lowest precedence first */
  profiles?: readonly string[]

  /** @default new FsFragmentReader() */
  reader?: FragmentReader

  /**
   * Fragment text replacing the built-in defaults. It can neither include
   * fragments nor declare profiles.
   */
  defaults?: string

  logger?: Logger
}

export type ResolveOptions = {
  /** Keys the caller cannot do without; any of them missing fails the resolution */
  required?: readonly string[]
}

/**
 * Loaded configuration: an immutable layer stack and its merged base tree,
 * resolved per process and attempt on demand.
 *
 * Nothing is cached between resolutions; each call reads only the base tree
 * and the selectors.
 */
export class ConfigEngine {
  constructor(
    readonly stack: LayerStack,
    readonly registry: ProfileRegistry,
    readonly activeProfiles: readonly string[],
    readonly base: ConfigMapping,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  /**
   * @throws RangeError when `attempt` is not a positive integer or
   * `processName` is empty.
   * @throws MissingKeyError listing the `required` keys no layer set.
   */
  resolve(
    processName: string,
    attempt: number | RuntimeContext,
    options: ResolveOptions = {},
  ): ResolvedConfig {
    const ctx = typeof attempt === "number" ? { attempt } : attempt
    const config = resolveConfig(this.base, this.stack.selectors, processName, ctx)
    const missing = (options.required ?? []).filter((key) => !config.has(key))

    this.logger.trace("Resolved configuration", {
      process: processName,
      attempt: ctx.attempt,
      keys: config.keys().length,
      selectors: config.selectorsApplied,
    })

    if (missing.length > 0) throw new MissingKeyError(processName, missing)

    return config
  }

  /**
   * @throws InvalidDirectivesError when a `process` directive is ill-formed.
   */
  directives(processName: string, attempt: number | RuntimeContext): ProcessDirectives {
    const config = this.resolve(processName, attempt)
    const directives = readDirectives(config)

    if (directives.unknownKeys.length > 0) {
      this.logger.warn("Unknown process directives", {
        process: processName,
        attempt: config.attempt,
        keys: directives.unknownKeys,
      })
    }

    return directives
  }
}

/**
 * Reads the root fragment and everything it includes, activates the requested
 * profiles and merges the layers into the base tree.
 *
 * @throws ParseError, InvalidDynamicValueError, MissingFragmentError,
 * FragmentReadError, CyclicIncludeError or UnknownProfileError. A failed load
 * yields no configuration.
 *
 * @example
 * ```typescript
 * const engine = await loadConfiguration({ root: "main.config", profiles: ["incd"] })
 *
 * engine.resolve("chewbbaca", 1).get("process.queue") // "chewBBACA"
 * ```
 */
export async function loadConfiguration(options: LoadConfigurationOptions): Promise<ConfigEngine> {
  const logger = (options.logger ?? new NullLogger()).child({ module: "config" })
  const requested = options.profiles ?? []

  try {
    const defaults = buildDefaultsLayer(options.defaults)
    const loader = new FragmentLoader(options.reader ?? new FsFragmentReader(), logger)
    const loaded = await loader.load(options.root)
    const registry = new ProfileRegistry(loaded.profiles)
    const profiles = registry.activate(requested)

    for (const profile of requested) {
      logger.debug("Activated configuration profile", { profile })
    }

    const stack = buildLayerStack(defaults, loaded.layers, profiles)
    const base = merge(stack.layers.map((layer) => layer.root))

    logger.info("Configuration loaded", {
      root: options.root,
      fragments: loaded.fragments.length,
      layers: stack.layers.length,
      profiles: requested,
      selectors: stack.selectors.length,
    })

    return new ConfigEngine(stack, registry, Object.freeze([...requested]), base, logger)
  } catch (err) {
    logger.error("Failed to load configuration", { err, root: options.root })
    throw err
  }
}
