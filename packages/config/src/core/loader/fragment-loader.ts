import { type Logger, NullLogger } from "@pipeconf/logger"
import type { FragmentReader } from "../../ports/fragment-reader"
import type { Layer } from "../../ports/layer"
import {
  CyclicIncludeError,
  FragmentReadError,
  type IncludeSite,
  MissingFragmentError,
  ParseError,
} from "../errors"
import type { PathSegment, Statement } from "../syntax/ast"
import { parseFragment } from "../syntax/parser"
import { LayerDraft, type StatementSite } from "../tree/config-tree"

export type LoadedFragments = {
  /** Fragment layers, lowest precedence first */
  readonly layers: readonly Layer[]
  /** Profile layers by name, in first-declaration order */
  readonly profiles: ReadonlyArray<readonly [name: string, layer: Layer]>
  /** Identities of the fragments read, each once, in read order */
  readonly fragments: readonly string[]
}

/**
 * Where the statements being walked write to.
 *
 * A fragment target owns the layers of one fragment and splits them around
 * each include; a profile target writes into a single profile layer, includes
 * inlined.
 */
interface Target {
  draft(): LayerDraft
  include(id: string, prefix: readonly PathSegment[], site: IncludeSite): Promise<void>
}

type WalkContext = {
  readonly fragment: string
  readonly prefix: readonly PathSegment[]
  readonly target: Target
  /** Why a `profiles` block is rejected here, if it is */
  readonly profilesRejected?: string
}

/**
 * Turns a root fragment and everything it includes into ordered layers.
 *
 * Includes are inlined: the including fragment contributes one layer with
 * what precedes the include and another with what follows it, so later
 * assignments keep overriding earlier ones across fragments.
 *
 * @example
 * ```typescript
 * const loader = new FragmentLoader(new FsFragmentReader({ cwd: "/srv/pipeline" }))
 * const { layers, profiles, fragments } = await loader.load("main.config")
 * ```
 */
export class FragmentLoader {
  constructor(
    private readonly reader: FragmentReader,
    private readonly logger: Logger = new NullLogger(),
  ) {}

  /**
   * @throws ParseError, InvalidDynamicValueError, MissingFragmentError,
   * FragmentReadError or CyclicIncludeError; nothing is returned on failure.
   */
  async load(root: string): Promise<LoadedFragments> {
    return new LoadRun(this.reader, this.logger).run(root)
  }
}

class LoadRun {
  private readonly parsed = new Map<string, readonly Statement[]>()
  private readonly inProgress: string[] = []
  private readonly layers: Layer[] = []
  private readonly profiles = new Map<string, LayerDraft>()

  constructor(
    private readonly reader: FragmentReader,
    private readonly logger: Logger,
  ) {}

  async run(root: string): Promise<LoadedFragments> {
    await this.visitFragment(this.reader.resolve(root), [])

    return {
      layers: this.layers,
      profiles: [...this.profiles].map(([name, draft]) => [name, draft.build()] as const),
      fragments: [...this.parsed.keys()],
    }
  }

  private async visitFragment(
    id: string,
    prefix: readonly PathSegment[],
    site?: IncludeSite,
  ): Promise<void> {
    const statements = await this.enter(id, site)
    let current = new LayerDraft(`fragment:${id}`)

    const flush = () => {
      if (!current.isEmpty) this.layers.push(current.build())
      current = new LayerDraft(`fragment:${id}`)
    }

    const target: Target = {
      draft: () => current,
      include: async (child, childPrefix, includeSite) => {
        flush()
        await this.visitFragment(child, childPrefix, includeSite)
      },
    }

    await this.walk(statements, {
      fragment: id,
      prefix,
      target,
      ...(prefix.length > 0 && {
        profilesRejected: "profiles can only be declared at the top level",
      }),
    })

    flush()
    this.leave(id)
  }

  private profileTarget(draft: LayerDraft): Target {
    return {
      draft: () => draft,
      include: async (child, prefix, site) => {
        const statements = await this.enter(child, site)

        await this.walk(statements, {
          fragment: child,
          prefix,
          target: this.profileTarget(draft),
          profilesRejected: "profiles cannot be nested inside a profile",
        })

        this.leave(child)
      },
    }
  }

  private async walk(statements: readonly Statement[], ctx: WalkContext): Promise<void> {
    for (const statement of statements) {
      const site: StatementSite = { fragment: ctx.fragment, location: statement.location }

      switch (statement.kind) {
        case "assign":
          ctx.target.draft().assign([...ctx.prefix, ...statement.path], statement.value, site)
          break

        case "block": {
          const path = [...ctx.prefix, ...statement.path]

          ctx.target.draft().declare(path, site)
          await this.walk(statement.body, { ...ctx, prefix: path })
          break
        }

        case "include":
          await ctx.target.include(
            this.reader.resolve(statement.ref, ctx.fragment),
            ctx.prefix,
            site,
          )
          break

        case "profiles":
          if (ctx.profilesRejected) {
            throw new ParseError(ctx.fragment, statement.location, ctx.profilesRejected)
          }

          for (const profile of statement.profiles) {
            await this.walk(profile.body, {
              fragment: ctx.fragment,
              prefix: [],
              target: this.profileTarget(this.profileDraft(profile.name)),
              profilesRejected: "profiles cannot be nested inside a profile",
            })
          }
          break
      }
    }
  }

  private profileDraft(name: string): LayerDraft {
    let draft = this.profiles.get(name)

    if (!draft) {
      draft = new LayerDraft(`profile:${name}`)
      this.profiles.set(name, draft)
    }

    return draft
  }

  private async enter(id: string, site?: IncludeSite): Promise<readonly Statement[]> {
    const start = this.inProgress.indexOf(id)

    if (start !== -1) {
      throw new CyclicIncludeError([...this.inProgress.slice(start), id])
    }

    this.inProgress.push(id)

    return this.statements(id, site)
  }

  private leave(id: string): void {
    if (this.inProgress.at(-1) === id) this.inProgress.pop()
  }

  private async statements(id: string, site?: IncludeSite): Promise<readonly Statement[]> {
    const cached = this.parsed.get(id)

    if (cached) return cached

    let text: string | undefined

    try {
      text = await this.reader.read(id)
    } catch (err) {
      throw new FragmentReadError(id, err)
    }

    if (text === undefined) throw new MissingFragmentError(id, site)

    this.logger.debug("Read configuration fragment", { fragment: id, bytes: text.length })

    const statements = parseFragment(text, id)

    this.parsed.set(id, statements)
    return statements
  }
}
