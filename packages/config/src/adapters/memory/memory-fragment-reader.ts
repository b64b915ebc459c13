import path from "node:path"
import type { FragmentReader } from "../../ports/fragment-reader"

const posix = path.posix

function normalize(ref: string): string {
  return posix.normalize(ref)
}

/**
 * Fragments held in memory, keyed by POSIX-style path.
 *
 * @example
 * ```typescript
 * const reader = new MemoryFragmentReader({
 *   "main.config": 'includeConfig "conf/base.config"',
 *   "conf/base.config": "process { cpus = 2 }",
 * })
 * ```
 */
export class MemoryFragmentReader implements FragmentReader {
  readonly name = "memory"
  private readonly fragments: ReadonlyMap<string, string>

  constructor(fragments: Readonly<Record<string, string>> = {}) {
    this.fragments = new Map(
      Object.entries(fragments).map(([id, text]) => [normalize(id), text]),
    )
  }

  resolve(ref: string, from?: string): string {
    if (!from || posix.isAbsolute(ref)) return normalize(ref)

    return normalize(posix.join(posix.dirname(from), ref))
  }

  async read(id: string): Promise<string | undefined> {
    return this.fragments.get(id)
  }
}
