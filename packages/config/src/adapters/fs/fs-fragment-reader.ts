import fs from "node:fs/promises"
import path from "node:path"
import type { FragmentReader } from "../../ports/fragment-reader"

/**
 * Options for reading fragments from the filesystem.
 */
export type FsFragmentReaderOptions = {
  /**
   * Base directory for the root fragment. Included fragments resolve
   * against the directory of the fragment that includes them.
   *
   * @default process.cwd()
   */
  cwd?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class FsFragmentReader implements FragmentReader {
  readonly name: string
  private readonly cwd: string

  constructor(opts: FsFragmentReaderOptions = {}) {
    this.cwd = path.resolve(opts.cwd ?? process.cwd())
    this.name = `fs:${this.cwd}`
  }

  resolve(ref: string, from?: string): string {
    return path.resolve(from ? path.dirname(from) : this.cwd, ref)
  }

  async read(id: string): Promise<string | undefined> {
    try {
      return await fs.readFile(id, "utf-8")
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw err
    }
  }
}
