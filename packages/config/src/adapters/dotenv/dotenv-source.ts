import fs from "node:fs/promises"
import path from "node:path"
import { parse } from "dotenv"
import type { SettingsSource } from "../../ports/settings-source"

export type DotenvSourceOptions = {
  /**
   * Path to the .env file, absolute or relative to `cwd`.
   *
   * @example ".env", ".env.cluster"
   */
  file: string

  /** When false, a missing file provides no settings instead of failing */
  required: boolean

  /** @default process.cwd() */
  cwd?: string

  /**
   * Only keys starting with `prefix` are kept, with the prefix stripped.
   * Unprefixed files are read whole.
   */
  prefix?: string
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT"
}

export class DotenvSource implements SettingsSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, string | undefined>> {
    const filePath = path.resolve(this.opts.cwd ?? process.cwd(), this.opts.file)
    let content: string

    try {
      content = await fs.readFile(filePath, "utf-8")
    } catch (err) {
      if (!this.opts.required && isNotFound(err)) return {}
      throw err
    }

    const parsed = parse(content)
    const { prefix } = this.opts

    if (!prefix) return parsed

    return Object.fromEntries(
      Object.entries(parsed)
        .filter(([key]) => key.startsWith(prefix))
        .map(([key, value]) => [key.slice(prefix.length), value]),
    )
  }
}
