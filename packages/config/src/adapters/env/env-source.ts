import type { SettingsSource } from "../../ports/settings-source"

export const DEFAULT_ENV_PREFIX = "PIPECONF_"

export type EnvSourceOptions = {
  /** Only variables starting with `prefix` are read, with the prefix stripped */
  prefix?: string
  /** @default process.env */
  env?: Readonly<Record<string, string | undefined>>
}

export class EnvSource implements SettingsSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_ENV_PREFIX
    this.env = options.env ?? process.env
  }

  async load(): Promise<Record<string, string | undefined>> {
    const settings: Record<string, string | undefined> = {}

    for (const [key, value] of Object.entries(this.env)) {
      if (key.startsWith(this.prefix)) {
        settings[key.slice(this.prefix.length)] = value
      }
    }

    return settings
  }
}
