/**
 * A source of host settings: where the engine finds its root fragment,
 * which profiles to activate and how to log.
 *
 * Sources only load raw strings. Validation and defaults belong to
 * `loadSettings`, and later sources override earlier ones there.
 */
export interface SettingsSource {
  /**
   * Human-readable name, reported by `explain`.
   * Example: "env", "dotenv:.env"
   */
  readonly name: string

  /**
   * Raw settings keyed by name without prefix. An `undefined` value means
   * "not provided".
   */
  load(): Promise<Record<string, string | undefined>>
}
