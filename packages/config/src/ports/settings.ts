/**
 * Validated host settings with the source of each value.
 *
 * @example
 * ```typescript
 * const settings = await loadSettings({
 *   sources: [new DotenvSource({ file: ".env", required: false }), new EnvSource({ prefix: "PIPECONF_" })],
 * })
 *
 * settings.value.ROOT         // "main.config"
 * settings.explain("PROFILES") // "env"
 * ```
 */
export interface ISettings<T extends Record<string, unknown>> {
  readonly value: Readonly<T>

  /**
   * Source that provided the final value of `key`, or "default" when the
   * schema supplied it.
   */
  explain<K extends keyof T & string>(key: K): string

  /** Names of the sources that supplied at least one final value, in key order */
  sourcesUsed(): string[]

  /** Keys some source provided that no setting covers */
  unknownKeys(): string[]
}
