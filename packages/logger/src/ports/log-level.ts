export const logLevelNames = ["trace", "debug", "info", "warn", "error", "fatal"] as const

export type LogLevelName = (typeof logLevelNames)[number]

/**
 * Numeric log severity levels (higher = more severe).
 */
export const LogLevels = {
  /** Per-resolution detail: selectors matched, values evaluated. */
  Trace: 10,
  /** Load-phase detail: each fragment read, each profile activated. */
  Debug: 20,
  /** One-off milestones such as a completed load. */
  Info: 30,
  /** Suspicious configuration that still resolves. */
  Warn: 40,
  /** A failed load. */
  Error: 50,
  Fatal: 60,
} as const

export type LogLevel = (typeof LogLevels)[keyof typeof LogLevels]

export function isLogLevelName(value: string): value is LogLevelName {
  return logLevelNames.some((name) => name === value)
}
