import { z } from "zod"
import type { IResolvedConfig } from "../../ports/resolved-config"
import { parseDuration, parseSize } from "../dynamic/quantity"
import { InvalidDirectivesError } from "../errors"

export const errorStrategies = ["retry", "ignore", "terminate", "finish"] as const

export type ErrorStrategy = (typeof errorStrategies)[number]

function parses(parse: (text: string) => number) {
  return (text: string) => {
    try {
      parse(text)
      return true
    } catch {
      return false
    }
  }
}

export const directivesSchema = z.object({
  cpus: z.number().int().positive().optional(),
  memory: z.string().refine(parses(parseSize), { error: "expected a size such as 4GB" }).optional(),
  time: z.string().refine(parses(parseDuration), { error: "expected a duration such as 2h" }).optional(),
  container: z.string().optional(),
  version: z.string().optional(),
  queue: z.string().optional(),
  clusterOptions: z.string().optional(),
  executor: z.string().optional(),
  errorStrategy: z.enum(errorStrategies).optional(),
  maxRetries: z.number().int().nonnegative().optional(),
})

const knownDirectives: ReadonlySet<string> = new Set(Object.keys(directivesSchema.shape))

export type ProcessDirectives = z.infer<typeof directivesSchema> & {
  /** `memory` in bytes */
  memoryBytes?: number
  /** `time` in milliseconds */
  timeMs?: number
  /** `container:version`, or `container` when no version is set */
  image?: string
  /** Keys of the process scope no directive covers, e.g. misspellings */
  unknownKeys: string[]
}

/**
 * Typed view of the `process` scope of a resolved configuration, what an
 * executor reads to dispatch the task.
 *
 * @throws InvalidDirectivesError when a directive has the wrong type or
 * format (`cpus = "two"`, `memory = "lots"`).
 */
export function readDirectives(config: IResolvedConfig): ProcessDirectives {
  const scope = config.scope("process")
  const result = directivesSchema.safeParse(scope)

  if (!result.success) {
    throw new InvalidDirectivesError(config.process, z.prettifyError(result.error))
  }

  const directives = result.data
  const { container, version, memory, time } = directives

  return {
    ...directives,
    ...(memory !== undefined && { memoryBytes: parseSize(memory) }),
    ...(time !== undefined && { timeMs: parseDuration(time) }),
    ...(container !== undefined && {
      image: version === undefined ? container : `${container}:${version}`,
    }),
    unknownKeys: Object.keys(scope).filter((key) => !knownDirectives.has(key)),
  }
}
