import type { Scalar } from "../../ports/config-node"

/** A directive value, or a dynamic expression evaluated per attempt */
export type DirectiveValue = Scalar | { readonly expression: string }

/** Directives keyed by process name, then by directive */
export type ComponentDirectives = Readonly<
  Record<string, Readonly<Record<string, DirectiveValue>>>
>

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/

function assertIdentifier(kind: string, name: string): void {
  if (!IDENTIFIER.test(name)) {
    throw new RangeError(`${kind} '${name}' is not a valid identifier`)
  }
}

function renderValue(value: DirectiveValue): string {
  if (typeof value === "object") return `{ ${value.expression} }`
  if (typeof value === "string") return JSON.stringify(value)
  if (typeof value === "number" && !Number.isFinite(value)) {
    throw new RangeError(`cannot render non-finite number ${value}`)
  }
  return String(value)
}

/**
 * Renders per-process directives as fragment text, each one a selector
 * override under `process`.
 *
 * A `version` is folded into the `container` of the same process as
 * `container:version`, and is always written as a string.
 *
 * @example
 * ```typescript
 * renderDirectives({ fastqc: { cpus: 2, container: "fastqc", version: "0.11.9" } })
 * // process {
 * //     $fastqc.cpus = 2
 * //     $fastqc.container = "fastqc:0.11.9"
 * // }
 * ```
 */
export function renderDirectives(directives: ComponentDirectives): string {
  const lines: string[] = []

  for (const [processName, settings] of Object.entries(directives)) {
    assertIdentifier("process name", processName)

    const { version } = settings
    const hasContainer = settings.container !== undefined

    for (const [key, value] of Object.entries(settings)) {
      assertIdentifier("directive", key)

      if (key === "version" && hasContainer) continue

      const rendered =
        key === "container" && version !== undefined
          ? renderImage(value, version)
          : key === "version" && typeof value === "number"
            ? JSON.stringify(String(value))
            : renderValue(value)

      lines.push(`    $${processName}.${key} = ${rendered}`)
    }
  }

  return ["process {", ...lines, "}", ""].join("\n")
}

function renderImage(container: DirectiveValue, version: DirectiveValue): string {
  if (typeof container === "object" || typeof version === "object") {
    throw new RangeError("container and version cannot be dynamic values when folded together")
  }
  return JSON.stringify(`${container}:${version}`)
}
