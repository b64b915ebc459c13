import { BaseError } from "@pipeconf/errors"
import type { SourceLocation } from "./syntax/ast"

function at(fragment: string, location: SourceLocation): string {
  return `${fragment}:${location.line}:${location.column}`
}

export class ParseError extends BaseError<"parse_error"> {
  constructor(
    readonly fragment: string,
    readonly location: SourceLocation,
    detail: string,
  ) {
    super(`${at(fragment, location)}: ${detail}`, {
      code: "parse_error",
      context: { fragment, line: location.line, column: location.column },
    })
  }
}

export type IncludeSite = {
  fragment: string
  location: SourceLocation
}

export class MissingFragmentError extends BaseError<"missing_fragment"> {
  constructor(
    readonly fragment: string,
    readonly includedFrom?: IncludeSite,
  ) {
    const suffix = includedFrom
      ? ` (included from ${at(includedFrom.fragment, includedFrom.location)})`
      : ""

    super(`Configuration fragment not found: ${fragment}${suffix}`, {
      code: "missing_fragment",
      context: {
        fragment,
        ...(includedFrom && { includedFrom: includedFrom.fragment }),
      },
    })
  }
}

export class FragmentReadError extends BaseError<"fragment_read_failed"> {
  constructor(
    readonly fragment: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause)

    super(`Failed to read configuration fragment ${fragment}: ${reason}`, {
      code: "fragment_read_failed",
      context: { fragment },
      cause,
    })
  }
}

export class CyclicIncludeError extends BaseError<"cyclic_include"> {
  constructor(readonly cycle: readonly string[]) {
    super(`Cyclic include: ${cycle.join(" -> ")}`, {
      code: "cyclic_include",
      context: { cycle: [...cycle] },
    })
  }
}

export class UnknownProfileError extends BaseError<"unknown_profile"> {
  constructor(
    readonly profile: string,
    readonly available: readonly string[],
  ) {
    const known = available.length ? available.join(", ") : "none"

    super(`Unknown configuration profile '${profile}' (available: ${known})`, {
      code: "unknown_profile",
      context: { profile, available: [...available] },
    })
  }
}

export type ExpressionSite = {
  fragment: string
  location: SourceLocation
}

export class InvalidDynamicValueError extends BaseError<"invalid_dynamic_value"> {
  constructor(
    readonly expression: string,
    reason: string,
    readonly site?: ExpressionSite,
  ) {
    const where = site ? `${at(site.fragment, site.location)}: ` : ""

    super(`${where}Invalid dynamic value { ${expression} }: ${reason}`, {
      code: "invalid_dynamic_value",
      context: {
        expression,
        ...(site && {
          fragment: site.fragment,
          line: site.location.line,
          column: site.location.column,
        }),
      },
    })
  }
}

export class MissingKeyError extends BaseError<"missing_key"> {
  constructor(
    readonly process: string,
    readonly keys: readonly string[],
  ) {
    super(`Missing required configuration for process '${process}': ${keys.join(", ")}`, {
      code: "missing_key",
      context: { process, keys: [...keys] },
    })
  }
}

export class InvalidDirectivesError extends BaseError<"invalid_directives"> {
  constructor(
    readonly process: string,
    issues: string,
  ) {
    super(`Invalid directives for process '${process}':\n${issues}`, {
      code: "invalid_directives",
      context: { process, issues },
    })
  }
}
