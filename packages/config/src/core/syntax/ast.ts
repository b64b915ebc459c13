import type { Scalar } from "../../ports/config-node"
import type { CompiledExpression } from "../dynamic/expression"

export interface SourceLocation {
  /** 1 based */
  readonly line: number
  /** 1 based */
  readonly column: number
}

export const SELECTOR_SIGIL = "$"

/**
 * One segment of a key path. Selector segments keep their sigil
 * (`$chewbbaca`), which no plain identifier can start with.
 */
export type PathSegment = string

export function isSelectorSegment(segment: PathSegment): boolean {
  return segment.startsWith(SELECTOR_SIGIL)
}

export type ValueNode =
  | { readonly kind: "scalar"; readonly value: Scalar; readonly location: SourceLocation }
  | {
      readonly kind: "dynamic"
      readonly expression: CompiledExpression
      readonly location: SourceLocation
    }

/** `process.memory = "1GB"` */
export interface AssignStatement {
  readonly kind: "assign"
  readonly path: readonly PathSegment[]
  readonly value: ValueNode
  readonly location: SourceLocation
}

/** `process { ... }` */
export interface BlockStatement {
  readonly kind: "block"
  readonly path: readonly PathSegment[]
  readonly body: readonly Statement[]
  readonly location: SourceLocation
}

/** `includeConfig "conf/base.config"` */
export interface IncludeStatement {
  readonly kind: "include"
  readonly ref: string
  readonly location: SourceLocation
}

export interface ProfileDeclaration {
  readonly name: string
  readonly body: readonly Statement[]
  readonly location: SourceLocation
}

/** `profiles { standard { ... } incd { ... } }` */
export interface ProfilesStatement {
  readonly kind: "profiles"
  readonly profiles: readonly ProfileDeclaration[]
  readonly location: SourceLocation
}

export type Statement = AssignStatement | BlockStatement | IncludeStatement | ProfilesStatement
