import type { DynamicValue, RuntimeContext, Scalar } from "../../ports/config-node"
import type { Provenance } from "../../ports/layer"
import { type ExpressionSite, InvalidDynamicValueError, ParseError } from "../errors"
import { describeToken, type Token, type TokenKind, tokenize } from "../syntax/lexer"
import {
  canonicalUnit,
  dimensionOf,
  formatQuantity,
  type Quantity,
  toBaseAmount,
  type Unit,
} from "./quantity"

type Value = number | string | boolean | Quantity

type ValueType =
  | { readonly kind: "number" }
  | { readonly kind: "string" }
  | { readonly kind: "boolean" }
  | { readonly kind: "quantity"; readonly unit: Unit }

type Compiled = {
  readonly type: ValueType
  readonly evaluate: (ctx: RuntimeContext) => Value
}

/**
 * A type-checked expression, ready to evaluate against any runtime context.
 */
export interface CompiledExpression {
  /** Expression text, trimmed */
  readonly source: string
  evaluate(ctx: RuntimeContext): Scalar
}

const NUMBER: ValueType = { kind: "number" }
const STRING: ValueType = { kind: "string" }
const BOOLEAN: ValueType = { kind: "boolean" }

const ATTEMPT_REFERENCE = "task.attempt"

const comparisons = new Map<TokenKind, (a: number, b: number) => boolean>([
  ["lt", (a, b) => a < b],
  ["le", (a, b) => a <= b],
  ["gt", (a, b) => a > b],
  ["ge", (a, b) => a >= b],
  ["eq", (a, b) => a === b],
  ["ne", (a, b) => a !== b],
])

function describeType(type: ValueType): string {
  return type.kind === "quantity" ? `quantity (${type.unit})` : type.kind
}

function sameType(a: ValueType, b: ValueType): boolean {
  if (a.kind === "quantity" || b.kind === "quantity") {
    return a.kind === "quantity" && b.kind === "quantity" && a.unit === b.unit
  }
  return a.kind === b.kind
}

function isQuantity(value: Value): value is Quantity {
  return typeof value === "object"
}

function asNumber(value: Value): number {
  if (typeof value === "number") return value
  return isQuantity(value) ? toBaseAmount(value) : Number.NaN
}

function amountOf(value: Value): number {
  return isQuantity(value) ? value.amount : asNumber(value)
}

function toScalar(value: Value): Scalar {
  return isQuantity(value) ? formatQuantity(value) : value
}

/**
 * Compiles the tokens of one expression, ending with an `eof` token.
 *
 * Grammar, lowest precedence first:
 *
 * ```
 * conditional    := comparison ('?' conditional ':' conditional)?
 * comparison     := additive (('<' | '<=' | '>' | '>=' | '==' | '!=') additive)?
 * additive       := multiplicative (('+' | '-') multiplicative)*
 * multiplicative := unary ('*' unary)*
 * unary          := '-' unary | primary
 * primary        := NUMBER ('.' UNIT)? | STRING | 'true' | 'false'
 *                 | 'task.attempt' | '(' conditional ')'
 * ```
 *
 * @throws InvalidDynamicValueError when the expression is malformed or
 * ill-typed.
 */
export function compileExpression(
  tokens: readonly Token[],
  source: string,
  site?: ExpressionSite,
): CompiledExpression {
  const compiled = new ExpressionCompiler(tokens, source, site).compile()

  return {
    source,
    evaluate: (ctx) => {
      try {
        return toScalar(compiled.evaluate(ctx))
      } catch (err) {
        if (err instanceof RangeError) {
          throw new InvalidDynamicValueError(source, err.message, site)
        }
        throw err
      }
    },
  }
}

/**
 * Compiles standalone expression text into a {@link DynamicValue}.
 *
 * @example
 * ```typescript
 * const policy = createDynamicValue('task.attempt <= 7 ? "retry" : "ignore"')
 *
 * policy.evaluate({ attempt: 8 }) // "ignore"
 * ```
 */
export function createDynamicValue(
  expression: string,
  origin: Provenance = "defaults",
): DynamicValue {
  const source = expression.trim()
  let tokens: Token[]

  try {
    tokens = tokenize(source, "<expression>")
  } catch (err) {
    if (err instanceof ParseError) {
      throw new InvalidDynamicValueError(source, err.message)
    }
    throw err
  }

  const compiled = compileExpression(tokens, source)

  return {
    kind: "dynamic",
    expression: compiled.source,
    origin,
    evaluate: compiled.evaluate,
  }
}

class ExpressionCompiler {
  private index = 0
  private readonly eof: Token

  constructor(
    private readonly tokens: readonly Token[],
    private readonly source: string,
    private readonly site?: ExpressionSite,
  ) {
    this.eof = tokens.at(-1) ?? {
      kind: "eof",
      value: "",
      location: { line: 1, column: 1 },
      start: 0,
      end: 0,
    }
  }

  compile(): Compiled {
    if (this.peek().kind === "eof") throw this.error("empty expression")

    const compiled = this.conditional()
    const rest = this.peek()

    if (rest.kind !== "eof") throw this.error(`unexpected ${describeToken(rest)}`)

    return compiled
  }

  private conditional(): Compiled {
    const test = this.comparison()

    if (!this.accept("question")) return test

    const consequent = this.conditional()

    if (!this.accept("colon")) {
      throw this.error(`expected ':' but found ${describeToken(this.peek())}`)
    }

    const alternate = this.conditional()

    if (test.type.kind !== "boolean") {
      throw this.error(`condition must be a boolean, not ${describeType(test.type)}`)
    }

    if (!sameType(consequent.type, alternate.type)) {
      throw this.error(
        `branches have different types: ${describeType(consequent.type)} and ${describeType(alternate.type)}`,
      )
    }

    return {
      type: consequent.type,
      evaluate: (ctx) => (test.evaluate(ctx) ? consequent.evaluate(ctx) : alternate.evaluate(ctx)),
    }
  }

  private comparison(): Compiled {
    const left = this.additive()
    const operator = this.peek()
    const compare = comparisons.get(operator.kind)

    if (!compare) return left

    this.index++

    const right = this.additive()

    if (comparisons.has(this.peek().kind)) {
      throw this.error("comparisons cannot be chained")
    }

    const equality = operator.kind === "eq" || operator.kind === "ne"
    const comparable =
      (left.type.kind === "number" && right.type.kind === "number") ||
      (left.type.kind === "quantity" &&
        right.type.kind === "quantity" &&
        dimensionOf(left.type.unit) === dimensionOf(right.type.unit))
    const equatable =
      equality &&
      ((left.type.kind === "string" && right.type.kind === "string") ||
        (left.type.kind === "boolean" && right.type.kind === "boolean"))

    if (equatable) {
      const negate = operator.kind === "ne"

      return {
        type: BOOLEAN,
        evaluate: (ctx) => (left.evaluate(ctx) === right.evaluate(ctx)) !== negate,
      }
    }

    if (!comparable) {
      throw this.error(
        `cannot compare ${describeType(left.type)} ${operator.value} ${describeType(right.type)}`,
      )
    }

    return {
      type: BOOLEAN,
      evaluate: (ctx) => compare(asNumber(left.evaluate(ctx)), asNumber(right.evaluate(ctx))),
    }
  }

  private additive(): Compiled {
    let left = this.multiplicative()

    for (;;) {
      const operator = this.peek()

      if (operator.kind !== "plus" && operator.kind !== "minus") return left

      this.index++

      const right = this.multiplicative()
      const sign = operator.kind === "plus" ? 1 : -1
      const lhs = left

      if (lhs.type.kind === "number" && right.type.kind === "number") {
        left = {
          type: NUMBER,
          evaluate: (ctx) => asNumber(lhs.evaluate(ctx)) + sign * asNumber(right.evaluate(ctx)),
        }
      } else if (lhs.type.kind === "quantity" && sameType(lhs.type, right.type)) {
        const unit = lhs.type.unit

        left = {
          type: lhs.type,
          evaluate: (ctx) => ({
            amount: amountOf(lhs.evaluate(ctx)) + sign * amountOf(right.evaluate(ctx)),
            unit,
          }),
        }
      } else {
        const verb = operator.kind === "plus" ? "add" : "subtract"

        throw this.error(
          `cannot ${verb} ${describeType(lhs.type)} and ${describeType(right.type)}`,
        )
      }
    }
  }

  private multiplicative(): Compiled {
    let left = this.unary()

    while (this.accept("star")) {
      const right = this.unary()
      const lhs = left

      if (lhs.type.kind === "number" && right.type.kind === "number") {
        left = {
          type: NUMBER,
          evaluate: (ctx) => asNumber(lhs.evaluate(ctx)) * asNumber(right.evaluate(ctx)),
        }
      } else if (lhs.type.kind === "quantity" && right.type.kind === "number") {
        left = this.scale(lhs, right, lhs.type.unit)
      } else if (lhs.type.kind === "number" && right.type.kind === "quantity") {
        left = this.scale(right, lhs, right.type.unit)
      } else {
        throw this.error(
          `cannot multiply ${describeType(lhs.type)} by ${describeType(right.type)}`,
        )
      }
    }

    return left
  }

  private scale(quantity: Compiled, factor: Compiled, unit: Unit): Compiled {
    return {
      type: quantity.type,
      evaluate: (ctx) => ({
        amount: amountOf(quantity.evaluate(ctx)) * asNumber(factor.evaluate(ctx)),
        unit,
      }),
    }
  }

  private unary(): Compiled {
    if (!this.accept("minus")) return this.primary()

    const operand = this.unary()
    const type = operand.type

    if (type.kind === "number") {
      return { type, evaluate: (ctx) => -asNumber(operand.evaluate(ctx)) }
    }

    if (type.kind === "quantity") {
      return {
        type,
        evaluate: (ctx) => ({ amount: -amountOf(operand.evaluate(ctx)), unit: type.unit }),
      }
    }

    throw this.error(`cannot negate ${describeType(type)}`)
  }

  private primary(): Compiled {
    const token = this.peek()

    switch (token.kind) {
      case "number":
        this.index++
        return this.numberOrQuantity(Number(token.value))

      case "string":
        this.index++
        return { type: STRING, evaluate: () => token.value }

      case "ident":
        return this.reference()

      case "lparen": {
        this.index++

        const inner = this.conditional()

        if (!this.accept("rparen")) {
          throw this.error(`expected ')' but found ${describeToken(this.peek())}`)
        }

        return inner
      }

      case "eof":
        throw this.error("unexpected end of expression")

      default:
        throw this.error(`unexpected ${describeToken(token)}`)
    }
  }

  private numberOrQuantity(amount: number): Compiled {
    if (this.peek().kind !== "dot") {
      return { type: NUMBER, evaluate: () => amount }
    }

    this.index++

    const unitToken = this.peek()
    const unit = unitToken.kind === "ident" ? canonicalUnit(unitToken.value) : undefined

    if (!unit) {
      throw this.error(`expected a unit after '${amount}.' but found ${describeToken(unitToken)}`)
    }

    this.index++

    const quantity: Quantity = { amount, unit }

    return { type: { kind: "quantity", unit }, evaluate: () => quantity }
  }

  private reference(): Compiled {
    const parts: string[] = []

    do {
      const token = this.peek()

      if (token.kind !== "ident") {
        throw this.error(`expected a name but found ${describeToken(token)}`)
      }

      parts.push(token.value)
      this.index++
    } while (this.accept("dot"))

    const name = parts.join(".")

    if (name === "true" || name === "false") {
      const value = name === "true"

      return { type: BOOLEAN, evaluate: () => value }
    }

    if (name === ATTEMPT_REFERENCE) {
      return { type: NUMBER, evaluate: (ctx) => ctx.attempt }
    }

    throw this.error(`unsupported reference '${name}' (only ${ATTEMPT_REFERENCE} is available)`)
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.eof
  }

  private accept(kind: TokenKind): boolean {
    if (this.peek().kind !== kind) return false

    this.index++
    return true
  }

  private error(reason: string): InvalidDynamicValueError {
    return new InvalidDynamicValueError(this.source, reason, this.site)
  }
}
