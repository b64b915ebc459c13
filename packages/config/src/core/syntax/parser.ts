import { canonicalUnit } from "../dynamic/quantity"
import { compileExpression } from "../dynamic/expression"
import { ParseError } from "../errors"
import {
  type AssignStatement,
  type BlockStatement,
  isSelectorSegment,
  type PathSegment,
  type ProfileDeclaration,
  type ProfilesStatement,
  SELECTOR_SIGIL,
  type SourceLocation,
  type Statement,
  type ValueNode,
} from "./ast"
import { describeToken, type Token, type TokenKind, tokenize } from "./lexer"

export const INCLUDE_KEYWORD = "includeConfig"
export const PROFILES_KEYWORD = "profiles"

type Scope = {
  /**
   * At the root of the fragment or of a profile body, the only places
   * `profiles` is a keyword. Anywhere else it is an ordinary key.
   */
  readonly topLevel: boolean
  readonly inProfile: boolean
  readonly inSelector: boolean
}

const TOP_SCOPE: Scope = { topLevel: true, inProfile: false, inSelector: false }

/**
 * Parses the text of one fragment into statements.
 *
 * Dynamic values are compiled here, so an ill-typed `{ ... }` fails the
 * parse of its fragment.
 *
 * @throws ParseError on syntax errors.
 * @throws InvalidDynamicValueError on malformed or ill-typed dynamic values.
 */
export function parseFragment(text: string, fragment: string): Statement[] {
  return new Parser(tokenize(text, fragment), text, fragment).parse()
}

class Parser {
  private index = 0
  private readonly eof: Token

  constructor(
    private readonly tokens: readonly Token[],
    private readonly text: string,
    private readonly fragment: string,
  ) {
    this.eof = tokens.at(-1) ?? {
      kind: "eof",
      value: "",
      location: { line: 1, column: 1 },
      start: text.length,
      end: text.length,
    }
  }

  parse(): Statement[] {
    const statements = this.statements(TOP_SCOPE)
    const rest = this.peek()

    if (rest.kind !== "eof") throw this.unexpected(rest)

    return statements
  }

  private statements(scope: Scope): Statement[] {
    const statements: Statement[] = []

    for (;;) {
      const token = this.peek()

      if (token.kind === "eof" || token.kind === "rbrace") return statements

      if (token.kind === "semi") {
        this.index++
        continue
      }

      statements.push(this.statement(scope))
    }
  }

  private statement(scope: Scope): Statement {
    const token = this.peek()

    if (token.kind === "ident" && token.value === INCLUDE_KEYWORD) {
      return this.include(token)
    }

    if (token.kind === "ident" && token.value === PROFILES_KEYWORD && scope.topLevel) {
      return this.profiles(token, scope)
    }

    if (token.kind === "ident" || token.kind === "selector") {
      return this.keyed(scope)
    }

    throw this.unexpected(token)
  }

  private include(keyword: Token): Statement {
    this.index++

    const ref = this.peek()

    if (ref.kind !== "string") {
      throw this.error(ref.location, `${INCLUDE_KEYWORD} expects a quoted path`)
    }

    this.index++

    return { kind: "include", ref: ref.value, location: keyword.location }
  }

  private profiles(keyword: Token, scope: Scope): ProfilesStatement {
    if (scope.inProfile) {
      throw this.error(keyword.location, "profiles cannot be nested inside a profile")
    }

    this.index++
    this.expect("lbrace", `'{' after ${PROFILES_KEYWORD}`)

    const profiles: ProfileDeclaration[] = []

    for (;;) {
      const token = this.peek()

      if (token.kind === "rbrace") break

      if (token.kind === "semi") {
        this.index++
        continue
      }

      if (token.kind !== "ident") {
        throw this.error(token.location, `expected a profile name but found ${describeToken(token)}`)
      }

      this.index++

      const next = this.peek()

      if (next.kind !== "lbrace") {
        throw this.error(
          next.location,
          next.kind === "assign" || next.kind === "dot"
            ? `cannot assign directly under ${PROFILES_KEYWORD}; declare '${token.value} { ... }' instead`
            : `expected '{' after profile name '${token.value}'`,
        )
      }

      this.index++

      const body = this.statements({ topLevel: true, inProfile: true, inSelector: false })

      this.expect("rbrace", `'}' closing profile '${token.value}'`)
      profiles.push({ name: token.value, body, location: token.location })
    }

    this.index++

    return { kind: "profiles", profiles, location: keyword.location }
  }

  private keyed(scope: Scope): AssignStatement | BlockStatement {
    const location = this.peek().location
    const path = this.path(scope)
    const hasSelector = path.some(isSelectorSegment)
    const token = this.peek()

    if (token.kind === "assign") {
      this.index++
      return { kind: "assign", path, value: this.value(), location }
    }

    if (token.kind === "lbrace") {
      this.index++

      const body = this.statements({
        topLevel: false,
        inProfile: scope.inProfile,
        inSelector: scope.inSelector || hasSelector,
      })

      this.expect("rbrace", `'}' closing '${path.join(".")}'`)

      return { kind: "block", path, body, location }
    }

    throw this.error(
      token.location,
      `expected '=' or '{' after '${path.join(".")}' but found ${describeToken(token)}`,
    )
  }

  private path(scope: Scope): PathSegment[] {
    const segments: PathSegment[] = []
    let selectors = scope.inSelector ? 1 : 0

    do {
      const token = this.peek()

      if (token.kind === "selector") {
        if (++selectors > 1) {
          throw this.error(token.location, "selectors cannot be nested")
        }
        segments.push(`${SELECTOR_SIGIL}${token.value}`)
      } else if (token.kind === "ident") {
        segments.push(token.value)
      } else {
        throw this.error(token.location, `expected a key but found ${describeToken(token)}`)
      }

      this.index++
    } while (this.accept("dot"))

    return segments
  }

  private value(): ValueNode {
    const token = this.peek()
    const location = token.location

    switch (token.kind) {
      case "string":
        this.index++
        return { kind: "scalar", value: token.value, location }

      case "number":
        this.index++
        return { kind: "scalar", value: this.numberOrQuantity(token, false), location }

      case "minus": {
        this.index++

        const number = this.peek()

        if (number.kind !== "number") {
          throw this.error(number.location, `expected a number after '-'`)
        }

        this.index++
        return { kind: "scalar", value: this.numberOrQuantity(number, true), location }
      }

      case "ident":
        if (token.value === "true" || token.value === "false") {
          this.index++
          return { kind: "scalar", value: token.value === "true", location }
        }
        throw this.error(
          location,
          `unquoted value '${token.value}'; strings must be quoted`,
        )

      case "lbrace":
        return this.dynamic(token)

      default:
        throw this.error(location, `expected a value but found ${describeToken(token)}`)
    }
  }

  private numberOrQuantity(token: Token, negative: boolean): number | string {
    const amount = Number(token.value)

    if (this.peek().kind !== "dot") return negative ? -amount : amount

    this.index++

    const unitToken = this.peek()
    const unit = unitToken.kind === "ident" ? canonicalUnit(unitToken.value) : undefined

    if (!unit) {
      throw this.error(
        unitToken.location,
        `expected a unit after '${token.value}.' but found ${describeToken(unitToken)}`,
      )
    }

    if (negative) {
      throw this.error(token.location, "quantities cannot be negative")
    }

    this.index++

    return `${amount}${unit}`
  }

  private dynamic(open: Token): ValueNode {
    this.index++

    const body: Token[] = []
    let depth = 0

    for (;;) {
      const token = this.peek()

      if (token.kind === "eof") {
        throw this.error(open.location, "unterminated dynamic value")
      }

      this.index++

      if (token.kind === "rbrace" && depth === 0) {
        const source = this.text.slice(open.end, token.start).trim()

        body.push({ ...token, kind: "eof", value: "" })

        return {
          kind: "dynamic",
          expression: compileExpression(body, source, {
            fragment: this.fragment,
            location: open.location,
          }),
          location: open.location,
        }
      }

      if (token.kind === "lbrace") depth++
      if (token.kind === "rbrace") depth--

      body.push(token)
    }
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.eof
  }

  private accept(kind: TokenKind): boolean {
    if (this.peek().kind !== kind) return false

    this.index++
    return true
  }

  private expect(kind: TokenKind, what: string): void {
    const token = this.peek()

    if (token.kind !== kind) {
      throw this.error(token.location, `expected ${what} but found ${describeToken(token)}`)
    }

    this.index++
  }

  private unexpected(token: Token): ParseError {
    return this.error(token.location, `unexpected ${describeToken(token)}`)
  }

  private error(location: SourceLocation, detail: string): ParseError {
    return new ParseError(this.fragment, location, detail)
  }
}
