import { ParseError } from "../errors"
import type { SourceLocation } from "./ast"

export type TokenKind =
  | "ident"
  | "selector"
  | "number"
  | "string"
  | "lbrace"
  | "rbrace"
  | "lparen"
  | "rparen"
  | "dot"
  | "semi"
  | "assign"
  | "question"
  | "colon"
  | "plus"
  | "minus"
  | "star"
  | "lt"
  | "le"
  | "gt"
  | "ge"
  | "eq"
  | "ne"
  | "eof"

export interface Token {
  readonly kind: TokenKind
  /**
   * Decoded content: the characters of a string literal, the name of a
   * selector without its `$`, the raw text of anything else.
   */
  readonly value: string
  readonly location: SourceLocation
  /** Offsets of the token in the fragment text, end exclusive */
  readonly start: number
  readonly end: number
}

const operators: ReadonlyArray<readonly [string, TokenKind]> = [
  ["<=", "le"],
  [">=", "ge"],
  ["==", "eq"],
  ["!=", "ne"],
  ["{", "lbrace"],
  ["}", "rbrace"],
  ["(", "lparen"],
  [")", "rparen"],
  [".", "dot"],
  [";", "semi"],
  ["=", "assign"],
  ["?", "question"],
  [":", "colon"],
  ["+", "plus"],
  ["-", "minus"],
  ["*", "star"],
  ["<", "lt"],
  [">", "gt"],
]

const escapes: Readonly<Record<string, string>> = {
  '"': '"',
  "'": "'",
  "\\": "\\",
  "/": "/",
  n: "\n",
  t: "\t",
  r: "\r",
  b: "\b",
  f: "\f",
}

const isDigit = (ch: string) => ch >= "0" && ch <= "9"
const isIdentStart = (ch: string) => /^[A-Za-z_]$/.test(ch)
const isIdentPart = (ch: string) => /^[A-Za-z0-9_]$/.test(ch)

export function describeToken(token: Token): string {
  switch (token.kind) {
    case "eof":
      return "end of input"
    case "string":
      return `string ${JSON.stringify(token.value)}`
    case "selector":
      return `'$${token.value}'`
    default:
      return `'${token.value}'`
  }
}

/**
 * Splits fragment text into tokens, ending with an `eof` token.
 *
 * Whitespace, newlines and comments (`// line`, `/* block *\/`) separate
 * tokens and are otherwise dropped.
 *
 * @throws ParseError on characters that start no token, bad escapes or
 * unterminated strings and comments.
 */
export function tokenize(text: string, fragment: string): Token[] {
  return new Lexer(text, fragment).run()
}

class Lexer {
  private pos = 0
  private line = 1
  private column = 1
  private readonly tokens: Token[] = []

  constructor(
    private readonly text: string,
    private readonly fragment: string,
  ) {}

  run(): Token[] {
    for (;;) {
      this.skipTrivia()

      if (this.pos >= this.text.length) {
        this.push("eof", "", this.here(), this.pos)
        return this.tokens
      }

      this.next()
    }
  }

  private next(): void {
    const ch = this.peek()
    const location = this.here()
    const start = this.pos

    if (isDigit(ch)) {
      this.number(location, start)
    } else if (isIdentStart(ch)) {
      this.push("ident", this.identifier(), location, start)
    } else if (ch === "$") {
      this.advance()
      if (!isIdentStart(this.peek())) {
        throw this.error(location, "expected a process name after '$'")
      }
      this.push("selector", this.identifier(), location, start)
    } else if (ch === '"' || ch === "'") {
      this.push("string", this.string(ch, location), location, start)
    } else {
      this.operator(ch, location, start)
    }
  }

  private number(location: SourceLocation, start: number): void {
    while (isDigit(this.peek())) this.advance()

    // `4.GB` is a number, a dot and a unit; `1.5` is one number
    if (this.peek() === "." && isDigit(this.peek(1))) {
      this.advance()
      while (isDigit(this.peek())) this.advance()
    }

    this.push("number", this.text.slice(start, this.pos), location, start)
  }

  private identifier(): string {
    const start = this.pos

    while (isIdentPart(this.peek())) this.advance()

    return this.text.slice(start, this.pos)
  }

  private string(quote: string, location: SourceLocation): string {
    let value = ""

    this.advance()

    for (;;) {
      const ch = this.peek()

      if (ch === "" || ch === "\n") {
        throw this.error(location, "unterminated string")
      }

      this.advance()

      if (ch === quote) return value

      if (ch !== "\\") {
        value += ch
        continue
      }

      const escape = this.peek()
      const escapeLocation = this.here()

      this.advance()

      if (escape === "u") {
        const hex = this.text.slice(this.pos, this.pos + 4)

        if (!/^[0-9A-Fa-f]{4}$/.test(hex)) {
          throw this.error(escapeLocation, "invalid unicode escape")
        }

        for (let i = 0; i < 4; i++) this.advance()
        value += String.fromCharCode(Number.parseInt(hex, 16))
        continue
      }

      const decoded = escapes[escape]

      if (decoded === undefined) {
        throw this.error(escapeLocation, `invalid escape '\\${escape}'`)
      }

      value += decoded
    }
  }

  private operator(ch: string, location: SourceLocation, start: number): void {
    for (const [text, kind] of operators) {
      if (this.text.startsWith(text, this.pos)) {
        for (let i = 0; i < text.length; i++) this.advance()
        this.push(kind, text, location, start)
        return
      }
    }

    throw this.error(location, `unexpected character '${ch}'`)
  }

  private skipTrivia(): void {
    for (;;) {
      const ch = this.peek()

      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.advance()
      } else if (ch === "/" && this.peek(1) === "/") {
        while (this.peek() !== "" && this.peek() !== "\n") this.advance()
      } else if (ch === "/" && this.peek(1) === "*") {
        const location = this.here()

        this.advance()
        this.advance()

        while (!(this.peek() === "*" && this.peek(1) === "/")) {
          if (this.peek() === "") throw this.error(location, "unterminated comment")
          this.advance()
        }

        this.advance()
        this.advance()
      } else {
        return
      }
    }
  }

  private peek(offset = 0): string {
    return this.text.charAt(this.pos + offset)
  }

  private advance(): void {
    if (this.text.charAt(this.pos) === "\n") {
      this.line++
      this.column = 1
    } else {
      this.column++
    }
    this.pos++
  }

  private here(): SourceLocation {
    return { line: this.line, column: this.column }
  }

  private push(kind: TokenKind, value: string, location: SourceLocation, start: number) {
    this.tokens.push({ kind, value, location, start, end: this.pos })
  }

  private error(location: SourceLocation, detail: string): ParseError {
    return new ParseError(this.fragment, location, detail)
  }
}
