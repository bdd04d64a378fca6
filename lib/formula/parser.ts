/**
 * Formula Parser
 *
 * Tokenizes and parses arithmetic expressions into an AST.
 *
 * Supports:
 * - Number literals: 42, 3.14, .5, 2.5e-3
 * - Variables: identifiers bound at evaluation time
 * - Operators: +, -, *, /, ^
 * - Functions: see FUNCTIONS in ./types (names are case-insensitive)
 * - Parentheses for grouping
 *
 * Grammar:
 *   expression -> term (('+' | '-') term)*
 *   term       -> unary (('*' | '/') unary)*
 *   unary      -> ('-' | '+') unary | power
 *   power      -> primary ('^' unary)?
 *   primary    -> NUMBER | IDENTIFIER | function_call | '(' expression ')'
 *   function   -> IDENTIFIER '(' arguments ')'
 *   arguments  -> expression (',' expression)*
 *
 * '^' is right-associative and binds tighter than unary minus, so -2^2 = -4.
 */

import type {
  Token,
  TokenType,
  ASTNode,
  BinaryOperator,
  FunctionCallNode,
  ParseResult,
} from "./types"
import { getFunctionSpec, isSupportedFunction, SUPPORTED_FUNCTIONS } from "./types"

// ============================================
// Lexer (Tokenizer)
// ============================================

const SINGLE_CHAR_TOKENS: Readonly<Record<string, TokenType>> = {
  "+": "PLUS",
  "-": "MINUS",
  "*": "STAR",
  "/": "SLASH",
  "^": "CARET",
  "(": "LPAREN",
  ")": "RPAREN",
  ",": "COMMA",
}

/**
 * Length of the numeric literal starting at `start`, or 0 if there is none.
 * Accepts digits with an optional fraction and an optional exponent.
 */
export function scanNumber(text: string, start: number): number {
  const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(text.slice(start))
  return match ? match[0].length : 0
}

/**
 * Tokenize an expression into tokens.
 */
export function tokenize(expression: string): Token[] {
  const tokens: Token[] = []
  let pos = 0

  while (pos < expression.length) {
    const char = expression[pos]

    // Skip whitespace
    if (/\s/.test(char)) {
      pos++
      continue
    }

    const single = SINGLE_CHAR_TOKENS[char]
    if (single) {
      tokens.push({ type: single, value: char, position: pos })
      pos++
      continue
    }

    // Number literal
    const numberLength = scanNumber(expression, pos)
    if (numberLength > 0) {
      const numStr = expression.slice(pos, pos + numberLength)
      const num = parseFloat(numStr)
      if (isNaN(num)) {
        throw new Error(`Invalid number "${numStr}" at position ${pos}`)
      }
      tokens.push({ type: "NUMBER", value: num, position: pos })
      pos += numberLength
      continue
    }

    // Identifier (variable, function or constant name)
    if (/[a-zA-Z_]/.test(char)) {
      const startPos = pos
      while (pos < expression.length && /[a-zA-Z0-9_]/.test(expression[pos])) {
        pos++
      }
      tokens.push({ type: "IDENTIFIER", value: expression.slice(startPos, pos), position: startPos })
      continue
    }

    throw new Error(`Unexpected character "${char}" at position ${pos}`)
  }

  tokens.push({ type: "EOF", value: "", position: pos })
  return tokens
}

// ============================================
// Parser
// ============================================

class Parser {
  private tokens: Token[]
  private pos: number
  private variables: Set<string>

  constructor(tokens: Token[]) {
    this.tokens = tokens
    this.pos = 0
    this.variables = new Set()
  }

  private current(): Token {
    return this.tokens[this.pos]
  }

  private advance(): Token {
    const token = this.current()
    if (token.type !== "EOF") {
      this.pos++
    }
    return token
  }

  private expect(type: TokenType): Token {
    const token = this.current()
    if (token.type !== type) {
      throw new Error(`Expected ${type} but got ${token.type} at position ${token.position}`)
    }
    return this.advance()
  }

  private match(...types: TokenType[]): boolean {
    return types.includes(this.current().type)
  }

  private binary(operator: BinaryOperator, left: ASTNode, right: ASTNode): ASTNode {
    return { type: "binary_op", operator, left, right }
  }

  /**
   * Parse the entire expression.
   */
  parse(): { ast: ASTNode; variables: string[] } {
    const ast = this.expression()

    if (this.current().type !== "EOF") {
      throw new Error(`Unexpected token "${this.current().value}" at position ${this.current().position}`)
    }

    return { ast, variables: [...this.variables] }
  }

  /**
   * expression -> term (('+' | '-') term)*
   */
  private expression(): ASTNode {
    let left = this.term()

    while (this.match("PLUS", "MINUS")) {
      const operator = this.advance().type === "PLUS" ? "+" : "-"
      left = this.binary(operator, left, this.term())
    }

    return left
  }

  /**
   * term -> unary (('*' | '/') unary)*
   */
  private term(): ASTNode {
    let left = this.unary()

    while (this.match("STAR", "SLASH")) {
      const operator = this.advance().type === "STAR" ? "*" : "/"
      left = this.binary(operator, left, this.unary())
    }

    return left
  }

  /**
   * unary -> ('-' | '+') unary | power
   */
  private unary(): ASTNode {
    if (this.match("MINUS", "PLUS")) {
      const operator = this.advance().type === "MINUS" ? "-" : "+"
      return { type: "unary_op", operator, operand: this.unary() }
    }

    return this.power()
  }

  /**
   * power -> primary ('^' unary)?
   */
  private power(): ASTNode {
    const base = this.primary()

    if (this.match("CARET")) {
      this.advance()
      return this.binary("^", base, this.unary())
    }

    return base
  }

  /**
   * primary -> NUMBER | IDENTIFIER | function_call | '(' expression ')'
   */
  private primary(): ASTNode {
    const token = this.current()

    if (token.type === "NUMBER" && typeof token.value === "number") {
      this.advance()
      return { type: "number", value: token.value }
    }

    if (token.type === "IDENTIFIER" && typeof token.value === "string") {
      const name = token.value
      this.advance()

      if (this.match("LPAREN")) {
        return this.functionCall(name, token.position)
      }

      if (isSupportedFunction(name)) {
        throw new Error(`Expected '(' after function name "${name}" at position ${this.current().position}`)
      }

      this.variables.add(name)
      return { type: "variable", name }
    }

    if (token.type === "LPAREN") {
      this.advance()
      const expr = this.expression()
      this.expect("RPAREN")
      return { type: "group", expression: expr }
    }

    if (token.type === "EOF") {
      throw new Error(`Unexpected end of expression at position ${token.position}`)
    }

    throw new Error(`Unexpected token "${token.value}" at position ${token.position}`)
  }

  /**
   * Parse a function call: name(args)
   */
  private functionCall(name: string, position: number): FunctionCallNode {
    const spec = getFunctionSpec(name)
    if (!spec) {
      throw new Error(`Unknown function "${name}" at position ${position}. Supported: ${SUPPORTED_FUNCTIONS.join(", ")}`)
    }

    this.expect("LPAREN")
    const args: ASTNode[] = []

    if (!this.match("RPAREN")) {
      args.push(this.expression())

      while (this.match("COMMA")) {
        this.advance()
        args.push(this.expression())
      }
    }

    this.expect("RPAREN")

    if (args.length < spec.minArgs || args.length > spec.maxArgs) {
      const expected =
        spec.maxArgs === Infinity
          ? `at least ${spec.minArgs}`
          : spec.minArgs === spec.maxArgs
            ? `${spec.minArgs}`
            : `${spec.minArgs}-${spec.maxArgs}`
      throw new Error(`Function "${name}" expects ${expected} argument(s) but got ${args.length}`)
    }

    return { type: "function_call", name: name.toLowerCase(), args }
  }
}

// ============================================
// Public API
// ============================================

/**
 * Parse an arithmetic expression into an AST.
 *
 * @param expression The expression (e.g., "RPM * 0.5 + sqrt(Boost)")
 * @returns ParseResult with AST and the variable names it reads, or error
 */
export function parseExpression(expression: string): ParseResult {
  try {
    if (!expression || !expression.trim()) {
      return { ok: false, error: "Expression is empty" }
    }

    const tokens = tokenize(expression)
    const parser = new Parser(tokens)
    const { ast, variables } = parser.parse()

    return { ok: true, ast, variables }
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown parse error"
    return { ok: false, error: message }
  }
}
