/**
 * Formula Types
 *
 * Type definitions for the arithmetic expression engine:
 * - Tokens produced by the lexer
 * - AST nodes for parsed expressions
 * - Function and constant tables
 *
 * Expression Syntax:
 * - Numbers: 42, 3.14, .5, 1e-3
 * - Variables: identifiers bound at evaluation time (e.g., RPM, v_1)
 * - Operators: +, -, *, /, ^ (power), (, )
 * - Functions: sin(x), atan2(y, x), min(a, b, ...), ...
 * - Constants: pi, e, tau, phi
 */

// ============================================
// AST Nodes (Parsed Expression)
// ============================================

export type ASTNodeType =
  | "number"
  | "variable"
  | "function_call"
  | "binary_op"
  | "unary_op"
  | "group"

export interface NumberNode {
  type: "number"
  value: number
}

/**
 * Variable node.
 * Resolved against the bound variables first, then the constant table.
 */
export interface VariableNode {
  type: "variable"
  name: string
}

export interface FunctionCallNode {
  type: "function_call"
  /** Function name (lowercase) */
  name: string
  args: ASTNode[]
}

export type BinaryOperator = "+" | "-" | "*" | "/" | "^"

export interface BinaryOpNode {
  type: "binary_op"
  operator: BinaryOperator
  left: ASTNode
  right: ASTNode
}

export interface UnaryOpNode {
  type: "unary_op"
  operator: "-" | "+"
  operand: ASTNode
}

export interface GroupNode {
  type: "group"
  expression: ASTNode
}

export type ASTNode =
  | NumberNode
  | VariableNode
  | FunctionCallNode
  | BinaryOpNode
  | UnaryOpNode
  | GroupNode

// ============================================
// Results
// ============================================

/**
 * Result of expression evaluation.
 */
export type FormulaResult =
  | { ok: true; value: number }
  | { ok: false; error: string }

/**
 * Result of expression parsing.
 */
export type ParseResult =
  | { ok: true; ast: ASTNode; variables: string[] }
  | { ok: false; error: string; position?: number }

/**
 * Variable values available during evaluation.
 */
export type VariableScope = ReadonlyMap<string, number>

// ============================================
// Supported Functions
// ============================================

export interface FunctionSpec {
  /** Minimum argument count */
  minArgs: number
  /** Maximum argument count (Infinity = variadic) */
  maxArgs: number
  apply: (args: number[]) => number
}

const unary = (fn: (x: number) => number): FunctionSpec => ({
  minArgs: 1,
  maxArgs: 1,
  apply: (args) => fn(args[0]),
})

/**
 * Round half away from zero; a zero result is always +0.
 */
function roundHalfAwayFromZero(x: number): number {
  const rounded = x < 0 ? -Math.round(-x) : Math.round(x)
  return rounded === 0 ? 0 : rounded
}

/**
 * 1 for +0 and positive values, -1 for -0 and negative values, NaN for NaN.
 */
function signum(x: number): number {
  if (Number.isNaN(x)) return NaN
  return x < 0 || Object.is(x, -0) ? -1 : 1
}

const FUNCTIONS: Record<string, FunctionSpec> = {
  sin: unary(Math.sin),
  cos: unary(Math.cos),
  tan: unary(Math.tan),
  asin: unary(Math.asin),
  acos: unary(Math.acos),
  atan: unary(Math.atan),
  atan2: { minArgs: 2, maxArgs: 2, apply: (args: number[]) => Math.atan2(args[0], args[1]) },
  sinh: unary(Math.sinh),
  cosh: unary(Math.cosh),
  tanh: unary(Math.tanh),
  asinh: unary(Math.asinh),
  acosh: unary(Math.acosh),
  atanh: unary(Math.atanh),
  sqrt: unary(Math.sqrt),
  abs: unary(Math.abs),
  exp: unary(Math.exp),
  ln: unary(Math.log),
  log: unary(Math.log10),
  log2: unary(Math.log2),
  log10: unary(Math.log10),
  floor: unary(Math.floor),
  ceil: unary(Math.ceil),
  round: unary(roundHalfAwayFromZero),
  trunc: unary(Math.trunc),
  fract: unary((x) => x - Math.trunc(x)),
  signum: unary(signum),
  min: { minArgs: 1, maxArgs: Infinity, apply: (args: number[]) => Math.min(...args) },
  max: { minArgs: 1, maxArgs: Infinity, apply: (args: number[]) => Math.max(...args) },
}

const FUNCTION_TABLE: ReadonlyMap<string, FunctionSpec> = new Map(Object.entries(FUNCTIONS))

export const SUPPORTED_FUNCTIONS: readonly string[] = [...FUNCTION_TABLE.keys()]

/**
 * Check if a string is a supported function name (case-insensitive).
 */
export function isSupportedFunction(name: string): boolean {
  return FUNCTION_TABLE.has(name.toLowerCase())
}

export function getFunctionSpec(name: string): FunctionSpec | undefined {
  return FUNCTION_TABLE.get(name.toLowerCase())
}

// ============================================
// Constants
// ============================================

const CONSTANT_TABLE: ReadonlyMap<string, number> = new Map([
  ["pi", Math.PI],
  ["e", Math.E],
  ["tau", 2 * Math.PI],
  ["phi", (1 + Math.sqrt(5)) / 2],
])

export const SUPPORTED_CONSTANTS: readonly string[] = [...CONSTANT_TABLE.keys()]

export function getConstant(name: string): number | undefined {
  return CONSTANT_TABLE.get(name.toLowerCase())
}

// ============================================
// Token Types (for Lexer)
// ============================================

export type TokenType =
  | "NUMBER"
  | "IDENTIFIER"
  | "PLUS"
  | "MINUS"
  | "STAR"
  | "SLASH"
  | "CARET"
  | "LPAREN"
  | "RPAREN"
  | "COMMA"
  | "EOF"

export interface Token {
  type: TokenType
  value: string | number
  position: number
}
