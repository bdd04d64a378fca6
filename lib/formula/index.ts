/**
 * Formula Library
 *
 * Arithmetic expression engine used by computed channels.
 *
 * Usage:
 * ```typescript
 * import { compileExpression } from "@/lib/formula"
 *
 * const compiled = compileExpression("RPM * 0.5 + sqrt(Boost)")
 * if (compiled.ok) {
 *   const result = compiled.expression.evaluate(new Map([["RPM", 3000], ["Boost", 16]]))
 *   // result => { ok: true, value: 1504 }
 * }
 * ```
 */

// Types
export type {
  ASTNode,
  ASTNodeType,
  NumberNode,
  VariableNode,
  FunctionCallNode,
  BinaryOpNode,
  BinaryOperator,
  UnaryOpNode,
  GroupNode,
  FormulaResult,
  ParseResult,
  VariableScope,
  FunctionSpec,
  Token,
  TokenType,
} from "./types"

export {
  SUPPORTED_FUNCTIONS,
  SUPPORTED_CONSTANTS,
  isSupportedFunction,
  getFunctionSpec,
  getConstant,
} from "./types"

// Parser
export { parseExpression, tokenize, scanNumber } from "./parser"

// Evaluator
export { evaluateExpression, compileExpression } from "./evaluator"
export type { CompiledExpression, CompileResult } from "./evaluator"
