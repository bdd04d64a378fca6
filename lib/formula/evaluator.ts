/**
 * Formula Evaluator
 *
 * Evaluates a parsed expression AST against a scope of bound variables.
 *
 * Identifiers resolve to a bound variable first and fall back to the
 * constant table (pi, e, tau, phi). Division by zero and domain errors
 * follow IEEE semantics (Infinity / NaN) and are not reported as errors;
 * callers decide how to treat non-finite results.
 */

import type { ASTNode, FormulaResult, VariableScope } from "./types"
import { getConstant, getFunctionSpec } from "./types"
import { parseExpression } from "./parser"

class EvaluationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "EvaluationError"
  }
}

function evaluateNode(node: ASTNode, scope: VariableScope): number {
  switch (node.type) {
    case "number":
      return node.value

    case "variable": {
      const bound = scope.get(node.name)
      if (bound !== undefined) return bound
      const constant = getConstant(node.name)
      if (constant !== undefined) return constant
      throw new EvaluationError(`Unknown variable "${node.name}"`)
    }

    case "group":
      return evaluateNode(node.expression, scope)

    case "unary_op": {
      const operand = evaluateNode(node.operand, scope)
      return node.operator === "-" ? -operand : operand
    }

    case "binary_op": {
      const left = evaluateNode(node.left, scope)
      const right = evaluateNode(node.right, scope)
      switch (node.operator) {
        case "+":
          return left + right
        case "-":
          return left - right
        case "*":
          return left * right
        case "/":
          return left / right
        case "^":
          return Math.pow(left, right)
      }
    }

    case "function_call": {
      const spec = getFunctionSpec(node.name)
      if (!spec) {
        throw new EvaluationError(`Unknown function "${node.name}"`)
      }
      return spec.apply(node.args.map((arg) => evaluateNode(arg, scope)))
    }
  }
}

/**
 * Evaluate a parsed expression with the given variable values.
 */
export function evaluateExpression(ast: ASTNode, scope: VariableScope): FormulaResult {
  try {
    return { ok: true, value: evaluateNode(ast, scope) }
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown evaluation error"
    return { ok: false, error: message }
  }
}

/**
 * An expression parsed once and evaluated many times.
 */
export interface CompiledExpression {
  ast: ASTNode
  /** Identifiers read by the expression, constants included */
  variables: string[]
  evaluate(scope: VariableScope): FormulaResult
}

export type CompileResult =
  | { ok: true; expression: CompiledExpression }
  | { ok: false; error: string }

/**
 * Parse an expression once into a reusable evaluator.
 */
export function compileExpression(source: string): CompileResult {
  const parsed = parseExpression(source)
  if (!parsed.ok) {
    return { ok: false, error: parsed.error }
  }

  const { ast, variables } = parsed
  return {
    ok: true,
    expression: {
      ast,
      variables,
      evaluate: (scope) => evaluateExpression(ast, scope),
    },
  }
}
