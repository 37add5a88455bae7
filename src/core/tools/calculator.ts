/**
 * Calculator tool: evaluates plain arithmetic
 */

import { ToolDef } from "../types";

export const INVALID_EXPRESSION = "Error: Invalid mathematical expression";

// After sqrt( is stripped only numbers, operators and brackets may remain
const SAFE_PATTERN = /^[\d\s+\-*/%^().]+$/;

export function evaluateExpression(expression: string): number | null {
  const withoutFunctions = expression.replace(/\bsqrt\s*\(/g, "(");
  if (!SAFE_PATTERN.test(withoutFunctions)) return null;

  const normalized = expression.replace(/\^/g, "**").replace(/\bsqrt\s*\(/g, "Math.sqrt(");

  try {
    const result: unknown = new Function(`"use strict"; return (${normalized});`)();
    return typeof result === "number" && Number.isFinite(result) ? result : null;
  } catch {
    // Syntax errors in the expression
    return null;
  }
}

export const calculatorTool: ToolDef = {
  name: "calculator",
  description: [
    "Performs basic mathematical calculations, use also for simple additions",
    "",
    "Args:",
    "    expression (str): The mathematical expression to evaluate (e.g., '2+2', '10*5', 'sqrt(16)', '2^8')",
    "",
    "Returns:",
    "    str: the result of the evaluation or an error message in case of failure",
  ].join("\n"),
  parameters: {
    type: "object",
    properties: {
      expression: { type: "string" },
    },
    required: ["expression"],
  },
  run: (args) => {
    const result = evaluateExpression(String(args.expression));
    return result === null ? INVALID_EXPRESSION : String(result);
  },
};
