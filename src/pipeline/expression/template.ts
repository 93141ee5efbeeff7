// ---------------------------------------------------------------------------
// Expression Language – Templates & Guards
// ---------------------------------------------------------------------------

import type { EvaluationScope } from "./evaluate.js";
import type { ExprNode } from "./parser.js";
import { evaluate, isTruthy, stringifyValue } from "./evaluate.js";
import { STATUS_FUNCTIONS, hasPlaceholders, parseExpression, parseTemplate } from "./parser.js";

/** Render a template to a string. Text without placeholders is returned as-is. */
export function renderTemplate(template: string, scope: EvaluationScope): string {
  if (!hasPlaceholders(template)) {
    return template;
  }
  let out = "";
  for (const segment of parseTemplate(template)) {
    out += segment.kind === "text" ? segment.value : stringifyValue(evaluate(segment.node, scope));
  }
  return out;
}

/** Render every value of a string map, in insertion order. */
export function renderRecord(
  record: Record<string, string> | undefined,
  scope: EvaluationScope,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(record ?? {})) {
    out[key] = renderTemplate(value, scope);
  }
  return out;
}

/**
 * Resolve a guard to its expression node. A guard is either a bare expression
 * (`steps.a.outputs.x == 'ok'`) or exactly one `${{ }}` placeholder.
 * Returns null for mixed text, which is rendered and tested as a string.
 */
function guardExpression(guard: string): ExprNode | null {
  const trimmed = guard.trim();
  if (!hasPlaceholders(trimmed)) {
    return parseExpression(trimmed, guard);
  }
  const segments = parseTemplate(trimmed);
  if (segments.length === 1 && segments[0].kind === "expr") {
    return segments[0].node;
  }
  return null;
}

/** Evaluate a step guard. An absent guard is true. */
export function evaluateGuard(guard: string | undefined, scope: EvaluationScope): boolean {
  if (guard === undefined || guard.trim() === "") {
    return true;
  }
  const node = guardExpression(guard);
  if (node) {
    return isTruthy(evaluate(node, scope));
  }
  return renderTemplate(guard, scope) !== "";
}

/**
 * True when the guard calls success(), failure(), always() or cancelled().
 * Such steps still run after an earlier step has failed.
 */
export function usesStatusFunction(guard: string | undefined): boolean {
  if (guard === undefined || guard.trim() === "") {
    return false;
  }
  const trimmed = guard.trim();
  const nodes = hasPlaceholders(trimmed)
    ? parseTemplate(trimmed).flatMap((s) => (s.kind === "expr" ? [s.node] : []))
    : [parseExpression(trimmed, guard)];
  return nodes.some(containsStatusCall);
}

function containsStatusCall(node: ExprNode): boolean {
  switch (node.type) {
    case "call":
      return STATUS_FUNCTIONS.has(node.name) || node.args.some(containsStatusCall);
    case "member":
      return containsStatusCall(node.object);
    case "index":
      return containsStatusCall(node.object) || containsStatusCall(node.index);
    case "not":
      return containsStatusCall(node.operand);
    case "compare":
    case "logical":
      return containsStatusCall(node.left) || containsStatusCall(node.right);
    default:
      return false;
  }
}
