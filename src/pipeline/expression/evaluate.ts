// ---------------------------------------------------------------------------
// Expression Language – Evaluator
// ---------------------------------------------------------------------------
// Walks the AST against an EvaluationScope. Lookups are permissive: unknown
// namespaces and missing properties evaluate to null, which renders as ''.
// ---------------------------------------------------------------------------

import { TemplateSyntaxError } from "../errors.js";
import type { ExprNode, ExprValue } from "./parser.js";

// ---------------------------------------------------------------------------
// Scope
// ---------------------------------------------------------------------------

export type JobStatusForGuards = "success" | "failure" | "cancelled";

export interface EvaluationScope {
  /** Value of a top-level namespace (`env`, `matrix`, `steps`, …). */
  lookup(namespace: string): ExprValue;
  /**
   * Called before `<namespace>.<key>` is read. May throw, e.g. a
   * ForwardReferenceError for a step that has not run.
   */
  checkAccess?(namespace: string, key: string): void;
  /** Content hash over files matching the patterns; '' when none match. */
  hashFiles?(patterns: string[]): string;
  /** Current job status seen by success()/failure()/cancelled(). */
  jobStatus?: JobStatusForGuards;
}

// ---------------------------------------------------------------------------
// Coercion helpers
// ---------------------------------------------------------------------------

export function isTruthy(value: ExprValue): boolean {
  if (value === null || value === false || value === "") {
    return false;
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  return true;
}

export function stringifyValue(value: ExprValue): string {
  if (value === null) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

function toNumber(value: ExprValue): number {
  if (value === null) {
    return 0;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string") {
    return value.trim() === "" ? 0 : Number(value);
  }
  return Number.NaN;
}

function isComposite(value: ExprValue): value is ExprValue[] | { [key: string]: ExprValue } {
  return typeof value === "object" && value !== null;
}

/**
 * Loose equality: null compares as '', strings compare case-insensitively,
 * a number and a string compare numerically, composites compare by identity.
 * Any other mix of types is unequal.
 */
export function looseEquals(a: ExprValue, b: ExprValue): boolean {
  const left = a === null ? "" : a;
  const right = b === null ? "" : b;
  if (typeof left === "string" && typeof right === "string") {
    return left.toLowerCase() === right.toLowerCase();
  }
  if (
    (typeof left === "number" && typeof right === "string") ||
    (typeof left === "string" && typeof right === "number")
  ) {
    return toNumber(left) === toNumber(right);
  }
  return left === right;
}

function compareOrder(a: ExprValue, b: ExprValue): number {
  if (typeof a === "string" && typeof b === "string") {
    const l = a.toLowerCase();
    const r = b.toLowerCase();
    return l < r ? -1 : l > r ? 1 : 0;
  }
  return toNumber(a) - toNumber(b);
}

function readProperty(target: ExprValue, key: string): ExprValue {
  if (Array.isArray(target)) {
    const idx = Number(key);
    return Number.isInteger(idx) && idx >= 0 && idx < target.length ? target[idx] : null;
  }
  if (isComposite(target) && Object.prototype.hasOwnProperty.call(target, key)) {
    return target[key];
  }
  return null;
}

/** Convert parsed JSON into an expression value, dropping anything unrepresentable. */
export function toExprValue(raw: unknown): ExprValue {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (typeof raw === "string" || typeof raw === "number" || typeof raw === "boolean") {
    return raw;
  }
  if (Array.isArray(raw)) {
    return raw.map(toExprValue);
  }
  if (typeof raw === "object") {
    const out: { [key: string]: ExprValue } = {};
    for (const [key, value] of Object.entries(raw)) {
      out[key] = toExprValue(value);
    }
    return out;
  }
  return null;
}

// ---------------------------------------------------------------------------
// Built-in functions
// ---------------------------------------------------------------------------

type BuiltinFn = (args: ExprValue[], scope: EvaluationScope) => ExprValue;

const BUILTINS: Record<string, BuiltinFn> = {
  hashfiles: (args, scope) => scope.hashFiles?.(args.map(stringifyValue)) ?? "",

  join: ([value, separator]) => {
    const sep = separator === undefined ? "," : stringifyValue(separator);
    return Array.isArray(value) ? value.map(stringifyValue).join(sep) : stringifyValue(value);
  },

  contains: ([haystack, needle]) => {
    if (Array.isArray(haystack)) {
      return haystack.some((item) => looseEquals(item, needle));
    }
    return stringifyValue(haystack).toLowerCase().includes(stringifyValue(needle).toLowerCase());
  },

  startswith: ([value, prefix]) =>
    stringifyValue(value).toLowerCase().startsWith(stringifyValue(prefix).toLowerCase()),

  endswith: ([value, suffix]) =>
    stringifyValue(value).toLowerCase().endsWith(stringifyValue(suffix).toLowerCase()),

  format: ([pattern, ...rest]) =>
    stringifyValue(pattern).replace(/\{\{|\}\}|\{(\d+)\}/g, (match, index: string | undefined) => {
      if (match === "{{") {
        return "{";
      }
      if (match === "}}") {
        return "}";
      }
      const arg = rest[Number(index)];
      return arg === undefined ? match : stringifyValue(arg);
    }),

  tojson: ([value]) => JSON.stringify(value, null, 2),

  fromjson: ([value]) => {
    try {
      return toExprValue(JSON.parse(stringifyValue(value)));
    } catch {
      return null;
    }
  },

  success: (_args, scope) => (scope.jobStatus ?? "success") === "success",
  failure: (_args, scope) => scope.jobStatus === "failure",
  cancelled: (_args, scope) => scope.jobStatus === "cancelled",
  always: () => true,
};

// ---------------------------------------------------------------------------
// evaluate
// ---------------------------------------------------------------------------

export function evaluate(node: ExprNode, scope: EvaluationScope): ExprValue {
  switch (node.type) {
    case "literal":
      return node.value;

    case "identifier":
      return scope.lookup(node.name);

    case "member":
      return readMember(node.object, node.property, scope);

    case "index": {
      const key = stringifyValue(evaluate(node.index, scope));
      return readMember(node.object, key, scope);
    }

    case "call": {
      const fn = BUILTINS[node.name];
      if (!fn) {
        throw new TemplateSyntaxError(`Unknown function '${node.name}'`, node.name);
      }
      return fn(
        node.args.map((arg) => evaluate(arg, scope)),
        scope,
      );
    }

    case "not":
      return !isTruthy(evaluate(node.operand, scope));

    case "compare": {
      const left = evaluate(node.left, scope);
      const right = evaluate(node.right, scope);
      switch (node.op) {
        case "==":
          return looseEquals(left, right);
        case "!=":
          return !looseEquals(left, right);
        case "<":
          return compareOrder(left, right) < 0;
        case "<=":
          return compareOrder(left, right) <= 0;
        case ">":
          return compareOrder(left, right) > 0;
        case ">=":
          return compareOrder(left, right) >= 0;
      }
    }

    case "logical": {
      const left = evaluate(node.left, scope);
      if (node.op === "&&") {
        return isTruthy(left) ? evaluate(node.right, scope) : left;
      }
      return isTruthy(left) ? left : evaluate(node.right, scope);
    }
  }
}

function readMember(objectNode: ExprNode, key: string, scope: EvaluationScope): ExprValue {
  if (objectNode.type === "identifier") {
    scope.checkAccess?.(objectNode.name, key);
  }
  return readProperty(evaluate(objectNode, scope), key);
}
