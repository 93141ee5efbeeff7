// ---------------------------------------------------------------------------
// Expression Language – Barrel Export
// ---------------------------------------------------------------------------

export type { ExprNode, ExprValue, TemplateSegment } from "./parser.js";
export type { EvaluationScope, JobStatusForGuards } from "./evaluate.js";

export { parseExpression, parseTemplate, hasPlaceholders } from "./parser.js";
export { evaluate, isTruthy, looseEquals, stringifyValue, toExprValue } from "./evaluate.js";
export {
  evaluateGuard,
  renderRecord,
  renderTemplate,
  usesStatusFunction,
} from "./template.js";
