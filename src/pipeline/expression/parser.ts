// ---------------------------------------------------------------------------
// Expression Language – Tokenizer & Parser
// ---------------------------------------------------------------------------
// Templates are literal text interspersed with `${{ <expr> }}` placeholders.
// Expressions are parsed into a small AST; nothing is ever handed to eval().
//
// Precedence (low → high):  ||   &&   == !=   < <= > >=   !   member/index/call
// ---------------------------------------------------------------------------

import { TemplateSyntaxError } from "../errors.js";

// ===========================================================================
// AST
// ===========================================================================

export type ExprValue = string | number | boolean | null | ExprValue[] | { [key: string]: ExprValue };

export type ComparisonOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type ExprNode =
  | { type: "literal"; value: ExprValue }
  | { type: "identifier"; name: string }
  | { type: "member"; object: ExprNode; property: string }
  | { type: "index"; object: ExprNode; index: ExprNode }
  | { type: "call"; name: string; args: ExprNode[] }
  | { type: "not"; operand: ExprNode }
  | { type: "compare"; op: ComparisonOp; left: ExprNode; right: ExprNode }
  | { type: "logical"; op: "&&" | "||"; left: ExprNode; right: ExprNode };

export type TemplateSegment =
  | { kind: "text"; value: string }
  | { kind: "expr"; source: string; node: ExprNode };

// ===========================================================================
// BUILT-IN FUNCTION SIGNATURES
// ===========================================================================

/** Lower-cased name → [min args, max args]. */
export const FUNCTION_ARITY: Record<string, [number, number]> = {
  hashfiles: [1, Number.POSITIVE_INFINITY],
  join: [1, 2],
  contains: [2, 2],
  startswith: [2, 2],
  endswith: [2, 2],
  format: [1, Number.POSITIVE_INFINITY],
  tojson: [1, 1],
  fromjson: [1, 1],
  success: [0, 0],
  failure: [0, 0],
  always: [0, 0],
  cancelled: [0, 0],
};

export const STATUS_FUNCTIONS = new Set(["success", "failure", "always", "cancelled"]);

// ===========================================================================
// TOKENIZER
// ===========================================================================

type Token =
  | { kind: "ident"; value: string }
  | { kind: "number"; value: number }
  | { kind: "string"; value: string }
  | { kind: "punct"; value: string };

const PUNCTUATION = ["==", "!=", "<=", ">=", "&&", "||", "<", ">", "!", "(", ")", "[", "]", ",", "."];

function tokenize(source: string, template: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (ch === "'") {
      let value = "";
      i++;
      for (;;) {
        if (i >= source.length) {
          throw new TemplateSyntaxError("Unterminated string literal", template);
        }
        if (source[i] === "'") {
          if (source[i + 1] === "'") {
            value += "'";
            i += 2;
            continue;
          }
          i++;
          break;
        }
        value += source[i];
        i++;
      }
      tokens.push({ kind: "string", value });
      continue;
    }

    const numberMatch = /^\d+(\.\d+)?/.exec(source.slice(i));
    if (numberMatch) {
      tokens.push({ kind: "number", value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }

    const identMatch = /^[A-Za-z_][A-Za-z0-9_-]*/.exec(source.slice(i));
    if (identMatch) {
      tokens.push({ kind: "ident", value: identMatch[0] });
      i += identMatch[0].length;
      continue;
    }

    const punct = PUNCTUATION.find((p) => source.startsWith(p, i));
    if (punct) {
      tokens.push({ kind: "punct", value: punct });
      i += punct.length;
      continue;
    }

    throw new TemplateSyntaxError(`Unexpected character '${ch}'`, template);
  }

  return tokens;
}

// ===========================================================================
// PARSER (recursive descent)
// ===========================================================================

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly template: string,
  ) {}

  parse(): ExprNode {
    if (this.tokens.length === 0) {
      this.fail("Empty expression");
    }
    const node = this.parseOr();
    if (this.pos < this.tokens.length) {
      this.fail(`Unexpected token '${describe(this.tokens[this.pos])}'`);
    }
    return node;
  }

  private fail(message: string): never {
    throw new TemplateSyntaxError(message, this.template);
  }

  private peekPunct(value: string): boolean {
    const tok = this.tokens[this.pos];
    return tok !== undefined && tok.kind === "punct" && tok.value === value;
  }

  private expectPunct(value: string): void {
    if (!this.peekPunct(value)) {
      const tok = this.tokens[this.pos];
      this.fail(tok ? `Expected '${value}' but found '${describe(tok)}'` : `Expected '${value}'`);
    }
    this.pos++;
  }

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.peekPunct("||")) {
      this.pos++;
      left = { type: "logical", op: "||", left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseEquality();
    while (this.peekPunct("&&")) {
      this.pos++;
      left = { type: "logical", op: "&&", left, right: this.parseEquality() };
    }
    return left;
  }

  private parseEquality(): ExprNode {
    let left = this.parseRelational();
    for (;;) {
      const op = this.peekPunct("==") ? "==" : this.peekPunct("!=") ? "!=" : null;
      if (!op) {
        return left;
      }
      this.pos++;
      left = { type: "compare", op, left, right: this.parseRelational() };
    }
  }

  private parseRelational(): ExprNode {
    let left = this.parseUnary();
    for (;;) {
      const op = (["<=", ">=", "<", ">"] as const).find((candidate) => this.peekPunct(candidate));
      if (!op) {
        return left;
      }
      this.pos++;
      left = { type: "compare", op, left, right: this.parseUnary() };
    }
  }

  private parseUnary(): ExprNode {
    if (this.peekPunct("!")) {
      this.pos++;
      return { type: "not", operand: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ExprNode {
    let node = this.parsePrimary();
    for (;;) {
      if (this.peekPunct(".")) {
        this.pos++;
        const tok = this.tokens[this.pos];
        if (!tok || tok.kind !== "ident") {
          this.fail("Expected property name after '.'");
        }
        this.pos++;
        node = { type: "member", object: node, property: tok.value };
      } else if (this.peekPunct("[")) {
        this.pos++;
        const index = this.parseOr();
        this.expectPunct("]");
        node = { type: "index", object: node, index };
      } else {
        return node;
      }
    }
  }

  private parsePrimary(): ExprNode {
    const tok = this.tokens[this.pos];
    if (!tok) {
      this.fail("Unexpected end of expression");
    }
    this.pos++;

    if (tok.kind === "string" || tok.kind === "number") {
      return { type: "literal", value: tok.value };
    }
    if (tok.kind === "punct") {
      if (tok.value !== "(") {
        this.fail(`Unexpected token '${tok.value}'`);
      }
      const inner = this.parseOr();
      this.expectPunct(")");
      return inner;
    }

    const name = tok.value;
    if (name === "true" || name === "false") {
      return { type: "literal", value: name === "true" };
    }
    if (name === "null") {
      return { type: "literal", value: null };
    }

    if (this.peekPunct("(")) {
      return this.parseCall(name);
    }
    return { type: "identifier", name };
  }

  private parseCall(rawName: string): ExprNode {
    const name = rawName.toLowerCase();
    const arity = FUNCTION_ARITY[name];
    if (!arity) {
      this.fail(`Unknown function '${rawName}'`);
    }

    this.expectPunct("(");
    const args: ExprNode[] = [];
    if (!this.peekPunct(")")) {
      args.push(this.parseOr());
      while (this.peekPunct(",")) {
        this.pos++;
        args.push(this.parseOr());
      }
    }
    this.expectPunct(")");

    const [min, max] = arity;
    if (args.length < min || args.length > max) {
      this.fail(`Function '${rawName}' called with ${args.length} argument(s)`);
    }
    return { type: "call", name, args };
  }
}

function describe(tok: Token): string {
  return tok.kind === "string" ? `'${tok.value}'` : String(tok.value);
}

// ===========================================================================
// PUBLIC API
// ===========================================================================

/** Parse a bare expression (no `${{ }}` wrapper). */
export function parseExpression(source: string, template = source): ExprNode {
  return new Parser(tokenize(source, template), template).parse();
}

const templateCache = new Map<string, TemplateSegment[]>();

/**
 * Split a template into text and expression segments. Parsed templates are
 * memoised; parsing is deterministic so the cache never goes stale.
 */
export function parseTemplate(template: string): TemplateSegment[] {
  const cached = templateCache.get(template);
  if (cached) {
    return cached;
  }

  const segments: TemplateSegment[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const open = template.indexOf("${{", cursor);
    if (open === -1) {
      segments.push({ kind: "text", value: template.slice(cursor) });
      break;
    }
    if (open > cursor) {
      segments.push({ kind: "text", value: template.slice(cursor, open) });
    }

    const close = findClose(template, open + 3);
    if (close === -1) {
      throw new TemplateSyntaxError("Unterminated expression", template);
    }

    const source = template.slice(open + 3, close).trim();
    segments.push({ kind: "expr", source, node: parseExpression(source, template) });
    cursor = close + 2;
  }

  templateCache.set(template, segments);
  return segments;
}

/** Index of the `}}` closing a placeholder, skipping quoted strings. */
function findClose(template: string, from: number): number {
  let inString = false;
  for (let i = from; i < template.length; i++) {
    const ch = template[i];
    if (ch === "'") {
      inString = !inString;
      continue;
    }
    if (!inString && ch === "}" && template[i + 1] === "}") {
      return i;
    }
  }
  return -1;
}

/** True when the template contains at least one placeholder. */
export function hasPlaceholders(template: string): boolean {
  return template.includes("${{");
}
