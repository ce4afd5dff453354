import { ParseError } from "../core/errors.js";
import type { ConditionValue } from "../types/config.js";
import { TokenStream, tokenize } from "./lexer.js";

export type ConditionNode =
  | { type: "literal"; value: ConditionValue }
  | { type: "var"; name: string }
  | { type: "not"; operand: ConditionNode }
  | { type: "and" | "or"; left: ConditionNode; right: ConditionNode }
  | { type: "==" | "!="; left: ConditionNode; right: ConditionNode };

/** Outcome of evaluating a condition against a partial set of variables. */
export type Tristate = "true" | "false" | "unknown";

const UNKNOWN = Symbol("unknown");
type Operand = ConditionValue | typeof UNKNOWN;

function parseOr(stream: TokenStream): ConditionNode {
  let left = parseAnd(stream);
  while (stream.isIdent("or")) {
    stream.next();
    left = { type: "or", left, right: parseAnd(stream) };
  }
  return left;
}

function parseAnd(stream: TokenStream): ConditionNode {
  let left = parseNot(stream);
  while (stream.isIdent("and")) {
    stream.next();
    left = { type: "and", left, right: parseNot(stream) };
  }
  return left;
}

function parseNot(stream: TokenStream): ConditionNode {
  if (stream.isIdent("not")) {
    stream.next();
    return { type: "not", operand: parseNot(stream) };
  }
  return parseComparison(stream);
}

function parseComparison(stream: TokenStream): ConditionNode {
  const left = parsePrimary(stream);
  for (const op of ["==", "!="] as const) {
    if (stream.isOp(op)) {
      stream.next();
      return { type: op, left, right: parsePrimary(stream) };
    }
  }
  return left;
}

function parsePrimary(stream: TokenStream): ConditionNode {
  const token = stream.peek();
  if (token.kind === "op" && token.value === "(") {
    stream.next();
    const inner = parseOr(stream);
    stream.expectOp(")");
    return inner;
  }
  if (token.kind === "string") {
    stream.next();
    return { type: "literal", value: token.value };
  }
  if (token.kind === "ident") {
    stream.next();
    if (token.value === "True") return { type: "literal", value: true };
    if (token.value === "False") return { type: "literal", value: false };
    return { type: "var", name: token.value };
  }
  return stream.fail("Expected a condition operand");
}

/** Parse a gclient condition such as `checkout_linux and not checkout_android`. */
export function parseCondition(source: string): ConditionNode {
  const stream = new TokenStream(tokenize(source));
  const node = parseOr(stream);
  if (stream.peek().kind !== "eof") stream.fail("Unexpected trailing input in condition");
  return node;
}

function truthy(value: Operand): Tristate {
  if (value === UNKNOWN) return "unknown";
  if (typeof value === "boolean") return value ? "true" : "false";
  return value.length > 0 ? "true" : "false";
}

// Target variables gclient supplies from the client's own configuration.
const TARGET_VAR = /^(checkout_[a-z0-9_]+|host_os|host_cpu|target_os|target_cpu)$/;

function resolveVar(name: string, vars: Record<string, ConditionValue>, referenced: readonly string[]): Operand {
  if (referenced.includes(name)) {
    throw new ParseError(`Cyclic reference to variable ${name} in condition`, referenced.join(" -> "));
  }
  if (!Object.hasOwn(vars, name)) return TARGET_VAR.test(name) ? UNKNOWN : name;
  const value = vars[name];
  if (typeof value !== "string") return value;
  let nested: ConditionNode;
  try {
    nested = parseCondition(value);
  } catch (e) {
    if (e instanceof ParseError) return value;
    throw e;
  }
  return evaluateNode(nested, vars, [...referenced, name]);
}

function evaluateNode(node: ConditionNode, vars: Record<string, ConditionValue>, referenced: readonly string[]): Operand {
  switch (node.type) {
    case "literal":
      return node.value;
    case "var":
      return resolveVar(node.name, vars, referenced);
    case "not": {
      const t = truthy(evaluateNode(node.operand, vars, referenced));
      return t === "unknown" ? UNKNOWN : t === "false";
    }
    case "and": {
      const l = truthy(evaluateNode(node.left, vars, referenced));
      const r = truthy(evaluateNode(node.right, vars, referenced));
      if (l === "false" || r === "false") return false;
      if (l === "true" && r === "true") return true;
      return UNKNOWN;
    }
    case "or": {
      const l = truthy(evaluateNode(node.left, vars, referenced));
      const r = truthy(evaluateNode(node.right, vars, referenced));
      if (l === "true" || r === "true") return true;
      if (l === "false" && r === "false") return false;
      return UNKNOWN;
    }
    case "==":
    case "!=": {
      const l = evaluateNode(node.left, vars, referenced);
      const r = evaluateNode(node.right, vars, referenced);
      if (l === UNKNOWN || r === UNKNOWN) return UNKNOWN;
      return node.type === "==" ? l === r : l !== r;
    }
  }
}

/**
 * Evaluate with Kleene logic: an unset target variable makes its
 * sub-expression unknown, and unknown only collapses where the other side
 * decides the result (`False and x`, `True or x`). A variable holding a
 * string is itself evaluated as a condition; an undeclared name that is not
 * a target variable stands for its own name.
 */
export function evaluateCondition(source: string, vars: Record<string, ConditionValue>): Tristate {
  return truthy(evaluateNode(parseCondition(source), vars, []));
}

export function combineConditions(parent: string | undefined, child: string | undefined): string | undefined {
  if (!parent) return child;
  if (!child) return parent;
  return `(${parent}) and (${child})`;
}
