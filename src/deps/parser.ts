import { ParseError } from "../core/errors.js";
import type { PyDict, PyValue } from "../types/deps.js";
import { TokenStream, tokenize } from "./lexer.js";

const CONSTANTS: Record<string, PyValue> = { True: true, False: false, None: null };

/**
 * Built-ins gclient exposes to DEPS files. `Var` is lazy: it yields a
 * `{name}` template that is formatted against `vars` once the entry is used.
 */
const BUILTINS: Record<string, (args: PyValue[], stream: TokenStream) => PyValue> = {
  Var: (args, stream) => {
    const [name] = args;
    if (args.length !== 1 || typeof name !== "string") stream.fail("Var() takes one string argument");
    return `{${name}}`;
  },
  Str: (args, stream) => {
    const [value] = args;
    if (args.length !== 1 || typeof value !== "string") stream.fail("Str() takes one string argument");
    return value;
  },
};

function add(left: PyValue, right: PyValue, stream: TokenStream): PyValue {
  if (typeof left === "string" && typeof right === "string") return left + right;
  if (Array.isArray(left) && Array.isArray(right)) return [...left, ...right];
  if (typeof left === "number" && typeof right === "number") return left + right;
  return stream.fail("Unsupported operands for +");
}

function parseExpression(stream: TokenStream): PyValue {
  let value = parseAtom(stream);
  while (stream.isOp("+")) {
    stream.next();
    value = add(value, parseAtom(stream), stream);
  }
  return value;
}

function parseSequence(stream: TokenStream, close: string): PyValue[] {
  const items: PyValue[] = [];
  while (!stream.isOp(close)) {
    items.push(parseExpression(stream));
    if (!stream.isOp(close)) stream.expectOp(",");
  }
  stream.expectOp(close);
  return items;
}

function parseDict(stream: TokenStream): PyDict {
  const dict: PyDict = {};
  while (!stream.isOp("}")) {
    const keyToken = stream.peek();
    const key = parseExpression(stream);
    if (typeof key !== "string") {
      throw new ParseError("Dictionary keys must be strings", `${keyToken.line}:${keyToken.column}`);
    }
    stream.expectOp(":");
    dict[key] = parseExpression(stream);
    if (!stream.isOp("}")) stream.expectOp(",");
  }
  stream.expectOp("}");
  return dict;
}

function parseAtom(stream: TokenStream): PyValue {
  const token = stream.peek();

  switch (token.kind) {
    case "string": {
      // adjacent literals concatenate
      let value = "";
      while (stream.peek().kind === "string") value += stream.next().value;
      return value;
    }
    case "number": {
      stream.next();
      const n = Number(token.value);
      if (Number.isNaN(n)) stream.fail(`Invalid number ${token.value}`);
      return n;
    }
    case "ident": {
      stream.next();
      if (Object.hasOwn(CONSTANTS, token.value)) return CONSTANTS[token.value];
      if (Object.hasOwn(BUILTINS, token.value) && stream.isOp("(")) {
        stream.next();
        return BUILTINS[token.value](parseSequence(stream, ")"), stream);
      }
      throw new ParseError(`Unknown name ${token.value}`, `${token.line}:${token.column}`);
    }
    case "op": {
      if (token.value === "[") {
        stream.next();
        return parseSequence(stream, "]");
      }
      if (token.value === "{") {
        stream.next();
        return parseDict(stream);
      }
      if (token.value === "(") {
        stream.next();
        // (x) is grouping, (x,) and (x, y) are tuples
        if (stream.isOp(")")) {
          stream.next();
          return [];
        }
        const first = parseExpression(stream);
        if (stream.isOp(")")) {
          stream.next();
          return first;
        }
        stream.expectOp(",");
        return [first, ...parseSequence(stream, ")")];
      }
      return stream.fail("Unexpected token");
    }
    default:
      return stream.fail("Unexpected token");
  }
}

/**
 * Parse a DEPS file into its top-level assignments. Only literal values,
 * `+`, and the `Var`/`Str` built-ins are accepted; anything else is a
 * ParseError carrying the line and column.
 */
export function parseDepsSource(source: string): Record<string, PyValue> {
  const stream = new TokenStream(tokenize(source));
  const assignments: Record<string, PyValue> = {};

  while (stream.peek().kind !== "eof") {
    const name = stream.expectIdent();
    stream.expectOp("=");
    assignments[name.value] = parseExpression(stream);
  }

  return assignments;
}
