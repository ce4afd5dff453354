import { ParseError } from "../core/errors.js";

export type TokenKind = "ident" | "string" | "number" | "op" | "eof";

export type Token = {
  kind: TokenKind;
  value: string;
  line: number;
  column: number;
};

const OPERATORS = ["==", "!=", "(", ")", "[", "]", "{", "}", ",", ":", "=", "+"];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  "'": "'",
  '"': '"',
};

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

/**
 * Tokenizer for the literal subset used by DEPS files and their
 * condition expressions. Newlines are insignificant: statements are
 * separated by the grammar, not by line breaks.
 */
export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;
  let lineStart = 0;

  const here = () => ({ line, column: pos - lineStart + 1 });
  const fail = (message: string): never => {
    const { line: l, column } = here();
    throw new ParseError(message, `${l}:${column}`);
  };

  while (pos < source.length) {
    const ch = source[pos];

    if (ch === "\n") {
      pos++;
      line++;
      lineStart = pos;
      continue;
    }
    if (ch === " " || ch === "\t" || ch === "\r" || ch === "\\") {
      // a backslash outside a string is a line continuation
      pos++;
      continue;
    }
    if (ch === "#") {
      while (pos < source.length && source[pos] !== "\n") pos++;
      continue;
    }

    const start = here();

    let quotePos = pos;
    let raw = false;
    if ((ch === "r" || ch === "R" || ch === "u" || ch === "U") && (source[pos + 1] === "'" || source[pos + 1] === '"')) {
      raw = ch === "r" || ch === "R";
      quotePos = pos + 1;
    }
    const quote = source[quotePos];
    if (quote === "'" || quote === '"') {
      pos = quotePos;
      const triple = source.startsWith(quote.repeat(3), pos);
      const delimiter = triple ? quote.repeat(3) : quote;
      pos += delimiter.length;
      let value = "";
      for (;;) {
        if (pos >= source.length) fail("Unterminated string literal");
        if (source.startsWith(delimiter, pos)) {
          pos += delimiter.length;
          break;
        }
        const c = source[pos];
        if (c === "\n") {
          if (!triple) fail("Newline in string literal");
          line++;
          lineStart = pos + 1;
        }
        if (c === "\\" && !raw && pos + 1 < source.length) {
          const next = source[pos + 1];
          if (next === "\n") {
            line++;
            lineStart = pos + 2;
          } else {
            value += ESCAPES[next] ?? `\\${next}`;
          }
          pos += 2;
          continue;
        }
        value += c;
        pos++;
      }
      tokens.push({ kind: "string", value, ...start });
      continue;
    }

    if (isIdentStart(ch)) {
      let end = pos;
      while (end < source.length && isIdentPart(source[end])) end++;
      tokens.push({ kind: "ident", value: source.slice(pos, end), ...start });
      pos = end;
      continue;
    }

    if (/[0-9]/.test(ch) || (ch === "-" && /[0-9]/.test(source[pos + 1] ?? ""))) {
      let end = pos + 1;
      while (end < source.length && /[0-9.]/.test(source[end])) end++;
      tokens.push({ kind: "number", value: source.slice(pos, end), ...start });
      pos = end;
      continue;
    }

    const op = OPERATORS.find((o) => source.startsWith(o, pos));
    if (op) {
      tokens.push({ kind: "op", value: op, ...start });
      pos += op.length;
      continue;
    }

    fail(`Unexpected character ${JSON.stringify(ch)}`);
  }

  tokens.push({ kind: "eof", value: "", ...here() });
  return tokens;
}

/** Cursor over a token list, shared by the DEPS and condition parsers. */
export class TokenStream {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)];
  }

  next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.index++;
    return token;
  }

  isOp(value: string): boolean {
    const token = this.peek();
    return token.kind === "op" && token.value === value;
  }

  isIdent(value?: string): boolean {
    const token = this.peek();
    return token.kind === "ident" && (value === undefined || token.value === value);
  }

  expectOp(value: string): Token {
    if (!this.isOp(value)) this.fail(`Expected "${value}"`);
    return this.next();
  }

  expectIdent(): Token {
    if (!this.isIdent()) this.fail("Expected an identifier");
    return this.next();
  }

  fail(message: string): never {
    const token = this.peek();
    const found = token.kind === "eof" ? "end of input" : JSON.stringify(token.value);
    throw new ParseError(`${message}, found ${found}`, `${token.line}:${token.column}`);
  }
}
