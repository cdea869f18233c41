/// # computed columns
///
/// `--col "Code share" "1/(1+2+3)"` adds a column to every report row. the
/// integers in an expression are *column positions*, not literals: `1`
/// means the first data column (the first category of the chart), `2` the
/// second, and so on.
///
/// expressions are parsed once, up front, so a typo fails before any file
/// is read. evaluation never throws: dividing by zero gives the
/// `"undefined"` marker and an empty cell gives `null`, so one odd file
/// can't take the whole table down.

import { ConfigError } from "./errors.js";

export const UNDEFINED = "undefined";

export type Cell = number | null;

export type ColumnValue = number | null | typeof UNDEFINED;

export interface ComputedColumn {
  title: string;
  expression: string;
}

type Expr =
  | { kind: "column"; index: number }
  | { kind: "negate"; operand: Expr }
  | { kind: "binary"; op: "+" | "-" | "*" | "/"; left: Expr; right: Expr };

export interface ColumnExpression {
  source: string;
  /// the highest column position the expression refers to.
  maxColumn: number;
  evaluate(row: readonly Cell[]): ColumnValue;
}

export interface CompiledColumn extends ColumnExpression {
  title: string;
}

/// ## tokenizer
///
/// a run of digits is one token, so `12` is column twelve and never
/// column one followed by column two.

type Token = { kind: "number"; value: number } | { kind: "op"; value: string };

function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (/\s/.test(ch)) {
      i++;
    } else if (/\d/.test(ch)) {
      let j = i;
      while (j < source.length && /\d/.test(source[j])) j++;
      tokens.push({ kind: "number", value: Number(source.slice(i, j)) });
      i = j;
    } else if ("+-*/()".includes(ch)) {
      tokens.push({ kind: "op", value: ch });
      i++;
    } else {
      throw new ConfigError(`unexpected "${ch}" in column expression "${source}"`);
    }
  }
  return tokens;
}

/// ## parser
///
/// plain recursive descent, one function per precedence level:
///
/// ```
/// expr    := term (("+" | "-") term)*
/// term    := unary (("*" | "/") unary)*
/// unary   := ("+" | "-") unary | primary
/// primary := COLUMN | "(" expr ")"
/// ```

export function parseColumnExpression(source: string): ColumnExpression {
  const tokens = tokenize(source);
  let pos = 0;

  const fail = (what: string): never => {
    throw new ConfigError(`${what} in column expression "${source}"`);
  };

  const peekOp = (...ops: string[]): string | undefined => {
    const token = tokens[pos];
    return token && token.kind === "op" && ops.includes(token.value) ? token.value : undefined;
  };

  function expr(): Expr {
    let left = term();
    let op = peekOp("+", "-");
    while (op === "+" || op === "-") {
      pos++;
      left = { kind: "binary", op, left, right: term() };
      op = peekOp("+", "-");
    }
    return left;
  }

  function term(): Expr {
    let left = unary();
    let op = peekOp("*", "/");
    while (op === "*" || op === "/") {
      pos++;
      left = { kind: "binary", op, left, right: unary() };
      op = peekOp("*", "/");
    }
    return left;
  }

  function unary(): Expr {
    const op = peekOp("+", "-");
    if (op) {
      pos++;
      const operand = unary();
      return op === "-" ? { kind: "negate", operand } : operand;
    }
    return primary();
  }

  function primary(): Expr {
    const token = tokens[pos];
    if (!token) return fail("unexpected end");
    if (token.kind === "number") {
      pos++;
      if (token.value < 1) fail("column positions start at 1");
      return { kind: "column", index: token.value };
    }
    if (token.value === "(") {
      pos++;
      const inner = expr();
      if (!peekOp(")")) fail("missing \")\"");
      pos++;
      return inner;
    }
    return fail(`unexpected "${token.value}"`);
  }

  if (tokens.length === 0) fail("nothing");
  const tree = expr();
  if (pos < tokens.length) fail("trailing input");

  return {
    source,
    maxColumn: maxColumnOf(tree),
    evaluate: row => evaluateExpr(tree, row)
  };
}

function maxColumnOf(node: Expr): number {
  switch (node.kind) {
    case "column":
      return node.index;
    case "negate":
      return maxColumnOf(node.operand);
    case "binary":
      return Math.max(maxColumnOf(node.left), maxColumnOf(node.right));
  }
}

/// ## evaluation
///
/// an empty cell wins over everything: if the file doesn't declare a
/// category, any arithmetic on it is meaningless. then `"undefined"`
/// spreads upward from a zero divisor.

function evaluateExpr(node: Expr, row: readonly Cell[]): ColumnValue {
  switch (node.kind) {
    case "column":
      return row[node.index - 1] ?? null;
    case "negate": {
      const value = evaluateExpr(node.operand, row);
      return typeof value === "number" ? -value : value;
    }
    case "binary": {
      const left = evaluateExpr(node.left, row);
      const right = evaluateExpr(node.right, row);
      if (left === null || right === null) return null;
      if (left === UNDEFINED || right === UNDEFINED) return UNDEFINED;
      switch (node.op) {
        case "+":
          return left + right;
        case "-":
          return left - right;
        case "*":
          return left * right;
        case "/":
          return right === 0 ? UNDEFINED : left / right;
      }
    }
  }
}

/// binding an expression to a table. this is the point where we know how
/// many data columns there are, and where `5` on a four-column table
/// becomes an error instead of a silent blank.
export function compileColumn(column: ComputedColumn, columnCount: number): CompiledColumn {
  const compiled = parseColumnExpression(column.expression);
  const title = column.title || `Calc(${column.expression})`;
  if (compiled.maxColumn > columnCount) {
    throw new ConfigError(
      `column "${title}" refers to column ${compiled.maxColumn}, but there are only ${columnCount} data columns`
    );
  }
  return { ...compiled, title };
}
