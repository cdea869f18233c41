import { describe, it, expect } from "vitest";
import { compileColumn, parseColumnExpression, UNDEFINED } from "../src/columns.js";
import { ConfigError } from "../src/errors.js";

const evaluate = (source: string, row: (number | null)[]) => parseColumnExpression(source).evaluate(row);

describe("parseColumnExpression", () => {
  it("reads integers as column positions", () => {
    expect(evaluate("1/(1+2)", [2, 2])).toBe(0.5);
    expect(evaluate("2", [7, 9])).toBe(9);
  });

  it("follows the usual precedence", () => {
    expect(evaluate("1+2*3", [1, 2, 3])).toBe(7);
    expect(evaluate("(1+2)*3", [1, 2, 3])).toBe(9);
    expect(evaluate("3-2-1", [1, 2, 3])).toBe(0);
    expect(evaluate("-1+2*3", [1, 2, 3])).toBe(5);
  });

  it("reads a run of digits as one position", () => {
    const expression = parseColumnExpression("1 + 12");
    expect(expression.maxColumn).toBe(12);
  });

  it("marks division by zero as undefined", () => {
    expect(evaluate("1/2", [3, 0])).toBe(UNDEFINED);
    expect(evaluate("1/2 + 1", [3, 0])).toBe(UNDEFINED);
  });

  it("lets an empty cell win over everything", () => {
    expect(evaluate("1+2", [null, 3])).toBeNull();
    expect(evaluate("1/2 + 3", [1, 0, null])).toBeNull();
  });

  it.each([
    ["1 +", 'unexpected end in column expression "1 +"'],
    ["0+1", 'column positions start at 1 in column expression "0+1"'],
    ["(1+2", 'missing ")" in column expression "(1+2"'],
    ["1 2", 'trailing input in column expression "1 2"'],
    ["", 'nothing in column expression ""'],
    ["1 $ 2", 'unexpected "$" in column expression "1 $ 2"'],
    ["*1", 'unexpected "*" in column expression "*1"']
  ])("rejects %j", (source, message) => {
    expect(() => parseColumnExpression(source)).toThrow(ConfigError);
    expect(() => parseColumnExpression(source)).toThrow(message);
  });
});

describe("compileColumn", () => {
  it("keeps the given title", () => {
    const column = compileColumn({ title: "Share", expression: "1/2" }, 2);
    expect(column.title).toBe("Share");
    expect(column.evaluate([1, 4])).toBe(0.25);
  });

  it("refuses a position past the last data column", () => {
    expect(() => compileColumn({ title: "", expression: "1/3" }, 2)).toThrow(
      'column "Calc(1/3)" refers to column 3, but there are only 2 data columns'
    );
  });
});
