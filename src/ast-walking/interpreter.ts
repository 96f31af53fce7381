import type {
  BinaryOp,
  DataType,
  Expression,
  Program,
  Statement,
  UnaryOp,
} from "../ast.ts";
import { err, unreachable } from "../utils.ts";
import { Environment } from "./environment.ts";
import { type InputSource, LinesInput } from "./input.ts";
import {
  boolean,
  character,
  float,
  integer,
  NUL,
  parseNumber,
  text,
  toBoolean,
  toNumber,
  toText,
  type Value,
  zeroValue,
} from "./value.ts";

const arithmetic = (
  left: Value,
  right: Value,
  fn: (a: number, b: number) => number,
): Value =>
  left.type === "Integer" && right.type === "Integer"
    ? integer(fn(left.value, right.value))
    : float(fn(toNumber(left), toNumber(right)));

const fromField = (dataType: DataType, field: string): Value => {
  switch (dataType) {
    case "INT":
      return integer(Math.trunc(parseNumber(field)));
    case "FLOAT":
      return float(parseNumber(field));
    case "CHAR":
      return character(field.length > 0 ? field[0] : NUL);
    case "BOOL":
      return boolean(field === "TRUE" || field === "true");
  }
};

// an empty line has no fields and a trailing comma adds none
const splitFields = (line: string): string[] => {
  const fields = line.split(",");
  if (fields[fields.length - 1] === "") fields.pop();
  return fields.map((f) => f.replace(/^[ \t]+|[ \t]+$/g, ""));
};

/**Interpreter */
export class Interpreter {
  private env = new Environment();
  private out: string[] = [];

  constructor(private input: InputSource = new LinesInput()) {}

  public execute = (program: Program): void => {
    for (const decl of program.declarations) this.exec(decl);
    this.block(program.statements);
  };

  /** Everything printed so far, also after a failed run */
  public output = (): string => this.out.join("");

  public environment = (): Environment => this.env;

  private block = (body: Statement[]): void => {
    for (const stmt of body) this.exec(stmt);
  };

  private exec = (stmt: Statement): void => {
    switch (stmt.type) {
      case "Declaration": {
        for (const { name, init } of stmt.bindings) {
          const value = init ? this.eval(init) : zeroValue(stmt.dataType);
          this.env.declare(name, stmt.dataType, value);
        }
        return;
      }
      case "Assignment": {
        this.env.assign(stmt.name, this.eval(stmt.value));
        return;
      }
      case "Print": {
        for (const expr of stmt.values) {
          const s = toText(this.eval(expr));
          this.out.push(s === "$" ? "\n" : s);
        }
        return;
      }
      case "Scan": {
        const line = this.input.readLine() ?? "";
        const fields = splitFields(line);
        stmt.names.forEach((name, i) => {
          if (i >= fields.length) return;
          const { dataType } = this.env.lookup(name);
          this.env.assign(name, fromField(dataType, fields[i]));
        });
        return;
      }
      case "If": {
        if (toBoolean(this.eval(stmt.cond))) this.block(stmt.then);
        else if (stmt.else) this.block(stmt.else);
        return;
      }
      case "Repeat": {
        while (toBoolean(this.eval(stmt.cond))) this.block(stmt.body);
        return;
      }
      case "For": {
        // no loop header in the grammar, so the body runs once
        this.block(stmt.body);
        return;
      }
      default:
        return unreachable(stmt, "statement");
    }
  };

  private eval = (expr: Expression): Value => {
    switch (expr.type) {
      case "NumberLiteral":
        return expr.isFloat ? float(expr.value) : integer(expr.value);
      case "StringLiteral":
        return text(expr.value);
      case "CharacterLiteral":
        return character(expr.value);
      case "BooleanLiteral":
        return boolean(expr.value);
      case "Identifier":
        return this.env.getVar(expr.name);
      case "BinaryOp":
        return this.binary(expr);
      case "UnaryOp":
        return this.unary(expr);
      default:
        return unreachable(expr, "expression");
    }
  };

  private binary = (expr: BinaryOp): Value => {
    // both sides always run, AND/OR included
    const left = this.eval(expr.left);
    const right = this.eval(expr.right);

    switch (expr.op) {
      case "+":
        return arithmetic(left, right, (a, b) => a + b);
      case "-":
        return arithmetic(left, right, (a, b) => a - b);
      case "*":
        return arithmetic(left, right, (a, b) => a * b);
      case "/": {
        const divisor = toNumber(right);
        if (divisor === 0) return err("RuntimeError", "division by zero");
        return float(toNumber(left) / divisor);
      }
      case "%": {
        const divisor = Math.trunc(toNumber(right));
        if (divisor === 0) return err("RuntimeError", "modulo by zero");
        return integer(Math.trunc(toNumber(left)) % divisor);
      }
      case "<":
        return boolean(toNumber(left) < toNumber(right));
      case ">":
        return boolean(toNumber(left) > toNumber(right));
      case "<=":
        return boolean(toNumber(left) <= toNumber(right));
      case ">=":
        return boolean(toNumber(left) >= toNumber(right));
      case "==":
      case "<>": {
        const same = left.type === "Text" || right.type === "Text"
          ? toText(left) === toText(right)
          : toNumber(left) === toNumber(right);
        return boolean(expr.op === "==" ? same : !same);
      }
      case "AND":
        return boolean(toBoolean(left) && toBoolean(right));
      case "OR":
        return boolean(toBoolean(left) || toBoolean(right));
      default:
        return err("RuntimeError", `unknown operator '${String(expr.op)}'`);
    }
  };

  private unary = (expr: UnaryOp): Value => {
    const val = this.eval(expr.argument);
    switch (expr.op) {
      case "NOT":
        return boolean(!toBoolean(val));
      case "-":
        return val.type === "Integer"
          ? integer(-val.value)
          : float(-toNumber(val));
      case "+":
        return val.type === "Integer" ? val : float(toNumber(val));
      default:
        return err("RuntimeError", `unknown operator '${String(expr.op)}'`);
    }
  };
}
