import type {
  Assignment,
  BinaryOperator,
  DataType,
  Declaration,
  Expression,
  If,
  Program,
  Statement,
  UnaryOperator,
} from "./ast.ts";
import { type Token, TokenType } from "./token.ts";
import { err } from "./utils.ts";

const dataTypes = new Map<TokenType, DataType>([
  [TokenType.INT, "INT"],
  [TokenType.FLOAT, "FLOAT"],
  [TokenType.CHAR, "CHAR"],
  [TokenType.BOOL, "BOOL"],
]);

const comparisonOps = new Map<TokenType, BinaryOperator>([
  [TokenType.COMP_LT, "<"],
  [TokenType.COMP_GT, ">"],
  [TokenType.COMP_LE, "<="],
  [TokenType.COMP_GE, ">="],
  [TokenType.COMP_EQ, "=="],
  [TokenType.COMP_NE, "<>"],
]);

const additiveOps = new Map<TokenType, BinaryOperator>([
  [TokenType.OP_ADD, "+"],
  [TokenType.OP_SUB, "-"],
]);

const multiplicativeOps = new Map<TokenType, BinaryOperator>([
  [TokenType.OP_MUL, "*"],
  [TokenType.OP_DIV, "/"],
  [TokenType.OP_MOD, "%"],
]);

const unaryOps = new Map<TokenType, UnaryOperator>([
  [TokenType.OP_ADD, "+"],
  [TokenType.OP_SUB, "-"],
  [TokenType.NOT, "NOT"],
]);

/**Parser */
export class Parser {
  private pos = 0;

  constructor(private tokens: Token[]) {}

  public parse = (): Program => {
    this.expect(TokenType.SCRIPT, "Expected 'SCRIPT'");
    this.expect(TokenType.AREA, "Expected 'AREA' after 'SCRIPT'");
    this.expect(TokenType.START, "Expected 'START'");
    this.expect(TokenType.SCRIPT, "Expected 'SCRIPT' after 'START'");

    const declarations: Declaration[] = [];
    while (this.current().type === TokenType.DECLARE) {
      declarations.push(this.declaration());
    }
    const statements = this.block();

    this.expect(TokenType.END, "Expected 'END SCRIPT'");
    this.expect(TokenType.SCRIPT, "Expected 'SCRIPT' after 'END'");
    return { type: "Program", declarations, statements };
  };

  private current = (): Token => {
    if (this.pos < this.tokens.length) return this.tokens[this.pos];
    const last = this.tokens[this.tokens.length - 1];
    return {
      type: TokenType.EOF,
      lexeme: "",
      line: last?.line ?? 1,
      column: last?.column ?? 1,
    };
  };

  private peek = (): Token | undefined => this.tokens[this.pos + 1];

  private bump = (): Token => {
    const tok = this.current();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  };

  private fail = (msg: string): never => {
    const tok = this.current();
    if (tok.type === TokenType.ERROR) {
      return err("LexError", `Unexpected character '${tok.lexeme}'`, tok);
    }
    return err("ParseError", msg, tok);
  };

  private expect = (type: TokenType, msg: string): Token => {
    if (this.current().type !== type) return this.fail(msg);
    return this.bump();
  };

  // statements up to the END of the enclosing block
  private block = (): Statement[] => {
    const body: Statement[] = [];
    while (
      this.current().type !== TokenType.END &&
      this.current().type !== TokenType.EOF
    ) {
      body.push(...this.statement());
    }
    return body;
  };

  private closeBlock = (keyword: TokenType, name: string): void => {
    this.expect(TokenType.END, `Expected 'END ${name}'`);
    this.expect(keyword, `Expected '${name}' after 'END'`);
  };

  private statement = (): Statement[] => {
    switch (this.current().type) {
      case TokenType.DECLARE:
        return [this.declaration()];
      case TokenType.IDENT:
        return this.assignment();
      case TokenType.PRINT: {
        this.bump();
        this.expect(TokenType.COLON, "Expected ':' after 'PRINT'");
        const values = [this.expr()];
        while (this.current().type === TokenType.CONCAT) {
          this.bump();
          values.push(this.expr());
        }
        return [{ type: "Print", values }];
      }
      case TokenType.SCAN: {
        this.bump();
        this.expect(TokenType.COLON, "Expected ':' after 'SCAN'");
        const names = [this.identifier("Expected variable name after 'SCAN:'")];
        while (this.current().type === TokenType.COMMA) {
          this.bump();
          names.push(this.identifier("Expected variable name after ','"));
        }
        return [{ type: "Scan", names }];
      }
      case TokenType.IF:
        return [this.ifStatement()];
      case TokenType.REPEAT: {
        this.bump();
        this.expect(TokenType.WHEN, "Expected 'WHEN' after 'REPEAT'");
        const cond = this.condition();
        this.expect(TokenType.START, "Expected 'START REPEAT'");
        this.expect(TokenType.REPEAT, "Expected 'REPEAT' after 'START'");
        const body = this.block();
        this.closeBlock(TokenType.REPEAT, "REPEAT");
        return [{ type: "Repeat", cond, body }];
      }
      case TokenType.START: {
        this.bump();
        this.expect(TokenType.FOR, "Expected 'FOR' after 'START'");
        const body = this.block();
        this.closeBlock(TokenType.FOR, "FOR");
        return [{ type: "For", body }];
      }
      default:
        return this.fail("Expected a statement");
    }
  };

  private declaration = (): Declaration => {
    this.expect(TokenType.DECLARE, "Expected 'DECLARE'");
    const dataType = dataTypes.get(this.current().type);
    if (dataType === undefined) {
      return this.fail("Expected a data type (INT, CHAR, BOOL, FLOAT)");
    }
    this.bump();

    const bindings: Declaration["bindings"] = [];
    do {
      if (bindings.length > 0) this.bump();
      const name = this.identifier("Expected variable name in declaration");
      if (this.current().type === TokenType.ASSIGN) {
        this.bump();
        bindings.push({ name, init: this.expr() });
      } else bindings.push({ name });
    } while (this.current().type === TokenType.COMMA);

    return { type: "Declaration", dataType, bindings };
  };

  // a=b=c=5 becomes c=5, b=c, a=b
  private assignment = (): Assignment[] => {
    const targets = [this.identifier("Expected variable name")];
    this.expect(TokenType.ASSIGN, "Expected '=' in assignment");
    while (
      this.current().type === TokenType.IDENT &&
      this.peek()?.type === TokenType.ASSIGN
    ) {
      targets.push(this.bump().lexeme);
      this.bump();
    }
    const value = this.expr();

    const chain: Assignment[] = [];
    let source: Expression = value;
    for (let i = targets.length - 1; i >= 0; i--) {
      chain.push({ type: "Assignment", name: targets[i], value: source });
      source = { type: "Identifier", name: targets[i] };
    }
    return chain;
  };

  private ifStatement = (): If => {
    this.expect(TokenType.IF, "Expected 'IF'");
    const cond = this.condition();
    this.expect(TokenType.START, "Expected 'START IF'");
    this.expect(TokenType.IF, "Expected 'IF' after 'START'");
    const then = this.block();
    this.closeBlock(TokenType.IF, "IF");

    if (this.current().type !== TokenType.ELSE) {
      return { type: "If", cond, then };
    }
    this.bump();
    if (this.current().type === TokenType.IF) {
      return { type: "If", cond, then, else: [this.ifStatement()] };
    }
    this.expect(TokenType.START, "Expected 'START IF' or 'IF' after 'ELSE'");
    this.expect(TokenType.IF, "Expected 'IF' after 'START'");
    const elseBody = this.block();
    this.closeBlock(TokenType.IF, "IF");
    return { type: "If", cond, then, else: elseBody };
  };

  private condition = (): Expression => {
    this.expect(TokenType.LPAREN, "Expected '(' before condition");
    const cond = this.expr();
    this.expect(TokenType.RPAREN, "Expected ')' after condition");
    return cond;
  };

  private identifier = (msg: string): string =>
    this.expect(TokenType.IDENT, msg).lexeme;

  private expr = (): Expression => {
    let left = this.logicalAnd();
    while (this.current().type === TokenType.OR) {
      this.bump();
      const right = this.logicalAnd();
      left = { type: "BinaryOp", op: "OR", left, right };
    }
    return left;
  };

  private logicalAnd = (): Expression => {
    let left = this.comparison();
    while (this.current().type === TokenType.AND) {
      this.bump();
      const right = this.comparison();
      left = { type: "BinaryOp", op: "AND", left, right };
    }
    return left;
  };

  private binary = (
    ops: ReadonlyMap<TokenType, BinaryOperator>,
    operand: () => Expression,
  ): Expression => {
    let left = operand();
    let op = ops.get(this.current().type);
    while (op !== undefined) {
      this.bump();
      const right = operand();
      left = { type: "BinaryOp", op, left, right };
      op = ops.get(this.current().type);
    }
    return left;
  };

  private comparison = (): Expression =>
    this.binary(comparisonOps, this.additive);

  private additive = (): Expression =>
    this.binary(additiveOps, this.multiplicative);

  private multiplicative = (): Expression =>
    this.binary(multiplicativeOps, this.unary);

  private unary = (): Expression => {
    const op = unaryOps.get(this.current().type);
    if (op !== undefined) {
      this.bump();
      return { type: "UnaryOp", op, argument: this.unary() };
    }
    return this.primary();
  };

  private primary = (): Expression => {
    const tok = this.current();
    switch (tok.type) {
      case TokenType.NUMBER: {
        this.bump();
        return {
          type: "NumberLiteral",
          value: parseFloat(tok.lexeme),
          isFloat: tok.lexeme.includes("."),
        };
      }
      case TokenType.STRING:
        this.bump();
        return { type: "StringLiteral", value: tok.lexeme };
      case TokenType.NEWLINE:
        this.bump();
        return { type: "StringLiteral", value: "$" };
      case TokenType.CHAR_LIT:
        this.bump();
        return { type: "CharacterLiteral", value: tok.lexeme || "\0" };
      case TokenType.TRUE:
      case TokenType.FALSE:
        this.bump();
        return { type: "BooleanLiteral", value: tok.type === TokenType.TRUE };
      case TokenType.IDENT:
        this.bump();
        return { type: "Identifier", name: tok.lexeme };
      case TokenType.LPAREN: {
        this.bump();
        const expr = this.expr();
        this.expect(TokenType.RPAREN, "Expected ')'");
        return expr;
      }
      default:
        return this.fail("Expected an expression");
    }
  };
}

export const parse = (tokens: Token[]): Program => new Parser(tokens).parse();
