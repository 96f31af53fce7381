import { keywords, type Token, TokenType } from "./token.ts";
import { isalnum, isalpha, isdigit } from "./utils.ts";

const escapes: Record<string, string> = { n: "\n", t: "\t" };

/**Lexer */
export class Lexer {
  private pos: number;
  private line: number;
  private column: number;
  private tok: Token;

  constructor(private src: string) {
    this.pos = 0;
    this.line = 1;
    this.column = 1;
    this.tok = { type: TokenType.EOF, lexeme: "", line: 1, column: 1 };
  }

  private current = (): string =>
    this.pos < this.src.length ? this.src[this.pos] : "\0";

  private peek = (offset: number = 1): string =>
    this.pos + offset < this.src.length ? this.src[this.pos + offset] : "\0";

  private atEnd = (): boolean => this.pos >= this.src.length;

  private bump = (): string => {
    const ch = this.current();
    this.pos++;
    if (ch === "\n") {
      this.line++;
      this.column = 1;
    } else this.column++;
    return ch;
  };

  private skipSpaces = (): void => {
    while (!this.atEnd()) {
      const ch = this.current();
      if (ch === " " || ch === "\t" || ch === "\r" || ch === "\n") {
        this.bump();
      } else if (ch === "%" && this.peek() === "%") {
        // comment runs through the newline
        while (!this.atEnd() && this.bump() !== "\n");
      } else break;
    }
  };

  private parseNumber = (): string => {
    let text = "";
    while (isdigit(this.current())) text += this.bump();
    if (this.current() === ".") {
      text += this.bump();
      while (isdigit(this.current())) text += this.bump();
    }
    return text;
  };

  private parseAlpha = (): string => {
    let alpha = "";
    while (!this.atEnd() && isalnum(this.current())) alpha += this.bump();
    return alpha;
  };

  private parseString = (): string => {
    this.bump();
    let s = "";
    while (!this.atEnd() && this.current() !== '"') {
      if (this.current() === "\\") {
        this.bump();
        if (this.atEnd()) break;
        const ch = this.bump();
        s += escapes[ch] ?? ch;
      } else s += this.bump();
    }
    if (!this.atEnd()) this.bump();
    return s;
  };

  private parseChar = (): string => {
    this.bump();
    let c = "";
    if (!this.atEnd() && this.current() !== "'") c = this.bump();
    if (this.current() === "'") this.bump();
    return c;
  };

  private operator = (): [TokenType, string] => {
    const ch = this.bump();
    switch (ch) {
      case "+":
        return [TokenType.OP_ADD, ch];
      case "-":
        return [TokenType.OP_SUB, ch];
      case "*":
        return [TokenType.OP_MUL, ch];
      case "/":
        return [TokenType.OP_DIV, ch];
      case "%":
        return [TokenType.OP_MOD, ch];
      case "&":
        return [TokenType.CONCAT, ch];
      case "$":
        return [TokenType.NEWLINE, ch];
      case "(":
        return [TokenType.LPAREN, ch];
      case ")":
        return [TokenType.RPAREN, ch];
      case "]":
        return [TokenType.RBRACKET, ch];
      case ":":
        return [TokenType.COLON, ch];
      case ",":
        return [TokenType.COMMA, ch];
      case "<": {
        if (this.current() === "=") {
          this.bump();
          return [TokenType.COMP_LE, "<="];
        }
        if (this.current() === ">") {
          this.bump();
          return [TokenType.COMP_NE, "<>"];
        }
        return [TokenType.COMP_LT, ch];
      }
      case ">": {
        if (this.current() === "=") {
          this.bump();
          return [TokenType.COMP_GE, ">="];
        }
        return [TokenType.COMP_GT, ch];
      }
      case "=": {
        if (this.current() === "=") {
          this.bump();
          return [TokenType.COMP_EQ, "=="];
        }
        return [TokenType.ASSIGN, ch];
      }
      default:
        return [TokenType.ERROR, ch];
    }
  };

  public nextToken = (): Token => {
    this.skipSpaces();
    const line = this.line;
    const column = this.column;
    const make = (type: TokenType, lexeme: string): Token => {
      this.tok = { type, lexeme, line, column };
      return this.tok;
    };

    if (this.atEnd()) return make(TokenType.EOF, "");

    const ch = this.current();
    if (isdigit(ch)) return make(TokenType.NUMBER, this.parseNumber());
    if (isalpha(ch)) {
      const ident = this.parseAlpha();
      return make(keywords.get(ident) ?? TokenType.IDENT, ident);
    }
    if (ch === '"') return make(TokenType.STRING, this.parseString());
    if (ch === "'") return make(TokenType.CHAR_LIT, this.parseChar());
    if (ch === "[") {
      // [c] escapes a single character
      if (this.peek(2) === "]" && this.pos + 2 < this.src.length) {
        this.bump();
        const escaped = this.bump();
        this.bump();
        return make(TokenType.STRING, escaped);
      }
      this.bump();
      return make(TokenType.LBRACKET, ch);
    }

    const [type, lexeme] = this.operator();
    return make(type, lexeme);
  };

  public tokenize = (): Token[] => {
    const tokens: Token[] = [];
    while (this.nextToken().type !== TokenType.EOF) tokens.push(this.tok);
    tokens.push(this.tok);
    return tokens;
  };
}

export const tokenize = (source: string): Token[] =>
  new Lexer(source).tokenize();
