export enum TokenType {
  // keywords
  SCRIPT,
  AREA,
  START,
  END,
  DECLARE,
  INT,
  CHAR,
  BOOL,
  FLOAT,
  PRINT,
  SCAN,
  IF,
  ELSE,
  FOR,
  REPEAT,
  WHEN,
  AND,
  OR,
  NOT,
  // literals
  NUMBER,
  STRING,
  CHAR_LIT,
  TRUE,
  FALSE,
  IDENT,
  // operators
  OP_ADD,
  OP_SUB,
  OP_MUL,
  OP_DIV,
  OP_MOD,
  COMP_GT,
  COMP_LT,
  COMP_GE,
  COMP_LE,
  COMP_EQ,
  COMP_NE,
  ASSIGN,
  CONCAT,
  NEWLINE, // $
  LPAREN,
  RPAREN,
  LBRACKET,
  RBRACKET,
  COLON,
  COMMA,
  EOF,
  ERROR,
}

export type Token = {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly line: number;
  readonly column: number;
};

export const keywords: ReadonlyMap<string, TokenType> = new Map([
  ["SCRIPT", TokenType.SCRIPT],
  ["AREA", TokenType.AREA],
  ["START", TokenType.START],
  ["END", TokenType.END],
  ["DECLARE", TokenType.DECLARE],
  ["INT", TokenType.INT],
  ["CHAR", TokenType.CHAR],
  ["BOOL", TokenType.BOOL],
  ["FLOAT", TokenType.FLOAT],
  ["PRINT", TokenType.PRINT],
  ["SCAN", TokenType.SCAN],
  ["IF", TokenType.IF],
  ["ELSE", TokenType.ELSE],
  ["FOR", TokenType.FOR],
  ["REPEAT", TokenType.REPEAT],
  ["WHEN", TokenType.WHEN],
  ["AND", TokenType.AND],
  ["OR", TokenType.OR],
  ["NOT", TokenType.NOT],
  ["TRUE", TokenType.TRUE],
  ["FALSE", TokenType.FALSE],
]);

/** Name of a token type as written in diagnostics and token dumps */
export const tokenName = (type: TokenType): string => TokenType[type];
