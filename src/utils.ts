export const isdigit = (ch: string): boolean =>
  ch.length === 1 && ch >= "0" && ch <= "9";

export const isalpha = (ch: string): boolean =>
  ch.length === 1 &&
  ((ch >= "A" && ch <= "Z") || (ch >= "a" && ch <= "z") || ch === "_");

export const isalnum = (ch: string): boolean => isalpha(ch) || isdigit(ch);

export type ErrorKind = "LexError" | "ParseError" | "RuntimeError";

export type Position = { line: number; column: number };

/** Failure raised by any stage of the pipeline */
export class LexorError extends Error {
  public readonly line?: number;
  public readonly column?: number;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    at?: Position,
  ) {
    super(message);
    this.name = kind;
    this.line = at?.line;
    this.column = at?.column;
  }
}

export class LexError extends LexorError {
  constructor(message: string, at: Position) {
    super("LexError", message, at);
  }
}

export class ParseError extends LexorError {
  constructor(message: string, at: Position) {
    super("ParseError", message, at);
  }
}

export class RuntimeError extends LexorError {
  constructor(message: string) {
    super("RuntimeError", message);
  }
}

export const err = (from: ErrorKind, msg: string, at?: Position): never => {
  if (from === "RuntimeError") throw new RuntimeError(msg);
  const pos = at ?? { line: 0, column: 0 };
  if (from === "LexError") throw new LexError(msg, pos);
  throw new ParseError(msg, pos);
};

export const unreachable = (value: never, what: string): never =>
  err("RuntimeError", `unknown ${what}: ${JSON.stringify(value)}`);
