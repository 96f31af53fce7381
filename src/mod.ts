export { Lexer, tokenize } from "./lexer.ts";
export { Parser, parse } from "./parser.ts";
export { Interpreter } from "./ast-walking/interpreter.ts";
export { Environment } from "./ast-walking/environment.ts";
export { type InputSource, LinesInput } from "./ast-walking/input.ts";
export { formatFailure, run, type RunFailure, type RunResult } from "./run.ts";
export { type Token, tokenName, TokenType } from "./token.ts";
export type * from "./ast.ts";
export type { Value } from "./ast-walking/value.ts";
export {
  type ErrorKind,
  LexError,
  LexorError,
  ParseError,
  RuntimeError,
} from "./utils.ts";
