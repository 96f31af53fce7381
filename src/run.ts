import { Interpreter } from "./ast-walking/interpreter.ts";
import { type InputSource, LinesInput } from "./ast-walking/input.ts";
import { tokenize } from "./lexer.ts";
import { parse } from "./parser.ts";
import { type ErrorKind, LexorError } from "./utils.ts";

export type RunFailure = {
  kind: ErrorKind;
  message: string;
  line?: number;
  column?: number;
};

export type RunResult =
  | { ok: true; output: string }
  | { ok: false; output: string; error: RunFailure };

/** Scan, parse and execute `source`, capturing what it prints */
export const run = (
  source: string,
  input: InputSource = new LinesInput(),
): RunResult => {
  const interpreter = new Interpreter(input);
  try {
    interpreter.execute(parse(tokenize(source)));
    return { ok: true, output: interpreter.output() };
  } catch (e) {
    if (!(e instanceof LexorError)) throw e;
    const error: RunFailure = { kind: e.kind, message: e.message };
    if (e.line !== undefined) error.line = e.line;
    if (e.column !== undefined) error.column = e.column;
    return { ok: false, output: interpreter.output(), error };
  }
};

export const formatFailure = (error: RunFailure): string =>
  error.line !== undefined && error.column !== undefined
    ? `${error.kind} at ${error.line}:${error.column}: ${error.message}`
    : `${error.kind}: ${error.message}`;
