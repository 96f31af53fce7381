import { readFileSync } from "node:fs";
import { Command } from "commander";
import readlineSync from "readline-sync";
import {
  formatFailure,
  type InputSource,
  Interpreter,
  LexorError,
  parse,
  tokenize,
  tokenName,
} from "./mod.ts";

type Options = { debug?: boolean };

const consoleInput: InputSource = {
  readLine: () => readlineSync.question(""),
};

const banner = (opts: Options, stage: string): void => {
  if (opts.debug) console.error(`=== ${stage} ===`);
};

const interpret = (file: string, opts: Options): void => {
  const src = readFileSync(file, "utf8");
  const interpreter = new Interpreter(consoleInput);
  try {
    banner(opts, "scan");
    const tokens = tokenize(src);
    banner(opts, "parse");
    const ast = parse(tokens);
    banner(opts, "execute");
    interpreter.execute(ast);
    process.stdout.write(interpreter.output());
    banner(opts, "done");
  } catch (e) {
    if (!(e instanceof LexorError)) throw e;
    process.stdout.write(interpreter.output());
    console.error(formatFailure(e));
    process.exitCode = 1;
  }
};

const printTokens = (file: string): void => {
  const src = readFileSync(file, "utf8");
  for (const tok of tokenize(src)) {
    console.log(
      `${tok.line}:${tok.column} ${tokenName(tok.type)} ${tok.lexeme}`,
    );
  }
};

const printAST = (file: string): void => {
  const src = readFileSync(file, "utf8");
  try {
    console.log(JSON.stringify(parse(tokenize(src)), null, 2));
  } catch (e) {
    if (!(e instanceof LexorError)) throw e;
    console.error(formatFailure(e));
    process.exitCode = 1;
  }
};

const main = (): void => {
  const program = new Command()
    .name("lexor")
    .version("v0.1.0")
    .description("LEXOR Interpreter");

  program
    .command("run <file>", { isDefault: true })
    .description("Run a LEXOR source file")
    .option("-d, --debug", "print a banner before each stage")
    .action((file: string, opts: Options) => interpret(file, opts));

  program
    .command("tokens <file>")
    .description("Show the tokens of a LEXOR source file")
    .action((file: string) => printTokens(file));

  program
    .command("ast <file>")
    .description("Show the AST of a LEXOR source file")
    .action((file: string) => printAST(file));

  program.parse(process.argv);
};

main();
