import { test } from "node:test";
import assert from "node:assert/strict";
import { Interpreter } from "../src/ast-walking/interpreter.ts";
import { LinesInput } from "../src/ast-walking/input.ts";
import { tokenize } from "../src/lexer.ts";
import { parse } from "../src/parser.ts";

const script = (body: string): string =>
  `SCRIPT AREA\nSTART SCRIPT\n${body}\nEND SCRIPT\n`;

const interpret = (body: string, lines: string[] = []): Interpreter => {
  const interpreter = new Interpreter(new LinesInput(lines));
  interpreter.execute(parse(tokenize(script(body))));
  return interpreter;
};

const output = (body: string, lines: string[] = []): string =>
  interpret(body, lines).output();

test("Interpreter: declared sum", () => {
  assert.equal(
    output("DECLARE INT x=5, y=3\nDECLARE INT z\nz=x+y\nPRINT: z"),
    "8",
  );
});

test("Interpreter: if branch", () => {
  assert.equal(
    output('DECLARE INT a=10\nIF (a>5)\nSTART IF\nPRINT: "Greater"\nEND IF'),
    "Greater",
  );
});

test("Interpreter: repeat with line breaks", () => {
  const body = [
    "DECLARE INT i=0",
    "REPEAT WHEN (i<3)",
    "START REPEAT",
    "PRINT: i & $",
    "i=i+1",
    "END REPEAT",
  ].join("\n");
  assert.equal(output(body), "0\n1\n2\n");
});

test("Interpreter: repeat checks its condition first", () => {
  const body =
    'REPEAT WHEN (FALSE) START REPEAT PRINT: 1 END REPEAT\nPRINT: "done"';
  assert.equal(output(body), "done");
});

test("Interpreter: bracket escapes print verbatim", () => {
  assert.equal(output('PRINT: "Hash: " & [#] & [[] & []]'), "Hash: #[]");
});

test("Interpreter: any value equal to $ prints a line break", () => {
  assert.equal(output('x = "$"\nPRINT: "a" & x & "b"'), "a\nb");
});

test("Interpreter: chained assignment auto-declares as INT", () => {
  const interpreter = interpret('x=y=4\nPRINT: x & " " & y');
  assert.equal(interpreter.output(), "4 4");
  assert.deepEqual(interpreter.environment().lookup("x"), {
    dataType: "INT",
    value: { type: "Integer", value: 4 },
  });
  assert.deepEqual(interpreter.environment().names(), ["y", "x"]);
});

test("Interpreter: assignment keeps the declared type", () => {
  const interpreter = interpret("DECLARE FLOAT f\nf = 3");
  assert.deepEqual(interpreter.environment().lookup("f"), {
    dataType: "FLOAT",
    value: { type: "Integer", value: 3 },
  });
});

test("Interpreter: zero values and declarations among statements", () => {
  const body = [
    "DECLARE INT a",
    "DECLARE FLOAT b",
    "DECLARE BOOL c",
    'PRINT: a & "," & b & "," & c & ","',
    "DECLARE INT d = a + 7",
    "PRINT: d",
  ].join("\n");
  assert.equal(output(body), "0,0,FALSE,7");
});

test("Interpreter: arithmetic result types", () => {
  assert.equal(output("PRINT: 2 * 3 & $ & 7 / 2 & $ & 4 / 2"), "6\n3.5\n2");
  assert.equal(output("PRINT: 1.25 * 2 & $ & 7 % 3 & $ & -7 % 3"), "2.5\n1\n-1");
  assert.equal(output("PRINT: 7.9 % 2"), "1");
  assert.equal(output("PRINT: 'a' + 1"), "98");
});

test("Interpreter: equality compares text when either side is text", () => {
  assert.equal(output('PRINT: "abc" == "abc" & " " & "5" == 5'), "TRUE TRUE");
  assert.equal(output("PRINT: 'a' == 97 & \" \" & 5.0 <> 5"), "TRUE FALSE");
});

test("Interpreter: ordering comparisons and mixed arithmetic", () => {
  assert.equal(
    output('PRINT: 1 <= 1 & 2 >= 3 & "a" <> "b" & "a" <> "a" & 1 + 0.5'),
    "TRUEFALSETRUEFALSE1.5",
  );
  assert.equal(output('PRINT: "10" >= "9" & "2" <= "1"'), "TRUEFALSE");
  const interpreter = interpret("x = 1 + 0.5\ny = 2 * 3\nz = 2 - 0.5");
  assert.deepEqual(interpreter.environment().getVar("x"), {
    type: "Float",
    value: 1.5,
  });
  assert.deepEqual(interpreter.environment().getVar("y"), {
    type: "Integer",
    value: 6,
  });
  assert.deepEqual(interpreter.environment().getVar("z"), {
    type: "Float",
    value: 1.5,
  });
});

test("Interpreter: logic and unary operators", () => {
  assert.equal(
    output("PRINT: (1 < 2) AND (2 < 1) & \" \" & NOT FALSE & \" \" & -(2.5)"),
    "FALSE TRUE -2.5",
  );
});

test("Interpreter: logical operators evaluate both sides", () => {
  assert.throws(() => interpret("DECLARE INT a=0\nPRINT: a AND (1/a)"), {
    kind: "RuntimeError",
    message: "division by zero",
  });
});

test("Interpreter: else-if chain", () => {
  const body = [
    "DECLARE INT n=2",
    "IF (n==1)",
    "START IF",
    'PRINT: "one"',
    "END IF",
    "ELSE IF (n==2)",
    "START IF",
    'PRINT: "two"',
    "END IF",
    "ELSE",
    "START IF",
    'PRINT: "many"',
    "END IF",
  ].join("\n");
  assert.equal(output(body), "two");
});

test("Interpreter: FOR runs its body once", () => {
  assert.equal(
    output("DECLARE INT i=0\nSTART FOR\ni=i+1\nEND FOR\nPRINT: i"),
    "1",
  );
});

test("Interpreter: scan converts fields by declared type", () => {
  const body = [
    "DECLARE INT a",
    "DECLARE FLOAT b",
    "DECLARE CHAR c",
    "DECLARE BOOL d",
    "SCAN: a, b, c, d",
    'PRINT: a & "|" & b & "|" & c & "|" & d',
  ].join("\n");
  assert.equal(output(body, ["12, 3.5 ,\txyz, true,extra"]), "12|3.5|x|TRUE");
});

test("Interpreter: scan leaves targets without a field untouched", () => {
  const body = "DECLARE INT a=1, b=2\nSCAN: a, b\nPRINT: a & b";
  assert.equal(output(body, ["9.8"]), "92");
});

test("Interpreter: scan at end of input changes nothing", () => {
  assert.equal(output("DECLARE INT a=5\nSCAN: a\nPRINT: a"), "5");
  assert.equal(
    output("DECLARE INT a=5\nDECLARE CHAR c='z'\nSCAN: a, c\nPRINT: a & c"),
    "5z",
  );
});

test("Interpreter: scan ignores a trailing comma", () => {
  const body = 'DECLARE INT a, b=7\nSCAN: a, b\nPRINT: a & "|" & b';
  assert.equal(output(body, ["1,"]), "1|7");
  assert.equal(output(body, [",3"]), "0|3");
});

test("Interpreter: undefined variables fail", () => {
  assert.throws(() => interpret("PRINT: q"), {
    kind: "RuntimeError",
    message: "undefined variable 'q'",
  });
  assert.throws(() => interpret("SCAN: q", ["1"]), {
    kind: "RuntimeError",
    message: "undefined variable 'q'",
  });
});

test("Interpreter: output before a failure is kept", () => {
  const interpreter = new Interpreter();
  assert.throws(
    () =>
      interpreter.execute(
        parse(tokenize(script("PRINT: 1 & $\nPRINT: 5 % 0\nPRINT: 2"))),
      ),
    { kind: "RuntimeError", message: "modulo by zero" },
  );
  assert.equal(interpreter.output(), "1\n");
});

test("Interpreter: identical programs print identically", () => {
  const body = "DECLARE INT i=0\nREPEAT WHEN (i<2) START REPEAT i=i+1\n" +
    "PRINT: i END REPEAT";
  assert.equal(output(body), "12");
  assert.equal(output(body), output(body));
});
