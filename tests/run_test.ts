import { test } from "node:test";
import assert from "node:assert/strict";
import { formatFailure, LinesInput, run } from "../src/mod.ts";

test("run: captures output of a full program", () => {
  const src = [
    "%% greets whoever is scanned",
    "SCRIPT AREA",
    "START SCRIPT",
    "DECLARE CHAR initial",
    "DECLARE INT age",
    "SCAN: initial, age",
    'PRINT: "Hi " & initial & [.] & $ & "next year: " & age + 1',
    "END SCRIPT",
  ].join("\n");
  assert.deepEqual(run(src, new LinesInput(["J, 41"])), {
    ok: true,
    output: "Hi J.\nnext year: 42",
  });
});

test("run: runtime failures keep partial output", () => {
  const src = "SCRIPT AREA\nSTART SCRIPT\nPRINT: 1 & $\nPRINT: 10/0\n" +
    "END SCRIPT";
  assert.deepEqual(run(src), {
    ok: false,
    output: "1\n",
    error: { kind: "RuntimeError", message: "division by zero" },
  });
});

test("run: parse failures carry the position", () => {
  const result = run("SCRIPT AREA START SCRIPT PRINT: END SCRIPT");
  assert.deepEqual(result, {
    ok: false,
    output: "",
    error: {
      kind: "ParseError",
      message: "Expected an expression",
      line: 1,
      column: 33,
    },
  });
  assert.ok(!result.ok);
  assert.equal(
    formatFailure(result.error),
    "ParseError at 1:33: Expected an expression",
  );
});

test("formatFailure: without a position", () => {
  assert.equal(
    formatFailure({ kind: "RuntimeError", message: "modulo by zero" }),
    "RuntimeError: modulo by zero",
  );
});
