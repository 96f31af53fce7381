import type { DataType } from "../ast.ts";

export type Value =
  | { type: "Integer"; value: number }
  | { type: "Float"; value: number }
  | { type: "Character"; value: string }
  | { type: "Boolean"; value: boolean }
  | { type: "Text"; value: string }
  | { type: "Void" };

export const NUL = "\0";

export const integer = (value: number): Value => ({ type: "Integer", value });
export const float = (value: number): Value => ({ type: "Float", value });
export const character = (value: string): Value => ({
  type: "Character",
  value,
});
export const boolean = (value: boolean): Value => ({ type: "Boolean", value });
export const text = (value: string): Value => ({ type: "Text", value });
export const VOID: Value = { type: "Void" };

export const zeroValue = (dataType: DataType): Value => {
  switch (dataType) {
    case "INT":
      return integer(0);
    case "FLOAT":
      return float(0);
    case "CHAR":
      return character(NUL);
    case "BOOL":
      return boolean(false);
  }
};

// leading numeric prefix, like strtod
export const parseNumber = (s: string): number => {
  const n = parseFloat(s);
  return Number.isNaN(n) ? 0 : n;
};

export const toText = (v: Value): string => {
  switch (v.type) {
    case "Integer":
      // plain digits, also past 1e21
      return Number.isFinite(v.value)
        ? BigInt(Math.trunc(v.value)).toString()
        : String(v.value);
    case "Float":
      return String(v.value);
    case "Character":
      return v.value.charAt(0);
    case "Boolean":
      return v.value ? "TRUE" : "FALSE";
    case "Text":
      return v.value;
    case "Void":
      return "";
  }
};

export const toNumber = (v: Value): number => {
  switch (v.type) {
    case "Integer":
    case "Float":
      return v.value;
    case "Character":
      return v.value.codePointAt(0) ?? 0;
    case "Boolean":
      return v.value ? 1 : 0;
    case "Text":
      return parseNumber(v.value);
    case "Void":
      return 0;
  }
};

export const toBoolean = (v: Value): boolean => {
  switch (v.type) {
    case "Integer":
    case "Float":
      return v.value !== 0;
    case "Character":
      return v.value !== NUL;
    case "Boolean":
      return v.value;
    case "Text":
      return v.value.length > 0;
    case "Void":
      return false;
  }
};
