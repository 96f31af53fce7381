import type { DataType } from "../ast.ts";
import { err } from "../utils.ts";
import type { Value } from "./value.ts";

export type Variable = { dataType: DataType; value: Value };

/** Flat variable store shared by the whole program; there are no scopes */
export class Environment {
  private vars = new Map<string, Variable>();

  // DECLARE registers (or re-registers) a name with its type
  public declare = (name: string, dataType: DataType, value: Value): void => {
    this.vars.set(name, { dataType, value });
  };

  // plain assignment keeps the declared type; unknown names become INT
  public assign = (name: string, value: Value): void => {
    const entry = this.vars.get(name);
    if (entry) entry.value = value;
    else this.vars.set(name, { dataType: "INT", value });
  };

  public lookup = (name: string): Variable => {
    const entry = this.vars.get(name);
    if (entry !== undefined) return entry;
    return err("RuntimeError", `undefined variable '${name}'`);
  };

  public getVar = (name: string): Value => this.lookup(name).value;

  public names = (): string[] => [...this.vars.keys()];
}
