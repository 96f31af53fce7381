export type NodeType =
  | "Program"
  | "Declaration"
  | "Assignment"
  | "Print"
  | "Scan"
  | "If"
  | "Repeat"
  | "For"
  | "NumberLiteral"
  | "StringLiteral"
  | "CharacterLiteral"
  | "BooleanLiteral"
  | "Identifier"
  | "BinaryOp"
  | "UnaryOp";

export type DataType = "INT" | "FLOAT" | "CHAR" | "BOOL";

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "<"
  | ">"
  | "<="
  | ">="
  | "=="
  | "<>"
  | "AND"
  | "OR";

export type UnaryOperator = "+" | "-" | "NOT";

export interface Node {
  type: NodeType;
}

export interface Program extends Node {
  type: "Program";
  declarations: Declaration[];
  statements: Statement[];
}

export type Statement =
  | Declaration
  | Assignment
  | Print
  | Scan
  | If
  | Repeat
  | For;

export type Expression =
  | NumberLiteral
  | StringLiteral
  | CharacterLiteral
  | BooleanLiteral
  | Identifier
  | BinaryOp
  | UnaryOp;

export interface Binding {
  name: string;
  init?: Expression;
}

export interface Declaration extends Node {
  type: "Declaration";
  dataType: DataType;
  bindings: Binding[];
}

export interface Assignment extends Node {
  type: "Assignment";
  name: string;
  value: Expression;
}

export interface Print extends Node {
  type: "Print";
  values: Expression[];
}

export interface Scan extends Node {
  type: "Scan";
  names: string[];
}

export interface If extends Node {
  type: "If";
  cond: Expression;
  then: Statement[];
  else?: Statement[]; // ELSE IF is a lone nested If
}

export interface Repeat extends Node {
  type: "Repeat";
  cond: Expression;
  body: Statement[];
}

export interface For extends Node {
  type: "For";
  body: Statement[];
}

export interface NumberLiteral extends Node {
  type: "NumberLiteral";
  value: number;
  isFloat: boolean;
}

export interface StringLiteral extends Node {
  type: "StringLiteral";
  value: string;
}

export interface CharacterLiteral extends Node {
  type: "CharacterLiteral";
  value: string;
}

export interface BooleanLiteral extends Node {
  type: "BooleanLiteral";
  value: boolean;
}

export interface Identifier extends Node {
  type: "Identifier";
  name: string;
}

export interface BinaryOp extends Node {
  type: "BinaryOp";
  op: BinaryOperator;
  left: Expression;
  right: Expression;
}

export interface UnaryOp extends Node {
  type: "UnaryOp";
  op: UnaryOperator;
  argument: Expression;
}
