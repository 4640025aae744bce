/** 1-based position of a node in its source document. */
export interface SourceLocation {
  line: number;
  col: number;
}

interface NodeBase {
  location?: SourceLocation;
}

export interface NullValue extends NodeBase {
  kind: "null";
}

export interface BooleanValue extends NodeBase {
  kind: "boolean";
  value: boolean;
}

export interface NumberValue extends NodeBase {
  kind: "number";
  value: number;
}

export interface StringValue extends NodeBase {
  kind: "string";
  value: string;
}

export interface SequenceValue extends NodeBase {
  kind: "sequence";
  items: readonly Value[];
}

/** Keys are unique strings; iteration follows document insertion order. */
export interface MappingValue extends NodeBase {
  kind: "mapping";
  entries: ReadonlyMap<string, Value>;
}

export type ScalarValue = NullValue | BooleanValue | NumberValue | StringValue;

/** One node of a parsed structured document. */
export type Value = ScalarValue | SequenceValue | MappingValue;

export type ValueKind = Value["kind"];

export type ValueCategory = "scalar" | "sequence" | "mapping";

export function isScalar(value: Value): value is ScalarValue {
  return value.kind !== "sequence" && value.kind !== "mapping";
}

export function categoryOf(value: Value): ValueCategory {
  if (value.kind === "sequence" || value.kind === "mapping") return value.kind;
  return "scalar";
}
