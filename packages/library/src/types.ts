export type Value =
    | { type: "num"; value: number }
    | { type: "str"; value: string }
    | { type: "bool"; value: boolean }
    | { type: "nil"; value: null };

export type NumberValue = Extract<Value, { type: "num" }>;
export type StringValue = Extract<Value, { type: "str" }>;
export type BoolValue = Extract<Value, { type: "bool" }>;
export type NilValue = Extract<Value, { type: "nil" }>;

/**
 * Line-oriented sink for `print` output.
 */
export interface Writer {
    writeLine(line: string): void;
}
