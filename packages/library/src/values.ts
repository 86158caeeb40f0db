import { BoolValue, NilValue, NumberValue, StringValue, Value } from "./types";

export const NIL: NilValue = { type: "nil", value: null };

export function num(value: number): NumberValue {
    return { type: "num", value };
}

export function str(value: string): StringValue {
    return { type: "str", value };
}

export function bool(value: boolean): BoolValue {
    return { type: "bool", value };
}

/**
 * `nil` and `false` are falsy. Everything else, `0` and `""` included, is truthy.
 */
export function isTruthy(val: Value): boolean {
    if (val.type === "nil") return false;
    if (val.type === "bool") return val.value;
    return true;
}

/**
 * Structural equality. Values of different types are never equal.
 */
export function isEqual(a: Value, b: Value): boolean {
    if (a.type !== b.type) return false;
    return a.value === b.value;
}

export function typeName(val: Value): string {
    switch (val.type) {
        case "num":
            return "number";
        case "str":
            return "string";
        case "bool":
            return "boolean";
        case "nil":
            return "nil";
    }
}
