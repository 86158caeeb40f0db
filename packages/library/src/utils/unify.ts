import { Value } from "../types";

/**
 * This function unifies the value to the string `print` writes
 * @param val
 */
export function unify(val: Value): string {
    switch (val.type) {
        case "num":
            return String(val.value);
        case "str":
            return val.value;
        case "bool":
            return val.value ? "true" : "false";
        case "nil":
            return "nil";
    }
}

/**
 * Same as {@link unify}, but strings keep their quotes. Used in error messages.
 * @param val
 */
export function inspect(val: Value): string {
    if (val.type === "str") return `"${val.value}"`;
    return unify(val);
}
