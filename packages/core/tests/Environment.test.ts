import { NIL, num, str } from "@quill/library";
import { Environment } from "../src/interpreter/Environment";

describe("Environment", () => {
    test("define and get", () => {
        const env = new Environment();
        expect(env.has("a")).toBe(false);
        expect(env.get("a")).toBeUndefined();

        env.define("a", num(1));
        expect(env.has("a")).toBe(true);
        expect(env.get("a")).toEqual(num(1));
    });

    test("define overwrites an earlier binding", () => {
        const env = new Environment();
        env.define("a", num(1));
        env.define("a", str("two"));
        expect(env.get("a")).toEqual(str("two"));
    });

    test("assign creates missing bindings", () => {
        const env = new Environment();
        env.assign("b", NIL);
        expect(env.has("b")).toBe(true);
        expect(env.get("b")).toEqual(NIL);
    });
});
