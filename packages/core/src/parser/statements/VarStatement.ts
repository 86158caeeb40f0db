import { BaseStatement } from "./BaseStatement";
import { Expression } from "../expressions";
import { Token } from "../../lexer/Token";

/**
 * `var name;` or `var name = initializer;`. A missing initializer binds `nil`.
 */
export interface VarStatement extends BaseStatement {
    kind: "VarStatement";
    name: Token;
    initializer?: Expression;
}
