import { Value } from "@quill/library";
import { Token } from "../../lexer/Token";

export type Expression =
    | BinaryExpression
    | UnaryExpression
    | GroupingExpression
    | LiteralExpression
    | VariableExpression
    | AssignExpression;

export interface BinaryExpression {
    type: "BinaryExpression";
    left: Expression;
    operator: Token;
    right: Expression;
}

export interface UnaryExpression {
    type: "UnaryExpression";
    operator: Token;
    right: Expression;
}

export interface GroupingExpression {
    type: "GroupingExpression";
    expression: Expression;
}

export interface LiteralExpression {
    type: "LiteralExpression";
    value: Value;
}

export interface VariableExpression {
    type: "VariableExpression";
    name: Token;
}

export interface AssignExpression {
    type: "AssignExpression";
    name: Token;
    value: Expression;
}
