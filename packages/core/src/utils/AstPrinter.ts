import { unify } from "@quill/library";
import { AST } from "../parser/types";
import { Expression } from "../parser/expressions";
import { Statement } from "../parser/statements";

/**
 * Parenthesized prefix form of an expression, e.g. `(+ 1 (* 2 3))`
 */
export function printExpression(expr: Expression): string {
    switch (expr.type) {
        case "BinaryExpression":
            return parenthesize(
                expr.operator.lexeme,
                expr.left,
                expr.right,
            );
        case "UnaryExpression":
            return parenthesize(expr.operator.lexeme, expr.right);
        case "GroupingExpression":
            return parenthesize("group", expr.expression);
        case "LiteralExpression":
            return unify(expr.value);
        case "VariableExpression":
            return expr.name.lexeme;
        case "AssignExpression":
            return `(= ${expr.name.lexeme} ${printExpression(expr.value)})`;
    }
}

export function printStatement(stmt: Statement): string {
    switch (stmt.kind) {
        case "ExpressionStatement":
            return printExpression(stmt.expression);
        case "PrintStatement":
            return parenthesize("print", stmt.expression);
        case "VarStatement":
            return stmt.initializer
                ? `(var ${stmt.name.lexeme} ${printExpression(stmt.initializer)})`
                : `(var ${stmt.name.lexeme})`;
    }
}

export function printAST(ast: AST): string {
    return ast.statements.map(printStatement).join("\n");
}

function parenthesize(name: string, ...exprs: Expression[]): string {
    return `(${[name, ...exprs.map(printExpression)].join(" ")})`;
}
