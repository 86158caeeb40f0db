import {
    NIL,
    Value,
    Writer,
    bool,
    inspect,
    isEqual,
    isTruthy,
    num,
    str,
    stdout,
    unify,
} from "@quill/library";

import { AST } from "../parser/types";
import { Statement } from "../parser/statements";
import {
    BinaryExpression,
    Expression,
    UnaryExpression,
} from "../parser/expressions";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { RuntimeError } from "../utils/Error";
import { Environment } from "./Environment";

export interface InterpreterOptions {
    /** Receives one line per `print` statement. Defaults to stdout. */
    output?: Writer;
}

export class Interpreter {
    public readonly environment: Environment = new Environment();
    private output: Writer;

    constructor(options: InterpreterOptions = {}) {
        this.output = options.output ?? stdout;
    }

    public run(ast: AST): void {
        this.interpret(ast.statements);
    }

    /**
     * Executes statements in order, stopping at the first runtime error.
     */
    public interpret(statements: Statement[]): void {
        for (const statement of statements) {
            this.executeStatement(statement);
        }
    }

    public getVariable(name: string): Value | undefined {
        return this.environment.get(name);
    }

    private executeStatement(stmt: Statement): void {
        switch (stmt.kind) {
            case "ExpressionStatement":
                this.evaluate(stmt.expression);
                return;
            case "PrintStatement": {
                const value = this.evaluate(stmt.expression);
                this.output.writeLine(unify(value));
                return;
            }
            case "VarStatement": {
                const value = stmt.initializer
                    ? this.evaluate(stmt.initializer)
                    : NIL;
                this.environment.define(stmt.name.lexeme, value);
                return;
            }
            default:
                return assertNever(stmt);
        }
    }

    public evaluate(expr: Expression): Value {
        switch (expr.type) {
            case "LiteralExpression":
                return expr.value;
            case "GroupingExpression":
                return this.evaluate(expr.expression);
            case "VariableExpression": {
                const value = this.environment.get(expr.name.lexeme);
                if (!value) {
                    throw new RuntimeError(
                        expr.name,
                        `Undefined variable '${expr.name.lexeme}'.`,
                        `Declare it first with 'var ${expr.name.lexeme} = ...;'`,
                    );
                }
                return value;
            }
            case "AssignExpression": {
                const value = this.evaluate(expr.value);
                this.environment.assign(expr.name.lexeme, value);
                return value;
            }
            case "UnaryExpression":
                return this.evaluateUnary(expr);
            case "BinaryExpression":
                return this.evaluateBinary(expr);
            default:
                return assertNever(expr);
        }
    }

    private evaluateUnary(expr: UnaryExpression): Value {
        const right = this.evaluate(expr.right);

        switch (expr.operator.type) {
            case TokenType.Bang:
                return bool(!isTruthy(right));
            case TokenType.Minus:
                if (right.type !== "num") {
                    throw new RuntimeError(
                        expr.operator,
                        `Invalid operand: ${inspect(right)}. Expected a number.`,
                    );
                }
                return num(-right.value);
            default:
                throw invalidOperator(expr.operator);
        }
    }

    private evaluateBinary(expr: BinaryExpression): Value {
        const left = this.evaluate(expr.left);
        const right = this.evaluate(expr.right);
        const op = expr.operator;

        switch (op.type) {
            case TokenType.Plus:
                if (left.type === "num" && right.type === "num") {
                    return num(left.value + right.value);
                }
                if (left.type === "str" && right.type === "str") {
                    return str(left.value + right.value);
                }
                if (left.type === "num") {
                    throw invalidOperands(
                        op,
                        left,
                        right,
                        "Expected a number.",
                    );
                }
                if (left.type === "str") {
                    throw invalidOperands(
                        op,
                        left,
                        right,
                        "Expected a string.",
                    );
                }
                throw invalidOperands(
                    op,
                    left,
                    right,
                    "Expected a number or string.",
                );

            case TokenType.Minus:
            case TokenType.Star:
            case TokenType.Slash: {
                if (left.type !== "num" || right.type !== "num") {
                    throw invalidOperands(
                        op,
                        left,
                        right,
                        "Expected numbers.",
                    );
                }
                if (op.type === TokenType.Minus) {
                    return num(left.value - right.value);
                }
                if (op.type === TokenType.Star) {
                    return num(left.value * right.value);
                }
                // Division by zero yields Infinity or NaN
                return num(left.value / right.value);
            }

            case TokenType.EqualEqual:
            case TokenType.BangEqual: {
                if (!isComparable(left, right)) {
                    throw invalidOperands(
                        op,
                        left,
                        right,
                        "Expected comparable types.",
                    );
                }
                const equal = isEqual(left, right);
                return bool(op.type === TokenType.EqualEqual ? equal : !equal);
            }

            case TokenType.Greater:
            case TokenType.GreaterEqual:
            case TokenType.Less:
            case TokenType.LessEqual: {
                if (left.type !== "num" || right.type !== "num") {
                    throw invalidOperands(
                        op,
                        left,
                        right,
                        "Expected numbers.",
                    );
                }
                return bool(compare(op.type, left.value, right.value));
            }

            default:
                throw invalidOperator(op);
        }
    }
}

/**
 * Only numbers, strings and booleans take part in `==` and `!=`,
 * and only against a value of the same type.
 */
function isComparable(left: Value, right: Value): boolean {
    if (left.type !== right.type) return false;
    return left.type === "num" || left.type === "str" || left.type === "bool";
}

function compare(operator: TokenType, left: number, right: number): boolean {
    switch (operator) {
        case TokenType.Greater:
            return left > right;
        case TokenType.GreaterEqual:
            return left >= right;
        case TokenType.Less:
            return left < right;
        default:
            return left <= right;
    }
}

function invalidOperands(
    operator: Token,
    left: Value,
    right: Value,
    expectation: string,
): RuntimeError {
    return new RuntimeError(
        operator,
        `Invalid operands: ${inspect(left)} and ${inspect(right)}. ${expectation}`,
    );
}

function invalidOperator(operator: Token): RuntimeError {
    return new RuntimeError(
        operator,
        `Invalid operator: '${operator.lexeme}'.`,
    );
}

function assertNever(node: never): never {
    throw new Error(`Unhandled node: ${JSON.stringify(node)}`);
}
