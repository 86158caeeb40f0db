import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";
import { AST } from "./types";
import { Expression } from "./expressions";
import {
    Statement,
    ExpressionStatement,
    PrintStatement,
    VarStatement,
} from "./statements";
import { ParseError } from "../utils/Error";

/** Deepest expression tree accepted; every later stage recurses once per level */
export const MAX_NESTING = 255;

/**
 * Recursive-descent parser, one method per precedence level.
 * Stops at the first error: nothing is synchronized or recovered.
 */
export class Parser {
    private tokens: Token[];
    private current: number = 0;
    private depth: number = 0;
    private heights = new WeakMap<Expression, number>();

    constructor(tokens: Token[]) {
        if (
            tokens.length === 0 ||
            tokens[tokens.length - 1].type !== TokenType.EOF
        ) {
            throw new Error("Token stream must end with an EOF token");
        }
        this.tokens = tokens;
    }

    public parse(): AST {
        this.current = 0;
        this.depth = 0;
        const statements: Statement[] = [];
        while (!this.isAtEnd()) {
            statements.push(this.declaration());
        }
        return { statements };
    }

    private declaration(): Statement {
        if (this.match(TokenType.Var)) {
            return this.varDeclaration();
        }
        return this.statement();
    }

    private varDeclaration(): VarStatement {
        const name = this.consume(
            TokenType.Identifier,
            "Expected variable name.",
        );

        let initializer: Expression | undefined;
        if (this.match(TokenType.Equal)) {
            initializer = this.expression();
        }

        this.consume(
            TokenType.Semicolon,
            "Expected ';' after variable declaration.",
        );

        return { kind: "VarStatement", name, initializer };
    }

    private statement(): Statement {
        if (this.match(TokenType.Print)) {
            return this.printStatement();
        }
        return this.expressionStatement();
    }

    private printStatement(): PrintStatement {
        const keyword = this.previous();
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expected ';' after value.");
        return { kind: "PrintStatement", keyword, expression };
    }

    private expressionStatement(): ExpressionStatement {
        const expression = this.expression();
        this.consume(TokenType.Semicolon, "Expected ';' after expression.");
        return { kind: "ExpressionStatement", expression };
    }

    private expression(): Expression {
        return this.assignment();
    }

    private assignment(): Expression {
        const expr = this.equality();

        if (this.match(TokenType.Equal)) {
            const equals = this.previous();
            const value = this.nested(() => this.assignment());

            if (expr.type === "VariableExpression") {
                return this.node(
                    { type: "AssignExpression", name: expr.name, value },
                    equals,
                    value,
                );
            }

            throw this.error(equals, "Invalid assignment target.");
        }

        return expr;
    }

    private equality(): Expression {
        return this.binary(
            () => this.comparison(),
            TokenType.BangEqual,
            TokenType.EqualEqual,
        );
    }

    private comparison(): Expression {
        return this.binary(
            () => this.term(),
            TokenType.Greater,
            TokenType.GreaterEqual,
            TokenType.Less,
            TokenType.LessEqual,
        );
    }

    private term(): Expression {
        return this.binary(
            () => this.factor(),
            TokenType.Minus,
            TokenType.Plus,
        );
    }

    private factor(): Expression {
        return this.binary(
            () => this.unary(),
            TokenType.Slash,
            TokenType.Star,
        );
    }

    /**
     * Left-folds `operand (op operand)*`, so `1 - 2 - 3` groups as `(1 - 2) - 3`.
     */
    private binary(
        operand: () => Expression,
        ...operators: TokenType[]
    ): Expression {
        let left = operand();

        while (this.match(...operators)) {
            const operator = this.previous();
            const right = operand();
            left = this.node(
                { type: "BinaryExpression", left, operator, right },
                operator,
                left,
                right,
            );
        }

        return left;
    }

    private unary(): Expression {
        if (this.match(TokenType.Bang, TokenType.Minus)) {
            const operator = this.previous();
            const right = this.nested(() => this.unary());
            return this.node(
                { type: "UnaryExpression", operator, right },
                operator,
                right,
            );
        }
        return this.primary();
    }

    private primary(): Expression {
        if (
            this.match(
                TokenType.Number,
                TokenType.String,
                TokenType.True,
                TokenType.False,
                TokenType.Nil,
            )
        ) {
            const token = this.previous();
            if (!token.literal) {
                throw this.error(
                    token,
                    `Missing literal value for '${token.lexeme}'.`,
                );
            }
            return { type: "LiteralExpression", value: token.literal };
        }

        if (this.match(TokenType.Identifier)) {
            return { type: "VariableExpression", name: this.previous() };
        }

        if (this.match(TokenType.LeftParen)) {
            const paren = this.previous();
            const expression = this.nested(() => this.expression());
            this.consume(
                TokenType.RightParen,
                "Expected ')' after expression.",
            );
            return this.node(
                { type: "GroupingExpression", expression },
                paren,
                expression,
            );
        }

        throw this.error(this.peek(), "Expected expression.");
    }

    /**
     * Bounds the descent into a nested operand, e.g. thousands of `(`.
     */
    private nested(parse: () => Expression): Expression {
        if (this.depth >= MAX_NESTING) {
            throw this.error(this.peek(), "Expression nesting too deep.");
        }
        this.depth++;
        try {
            return parse();
        } finally {
            this.depth--;
        }
    }

    /**
     * Records the height of a new node; left folds (`1 + 1 + ...`) grow the
     * tree without descending.
     */
    private node<T extends Expression>(
        expr: T,
        at: Token,
        ...children: Expression[]
    ): T {
        const height =
            1 + Math.max(...children.map((c) => this.heights.get(c) ?? 1));
        if (height > MAX_NESTING) {
            throw this.error(at, "Expression nesting too deep.");
        }
        this.heights.set(expr, height);
        return expr;
    }

    private match(...types: TokenType[]): boolean {
        for (const type of types) {
            if (this.check(type)) {
                this.advance();
                return true;
            }
        }
        return false;
    }

    private consume(type: TokenType, message: string): Token {
        if (this.check(type)) return this.advance();
        throw this.error(this.peek(), message);
    }

    private check(type: TokenType): boolean {
        if (this.isAtEnd()) return false;
        return this.peek().type === type;
    }

    private advance(): Token {
        if (!this.isAtEnd()) this.current++;
        return this.previous();
    }

    private isAtEnd(): boolean {
        return this.peek().type === TokenType.EOF;
    }

    private peek(): Token {
        return this.tokens[this.current];
    }

    private previous(): Token {
        return this.tokens[this.current - 1];
    }

    private error(token: Token, message: string): ParseError {
        return new ParseError(token, message);
    }
}
