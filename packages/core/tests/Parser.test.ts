import { Scanner } from "../src/lexer/Scanner";
import { MAX_NESTING, Parser } from "../src/parser/Parser";
import { TokenType } from "../src/lexer/TokenType";
import { ParseError } from "../src/utils/Error";
import { printAST } from "../src/utils/AstPrinter";
import { Statement } from "../src/parser/statements";

function parse(input: string) {
    const { tokens } = new Scanner(input).scanTokens();
    return new Parser(tokens).parse();
}

function isKind<K extends Statement["kind"]>(
    stmt: Statement,
    kind: K,
): stmt is Extract<Statement, { kind: K }> {
    return stmt.kind === kind;
}

function first<K extends Statement["kind"]>(
    input: string,
    kind: K,
): Extract<Statement, { kind: K }> {
    const stmt = parse(input).statements[0];
    if (stmt === undefined || !isKind(stmt, kind)) {
        throw new Error(`Expected ${kind} in: ${input}`);
    }
    return stmt;
}

function parseError(input: string): ParseError {
    try {
        parse(input);
    } catch (e) {
        if (e instanceof ParseError) return e;
        throw e;
    }
    throw new Error(`Expected a parse error for: ${input}`);
}

describe("Parser", () => {
    test("parse variable declaration", () => {
        expect(parse("var a = 10;").statements).toHaveLength(1);
        const stmt = first("var a = 10;", "VarStatement");
        expect(stmt.kind).toBe("VarStatement");
        expect(stmt.name.lexeme).toBe("a");
        expect(stmt.initializer).toEqual({
            type: "LiteralExpression",
            value: { type: "num", value: 10 },
        });
    });

    test("variable declaration without initializer", () => {
        const stmt = first("var a;", "VarStatement");
        expect(stmt.kind).toBe("VarStatement");
        expect(stmt.initializer).toBeUndefined();
    });

    test("parse print statement", () => {
        const stmt = first('print "hi";', "PrintStatement");
        expect(stmt.kind).toBe("PrintStatement");
        expect(stmt.keyword.type).toBe(TokenType.Print);
        expect(stmt.expression.type).toBe("LiteralExpression");
    });

    test("parse assignment", () => {
        const stmt = first("a = 20;", "ExpressionStatement");
        expect(stmt.kind).toBe("ExpressionStatement");
        expect(stmt.expression.type).toBe("AssignExpression");
        if (stmt.expression.type === "AssignExpression") {
            expect(stmt.expression.name.lexeme).toBe("a");
            expect(stmt.expression.value.type).toBe("LiteralExpression");
        }
    });

    test("assignment is right-associative", () => {
        expect(printAST(parse("a = b = 1;"))).toBe("(= a (= b 1))");
    });

    test("multiplication binds tighter than addition", () => {
        expect(printAST(parse("1 + 2 * 3;"))).toBe("(+ 1 (* 2 3))");
    });

    test("binary operators are left-associative", () => {
        expect(printAST(parse("1 - 2 - 3;"))).toBe("(- (- 1 2) 3)");
        expect(printAST(parse("8 / 4 / 2;"))).toBe("(/ (/ 8 4) 2)");
    });

    test("precedence from equality down to unary", () => {
        expect(printAST(parse("-1 + 2 < 3 == !false;"))).toBe(
            "(== (< (+ (- 1) 2) 3) (! false))",
        );
    });

    test("unary operators nest", () => {
        expect(printAST(parse("!!true;"))).toBe("(! (! true))");
        expect(printAST(parse("--1;"))).toBe("(- (- 1))");
    });

    test("grouping", () => {
        expect(printAST(parse("(1 + 2) * 3;"))).toBe(
            "(* (group (+ 1 2)) 3)",
        );
    });

    test("binary nodes keep the operator token", () => {
        const stmt = first("1 +\n2;", "ExpressionStatement");
        const expr = stmt.expression;
        expect(expr.type).toBe("BinaryExpression");
        if (expr.type === "BinaryExpression") {
            expect(expr.operator.type).toBe(TokenType.Plus);
            expect(expr.operator.line).toBe(1);
        }
    });

    test("statements keep source order", () => {
        const ast = parse("var a = 1; var b = 2; print a + b;");
        expect(ast.statements.map((s) => s.kind)).toEqual([
            "VarStatement",
            "VarStatement",
            "PrintStatement",
        ]);
    });

    test("empty input parses to no statements", () => {
        expect(parse("").statements).toEqual([]);
        expect(parse("// only a comment").statements).toEqual([]);
    });

    test("missing semicolon after expression", () => {
        const error = parseError("1 + 2");
        expect(error.rawMessage).toBe("Expected ';' after expression.");
        expect(error.token.type).toBe(TokenType.EOF);
        expect(error.message).toBe(
            "[line 1] Error at end: Expected ';' after expression.",
        );
    });

    test("missing semicolon after print value", () => {
        const error = parseError("print 1\nprint 2;");
        expect(error.rawMessage).toBe("Expected ';' after value.");
        expect(error.token.lexeme).toBe("print");
        expect(error.line).toBe(2);
    });

    test("missing variable name", () => {
        const error = parseError("var = 1;");
        expect(error.rawMessage).toBe("Expected variable name.");
        expect(error.message).toBe(
            "[line 1] Error at '=': Expected variable name.",
        );
    });

    test("missing semicolon after declaration", () => {
        expect(parseError("var a = 1").rawMessage).toBe(
            "Expected ';' after variable declaration.",
        );
    });

    test("missing closing paren", () => {
        const error = parseError("(1 + 2;");
        expect(error.rawMessage).toBe("Expected ')' after expression.");
        expect(error.token.type).toBe(TokenType.Semicolon);
    });

    test("missing expression", () => {
        const error = parseError("1 + ;");
        expect(error.rawMessage).toBe("Expected expression.");
        expect(error.token.lexeme).toBe(";");
    });

    test("invalid assignment target", () => {
        const error = parseError("1 = 2;");
        expect(error.rawMessage).toBe("Invalid assignment target.");
        expect(error.token.type).toBe(TokenType.Equal);
    });

    test("stops at the first error", () => {
        const error = parseError("print ; print );");
        expect(error.token.lexeme).toBe(";");
        expect(error.token.col).toBe(7);
    });

    test("deeply nested groupings are a parse error", () => {
        const error = parseError(
            "print " + "(".repeat(20000) + "1" + ")".repeat(20000) + ";",
        );
        expect(error.rawMessage).toBe("Expression nesting too deep.");
        expect(error.token.type).toBe(TokenType.LeftParen);
    });

    test("deeply nested unary operators are a parse error", () => {
        const error = parseError("print " + "-".repeat(20000) + "1;");
        expect(error.rawMessage).toBe("Expression nesting too deep.");
        expect(error.token.type).toBe(TokenType.Minus);
    });

    test("long operator chains are a parse error past the nesting limit", () => {
        const error = parseError(
            "print " + Array(20000).fill("1").join(" + ") + ";",
        );
        expect(error.rawMessage).toBe("Expression nesting too deep.");
        expect(error.token.type).toBe(TokenType.Plus);
        // the 255th '+' makes the tree 256 levels high
        expect(error.token.col).toBe(9 + 254 * 4);
    });

    test("nesting up to the limit parses", () => {
        const chain = Array(MAX_NESTING).fill("1").join(" + ");
        expect(parse(`${chain};`).statements).toHaveLength(1);

        const depth = MAX_NESTING - 1;
        const grouped = "(".repeat(depth) + "1" + ")".repeat(depth);
        expect(parse(`${grouped};`).statements).toHaveLength(1);
    });

    test("rejects a token stream without EOF", () => {
        expect(() => new Parser([])).toThrow(
            "Token stream must end with an EOF token",
        );
    });
});
