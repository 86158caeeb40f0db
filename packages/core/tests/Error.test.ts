import chalk from "chalk";
import { Scanner } from "../src/lexer/Scanner";
import { TokenType } from "../src/lexer/TokenType";
import {
    LexError,
    ParseError,
    QuillError,
    RuntimeError,
    formatError,
} from "../src/utils/Error";

describe("Errors", () => {
    const previousLevel = chalk.level;

    beforeAll(() => {
        chalk.level = 0;
    });

    afterAll(() => {
        chalk.level = previousLevel;
    });

    test("error kinds share the base class", () => {
        const token = { type: TokenType.Plus, lexeme: "+", line: 3, col: 5 };
        const lex = new LexError("Unexpected character '@'.", {
            line: 1,
            col: 2,
        });
        const parse = new ParseError(token, "Expected expression.");
        const runtime = new RuntimeError(token, "Expected numbers.");

        for (const error of [lex, parse, runtime]) {
            expect(error).toBeInstanceOf(QuillError);
            expect(error).toBeInstanceOf(Error);
        }
        expect(lex.name).toBe("LexError");
        expect(parse.name).toBe("ParseError");
        expect(runtime.name).toBe("RuntimeError");
        expect(lex.message).toBe(
            "[line 1] Error: Unexpected character '@'.",
        );
        expect(parse.message).toBe(
            "[line 3] Error at '+': Expected expression.",
        );
        expect(runtime.message).toBe("[line 3] Error: Expected numbers.");
        expect(runtime.loc).toEqual({ line: 3, col: 5, len: 1 });
    });

    test("formatError without source falls back to the message", () => {
        const error = new LexError("Unterminated string.", { line: 4, col: 1 });
        expect(formatError(error)).toBe("[line 4] Error: Unterminated string.");
    });

    test("formatError points at the offending token", () => {
        const source = 'var a = 1;\nprint a + "b";';
        const { tokens } = new Scanner(source).scanTokens();
        const plus = tokens.find((t) => t.type === TokenType.Plus);
        if (!plus) throw new Error("missing '+' token");

        const error = new RuntimeError(plus, "Expected a number.", "Convert first");
        expect(formatError(error, source).split("\n")).toEqual([
            "Error: Expected a number.",
            "  --> line 2:9",
            "  |",
            '2 | print a + "b";',
            "  |         ^",
            "  |",
            "  = Convert first",
        ]);
    });
});
