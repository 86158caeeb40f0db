import { Writer } from "@quill/library";
import { Scanner, ScanResult } from "./lexer/Scanner";
import { Token } from "./lexer/Token";
import { Parser } from "./parser/Parser";
import { AST } from "./parser/types";
import { Statement } from "./parser/statements";
import { Interpreter } from "./interpreter/Interpreter";
import { LexError, ParseError, RuntimeError } from "./utils/Error";
import { Result, err, ok } from "./utils/result";

export { Scanner, ScanResult } from "./lexer/Scanner";
export { Token } from "./lexer/Token";
export { TokenType } from "./lexer/TokenType";
export { MAX_NESTING, Parser } from "./parser/Parser";
export { Interpreter, InterpreterOptions } from "./interpreter/Interpreter";
export { Environment } from "./interpreter/Environment";
export * from "./parser/types";
export * from "./parser/statements";
export * from "./parser/expressions";
export * from "./utils/Error";
export * from "./utils/result";
export { printAST, printExpression, printStatement } from "./utils/AstPrinter";

export function scan(source: string): ScanResult {
    return new Scanner(source).scanTokens();
}

export function parse(tokens: Token[]): Result<AST, ParseError> {
    try {
        return ok(new Parser(tokens).parse());
    } catch (e) {
        if (e instanceof ParseError) return err(e);
        throw e;
    }
}

/**
 * Runs statements on the given interpreter, or on a fresh one writing to stdout.
 */
export function interpret(
    statements: Statement[],
    interpreter: Interpreter = new Interpreter(),
): Result<void, RuntimeError> {
    try {
        interpreter.interpret(statements);
        return ok(undefined);
    } catch (e) {
        if (e instanceof RuntimeError) return err(e);
        throw e;
    }
}

export type RunOutcome =
    | { status: "ok" }
    | { status: "lex-error"; errors: LexError[] }
    | { status: "parse-error"; error: ParseError }
    | { status: "runtime-error"; error: RuntimeError };

export interface RunOptions {
    /** Reuse an interpreter to keep variables between runs */
    interpreter?: Interpreter;
    output?: Writer;
    /** Called once scanning succeeds */
    onTokens?: (tokens: Token[]) => void;
    /** Called once parsing succeeds, before anything runs */
    onAst?: (ast: AST) => void;
}

export function run(source: string, options: RunOptions = {}): RunOutcome {
    const scanned = scan(source);
    if (scanned.hadError) {
        return { status: "lex-error", errors: scanned.errors };
    }
    options.onTokens?.(scanned.tokens);

    const parsed = parse(scanned.tokens);
    if (!parsed.ok) {
        return { status: "parse-error", error: parsed.error };
    }
    options.onAst?.(parsed.value);

    const interpreter =
        options.interpreter ?? new Interpreter({ output: options.output });
    const result = interpret(parsed.value.statements, interpreter);
    if (!result.ok) {
        return { status: "runtime-error", error: result.error };
    }

    return { status: "ok" };
}
