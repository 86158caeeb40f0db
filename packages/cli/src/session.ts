import chalk from "chalk";
import { Writer, stderr, stdout } from "@quill/library";
import {
    Interpreter,
    QuillError,
    RunOutcome,
    Token,
    TokenType,
    formatError,
    printAST,
    run,
} from "@quill/core";
import { CliConfig } from "./config";

// sysexits.h
export const ExitCode = {
    Ok: 0,
    Usage: 64,
    DataError: 65,
    NoInput: 66,
    Software: 70,
    Config: 78,
} as const;

export type Status = RunOutcome["status"];

export interface CliIO {
    out: Writer;
    err: Writer;
}

export interface Session {
    config: CliConfig;
    io: CliIO;
    /** Shared by every unit run in this session */
    interpreter: Interpreter;
}

export function createSession(
    config: CliConfig,
    io: CliIO = { out: stdout, err: stderr },
): Session {
    return {
        config,
        io,
        interpreter: new Interpreter({ output: io.out }),
    };
}

export function statusToExitCode(status: Status): number {
    switch (status) {
        case "ok":
            return ExitCode.Ok;
        case "lex-error":
        case "parse-error":
            return ExitCode.DataError;
        case "runtime-error":
            return ExitCode.Software;
    }
}

export function formatToken(token: Token): string {
    const literal = token.literal
        ? ` ${JSON.stringify(token.literal.value)}`
        : "";
    const lexeme = token.type === TokenType.EOF ? "" : ` '${token.lexeme}'`;
    return `${token.line}:${token.col} ${token.type}${lexeme}${literal}`;
}

/**
 * Scans, parses and interprets one unit of source, reporting every error to `io.err`.
 */
export function execute(source: string, session: Session): Status {
    const { config, io } = session;
    const report = (error: QuillError) =>
        io.err.writeLine(formatError(error, source));

    const outcome = run(source, {
        interpreter: session.interpreter,
        onTokens: (tokens) => {
            if (!config.showTokens) return;
            for (const token of tokens) {
                io.out.writeLine(chalk.gray(formatToken(token)));
            }
        },
        onAst: (ast) => {
            if (config.showAst && ast.statements.length > 0) {
                io.out.writeLine(chalk.gray(printAST(ast)));
            }
        },
    });

    switch (outcome.status) {
        case "lex-error":
            outcome.errors.forEach(report);
            break;
        case "parse-error":
        case "runtime-error":
            report(outcome.error);
            break;
    }

    return outcome.status;
}
