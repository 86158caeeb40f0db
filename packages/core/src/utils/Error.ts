import chalk from "chalk";
import { Token } from "../lexer/Token";
import { TokenType } from "../lexer/TokenType";

export interface ErrorLocation {
    line: number;
    col: number;
    len?: number;
}

export class QuillError extends Error {
    public rawMessage: string;
    public loc: ErrorLocation;
    public hint?: string;

    constructor(
        message: string,
        loc: ErrorLocation,
        hint?: string,
        where: string = "",
    ) {
        super(`[line ${loc.line}] Error${where}: ${message}`);
        this.name = "QuillError";
        this.rawMessage = message;
        this.loc = loc;
        this.hint = hint;
    }

    get line(): number {
        return this.loc.line;
    }
}

export class LexError extends QuillError {
    constructor(message: string, loc: ErrorLocation) {
        super(message, loc);
        this.name = "LexError";
    }
}

export class ParseError extends QuillError {
    constructor(
        public readonly token: Token,
        message: string,
    ) {
        super(
            message,
            tokenLoc(token),
            undefined,
            token.type === TokenType.EOF ? " at end" : ` at '${token.lexeme}'`,
        );
        this.name = "ParseError";
    }
}

export class RuntimeError extends QuillError {
    constructor(
        public readonly token: Token,
        message: string,
        hint?: string,
    ) {
        super(message, tokenLoc(token), hint);
        this.name = "RuntimeError";
    }
}

export function tokenLoc(token: Token): ErrorLocation {
    return {
        line: token.line,
        col: token.col,
        len: Math.max(1, token.lexeme.length),
    };
}

/**
 * Renders an error with the offending source line and a caret underline.
 *
 * @param error Any error raised by the pipeline
 * @param source The full source code the error was raised for
 */
export function formatError(error: QuillError, source?: string): string {
    if (!source) {
        return error.message;
    }

    const { loc } = error;
    const lines = source.split("\n");
    const lineContent = (lines[loc.line - 1] ?? "").replace(/\r$/, "");

    const lineNumStr = String(loc.line);
    const padding = " ".repeat(lineNumStr.length);

    // Error: [Message]
    //  --> line [line]:[col]
    //   |
    // 3 | var x = 1 + "a";
    //   |           ^
    //   |
    //   = [Hint]

    const errorHeader = `${chalk.red.bold("Error:")} ${chalk.bold(error.rawMessage)}`;
    const locationLine = `${chalk.blue(padding)} ${chalk.blue("-->")} line ${loc.line}:${loc.col}`;
    const pipeLine = `${chalk.blue(padding)} ${chalk.blue("|")}`;
    const codeLine = `${chalk.blue(lineNumStr)} ${chalk.blue("|")} ${lineContent}`;

    // Underline stays on the reported line
    const pointerSpace = " ".repeat(Math.max(0, loc.col - 1));
    const room = Math.max(1, lineContent.length - (loc.col - 1));
    const underlineLen = Math.min(Math.max(1, loc.len ?? 1), room);
    const pointer = chalk.red.bold("^".repeat(underlineLen));
    const pointerLine = `${chalk.blue(padding)} ${chalk.blue("|")} ${pointerSpace}${pointer}`;

    const output = [
        errorHeader,
        locationLine,
        pipeLine,
        codeLine,
        pointerLine,
        pipeLine,
    ];

    if (error.hint) {
        output.push(`${chalk.blue(padding)} ${chalk.blue("=")} ${error.hint}`);
    }

    return output.join("\n");
}
