import { NIL, Value, bool, num, str } from "@quill/library";
import { Token } from "./Token";
import { TokenType } from "./TokenType";
import { LexError } from "../utils/Error";

const KEYWORDS = new Map<string, TokenType>([
    ["true", TokenType.True],
    ["false", TokenType.False],
    ["nil", TokenType.Nil],
    ["var", TokenType.Var],
    ["print", TokenType.Print],
]);

const KEYWORD_LITERALS = new Map<TokenType, Value>([
    [TokenType.True, bool(true)],
    [TokenType.False, bool(false)],
    [TokenType.Nil, NIL],
]);

const SINGLE_CHAR_TOKENS = new Map<string, TokenType>([
    ["(", TokenType.LeftParen],
    [")", TokenType.RightParen],
    ["{", TokenType.LeftBrace],
    ["}", TokenType.RightBrace],
    [",", TokenType.Comma],
    [".", TokenType.Dot],
    ["-", TokenType.Minus],
    ["+", TokenType.Plus],
    [";", TokenType.Semicolon],
    ["*", TokenType.Star],
]);

export interface ScanResult {
    tokens: Token[];
    errors: LexError[];
    hadError: boolean;
}

export class Scanner {
    // Code points, so that astral characters count as one column
    private chars: string[];
    private tokens: Token[] = [];
    private errors: LexError[] = [];

    private start: number = 0;
    private current: number = 0;
    private line: number = 1;
    private col: number = 1;
    private startLine: number = 1;
    private startCol: number = 1;

    constructor(source: string) {
        this.chars = Array.from(source);
    }

    public get hadError(): boolean {
        return this.errors.length > 0;
    }

    public scanTokens(): ScanResult {
        this.tokens = [];
        this.errors = [];
        this.current = 0;
        this.line = 1;
        this.col = 1;

        while (!this.isAtEnd()) {
            this.start = this.current;
            this.startLine = this.line;
            this.startCol = this.col;
            this.scanToken();
        }

        this.tokens.push({
            type: TokenType.EOF,
            lexeme: "",
            line: this.line,
            col: this.col,
        });

        return {
            tokens: this.tokens,
            errors: this.errors,
            hadError: this.hadError,
        };
    }

    private scanToken() {
        const char = this.advance();

        const single = SINGLE_CHAR_TOKENS.get(char);
        if (single) {
            this.addToken(single);
            return;
        }

        switch (char) {
            case "!":
                this.addToken(
                    this.match("=") ? TokenType.BangEqual : TokenType.Bang,
                );
                return;
            case "=":
                this.addToken(
                    this.match("=") ? TokenType.EqualEqual : TokenType.Equal,
                );
                return;
            case "<":
                this.addToken(
                    this.match("=") ? TokenType.LessEqual : TokenType.Less,
                );
                return;
            case ">":
                this.addToken(
                    this.match("=")
                        ? TokenType.GreaterEqual
                        : TokenType.Greater,
                );
                return;
            case "/":
                if (this.match("/")) {
                    this.skipComment();
                } else {
                    this.addToken(TokenType.Slash);
                }
                return;
            case " ":
            case "\r":
            case "\t":
            case "\n":
                return;
            case '"':
                this.readString();
                return;
        }

        if (this.isDigit(char)) {
            this.readNumber();
            return;
        }

        if (this.isAlpha(char)) {
            this.readIdentifier();
            return;
        }

        this.error(`Unexpected character '${char}'.`);
    }

    private readString() {
        while (this.peek() !== '"' && !this.isAtEnd()) {
            this.advance();
        }

        if (this.isAtEnd()) {
            this.error("Unterminated string.");
            return;
        }

        this.advance(); // closing quote

        const value = this.chars.slice(this.start + 1, this.current - 1);
        this.addToken(TokenType.String, str(value.join("")));
    }

    private readNumber() {
        while (this.isDigit(this.peek())) {
            this.advance();
        }

        // A trailing '.' without digits is left for the next token
        if (this.peek() === "." && this.isDigit(this.peekNext())) {
            this.advance();
            while (this.isDigit(this.peek())) {
                this.advance();
            }
        }

        this.addToken(TokenType.Number, num(parseFloat(this.lexeme())));
    }

    private readIdentifier() {
        while (this.isAlphaNumeric(this.peek())) {
            this.advance();
        }

        const type = KEYWORDS.get(this.lexeme()) ?? TokenType.Identifier;
        this.addToken(type, KEYWORD_LITERALS.get(type));
    }

    private skipComment() {
        while (this.peek() !== "\n" && !this.isAtEnd()) {
            this.advance();
        }
    }

    private addToken(type: TokenType, literal?: Value) {
        const token: Token = {
            type,
            lexeme: this.lexeme(),
            line: this.startLine,
            col: this.startCol,
        };
        this.tokens.push(literal ? { ...token, literal } : token);
    }

    private error(message: string) {
        this.errors.push(
            new LexError(message, {
                line: this.startLine,
                col: this.startCol,
                len: this.current - this.start,
            }),
        );
    }

    private lexeme(): string {
        return this.chars.slice(this.start, this.current).join("");
    }

    private match(expected: string): boolean {
        if (this.peek() !== expected) return false;
        this.advance();
        return true;
    }

    private advance(): string {
        const char = this.chars[this.current];
        this.current++;
        if (char === "\n") {
            this.line++;
            this.col = 1;
        } else {
            this.col++;
        }
        return char;
    }

    private peek(): string {
        if (this.isAtEnd()) return "";
        return this.chars[this.current];
    }

    private peekNext(): string {
        if (this.current + 1 >= this.chars.length) return "";
        return this.chars[this.current + 1];
    }

    private isAtEnd(): boolean {
        return this.current >= this.chars.length;
    }

    private isDigit(char: string): boolean {
        return /^[0-9]$/.test(char);
    }

    private isAlpha(char: string): boolean {
        return /^[a-zA-Z_]$/.test(char);
    }

    private isAlphaNumeric(char: string): boolean {
        return /^[a-zA-Z0-9_]$/.test(char);
    }
}
