import { Value } from "@quill/library";
import { TokenType } from "./TokenType";

export interface Token {
    readonly type: TokenType;
    /** Exact source text, empty for EOF */
    readonly lexeme: string;
    readonly literal?: Value;
    readonly line: number;
    readonly col: number;
}
