export enum TokenType {
    // Single-character tokens
    LeftParen = "LeftParen", // (
    RightParen = "RightParen", // )
    LeftBrace = "LeftBrace", // {
    RightBrace = "RightBrace", // }
    Comma = "Comma", // ,
    Dot = "Dot", // .
    Minus = "Minus", // -
    Plus = "Plus", // +
    Semicolon = "Semicolon", // ;
    Star = "Star", // *
    Slash = "Slash", // /

    // One or two character tokens
    Bang = "Bang", // !
    BangEqual = "BangEqual", // !=
    Equal = "Equal", // =
    EqualEqual = "EqualEqual", // ==
    Less = "Less", // <
    LessEqual = "LessEqual", // <=
    Greater = "Greater", // >
    GreaterEqual = "GreaterEqual", // >=

    // Literals
    Identifier = "Identifier",
    String = "String",
    Number = "Number",

    // Keywords
    True = "True", // true
    False = "False", // false
    Nil = "Nil", // nil
    Var = "Var", // var
    Print = "Print", // print

    // End of file
    EOF = "EOF",
}
