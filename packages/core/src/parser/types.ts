import { Statement } from "./statements";

export interface AST {
    statements: Statement[];
}
