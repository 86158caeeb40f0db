import { ExpressionStatement } from "./ExpressionStatement";
import { PrintStatement } from "./PrintStatement";
import { VarStatement } from "./VarStatement";

export * from "./BaseStatement";
export * from "./ExpressionStatement";
export * from "./PrintStatement";
export * from "./VarStatement";

export type Statement = ExpressionStatement | PrintStatement | VarStatement;
