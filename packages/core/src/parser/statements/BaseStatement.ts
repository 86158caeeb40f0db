export interface BaseStatement {
    kind: string;
}
