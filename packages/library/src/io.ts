import { Writer } from "./types";

/**
 * Writes each line to stdout
 */
export const stdout: Writer = {
    writeLine(line: string) {
        process.stdout.write(line + "\n");
    },
};

/**
 * Writes each line to stderr
 */
export const stderr: Writer = {
    writeLine(line: string) {
        process.stderr.write(line + "\n");
    },
};

/**
 * Keeps written lines in memory, for embedders that collect output
 */
export class BufferWriter implements Writer {
    public readonly lines: string[] = [];

    writeLine(line: string): void {
        this.lines.push(line);
    }

    toString(): string {
        return this.lines.join("\n");
    }
}
