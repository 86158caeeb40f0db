import readline from "node:readline";
import chalk from "chalk";
import { Session, execute } from "../session";

export interface ReplStreams {
    input: NodeJS.ReadableStream;
    output: NodeJS.WritableStream;
}

/**
 * Reads one unit per line until EOF or `.exit`.
 * Errors are reported and the next line starts fresh; variables persist.
 */
export function startRepl(
    session: Session,
    streams: ReplStreams = { input: process.stdin, output: process.stdout },
): Promise<void> {
    const rl = readline.createInterface({
        input: streams.input,
        output: streams.output,
        prompt: session.config.prompt,
        terminal: "isTTY" in streams.output && streams.output.isTTY === true,
    });

    let closed = false;

    return new Promise((resolve) => {
        rl.on("line", (line) => {
            // Lines already buffered when `.exit` closed the interface
            if (closed) return;

            const trimmed = line.trim();
            if (trimmed === ".exit") {
                rl.close();
                return;
            }
            if (trimmed.length > 0) {
                execute(line, session);
            }
            rl.prompt();
        });

        rl.on("close", () => {
            closed = true;
            streams.output.write("\n");
            resolve();
        });

        streams.output.write(
            chalk.gray("Quill REPL. Type .exit or press Ctrl-D to quit.\n"),
        );
        rl.prompt();
    });
}
