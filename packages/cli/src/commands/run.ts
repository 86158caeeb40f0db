import fs from "node:fs";
import path from "node:path";
import chalk from "chalk";
import { stderr, stdout } from "@quill/library";
import { CliConfig, ConfigError, loadConfig } from "../config";
import {
    CliIO,
    ExitCode,
    Session,
    createSession,
    execute,
    statusToExitCode,
} from "../session";
import { startRepl } from "./repl";

export interface RunOptions {
    script?: string;
    config?: string;
    tokens?: boolean;
    ast?: boolean;
    color?: boolean;
}

/**
 * Command line flags win over the config file
 */
export function resolveConfig(options: RunOptions, cwd?: string): CliConfig {
    const config = loadConfig(options.config, cwd);
    return {
        ...config,
        showTokens: options.tokens ?? config.showTokens,
        showAst: options.ast ?? config.showAst,
        color: options.color ?? config.color,
    };
}

/**
 * Runs a whole file as one unit
 * @returns process exit code
 */
export function runFile(file: string, session: Session): number {
    let source: string;
    try {
        source = fs.readFileSync(path.resolve(file), "utf-8");
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        session.io.err.writeLine(
            chalk.red(`Error: could not read '${file}': ${reason}`),
        );
        return ExitCode.NoInput;
    }

    return statusToExitCode(execute(source, session));
}

/**
 * Entry point behind `quill [script]`: runs the script, or starts a REPL without one
 * @returns process exit code
 */
export async function runMain(
    options: RunOptions,
    io: CliIO = { out: stdout, err: stderr },
): Promise<number> {
    let config: CliConfig;
    try {
        config = resolveConfig(options);
    } catch (e) {
        if (e instanceof ConfigError) {
            io.err.writeLine(chalk.red(`Error: ${e.message}`));
            return ExitCode.Config;
        }
        throw e;
    }

    if (!config.color) {
        chalk.level = 0;
    }

    const session = createSession(config, io);

    if (options.script) {
        return runFile(options.script, session);
    }

    await startRepl(session);
    return ExitCode.Ok;
}
