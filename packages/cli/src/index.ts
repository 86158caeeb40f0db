#!/usr/bin/env node
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import chalk from "chalk";
import { runMain } from "./commands/run";
import { initProject } from "./commands/init";
import { ExitCode } from "./session";

yargs(hideBin(process.argv))
    .scriptName("quill")
    .usage("$0 [script]")
    .command(
        "$0 [script]",
        "Run a Quill script, or start a REPL when no script is given",
        (yargs) =>
            yargs
                .positional("script", {
                    describe: "Path to the script to run",
                    type: "string",
                })
                .option("config", {
                    describe: "Path to a quill.yml config file",
                    type: "string",
                })
                .option("tokens", {
                    describe: "Print tokens before parsing",
                    type: "boolean",
                })
                .option("ast", {
                    describe: "Print the parsed program before running it",
                    type: "boolean",
                })
                .option("color", {
                    describe: "Colour diagnostics (--no-color to disable)",
                    type: "boolean",
                }),
        async (argv) => {
            process.exitCode = await runMain({
                script: argv.script,
                config: argv.config,
                tokens: argv.tokens,
                ast: argv.ast,
                color: argv.color,
            });
        },
    )
    .command(
        "init <name>",
        "Create a new Quill project directory",
        (yargs) =>
            yargs.positional("name", {
                describe: "Name of the new project directory",
                type: "string",
                demandOption: true,
            }),
        async (argv) => {
            await initProject(argv.name);
        },
    )
    .strict()
    .fail((msg, err) => {
        if (err) throw err;
        console.error(chalk.red(msg));
        process.exit(ExitCode.Usage);
    })
    .help()
    .parseAsync()
    .catch((e: unknown) => {
        const reason = e instanceof Error ? e.message : String(e);
        console.error(chalk.red(`Error: ${reason}`));
        process.exitCode = 1;
    });
