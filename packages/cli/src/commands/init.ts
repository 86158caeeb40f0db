import fs from "node:fs/promises";
import path from "node:path";
import chalk from "chalk";
import { CONFIG_FILE } from "../config";

const DEFAULT_CONFIG = `# REPL prompt
prompt: "> "
# Set to false to disable coloured output
color: true
# Print the token list before parsing
showTokens: false
# Print the parsed program before running it
showAst: false
`;

const DEFAULT_SCRIPT = `// Variables live in a single global scope
var greeting = "Hello";
var name = "Quill";

print greeting + ", " + name + "!";
print 1 + 2 * 3;
`;

export const SCRIPT_FILE = "main.ql";

/**
 * Creates `<name>/` with a config file and a starter script.
 * Existing files are left untouched.
 * @returns created file paths
 */
export async function initProject(
    name: string,
    cwd: string = process.cwd(),
): Promise<string[]> {
    const projectDir = path.resolve(cwd, name);
    await fs.mkdir(projectDir, { recursive: true });

    const created: string[] = [];
    const files: [string, string][] = [
        [CONFIG_FILE, DEFAULT_CONFIG],
        [SCRIPT_FILE, DEFAULT_SCRIPT],
    ];

    for (const [file, contents] of files) {
        const target = path.join(projectDir, file);
        try {
            await fs.writeFile(target, contents, { flag: "wx" });
            created.push(target);
            console.log(chalk.gray(`Created ${path.join(name, file)}`));
        } catch (e) {
            if (isAlreadyExists(e)) {
                console.log(
                    chalk.yellow(`Skipped ${path.join(name, file)} (exists)`),
                );
                continue;
            }
            throw e;
        }
    }

    const script = path.join(name, SCRIPT_FILE);
    console.log(chalk.green(`\nRun it with: quill ${script}`));
    return created;
}

function isAlreadyExists(e: unknown): boolean {
    return e instanceof Error && "code" in e && e.code === "EEXIST";
}
