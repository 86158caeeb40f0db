import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod";

export const CONFIG_FILE = "quill.yml";

export const ConfigSchema = z
    .object({
        prompt: z.string().default("> "),
        color: z.boolean().default(true),
        showTokens: z.boolean().default(false),
        showAst: z.boolean().default(false),
    })
    .strict();

export type CliConfig = z.infer<typeof ConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export function defaultConfig(): CliConfig {
    return ConfigSchema.parse({});
}

/**
 * Parses and validates the YAML contents of a config file
 * @param text file contents
 * @param file path used in error messages
 */
export function parseConfig(text: string, file: string): CliConfig {
    let raw: unknown;
    try {
        raw = yaml.load(text);
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`${file}: invalid YAML: ${reason}`);
    }

    // An empty file loads as undefined
    const result = ConfigSchema.safeParse(raw ?? {});
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        throw new ConfigError(`${file}: ${where}: ${issue.message}`);
    }
    return result.data;
}

/**
 * Loads `quill.yml` from the working directory, or the file given with `--config`.
 * A missing default file yields the defaults; a missing explicit file is an error.
 */
export function loadConfig(
    explicitPath?: string,
    cwd: string = process.cwd(),
): CliConfig {
    const file = explicitPath
        ? path.resolve(cwd, explicitPath)
        : path.join(cwd, CONFIG_FILE);

    if (!fs.existsSync(file)) {
        if (explicitPath) {
            throw new ConfigError(`Config file not found: ${file}`);
        }
        return defaultConfig();
    }

    let text: string;
    try {
        text = fs.readFileSync(file, "utf-8");
    } catch (e) {
        const reason = e instanceof Error ? e.message : String(e);
        throw new ConfigError(`${file}: could not read: ${reason}`);
    }

    return parseConfig(text, file);
}
