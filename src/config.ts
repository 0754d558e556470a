import type { LoggingLevel } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

export const LOG_LEVELS = [
    "debug",
    "info",
    "notice",
    "warning",
    "error",
    "critical",
    "alert",
    "emergency",
] as const satisfies readonly LoggingLevel[];

const configSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).default("info"),
    loggerName: z.string().min(1).default("workflow-dsl"),
});

export type ServerConfig = z.infer<typeof configSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

const FLAG_TO_KEY: Record<string, keyof ServerConfig> = {
    "--log-level": "logLevel",
    "--logger-name": "loggerName",
};

/**
 * Resolve server configuration. Command line flags (`--log-level debug` or
 * `--log-level=debug`) win over environment variables.
 */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv): ServerConfig {
    const raw: Partial<Record<keyof ServerConfig, string>> = {
        logLevel: env.WORKFLOW_DSL_LOG_LEVEL,
        loggerName: env.WORKFLOW_DSL_LOGGER_NAME,
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const separator = arg.indexOf("=");
        const flag = separator === -1 ? arg : arg.slice(0, separator);
        const key = FLAG_TO_KEY[flag];
        if (!key) {
            throw new ConfigError(`Unknown option: ${flag}`);
        }
        const value: string | undefined = separator === -1 ? argv[++i] : arg.slice(separator + 1);
        if (value === undefined) {
            throw new ConfigError(`Missing value for ${flag}`);
        }
        raw[key] = value;
    }

    const parsed = configSchema.safeParse(raw);
    if (!parsed.success) {
        const reasons = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${reasons.join("; ")}`);
    }
    return parsed.data;
}
