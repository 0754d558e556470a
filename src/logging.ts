import type { LoggingLevel } from "@modelcontextprotocol/sdk/types.js";
import { LOG_LEVELS, ServerConfig } from "./config.js";
import { server } from "./server.js";

let minimumLevel: LoggingLevel = "info";
let loggerName = "workflow-dsl";

export function configureLogging(config: Pick<ServerConfig, "logLevel" | "loggerName">): void {
    minimumLevel = config.logLevel;
    loggerName = config.loggerName;
}

export function isLevelEnabled(level: LoggingLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minimumLevel);
}

/**
 * Send a log notification to the connected client. Dropped while no client is
 * connected; a failed send is reported on stderr and never rejects.
 */
export async function log(level: LoggingLevel, data: string, sessionId?: string): Promise<void> {
    if (!isLevelEnabled(level) || !server.isConnected()) return;
    try {
        await server.sendLoggingMessage({ level, logger: loggerName, data }, sessionId);
    } catch (error) {
        console.error(`[${loggerName}] failed to send ${level} log: ${error instanceof Error ? error.message : String(error)}`);
    }
}
