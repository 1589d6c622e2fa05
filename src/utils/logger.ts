import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";
import type { LoggingConfig } from "../config/types";

let rootLogger: Logger | undefined;

function baseOptions(level: LoggingConfig["level"]): LoggerOptions {
    return { level, base: undefined };
}

/**
 * Replaces the process-wide logger. With an explicit destination the output is plain JSON, which is what
 * the MCP server needs on stderr; otherwise `pretty` selects the pino-pretty transport.
 */
export function configureLogger(config: LoggingConfig, destination?: DestinationStream): Logger {
    if (destination) {
        rootLogger = pino(baseOptions(config.level), destination);
    } else if (config.pretty) {
        rootLogger = pino({
            ...baseOptions(config.level),
            transport: {
                target: "pino-pretty",
                options: { colorize: true, translateTime: "SYS:standard" },
            },
        });
    } else {
        rootLogger = pino(baseOptions(config.level));
    }
    return rootLogger;
}

export function getLogger(): Logger {
    if (!rootLogger) {
        rootLogger = pino(baseOptions("info"));
    }
    return rootLogger;
}

export function childLogger(logger: Logger, bindings: Record<string, string>): Logger {
    return logger.child(bindings);
}
