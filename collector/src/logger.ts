import { pino, type Logger } from "pino";
import type { LogLevel } from "./config";

export type { Logger };

export interface LoggerOptions {
    level: LogLevel;
    pretty: boolean;
}

export function createLogger(options: LoggerOptions): Logger {
    return pino({
        name: "sck-collector",
        level: options.level,
        // pino-pretty only for local runs, containers ship JSON lines
        transport: options.pretty
            ? { target: "pino-pretty", options: { ignore: "pid,hostname" } }
            : undefined,
    });
}
