import pino from "pino";

import type { Config } from "@/server/core/types";

export type Logger = pino.Logger;

export const LOGGER_NAME = "mesh-signal-relay";

type LoggerConfig = Pick<Config, "logLevel" | "nodeEnv">;

function baseOptions(config: LoggerConfig): pino.LoggerOptions {
    return {
        name: LOGGER_NAME,
        level: config.logLevel,
        // Replaces pid/hostname; channel and connection ids come from child bindings.
        base: { env: config.nodeEnv },
        serializers: {
            err: pino.stdSerializers.err,
        },
    };
}

/**
 * Root logger for the relay. Development output goes through pino-pretty;
 * everything else, and any explicit `destination`, gets one JSON object per
 * line with a string level and an ISO timestamp.
 */
export function createLogger(config: LoggerConfig, destination?: pino.DestinationStream): Logger {
    const options = baseOptions(config);

    if (config.nodeEnv === "development" && !destination) {
        return pino({
            ...options,
            transport: {
                target: "pino-pretty",
                options: {
                    colorize: true,
                    translateTime: "SYS:yyyy-mm-dd HH:MM:ss.l",
                    ignore: "pid,hostname,env,name",
                    messageFormat: "{if context}[{context}] {end}{msg}",
                },
            },
        });
    }

    const jsonOptions: pino.LoggerOptions = {
        ...options,
        formatters: {
            level: label => ({ level: label }),
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    return destination ? pino(jsonOptions, destination) : pino(jsonOptions);
}

export async function flushLogger(logger: Logger): Promise<void> {
    return new Promise<void>(resolve => {
        logger.flush((error?: Error) => {
            if (error) console.error("Logger flush error:", error);
            resolve();
        });
    });
}
