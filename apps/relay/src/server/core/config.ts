import { z } from "zod";
import { type Config, Environment, LogLevel } from "@/server/core/types";

const DEFAULTS: Config = {
    port: 8000,
    host: "0.0.0.0",
    wsPath: "/",
    maxMessageSize: 65_536, // 64 KiB
    logLevel: LogLevel.INFO,
    nodeEnv: Environment.DEVELOPMENT,
    compression: false,
    channelReservationTtlSec: 300,
} as const;

const envSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULTS.port),
    HOST: z.string().min(1).default(DEFAULTS.host),
    WS_PATH: z.string().startsWith("/", "WS_PATH must start with /").default(DEFAULTS.wsPath),
    MAX_MESSAGE_SIZE: z.coerce.number().int().positive().default(DEFAULTS.maxMessageSize),
    LOG_LEVEL: z.enum(LogLevel).default(DEFAULTS.logLevel),
    NODE_ENV: z.enum(Environment).default(DEFAULTS.nodeEnv),
    COMPRESSION: z.stringbool().default(DEFAULTS.compression),
    CHANNEL_RESERVATION_TTL_SEC: z.coerce.number().int().min(0).default(DEFAULTS.channelReservationTtlSec),
});

export type ConfigResult = { success: true; config: Config } | { success: false; issues: string[] };

export function parseConfig(env: NodeJS.ProcessEnv): ConfigResult {
    const { success, data, error } = envSchema.safeParse(env);

    if (!success) {
        return {
            success: false,
            issues: error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`),
        };
    }

    return {
        success: true,
        config: Object.freeze({
            port: data.PORT,
            host: data.HOST,
            wsPath: data.WS_PATH,
            logLevel: data.LOG_LEVEL,
            nodeEnv: data.NODE_ENV,
            maxMessageSize: data.MAX_MESSAGE_SIZE,
            compression: data.COMPRESSION,
            channelReservationTtlSec: data.CHANNEL_RESERVATION_TTL_SEC,
        }),
    };
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const result = parseConfig(env);

    if (result.success) {
        return result.config;
    }

    console.error("Invalid environment variables:");
    for (const issue of result.issues) {
        console.error(`  - ${issue}`);
    }
    process.exit(1);
}
