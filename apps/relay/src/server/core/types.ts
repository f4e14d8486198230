export const LogLevel = {
    DEBUG: "debug",
    INFO: "info",
    WARN: "warn",
    ERROR: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

export const Environment = {
    DEVELOPMENT: "development",
    PRODUCTION: "production",
    TEST: "test",
} as const;

export type Environment = (typeof Environment)[keyof typeof Environment];

export type Config = Readonly<{
    port: number;
    host: string;
    wsPath: string;
    logLevel: LogLevel;
    nodeEnv: Environment;
    maxMessageSize: number;
    compression: boolean;
    channelReservationTtlSec: number;
}>;
