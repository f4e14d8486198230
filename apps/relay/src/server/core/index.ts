export { type ConfigResult, createConfig, parseConfig } from "./config";
export { type AppContext, getContext, initContext, resetContext } from "./context";
export { createLogger, flushLogger, type Logger } from "./logger";
export { type Config, Environment, LogLevel } from "./types";
