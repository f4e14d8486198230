import { type ChannelIdGenerator, type ChannelRegistry, createChannelIdGenerator, createChannelRegistry } from "@/server/channel";
import { createConfig } from "@/server/core/config";
import { createLogger, type Logger } from "@/server/core/logger";
import type { Config } from "@/server/core/types";
import { createMessageRouter, type MessageRouter } from "@/server/websocket";

export interface AppContext {
    config: Config;
    logger: Logger;
    registry: ChannelRegistry;
    idGenerator: ChannelIdGenerator;
    router: MessageRouter;
}

let context: AppContext | null = null;

export function initContext(): AppContext {
    if (context) throw new Error("Context already initialized");

    const config = createConfig();
    const logger = createLogger(config);

    const registry = createChannelRegistry({
        config: {
            reservationTtlSec: config.channelReservationTtlSec,
        },
        logger,
    });

    const idGenerator = createChannelIdGenerator();
    const router = createMessageRouter({ registry, idGenerator });

    context = Object.freeze({ config, logger, registry, idGenerator, router });
    return context;
}

export function getContext(): AppContext {
    if (!context) throw new Error("Context not initialized");
    return context;
}

export function resetContext(): void {
    if (process.env.NODE_ENV !== "test") {
        throw new Error("Reset only available in test environment");
    }
    context?.registry.stop();
    context = null;
}
