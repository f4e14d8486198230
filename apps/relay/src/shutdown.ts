import { getContext } from "@/server/core/context";
import { flushLogger } from "@/server/core/logger";
import type { RelayServer } from "@/server";

let isShuttingDown = false;

async function performShutdown(signal: string, server: RelayServer): Promise<void> {
    const { logger, registry } = getContext();
    logger.info({ signal, ...registry.getStats() }, "Shutdown initiated");

    try {
        registry.stop();
        await server.close();
        await flushLogger(logger);
        process.exit(0);
    } catch (err) {
        logger.error({ err }, "Shutdown error");
        process.exit(1);
    }
}

export function gracefulShutdown(signal: string, server: RelayServer): void {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.log(`[shutdown] Received ${signal}, closing connections...`);

    performShutdown(signal, server).catch((err: unknown) => {
        console.error("[shutdown] Fatal error:", err);
        process.exit(1);
    });
}

export function setupShutdownHandlers(server: RelayServer): void {
    const handler = (signal: string) => () => gracefulShutdown(signal, server);

    process.on("SIGINT", handler("SIGINT"));
    process.on("SIGTERM", handler("SIGTERM"));
    process.on("SIGBREAK", handler("SIGBREAK"));
}
