import { startServer } from "@/server";
import { initContext } from "@/server/core/context";
import { setupShutdownHandlers } from "@/shutdown";

const { logger } = initContext();

startServer()
    .then(server => setupShutdownHandlers(server))
    .catch((err: unknown) => {
        logger.error({ err }, "Failed to start server");
        process.exit(1);
    });
