import { createErrorMessage, ErrorCatalog, type ErrorCode } from "@/protocol";
import type { ConnectionHandle } from "@/server/connection/types";
import type { Logger } from "@/server/core/logger";

/**
 * Sends an error message to the connection and, for non-recoverable codes,
 * closes it with the catalog close code.
 */
export function sendWebSocketError(
    connection: ConnectionHandle,
    errorCode: ErrorCode,
    customMessage: string | undefined,
    logger: Logger,
): void {
    const error = ErrorCatalog[errorCode];
    const message = customMessage ?? error.message;

    connection.send(createErrorMessage(errorCode, message)).catch((err: unknown) => {
        logger.debug({ err, errorCode }, "Error message not delivered");
    });

    if (!error.recoverable) {
        connection.close(error.code, error.message);
    }
}
