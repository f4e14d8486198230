import { CloseCode, ErrorCatalog, ErrorCode, parseMessage, validateRequest } from "@/protocol";
import type { ChannelRegistry } from "@/server/channel";
import type { Logger } from "@/server/core/logger";
import { sendWebSocketError } from "@/server/errors";
import type { MessageRouter } from "@/server/websocket/router";
import { type ConnectionHandle, LifecycleState } from "./types";

export type ConnectionLifecycleDependencies = Readonly<{
    registry: ChannelRegistry;
    router: MessageRouter;
    logger: Logger;
}>;

/**
 * Drives one connection from accept to release:
 * connected -> active -> (disconnected | failed).
 *
 * Both terminal states run `release()` exactly once, which removes the
 * connection from its channel and closes the transport. Nothing thrown while
 * handling this connection's frames leaves this class.
 */
export class ConnectionLifecycle {
    private readonly connection: ConnectionHandle;
    private readonly registry: ChannelRegistry;
    private readonly router: MessageRouter;
    private readonly logger: Logger;
    private state: LifecycleState = LifecycleState.CONNECTED;
    private released = false;

    constructor(connection: ConnectionHandle, deps: ConnectionLifecycleDependencies) {
        this.connection = connection;
        this.registry = deps.registry;
        this.router = deps.router;
        this.logger = deps.logger.child({
            context: "websocket",
            connectionId: connection.id,
        });
    }

    get currentState(): LifecycleState {
        return this.state;
    }

    open(): void {
        if (this.state !== LifecycleState.CONNECTED) return;

        this.state = LifecycleState.ACTIVE;
        this.logger.info({ remoteAddress: this.connection.remoteAddress }, "Connection opened");
    }

    receive(raw: string): void {
        if (this.state !== LifecycleState.ACTIVE) {
            this.logger.debug({ state: this.state }, "Message ignored, connection not active");
            return;
        }

        this.logger.debug({ sizeBytes: Buffer.byteLength(raw, "utf-8") }, "Message received");

        const validation = validateRequest(parseMessage(raw));
        if (!validation.valid) {
            this.reject(validation.error.code, validation.error.message);
            return;
        }

        const logger = this.logger.child({ cmd: validation.data.cmd, channelId: this.connection.channelId });

        try {
            const result = this.router.route(this.connection, validation.data, logger);

            if (!result.success) {
                this.reject(result.errorCode, result.message);
            }
        } catch (err) {
            logger.error({ err }, "Unhandled error while routing message");
            this.reject(ErrorCode.INTERNAL_ERROR);
        }
    }

    /** Transport closed by the peer or after a local close. */
    disconnect(code: number, reason: string): void {
        if (this.state === LifecycleState.CONNECTED || this.state === LifecycleState.ACTIVE) {
            this.state = LifecycleState.DISCONNECTED;
            this.logger.info({ code, reason }, "Connection closed");
        }

        this.release();
    }

    /** Transport-level error; the close event that follows drives cleanup. */
    transportError(err: Error): void {
        this.logger.warn({ err }, "Transport error");
    }

    private reject(errorCode: ErrorCode, message?: string): void {
        const recoverable = ErrorCatalog[errorCode].recoverable;

        if (recoverable) {
            this.logger.debug({ errorCode, message }, "Request rejected");
            sendWebSocketError(this.connection, errorCode, message, this.logger);
            return;
        }

        this.fail(errorCode, message);
    }

    private fail(errorCode: ErrorCode, message?: string): void {
        if (this.state === LifecycleState.FAILED || this.state === LifecycleState.DISCONNECTED) return;

        this.state = LifecycleState.FAILED;
        this.logger.warn({ errorCode, message }, "Protocol error, closing connection");

        sendWebSocketError(this.connection, errorCode, message, this.logger);
        this.release();
    }

    private release(): void {
        if (this.released) return;
        this.released = true;

        const result = this.registry.leave(this.connection);
        this.connection.close(CloseCode.NORMAL, "Connection released");

        this.logger.debug(
            result.removed
                ? { channelId: result.channelId, channelDestroyed: result.channelDestroyed }
                : { reason: result.reason },
            "Connection released",
        );
    }
}
