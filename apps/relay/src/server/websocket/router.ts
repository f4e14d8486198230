import { Command, createChannelIdMessage, ErrorCode, type OutboundMessage, type RelayRequest } from "@/protocol";
import type { ActionResult, ChannelIdGenerator, ChannelRegistry } from "@/server/channel";
import type { ConnectionHandle } from "@/server/connection/types";
import type { Logger } from "@/server/core/logger";

export type MessageRouterDependencies = Readonly<{
    registry: ChannelRegistry;
    idGenerator: ChannelIdGenerator;
}>;

/**
 * Dispatches one validated request by command. Holds no per-connection state.
 *
 * A failed result carries the error to report; whether it ends the connection
 * is decided by the error catalog.
 */
export class MessageRouter {
    private readonly registry: ChannelRegistry;
    private readonly idGenerator: ChannelIdGenerator;

    constructor(deps: MessageRouterDependencies) {
        this.registry = deps.registry;
        this.idGenerator = deps.idGenerator;
    }

    route(connection: ConnectionHandle, request: RelayRequest, logger: Logger): ActionResult {
        switch (request.cmd) {
            case Command.EMPTY:
                logger.debug("Empty command received");
                return { success: true };
            case Command.REQUEST_CHANNEL_ID:
                return this.handleRequestChannelId(connection, logger);
            case Command.CONNECT_CHANNEL:
                return this.handleConnectChannel(connection, request, logger);
            case Command.SEND:
                return this.handleSend(connection, request, logger);
            default:
                return {
                    success: false,
                    errorCode: ErrorCode.UNKNOWN_COMMAND,
                    message: `Unknown command: ${request.cmd}`,
                };
        }
    }

    private handleRequestChannelId(connection: ConnectionHandle, logger: Logger): ActionResult {
        const generated = this.idGenerator.generate(channelId => this.registry.hasChannel(channelId));

        if (!generated.success) {
            logger.warn({ errorCode: generated.errorCode }, "Channel identifier generation failed");
            return generated;
        }

        const created = this.registry.createChannel(generated.channelId);
        if (!created.success) {
            return created;
        }

        logger.info({ channelId: generated.channelId }, "Channel identifier issued");
        this.reply(connection, createChannelIdMessage(generated.channelId), logger);

        return { success: true };
    }

    private handleConnectChannel(connection: ConnectionHandle, request: RelayRequest, logger: Logger): ActionResult {
        this.registry.join(request.channel, connection);
        logger.debug({ channelId: request.channel }, "Connect channel handled");

        return { success: true };
    }

    /** The sender need not be a member; `""` is an ordinary channel code. */
    private handleSend(connection: ConnectionHandle, request: RelayRequest, logger: Logger): ActionResult {
        const recipients = this.registry.broadcast(request.channel, request, connection);
        logger.debug({ channelId: request.channel, recipients, dataLength: request.data.length }, "Relaying message");

        return { success: true };
    }

    private reply(connection: ConnectionHandle, message: OutboundMessage, logger: Logger): void {
        connection.send(message).catch((err: unknown) => {
            logger.warn({ err }, "Reply not delivered");
        });
    }
}

export function createMessageRouter(deps: MessageRouterDependencies): MessageRouter {
    return new MessageRouter(deps);
}
