import type { IncomingMessage } from "node:http";
import type { WebSocket } from "ws";
import type { ChannelRegistry } from "@/server/channel";
import { ConnectionLifecycle, WebSocketConnection } from "@/server/connection";
import type { Logger } from "@/server/core/logger";
import type { MessageRouter } from "./router";
import { decodeRawData, getRemoteAddress } from "./utils";

export type WebSocketHandlerDependencies = Readonly<{
    registry: ChannelRegistry;
    router: MessageRouter;
    logger: Logger;
}>;

export type ConnectionListener = (ws: WebSocket, request: IncomingMessage) => void;

/**
 * Builds the `connection` listener: one lifecycle per accepted socket,
 * identified by remote address and a per-server sequence number.
 */
export function createWebSocketHandler(deps: WebSocketHandlerDependencies): ConnectionListener {
    let sequence = 0;

    return (ws, request) => {
        sequence++;

        const remoteAddress = getRemoteAddress(request);
        const connection = new WebSocketConnection(ws, `${remoteAddress}#${sequence}`, remoteAddress);
        const lifecycle = new ConnectionLifecycle(connection, deps);

        ws.on("message", data => lifecycle.receive(decodeRawData(data)));
        ws.on("close", (code, reason) => lifecycle.disconnect(code, reason.toString("utf-8")));
        ws.on("error", err => lifecycle.transportError(err));

        lifecycle.open();
    };
}
