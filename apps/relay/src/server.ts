import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import { WebSocketServer } from "ws";
import { CloseCode } from "@/protocol";
import type { ChannelRegistry } from "@/server/channel";
import type { Config } from "@/server/core";
import { getContext } from "@/server/core/context";
import type { Logger } from "@/server/core/logger";
import { rejectUpgrade } from "@/server/errors";
import { handleHttpRequest } from "@/server/http/routes";
import { createWebSocketHandler, type MessageRouter } from "@/server/websocket";
import { matchesPath } from "@/server/websocket/utils";

export type RelayServerDependencies = Readonly<{
    config: Pick<Config, "port" | "host" | "wsPath" | "maxMessageSize" | "compression">;
    logger: Logger;
    registry: ChannelRegistry;
    router: MessageRouter;
}>;

export interface RelayServer {
    readonly http: Server;
    readonly wss: WebSocketServer;
    listen(port?: number, host?: string): Promise<AddressInfo>;
    /** Closes every connection with 1001, then the listener. */
    close(): Promise<void>;
}

export function createRelayServer(deps: RelayServerDependencies): RelayServer {
    const { config, logger } = deps;

    const wss = new WebSocketServer({
        noServer: true,
        maxPayload: config.maxMessageSize,
        perMessageDeflate: config.compression,
    });
    wss.on("connection", createWebSocketHandler(deps));

    const http = createServer((request, response) => handleHttpRequest(request, response, config.wsPath));

    http.on("upgrade", (request, socket, head) => {
        if (!matchesPath(request, config.wsPath)) {
            logger.debug({ url: request.url }, "Upgrade rejected, unknown path");
            rejectUpgrade(socket, 404, "NOT_FOUND", "Resource not found");
            return;
        }

        wss.handleUpgrade(request, socket, head, ws => {
            wss.emit("connection", ws, request);
        });
    });

    http.on("clientError", (err, socket) => {
        logger.debug({ err }, "HTTP client error");
        socket.destroy();
    });

    let closing: Promise<void> | null = null;

    async function shutdown(): Promise<void> {
        let closedCount = 0;

        for (const ws of wss.clients) {
            ws.close(CloseCode.GOING_AWAY, "Server shutting down");
            closedCount++;
        }

        logger.info({ closedCount }, "All connections closed");

        await new Promise<void>((resolve, reject) => {
            wss.close(err => (err ? reject(err) : resolve()));
        });

        if (!http.listening) return;

        await new Promise<void>((resolve, reject) => {
            http.close(err => (err ? reject(err) : resolve()));
        });
    }

    return {
        http,
        wss,

        listen(port = config.port, host = config.host) {
            return new Promise<AddressInfo>((resolve, reject) => {
                http.once("error", reject);
                http.listen(port, host, () => {
                    http.off("error", reject);

                    const address = http.address();
                    if (address === null || typeof address === "string") {
                        reject(new Error("Server is not listening on a TCP address"));
                        return;
                    }
                    resolve(address);
                });
            });
        },

        close() {
            closing ??= shutdown();
            return closing;
        },
    };
}

export async function startServer(): Promise<RelayServer> {
    const context = getContext();
    const { config, logger } = context;

    const server = createRelayServer(context);
    const address = await server.listen();

    logger.info(
        {
            host: address.address,
            port: address.port,
            wsPath: config.wsPath,
            nodeVersion: process.version,
            compression: config.compression,
            maxMessageSize: config.maxMessageSize,
            channelReservationTtlSec: config.channelReservationTtlSec,
        },
        "Server started",
    );

    return server;
}
