import { WebSocket } from "ws";
import { ErrorCode, type OutboundMessage, RelayError, serializeMessage } from "@/protocol";
import type { ConnectionHandle } from "./types";

export class WebSocketConnection implements ConnectionHandle {
    readonly connectedAt = new Date();
    channelId: string | null = null;

    constructor(
        private readonly ws: WebSocket,
        readonly id: string,
        readonly remoteAddress: string,
    ) {}

    get isOpen(): boolean {
        return this.ws.readyState === WebSocket.OPEN;
    }

    send(message: OutboundMessage): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            if (!this.isOpen) {
                reject(new RelayError(ErrorCode.SEND_FAILED, "Connection is not open", { context: { to: this.id } }));
                return;
            }

            this.ws.send(serializeMessage(message), error => {
                if (error) {
                    reject(new RelayError(ErrorCode.SEND_FAILED, error.message, { cause: error, context: { to: this.id } }));
                    return;
                }
                resolve();
            });
        });
    }

    close(code: number, reason: string): void {
        if (this.isOpen) {
            this.ws.close(code, reason);
        }
    }
}
