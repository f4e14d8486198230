import pino from "pino";
import { ErrorCode, type OutboundMessage, RelayError } from "@/protocol";
import type { ConnectionHandle } from "@/server/connection/types";
import type { Logger } from "@/server/core/logger";

export function createTestLogger(): Logger {
    return pino({ level: "silent" });
}

/** In-memory connection that records what it was sent. */
export class FakeConnection implements ConnectionHandle {
    readonly connectedAt = new Date();
    readonly sent: OutboundMessage[] = [];
    channelId: string | null = null;
    closed: { code: number; reason: string } | null = null;
    failSends = false;

    constructor(
        readonly id: string,
        readonly remoteAddress = "127.0.0.1",
    ) {}

    get isOpen(): boolean {
        return this.closed === null;
    }

    send(message: OutboundMessage): Promise<void> {
        if (this.failSends || !this.isOpen) {
            return Promise.reject(new RelayError(ErrorCode.SEND_FAILED, "Connection is not open"));
        }

        this.sent.push(message);
        return Promise.resolve();
    }

    close(code: number, reason: string): void {
        if (this.closed === null) {
            this.closed = { code, reason };
        }
    }
}
