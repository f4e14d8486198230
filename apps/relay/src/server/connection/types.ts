import type { OutboundMessage } from "@/protocol";

/**
 * One client connection as seen by the registry and router.
 *
 * `channelId` is a back-reference maintained by the registry: it names the
 * channel the connection is currently a member of, or null. The registry does
 * not own the underlying transport.
 */
export interface ConnectionHandle {
    readonly id: string;
    readonly remoteAddress: string;
    readonly connectedAt: Date;
    readonly isOpen: boolean;
    channelId: string | null;

    /** Resolves once the frame is written; rejects with a `RelayError` (SEND_FAILED). */
    send(message: OutboundMessage): Promise<void>;
    close(code: number, reason: string): void;
}

export const LifecycleState = {
    CONNECTED: "connected",
    ACTIVE: "active",
    DISCONNECTED: "disconnected",
    FAILED: "failed",
} as const;

export type LifecycleState = (typeof LifecycleState)[keyof typeof LifecycleState];
