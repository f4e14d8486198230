import type { OutboundMessage } from "@/protocol/types";

export function serializeMessage(message: OutboundMessage): string {
    return JSON.stringify(message);
}

export function parseMessage(raw: string): unknown {
    try {
        return JSON.parse(raw);
    } catch {
        return undefined;
    }
}
