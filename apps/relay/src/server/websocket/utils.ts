import type { IncomingMessage } from "node:http";
import type { RawData } from "ws";

export function decodeRawData(data: RawData): string {
    if (Buffer.isBuffer(data)) return data.toString("utf-8");
    if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
    return Buffer.from(data).toString("utf-8");
}

export function getRemoteAddress(request: IncomingMessage): string {
    return request.socket.remoteAddress ?? "unknown";
}

export function matchesPath(request: IncomingMessage, path: string): boolean {
    const url = new URL(request.url ?? "/", "http://localhost");
    return url.pathname === path;
}
