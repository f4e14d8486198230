import type { IncomingMessage, ServerResponse } from "node:http";
import { sendHttpError } from "@/server/errors";
import { matchesPath } from "@/server/websocket/utils";

/** Plain HTTP requests: the relay only speaks WebSocket on its one path. */
export function handleHttpRequest(request: IncomingMessage, response: ServerResponse, wsPath: string): void {
    if (!matchesPath(request, wsPath)) {
        handleNotFound(response);
        return;
    }

    sendHttpError(response, 426, "UPGRADE_REQUIRED", "WebSocket upgrade required");
}

export function handleNotFound(response: ServerResponse): void {
    sendHttpError(response, 404, "NOT_FOUND", "Resource not found");
}
