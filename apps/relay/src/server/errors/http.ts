import { STATUS_CODES, type ServerResponse } from "node:http";
import type { Duplex } from "node:stream";
import type { ErrorResponse } from "@/server/http/types";

export function buildHttpError(status: number, code: string, message: string): ErrorResponse {
    return { code, status, message };
}

export function sendHttpError(response: ServerResponse, status: number, code: string, message: string): void {
    const body = JSON.stringify(buildHttpError(status, code, message));

    response.writeHead(status, {
        "Content-Type": "application/json",
        "Content-Length": Buffer.byteLength(body),
    });
    response.end(body);
}

/** Answers a rejected upgrade request on the raw socket and closes it. */
export function rejectUpgrade(socket: Duplex, status: number, code: string, message: string): void {
    const body = JSON.stringify(buildHttpError(status, code, message));

    socket.once("finish", () => socket.destroy());
    socket.end(
        `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ""}\r\n` +
            "Connection: close\r\n" +
            "Content-Type: application/json\r\n" +
            `Content-Length: ${Buffer.byteLength(body)}\r\n` +
            "\r\n" +
            body,
    );
}
