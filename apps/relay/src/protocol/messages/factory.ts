import { type ChannelIdMessage, ErrorCatalog, type ErrorCode, type ErrorMessage } from "@/protocol/types";

export function createChannelIdMessage(channelId: string): ChannelIdMessage {
    return { cid: channelId };
}

export function createErrorMessage(code: ErrorCode, message?: string): ErrorMessage {
    return {
        error: {
            code,
            message: message ?? ErrorCatalog[code].message,
        },
    };
}
