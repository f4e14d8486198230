import type { z } from "zod";
import type { requestSchema } from "@/protocol/messages/schemas";
import type { ErrorCode } from "./enums";

/** Client request, normalized: absent fields are empty strings. */
export type RelayRequest = z.infer<typeof requestSchema>;

export interface ChannelIdMessage {
    cid: string;
}

export interface ErrorMessage {
    error: {
        code: ErrorCode;
        message: string;
    };
}

export type OutboundMessage = RelayRequest | ChannelIdMessage | ErrorMessage;
