export const Command = {
    EMPTY: "",
    REQUEST_CHANNEL_ID: "requestChannelId",
    CONNECT_CHANNEL: "connectChannel",
    SEND: "send",
} as const;

export type Command = (typeof Command)[keyof typeof Command];

export const ErrorCode = {
    INVALID_MESSAGE: "INVALID_MESSAGE",
    UNKNOWN_COMMAND: "UNKNOWN_COMMAND",
    CHANNEL_ID_EXHAUSTED: "CHANNEL_ID_EXHAUSTED",
    CHANNEL_ALREADY_EXISTS: "CHANNEL_ALREADY_EXISTS",
    SEND_FAILED: "SEND_FAILED",
    INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorDefinition = Readonly<{
    code: number;
    recoverable: boolean;
    message: string;
}>;

export const ErrorCatalog: Record<ErrorCode, ErrorDefinition> = {
    // 4000-4099: Protocol errors (fatal)
    INVALID_MESSAGE: {
        code: 4001,
        recoverable: false,
        message: "Invalid message format or structure",
    },
    UNKNOWN_COMMAND: {
        code: 4002,
        recoverable: false,
        message: "Unrecognized command",
    },

    // 4100-4199: Channel errors (recoverable)
    CHANNEL_ID_EXHAUSTED: {
        code: 4101,
        recoverable: true,
        message: "No free channel identifier could be allocated",
    },
    CHANNEL_ALREADY_EXISTS: {
        code: 4102,
        recoverable: true,
        message: "Channel identifier is already registered",
    },

    // 4200-4299: Delivery errors (recoverable, never sent to clients)
    SEND_FAILED: {
        code: 4200,
        recoverable: true,
        message: "Message could not be delivered",
    },

    // 4900-4999: Internal errors (fatal)
    INTERNAL_ERROR: {
        code: 4900,
        recoverable: false,
        message: "Unexpected server error",
    },
} as const;
