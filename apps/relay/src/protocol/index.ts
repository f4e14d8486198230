export { CHANNEL_ID, CloseCode } from "./constants";
export { RelayError } from "./errors";
export { createChannelIdMessage, createErrorMessage, parseMessage, serializeMessage } from "./messages";
export type {
    ChannelIdMessage,
    ErrorDefinition,
    ErrorMessage,
    OutboundMessage,
    RelayRequest,
} from "./types";
export { Command, ErrorCatalog, ErrorCode } from "./types";
export { type ValidationResult, validateRequest } from "./validation";
