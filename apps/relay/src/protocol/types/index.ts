export { Command, ErrorCatalog, ErrorCode, type ErrorDefinition } from "./enums";
export type { ChannelIdMessage, ErrorMessage, OutboundMessage, RelayRequest } from "./messages";
