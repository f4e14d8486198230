export { createChannelIdMessage, createErrorMessage } from "./factory";
export { requestSchema } from "./schemas";
export { parseMessage, serializeMessage } from "./serialization";
