export { type ConnectionListener, createWebSocketHandler, type WebSocketHandlerDependencies } from "./handler";
export { createMessageRouter, MessageRouter, type MessageRouterDependencies } from "./router";
