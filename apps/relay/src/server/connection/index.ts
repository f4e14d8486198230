export { ConnectionLifecycle, type ConnectionLifecycleDependencies } from "./lifecycle";
export { type ConnectionHandle, LifecycleState } from "./types";
export { WebSocketConnection } from "./websocket-connection";
