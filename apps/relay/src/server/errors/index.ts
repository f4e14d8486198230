export { buildHttpError, rejectUpgrade, sendHttpError } from "./http";
export { sendWebSocketError } from "./websocket";
