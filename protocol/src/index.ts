export * from "./schemas";
export * from "./codec";
export type { Transport, TransportFactory } from "./transport";
export { WebSocketTransport, createWebSocketTransport } from "./ws-transport";
