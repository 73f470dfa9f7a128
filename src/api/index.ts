// API layer - HTTP routes and swap progress streaming
export { WebSocketManager } from './WebSocketManager';
export { FastifyServer, toErrorResponse, serializeReceipt } from './FastifyServer';
export type { ApiDependencies, ErrorBody, ServerConfig } from './FastifyServer';
