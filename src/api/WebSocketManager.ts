import type { WebSocket } from '@fastify/websocket';
import type { SwapProgressCallback, SwapProgressData, SwapProgressMessage, SwapStage } from '../types';
import { logger } from '../utils/logger';

// WebSocket ready state constants
const WS_OPEN = 1;

const TERMINAL_STAGES: ReadonlySet<SwapStage> = new Set(['submitted', 'failed']);

/**
 * Fans swap progress out to WebSocket subscribers.
 * Connections are pooled by request id so several clients can follow the same swap;
 * they are closed once the swap reaches a terminal stage.
 */
export class WebSocketManager {
  private readonly connections = new Map<string, Set<WebSocket>>();

  addConnection(requestId: string, ws: WebSocket): void {
    let subscribers = this.connections.get(requestId);
    if (!subscribers) {
      subscribers = new Set();
      this.connections.set(requestId, subscribers);
    }
    subscribers.add(ws);

    logger.info({ requestId, totalConnections: subscribers.size }, 'WebSocket connection added');

    ws.on('error', (error: Error) => {
      logger.error({ requestId, error: error.message }, 'WebSocket error occurred');
      this.removeConnection(requestId, ws);
    });

    ws.on('close', () => {
      logger.debug({ requestId }, 'WebSocket connection closed');
      this.removeConnection(requestId, ws);
    });
  }

  removeConnection(requestId: string, ws: WebSocket): void {
    const subscribers = this.connections.get(requestId);
    if (!subscribers) {
      return;
    }

    subscribers.delete(ws);
    if (subscribers.size === 0) {
      this.connections.delete(requestId);
    }

    closeQuietly(ws, requestId);
  }

  /**
   * Progress callback for one swap request, handed to the orchestrator
   */
  progressFor(requestId: string): SwapProgressCallback {
    return (stage, data) => this.emitProgress(requestId, stage, data);
  }

  emitProgress(requestId: string, stage: SwapStage, data?: SwapProgressData): void {
    const subscribers = this.connections.get(requestId);

    if (!subscribers || subscribers.size === 0) {
      logger.debug({ requestId, stage }, 'No WebSocket subscribers for swap progress');
      return;
    }

    const message: SwapProgressMessage = {
      requestId,
      stage,
      timestamp: Date.now(),
      data
    };
    const payload = JSON.stringify(message);
    const disconnected: WebSocket[] = [];

    for (const ws of subscribers) {
      if (ws.readyState !== WS_OPEN) {
        disconnected.push(ws);
        continue;
      }
      try {
        ws.send(payload);
      } catch (error) {
        logger.error({ requestId, stage, error }, 'Error sending WebSocket message');
        disconnected.push(ws);
      }
    }

    for (const ws of disconnected) {
      this.removeConnection(requestId, ws);
    }

    logger.debug({ requestId, stage, delivered: subscribers.size }, 'Swap progress emitted');

    if (TERMINAL_STAGES.has(stage)) {
      this.removeAllConnections(requestId);
    }
  }

  removeAllConnections(requestId: string): void {
    const subscribers = this.connections.get(requestId);
    if (!subscribers) {
      return;
    }

    this.connections.delete(requestId);
    for (const ws of subscribers) {
      closeQuietly(ws, requestId);
    }
  }

  getConnectionCount(requestId: string): number {
    return this.connections.get(requestId)?.size ?? 0;
  }

  getTotalConnectionCount(): number {
    let total = 0;
    for (const subscribers of this.connections.values()) {
      total += subscribers.size;
    }
    return total;
  }

  /**
   * Closes every connection (server shutdown)
   */
  closeAll(): void {
    logger.info({ totalRequests: this.connections.size }, 'Closing all WebSocket connections');

    const all = [...this.connections.entries()];
    this.connections.clear();
    for (const [requestId, subscribers] of all) {
      for (const ws of subscribers) {
        closeQuietly(ws, requestId);
      }
    }
  }
}

function closeQuietly(ws: WebSocket, requestId: string): void {
  try {
    if (ws.readyState === WS_OPEN) {
      ws.close();
    }
  } catch (error) {
    logger.error({ requestId, error }, 'Error closing WebSocket');
  }
}
