import Fastify, { type FastifyError, type FastifyInstance, type FastifyReply, type FastifyRequest } from 'fastify';
import fastifyWebsocket from '@fastify/websocket';
import type { EnvironmentConfig } from '../config/env';
import type { ChainClient } from '../chain/ChainClient';
import type { ConversationInput, ConversationMachine, ConversationOutcome } from '../conversation/ConversationMachine';
import { CategorizedError, ErrorCategory, NotFoundError, ValidationError, logError } from '../errors';
import type { SwapOrchestrator } from '../execution/SwapOrchestrator';
import type { LedgerStore } from '../persistence/LedgerStore';
import type { SwapReceipt } from '../types';
import { logger } from '../utils/logger';
import { parseId } from '../utils/validation';
import type { WalletService } from '../wallet/WalletService';
import type { WebSocketManager } from './WebSocketManager';

export type ServerConfig = Pick<EnvironmentConfig, 'PORT' | 'HOST' | 'NODE_ENV' | 'LOG_LEVEL' | 'TX_EXPLORER_URL'>;

export interface ApiDependencies {
  ledger: LedgerStore;
  wallets: Pick<
    WalletService,
    'createWallet' | 'importWallet' | 'getActiveBalance' | 'getWalletDetails' | 'lookupToken'
  >;
  orchestrator: Pick<SwapOrchestrator, 'swapFromActiveWallet'>;
  conversation: Pick<ConversationMachine, 'step'>;
  chain: Pick<ChainClient, 'isReachable'>;
  wsManager: WebSocketManager;
}

export interface ErrorBody {
  error: { code: string; message: string };
}

type ConversationInputType = ConversationInput['type'];

interface UserParams {
  userId: string;
}

const CONVERSATION_INPUT_TYPES: readonly ConversationInputType[] = [
  'create-wallet',
  'import-wallet',
  'start-swap',
  'text',
  'confirm',
  'cancel'
];

const CATEGORY_STATUS: Record<ErrorCategory, number> = {
  [ErrorCategory.VALIDATION]: 400,
  [ErrorCategory.FORBIDDEN]: 403,
  [ErrorCategory.NOT_FOUND]: 404,
  [ErrorCategory.BALANCE]: 422,
  [ErrorCategory.QUOTE]: 422,
  [ErrorCategory.SUBMISSION]: 502,
  [ErrorCategory.NETWORK]: 503,
  [ErrorCategory.STORAGE]: 500,
  [ErrorCategory.SYSTEM]: 500
};

/**
 * Maps any error raised while serving a request to a status code and body
 */
export function toErrorResponse(error: FastifyError | CategorizedError): { status: number; body: ErrorBody } {
  if (error instanceof CategorizedError) {
    return {
      status: CATEGORY_STATUS[error.category],
      body: { error: { code: error.code, message: error.message } }
    };
  }

  if (error.validation) {
    return { status: 400, body: { error: { code: 'VALIDATION_ERROR', message: error.message } } };
  }

  if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
    return { status: error.statusCode, body: { error: { code: error.code ?? 'BAD_REQUEST', message: error.message } } };
  }

  // Unknown failures never leak their message
  return { status: 500, body: { error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } } };
}

/**
 * JSON form of a receipt; amounts travel as decimal strings in smallest units
 */
export function serializeReceipt(receipt: SwapReceipt) {
  return {
    ...receipt,
    amount: receipt.amount.toString(),
    minOutput: receipt.minOutput.toString(),
    expectedOutput: receipt.expectedOutput.toString(),
    gasPrice: receipt.gasPrice.toString()
  };
}

function serializeOutcome(outcome: ConversationOutcome) {
  return outcome.kind === 'swap-submitted' ? { ...outcome, receipt: serializeReceipt(outcome.receipt) } : outcome;
}

function toConversationInput(body: { type: ConversationInputType; text?: string }): ConversationInput {
  if (body.type === 'text') {
    if (typeof body.text !== 'string') {
      throw new ValidationError('text is required for text input', { field: 'text' });
    }
    return { type: 'text', text: body.text };
  }
  return { type: body.type };
}

/**
 * FastifyServer exposes the ledger, wallet service, swap orchestrator and
 * conversation machine over HTTP, and streams swap progress over WebSocket.
 */
export class FastifyServer {
  private readonly app: FastifyInstance;
  private readonly config: ServerConfig;
  private readonly deps: ApiDependencies;

  constructor(config: ServerConfig, deps: ApiDependencies) {
    this.config = config;
    this.deps = deps;

    this.app = Fastify({
      logger: {
        level: config.LOG_LEVEL
      }
    });

    this.app.setErrorHandler((error, request, reply) => this.handleError(error, request, reply));
    this.app.setNotFoundHandler((request, reply) => {
      const body: ErrorBody = {
        error: { code: 'NOT_FOUND', message: `Route ${request.method} ${request.url} not found` }
      };
      return reply.status(404).send(body);
    });

    this.app.register(fastifyWebsocket);
    // Routes live in a child plugin so the websocket hooks are loaded first
    this.app.register(async app => this.registerRoutes(app));
  }

  private registerRoutes(app: FastifyInstance): void {
    const { ledger, wallets, orchestrator, conversation, chain, wsManager } = this.deps;

    app.get('/health', async (_request, reply) => {
      const chainReachable = await chain.isReachable();
      return reply.status(chainReachable ? 200 : 503).send({
        status: chainReachable ? 'ok' : 'degraded',
        chainReachable,
        timestamp: Date.now()
      });
    });

    app.put<{ Params: UserParams; Body: { displayName: string } }>(
      '/api/users/:userId',
      {
        schema: {
          body: {
            type: 'object',
            required: ['displayName'],
            properties: {
              displayName: { type: 'string', minLength: 1, maxLength: 255 }
            }
          }
        }
      },
      async request => {
        const userId = parseId(request.params.userId, 'userId');
        await ledger.createUser(userId, request.body.displayName);

        const user = await ledger.getUser(userId);
        if (!user) {
          throw new NotFoundError('User not found', { userId });
        }
        return { user };
      }
    );

    app.post<{ Params: UserParams; Body: { name: string } }>(
      '/api/users/:userId/wallets',
      {
        schema: {
          body: {
            type: 'object',
            required: ['name'],
            properties: { name: { type: 'string' } }
          }
        }
      },
      async (request, reply) => {
        const userId = parseId(request.params.userId, 'userId');
        const created = await wallets.createWallet(userId, request.body.name);
        return reply.status(201).send(created);
      }
    );

    app.post<{ Params: UserParams; Body: { name: string; privateKey: string } }>(
      '/api/users/:userId/wallets/import',
      {
        schema: {
          body: {
            type: 'object',
            required: ['name', 'privateKey'],
            properties: {
              name: { type: 'string' },
              privateKey: { type: 'string' }
            }
          }
        }
      },
      async (request, reply) => {
        const userId = parseId(request.params.userId, 'userId');
        const wallet = await wallets.importWallet(userId, request.body.name, request.body.privateKey);
        return reply.status(201).send({ wallet });
      }
    );

    app.get<{ Params: UserParams }>('/api/users/:userId/wallets', async request => {
      const userId = parseId(request.params.userId, 'userId');
      return { wallets: await ledger.listWallets(userId) };
    });

    app.get<{ Params: UserParams & { walletId: string } }>('/api/users/:userId/wallets/:walletId', async request => {
      const userId = parseId(request.params.userId, 'userId');
      const walletId = parseId(request.params.walletId, 'walletId');
      return wallets.getWalletDetails(userId, walletId);
    });

    app.put<{ Params: UserParams; Body: { walletId: number } }>(
      '/api/users/:userId/active-wallet',
      {
        schema: {
          body: {
            type: 'object',
            required: ['walletId'],
            properties: { walletId: { type: 'integer' } }
          }
        }
      },
      async request => {
        const userId = parseId(request.params.userId, 'userId');
        const walletId = parseId(request.body.walletId, 'walletId');
        return { wallet: await ledger.setActiveWallet(userId, walletId) };
      }
    );

    app.get<{ Params: UserParams }>('/api/users/:userId/balance', async request => {
      const userId = parseId(request.params.userId, 'userId');
      return wallets.getActiveBalance(userId);
    });

    app.get<{ Params: UserParams; Querystring: { limit?: string } }>(
      '/api/users/:userId/transactions',
      async request => {
        const userId = parseId(request.params.userId, 'userId');
        const limit = request.query.limit === undefined ? undefined : parseId(request.query.limit, 'limit');
        return { transactions: await ledger.listTransactions(userId, limit) };
      }
    );

    app.get<{ Params: { address: string } }>('/api/tokens/:address', async request => {
      return { token: await wallets.lookupToken(request.params.address) };
    });

    app.post<{ Params: UserParams; Body: { tokenAddress: string; amount: string; requestId?: string } }>(
      '/api/users/:userId/swaps',
      {
        schema: {
          body: {
            type: 'object',
            required: ['tokenAddress', 'amount'],
            properties: {
              tokenAddress: { type: 'string' },
              // Numbers are coerced to strings before parsing
              amount: { type: 'string' },
              requestId: { type: 'string', minLength: 1, maxLength: 128 }
            }
          }
        }
      },
      async (request, reply) => {
        const userId = parseId(request.params.userId, 'userId');
        const { tokenAddress, amount, requestId } = request.body;
        const onProgress = requestId === undefined ? undefined : wsManager.progressFor(requestId);

        const receipt = await orchestrator.swapFromActiveWallet(userId, tokenAddress, amount, onProgress);
        return reply.status(201).send({
          receipt: serializeReceipt(receipt),
          explorerUrl: `${this.config.TX_EXPLORER_URL}${receipt.txHash}`
        });
      }
    );

    app.post<{ Params: UserParams; Body: { type: ConversationInputType; text?: string } }>(
      '/api/users/:userId/conversation',
      {
        schema: {
          body: {
            type: 'object',
            required: ['type'],
            properties: {
              type: { type: 'string', enum: [...CONVERSATION_INPUT_TYPES] },
              text: { type: 'string' }
            }
          }
        }
      },
      async request => {
        const userId = parseId(request.params.userId, 'userId');
        const result = await conversation.step(userId, toConversationInput(request.body));
        return { outcome: serializeOutcome(result.outcome), state: result.state };
      }
    );

    // Subscribers connect before posting a swap with the same requestId
    app.get<{ Params: { requestId: string } }>('/ws/swaps/:requestId', { websocket: true }, (socket, request) => {
      wsManager.addConnection(request.params.requestId, socket);
    });
  }

  private handleError(error: FastifyError, request: FastifyRequest, reply: FastifyReply): FastifyReply {
    const { status, body } = toErrorResponse(error);

    if (status >= 500) {
      logError(error, { method: request.method, url: request.url });
    } else {
      logger.debug({ method: request.method, url: request.url, code: body.error.code }, 'Request rejected');
    }

    return reply.status(status).send(body);
  }

  async start(): Promise<void> {
    try {
      await this.app.listen({
        port: this.config.PORT,
        host: this.config.HOST
      });

      logger.info(
        {
          port: this.config.PORT,
          host: this.config.HOST,
          env: this.config.NODE_ENV
        },
        'Fastify server started successfully'
      );
    } catch (error) {
      logger.error({ error }, 'Failed to start Fastify server');
      throw error;
    }
  }

  /**
   * Stop the Fastify server gracefully
   */
  async stop(): Promise<void> {
    try {
      this.deps.wsManager.closeAll();
      await this.app.close();

      logger.info('Fastify server stopped successfully');
    } catch (error) {
      logger.error({ error }, 'Error stopping Fastify server');
      throw error;
    }
  }

  /**
   * Get the Fastify app instance (for testing)
   */
  getApp(): FastifyInstance {
    return this.app;
  }
}
