import { loadConfig, type EnvironmentConfig } from './config/env';
import { logger } from './utils/logger';
import {
  closePool,
  closeRedis,
  getPool,
  getRedisClient,
  InMemoryLedgerStore,
  MemoryKeyValue,
  PostgresLedgerStore,
  runMigrations,
  SecretBox,
  SessionStore,
  testConnection,
  testRedisConnection,
  type KeyValueBackend,
  type LedgerStore
} from './persistence';
import { ViemChainClient } from './chain/ChainClient';
import { PoolResolver } from './routing/PoolResolver';
import { QuoteEngine } from './quoting/QuoteEngine';
import { SwapOrchestrator } from './execution/SwapOrchestrator';
import { WalletService } from './wallet/WalletService';
import { ConversationMachine } from './conversation/ConversationMachine';
import { FastifyServer, WebSocketManager } from './api';

/**
 * Application container holding all initialized components
 */
interface AppContainer {
  config: EnvironmentConfig;
  ledger: LedgerStore;
  wsManager: WebSocketManager;
  fastifyServer: FastifyServer;
}

let appContainer: AppContainer | null = null;

async function createLedger(config: EnvironmentConfig): Promise<LedgerStore> {
  if (config.LEDGER_BACKEND === 'memory') {
    logger.warn('Using the in-memory ledger; wallets are lost on restart');
    const secretBox = config.WALLET_ENCRYPTION_KEY ? new SecretBox(config.WALLET_ENCRYPTION_KEY) : SecretBox.ephemeral();
    return new InMemoryLedgerStore(secretBox);
  }

  if (!config.WALLET_ENCRYPTION_KEY) {
    throw new Error('WALLET_ENCRYPTION_KEY is required for the postgres ledger');
  }

  logger.info('Testing PostgreSQL connection...');
  if (!(await testConnection())) {
    throw new Error('Failed to connect to PostgreSQL database');
  }

  const secretBox = new SecretBox(config.WALLET_ENCRYPTION_KEY);
  const migration = await runMigrations(getPool(), secretBox);
  logger.info(migration, 'Ledger schema ready');

  return new PostgresLedgerStore(getPool(), secretBox);
}

async function createSessionBackend(config: EnvironmentConfig): Promise<KeyValueBackend> {
  if (config.LEDGER_BACKEND === 'memory') {
    return new MemoryKeyValue();
  }

  logger.info('Testing Redis connection...');
  if (!(await testRedisConnection())) {
    throw new Error('Failed to connect to Redis');
  }
  return getRedisClient();
}

/**
 * Initialize all application components with dependency injection
 */
async function initializeComponents(): Promise<AppContainer> {
  const config = loadConfig();
  // Secret-bearing fields are redacted by the logger
  logger.info({ config }, 'Configuration loaded');

  const ledger = await createLedger(config);
  const sessions = new SessionStore(await createSessionBackend(config), config.SESSION_TTL);
  logger.info({ backend: config.LEDGER_BACKEND }, 'Persistence layer initialized');

  const chain = new ViemChainClient({
    rpcUrl: config.RPC_URL,
    chainId: config.CHAIN_ID,
    chainName: config.CHAIN_NAME,
    nativeSymbol: config.NATIVE_SYMBOL,
    timeoutMs: config.RPC_TIMEOUT_MS
  });
  const resolver = new PoolResolver({
    discoveryUrl: config.DISCOVERY_URL,
    timeoutMs: config.DISCOVERY_TIMEOUT_MS
  });
  const quotes = new QuoteEngine(chain, {
    priceRouterAddress: config.PRICE_ROUTER_ADDRESS,
    toleranceBps: config.DEFAULT_SLIPPAGE_BPS
  });
  const orchestrator = new SwapOrchestrator(chain, resolver, quotes, ledger, {
    routerAddress: config.ROUTER_ADDRESS,
    chainId: config.CHAIN_ID,
    gasLimit: config.SWAP_GAS_LIMIT
  });
  logger.info({ chainId: config.CHAIN_ID, rpcUrl: config.RPC_URL }, 'Swap pipeline initialized');

  const wallets = new WalletService(ledger, chain, config.NATIVE_SYMBOL);
  const conversation = new ConversationMachine({
    sessions,
    ledger,
    wallets,
    resolver,
    orchestrator,
    chain,
    explorerUrl: config.TX_EXPLORER_URL,
    nativeSymbol: config.NATIVE_SYMBOL
  });

  const wsManager = new WebSocketManager();
  const fastifyServer = new FastifyServer(config, {
    ledger,
    wallets,
    orchestrator,
    conversation,
    chain,
    wsManager
  });
  logger.info('Fastify Server initialized');

  return { config, ledger, wsManager, fastifyServer };
}

/**
 * Graceful shutdown handler
 * Closes all connections and stops all services
 */
async function gracefulShutdown(signal: string): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal, starting graceful shutdown...');

  if (!appContainer) {
    logger.info('No active application container, exiting immediately');
    process.exit(0);
  }

  try {
    // In-flight requests finish before close resolves
    logger.info('Stopping Fastify server...');
    await appContainer.fastifyServer.stop();

    if (appContainer.config.LEDGER_BACKEND === 'postgres') {
      logger.info('Closing database connections...');
      await closePool();

      logger.info('Closing Redis connections...');
      await closeRedis();
    }

    logger.info('Graceful shutdown completed successfully');
    process.exit(0);
  } catch (error) {
    logger.error({ error }, 'Error during graceful shutdown');
    process.exit(1);
  }
}

/**
 * Main application entry point
 */
async function main(): Promise<void> {
  try {
    logger.info('Custodial swap engine starting...');

    appContainer = await initializeComponents();

    await appContainer.fastifyServer.start();

    logger.info(
      { host: appContainer.config.HOST, port: appContainer.config.PORT },
      'Custodial swap engine is ready and accepting requests'
    );

    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
  } catch (error) {
    logger.error({ error }, 'Failed to start custodial swap engine');
    process.exit(1);
  }
}

process.on('uncaughtException', (error) => {
  logger.error({ error }, 'Uncaught exception');
  void gracefulShutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled promise rejection');
  void gracefulShutdown('unhandledRejection');
});

void main();
