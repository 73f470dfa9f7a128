import dotenv from 'dotenv';
import { resolve } from 'path';
import { getAddress, isAddress, type Address } from 'viem';

// Load environment variables from .env file
dotenv.config({ path: resolve(process.cwd(), '.env') });

/**
 * Environment configuration interface
 * Defines all configuration options for the custodial swap engine
 */
export interface EnvironmentConfig {
  // Server Configuration
  PORT: number;
  HOST: string;
  NODE_ENV: 'development' | 'production' | 'test';

  // Ledger Configuration
  LEDGER_BACKEND: 'memory' | 'postgres';
  WALLET_ENCRYPTION_KEY?: string;

  // PostgreSQL Configuration
  POSTGRES_HOST: string;
  POSTGRES_PORT: number;
  POSTGRES_USER: string;
  POSTGRES_PASSWORD: string;
  POSTGRES_DATABASE: string;
  POSTGRES_MAX_CONNECTIONS: number;

  // Redis Configuration (conversation sessions)
  REDIS_HOST: string;
  REDIS_PORT: number;
  REDIS_PASSWORD?: string;
  REDIS_DB: number;
  SESSION_TTL: number; // Session TTL in seconds

  // Chain Configuration
  RPC_URL: string;
  CHAIN_ID: number;
  CHAIN_NAME: string;
  NATIVE_SYMBOL: string;
  RPC_TIMEOUT_MS: number;
  TX_EXPLORER_URL: string;

  // Exchange Configuration
  DISCOVERY_URL: string;
  DISCOVERY_TIMEOUT_MS: number;
  ROUTER_ADDRESS: Address;
  PRICE_ROUTER_ADDRESS: Address;
  SWAP_GAS_LIMIT: number;
  DEFAULT_SLIPPAGE_BPS: number;

  // Monitoring Configuration
  LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error';
}

/**
 * Parses an integer from environment variable with validation
 * @param key - Environment variable name
 * @param value - Environment variable value
 * @param defaultValue - Default value if not provided
 * @returns Parsed integer value
 */
function parseIntEnv(key: string, value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Invalid integer value for ${key}: ${value}`);
  }

  return parsed;
}

/**
 * Validates enum value against allowed options
 * @param key - Environment variable name
 * @param value - Environment variable value
 * @param allowedValues - Array of allowed values
 * @param defaultValue - Default value if not provided
 * @returns Validated enum value
 */
function parseEnumEnv<T extends string>(
  key: string,
  value: string | undefined,
  allowedValues: readonly T[],
  defaultValue: T
): T {
  if (!value) {
    return defaultValue;
  }

  const match = allowedValues.find(allowed => allowed === value);
  if (match === undefined) {
    throw new Error(
      `Invalid value for ${key}: ${value}. Allowed values: ${allowedValues.join(', ')}`
    );
  }

  return match;
}

/**
 * Parses a contract address, normalizing it to its checksummed form
 */
function parseAddressEnv(key: string, value: string | undefined, defaultValue: Address): Address {
  if (!value) {
    return defaultValue;
  }

  if (!isAddress(value, { strict: false })) {
    throw new Error(`Invalid address for ${key}: ${value}`);
  }

  return getAddress(value);
}

/**
 * Loads and validates environment configuration
 * @returns Validated EnvironmentConfig object
 * @throws Error if required variables are missing or invalid
 */
export function loadConfig(): EnvironmentConfig {
  const config: EnvironmentConfig = {
    // Server Configuration
    PORT: parseIntEnv('PORT', process.env.PORT, 3000),
    HOST: process.env.HOST || '0.0.0.0',
    NODE_ENV: parseEnumEnv(
      'NODE_ENV',
      process.env.NODE_ENV,
      ['development', 'production', 'test'] as const,
      'development'
    ),

    // Ledger Configuration
    LEDGER_BACKEND: parseEnumEnv(
      'LEDGER_BACKEND',
      process.env.LEDGER_BACKEND,
      ['memory', 'postgres'] as const,
      'memory'
    ),
    WALLET_ENCRYPTION_KEY: process.env.WALLET_ENCRYPTION_KEY || undefined,

    // PostgreSQL Configuration
    POSTGRES_HOST: process.env.POSTGRES_HOST || 'localhost',
    POSTGRES_PORT: parseIntEnv('POSTGRES_PORT', process.env.POSTGRES_PORT, 5432),
    POSTGRES_USER: process.env.POSTGRES_USER || 'postgres',
    POSTGRES_PASSWORD: process.env.POSTGRES_PASSWORD || 'postgres',
    POSTGRES_DATABASE: process.env.POSTGRES_DATABASE || 'swap_custody',
    POSTGRES_MAX_CONNECTIONS: parseIntEnv(
      'POSTGRES_MAX_CONNECTIONS',
      process.env.POSTGRES_MAX_CONNECTIONS,
      20
    ),

    // Redis Configuration
    REDIS_HOST: process.env.REDIS_HOST || 'localhost',
    REDIS_PORT: parseIntEnv('REDIS_PORT', process.env.REDIS_PORT, 6379),
    REDIS_PASSWORD: process.env.REDIS_PASSWORD || undefined,
    REDIS_DB: parseIntEnv('REDIS_DB', process.env.REDIS_DB, 0),
    SESSION_TTL: parseIntEnv('SESSION_TTL', process.env.SESSION_TTL, 900),

    // Chain Configuration
    RPC_URL: process.env.RPC_URL || 'https://testnet-rpc.monad.xyz',
    CHAIN_ID: parseIntEnv('CHAIN_ID', process.env.CHAIN_ID, 10143),
    CHAIN_NAME: process.env.CHAIN_NAME || 'Monad Testnet',
    NATIVE_SYMBOL: process.env.NATIVE_SYMBOL || 'MON',
    RPC_TIMEOUT_MS: parseIntEnv('RPC_TIMEOUT_MS', process.env.RPC_TIMEOUT_MS, 10000),
    TX_EXPLORER_URL: process.env.TX_EXPLORER_URL || 'https://testnet.monadexplorer.com/tx/',

    // Exchange Configuration
    DISCOVERY_URL: process.env.DISCOVERY_URL || 'https://api.testnet.kuru.io/api/v1/markets/filtered',
    DISCOVERY_TIMEOUT_MS: parseIntEnv(
      'DISCOVERY_TIMEOUT_MS',
      process.env.DISCOVERY_TIMEOUT_MS,
      10000
    ),
    ROUTER_ADDRESS: parseAddressEnv(
      'ROUTER_ADDRESS',
      process.env.ROUTER_ADDRESS,
      '0xc816865f172d640d93712C68a7E1F83F3fA63235'
    ),
    PRICE_ROUTER_ADDRESS: parseAddressEnv(
      'PRICE_ROUTER_ADDRESS',
      process.env.PRICE_ROUTER_ADDRESS,
      '0x9E50D9202bEc0D046a75048Be8d51bBa93386Ade'
    ),
    SWAP_GAS_LIMIT: parseIntEnv('SWAP_GAS_LIMIT', process.env.SWAP_GAS_LIMIT, 250000),
    DEFAULT_SLIPPAGE_BPS: parseIntEnv(
      'DEFAULT_SLIPPAGE_BPS',
      process.env.DEFAULT_SLIPPAGE_BPS,
      1500
    ),

    // Monitoring Configuration
    LOG_LEVEL: parseEnumEnv(
      'LOG_LEVEL',
      process.env.LOG_LEVEL,
      ['debug', 'info', 'warn', 'error'] as const,
      'info'
    )
  };

  // Validate configuration constraints
  validateConfig(config);

  return config;
}

/**
 * Validates configuration constraints and business rules
 * @param config - Configuration object to validate
 * @throws Error if validation fails
 */
function validateConfig(config: EnvironmentConfig): void {
  // Validate port range
  if (config.PORT < 1 || config.PORT > 65535) {
    throw new Error(`PORT must be between 1 and 65535, got: ${config.PORT}`);
  }

  // Validate Redis port
  if (config.REDIS_PORT < 1 || config.REDIS_PORT > 65535) {
    throw new Error(`REDIS_PORT must be between 1 and 65535, got: ${config.REDIS_PORT}`);
  }

  // Validate PostgreSQL port
  if (config.POSTGRES_PORT < 1 || config.POSTGRES_PORT > 65535) {
    throw new Error(`POSTGRES_PORT must be between 1 and 65535, got: ${config.POSTGRES_PORT}`);
  }

  if (config.SESSION_TTL < 1) {
    throw new Error(`SESSION_TTL must be at least 1, got: ${config.SESSION_TTL}`);
  }

  if (config.CHAIN_ID < 1) {
    throw new Error(`CHAIN_ID must be positive, got: ${config.CHAIN_ID}`);
  }

  // Every external call needs a bounded timeout
  if (config.RPC_TIMEOUT_MS < 1) {
    throw new Error(`RPC_TIMEOUT_MS must be at least 1, got: ${config.RPC_TIMEOUT_MS}`);
  }

  if (config.DISCOVERY_TIMEOUT_MS < 1) {
    throw new Error(`DISCOVERY_TIMEOUT_MS must be at least 1, got: ${config.DISCOVERY_TIMEOUT_MS}`);
  }

  if (config.SWAP_GAS_LIMIT < 21000) {
    throw new Error(`SWAP_GAS_LIMIT must be at least 21000, got: ${config.SWAP_GAS_LIMIT}`);
  }

  // Validate slippage tolerance in basis points
  if (config.DEFAULT_SLIPPAGE_BPS < 0 || config.DEFAULT_SLIPPAGE_BPS >= 10000) {
    throw new Error(
      `DEFAULT_SLIPPAGE_BPS must be between 0 and 9999, got: ${config.DEFAULT_SLIPPAGE_BPS}`
    );
  }

  if (config.WALLET_ENCRYPTION_KEY !== undefined && !/^[0-9a-fA-F]{64}$/.test(config.WALLET_ENCRYPTION_KEY)) {
    throw new Error('WALLET_ENCRYPTION_KEY must be 64 hexadecimal characters');
  }

  // Validate postgres backend requirements
  if (config.LEDGER_BACKEND === 'postgres' && !config.WALLET_ENCRYPTION_KEY) {
    throw new Error('WALLET_ENCRYPTION_KEY is required when LEDGER_BACKEND is "postgres"');
  }
}

/**
 * Singleton instance of configuration
 * Loaded once and reused throughout the application
 */
let configInstance: EnvironmentConfig | null = null;

/**
 * Gets the configuration instance (singleton pattern)
 * @returns EnvironmentConfig instance
 */
export function getConfig(): EnvironmentConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

/**
 * Resets the configuration instance (useful for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}
