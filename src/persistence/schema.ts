/**
 * Ledger schema.
 *
 * wallets.private_key holds the sealed form produced by SecretBox, never the
 * plaintext key. The partial unique index backs the one-active-wallet rule at
 * the database level.
 */

export const USERS_TABLE_SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
  user_id BIGINT PRIMARY KEY,
  username TEXT NOT NULL DEFAULT '',
  active_wallet_id INTEGER,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

export const WALLETS_TABLE_SCHEMA = `
CREATE TABLE IF NOT EXISTS wallets (
  id SERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL REFERENCES users(user_id),
  wallet_name VARCHAR(50) NOT NULL,
  wallet_address TEXT NOT NULL,
  private_key TEXT NOT NULL,
  is_active BOOLEAN NOT NULL DEFAULT FALSE,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  UNIQUE (user_id, wallet_address)
);
`;

export const TRANSACTIONS_TABLE_SCHEMA = `
CREATE TABLE IF NOT EXISTS transactions (
  id SERIAL PRIMARY KEY,
  user_id BIGINT NOT NULL REFERENCES users(user_id),
  wallet_id INTEGER NOT NULL REFERENCES wallets(id),
  tx_hash TEXT NOT NULL,
  tx_type VARCHAR(20) NOT NULL,
  amount TEXT NOT NULL,
  token_address TEXT NOT NULL,
  status VARCHAR(20) NOT NULL,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

export const LEDGER_INDEXES = [
  'CREATE UNIQUE INDEX IF NOT EXISTS idx_wallets_one_active ON wallets(user_id) WHERE is_active;',
  'CREATE INDEX IF NOT EXISTS idx_wallets_user ON wallets(user_id, created_at);',
  'CREATE INDEX IF NOT EXISTS idx_transactions_user ON transactions(user_id, created_at DESC);'
];

/**
 * Columns of the single-wallet layout that preceded multi-wallet support
 */
export const LEGACY_USER_COLUMNS = ['wallet_address', 'private_key'] as const;
