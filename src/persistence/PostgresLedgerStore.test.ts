import { describe, it, expect, vi } from 'vitest';
import type { Pool } from 'pg';
import type { Hex } from 'viem';
import { PostgresLedgerStore } from './PostgresLedgerStore';
import { SecretBox } from './SecretBox';
import { ForbiddenError, NotFoundError, StorageError, ValidationError } from '../errors';

const ALICE = 1001;
const ADDRESS = '0x1111111111111111111111111111111111111111';
const TOKEN = '0x3333333333333333333333333333333333333333';
const SECRET: Hex = `0x${'a1'.repeat(32)}`;
const TX_HASH: Hex = `0x${'ee'.repeat(32)}`;
const CREATED_AT = new Date('2026-01-01T00:00:00Z');

type Rows = { rows: unknown[] };
type Responder = (text: string, values: unknown[]) => Rows | Error;

/**
 * Pool stand-in that answers each statement through a scripted responder
 */
function createFakePool(responder: Responder) {
  const statements: { text: string; values: unknown[] }[] = [];
  const query = vi.fn(async (text: string, values: unknown[] = []) => {
    statements.push({ text, values });
    const result = responder(text, values);
    if (result instanceof Error) {
      throw result;
    }
    return { rows: result.rows, rowCount: result.rows.length };
  });
  const client = { query, release: vi.fn() };
  const pool = { query, connect: vi.fn(async () => client) };

  return {
    pool: pool as unknown as Pool,
    client,
    statements,
    texts: () => statements.map(statement => statement.text.trim())
  };
}

function walletRow(overrides: Record<string, unknown> = {}) {
  return {
    id: 5,
    user_id: String(ALICE),
    wallet_name: 'Main Wallet',
    wallet_address: ADDRESS,
    is_active: true,
    created_at: CREATED_AT,
    ...overrides
  };
}

describe('PostgresLedgerStore', () => {
  const box = new SecretBox('44'.repeat(32));

  describe('createUser', () => {
    it('should insert with ON CONFLICT DO NOTHING', async () => {
      const fake = createFakePool(() => ({ rows: [] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await store.createUser(ALICE, 'alice');

      expect(fake.statements[0].text).toContain('ON CONFLICT (user_id) DO NOTHING');
      expect(fake.statements[0].values).toEqual([ALICE, 'alice']);
    });
  });

  describe('getUser', () => {
    it('should map BIGINT ids returned as strings', async () => {
      const fake = createFakePool(() => ({
        rows: [{ user_id: '1001', username: 'alice', active_wallet_id: 5, created_at: CREATED_AT }]
      }));
      const store = new PostgresLedgerStore(fake.pool, box);

      expect(await store.getUser(ALICE)).toEqual({
        id: 1001,
        displayName: 'alice',
        activeWalletId: 5,
        createdAt: CREATED_AT
      });
    });
  });

  describe('createWallet', () => {
    it('should activate the first wallet inside one transaction', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.includes('COUNT(*)')) return { rows: [{ count: 0 }] };
        if (text.includes('INSERT INTO wallets')) return { rows: [walletRow()] };
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      const wallet = await store.createWallet(ALICE, 'Main Wallet', ADDRESS, SECRET);

      expect(wallet).toEqual({
        id: 5,
        userId: ALICE,
        name: 'Main Wallet',
        address: ADDRESS,
        isActive: true,
        createdAt: CREATED_AT
      });
      const texts = fake.texts();
      expect(texts[0]).toBe('BEGIN');
      expect(texts).toContain('UPDATE users SET active_wallet_id = $2 WHERE user_id = $1');
      expect(texts[texts.length - 1]).toBe('COMMIT');
      expect(fake.client.release).toHaveBeenCalledTimes(1);
    });

    it('should store the secret sealed', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.includes('COUNT(*)')) return { rows: [{ count: 0 }] };
        if (text.includes('INSERT INTO wallets')) return { rows: [walletRow()] };
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      await store.createWallet(ALICE, 'Main Wallet', ADDRESS, SECRET);

      const insert = fake.statements.find(statement => statement.text.includes('INSERT INTO wallets'));
      const stored = String(insert?.values[3]);
      expect(stored).not.toBe(SECRET);
      expect(box.open(stored)).toBe(SECRET);
      expect(insert?.values[4]).toBe(true);
    });

    it('should leave the pointer alone for later wallets', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.includes('COUNT(*)')) return { rows: [{ count: 1 }] };
        if (text.includes('INSERT INTO wallets')) return { rows: [walletRow({ id: 6, is_active: false })] };
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      const wallet = await store.createWallet(ALICE, 'Second', ADDRESS, SECRET);

      expect(wallet.isActive).toBe(false);
      expect(fake.texts().some(text => text.startsWith('UPDATE users'))).toBe(false);
    });

    it('should roll back for an unknown user', async () => {
      const fake = createFakePool(() => ({ rows: [] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(store.createWallet(ALICE, 'Main', ADDRESS, SECRET)).rejects.toThrow(NotFoundError);
      expect(fake.texts()).toContain('ROLLBACK');
      expect(fake.texts()).not.toContain('COMMIT');
    });

    it('should map a unique violation to a validation error', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.includes('COUNT(*)')) return { rows: [{ count: 1 }] };
        if (text.includes('INSERT INTO wallets')) {
          return Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
        }
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(store.createWallet(ALICE, 'Again', ADDRESS, SECRET)).rejects.toThrow(ValidationError);
      expect(fake.texts()).toContain('ROLLBACK');
    });
  });

  describe('getWallet', () => {
    it('should reject a wallet owned by another user', async () => {
      const fake = createFakePool(() => ({ rows: [walletRow({ user_id: '2002' })] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(store.getWallet(ALICE, 5)).rejects.toThrow(ForbiddenError);
    });
  });

  describe('getActiveWallet', () => {
    it('should open the sealed secret', async () => {
      const fake = createFakePool(() => ({ rows: [{ ...walletRow(), private_key: box.seal(SECRET) }] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      const wallet = await store.getActiveWallet(ALICE);

      expect(wallet.secret).toBe(SECRET);
      expect(wallet.id).toBe(5);
    });

    it('should fail when there is no active wallet', async () => {
      const fake = createFakePool(() => ({ rows: [] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(store.getActiveWallet(ALICE)).rejects.toThrow(NotFoundError);
    });
  });

  describe('setActiveWallet', () => {
    it('should deactivate, activate and move the pointer in order', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.startsWith('SELECT')) return { rows: [walletRow({ id: 6, is_active: false })] };
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      const wallet = await store.setActiveWallet(ALICE, 6);

      expect(wallet.isActive).toBe(true);
      const updates = fake.texts().filter(text => text.startsWith('UPDATE'));
      expect(updates).toEqual([
        'UPDATE wallets SET is_active = FALSE WHERE user_id = $1 AND is_active AND id <> $2',
        'UPDATE wallets SET is_active = TRUE WHERE id = $1',
        'UPDATE users SET active_wallet_id = $2 WHERE user_id = $1'
      ]);
      expect(fake.texts()[fake.texts().length - 1]).toBe('COMMIT');
    });

    it('should roll back when the wallet belongs to someone else', async () => {
      const fake = createFakePool((text) => {
        if (text.includes('FOR UPDATE')) return { rows: [{ user_id: String(ALICE) }] };
        if (text.startsWith('SELECT')) return { rows: [walletRow({ id: 9, user_id: '2002' })] };
        return { rows: [] };
      });
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(store.setActiveWallet(ALICE, 9)).rejects.toThrow(ForbiddenError);
      expect(fake.texts().some(text => text.startsWith('UPDATE'))).toBe(false);
      expect(fake.texts()).toContain('ROLLBACK');
    });
  });

  describe('transactions', () => {
    it('should map the inserted row', async () => {
      const fake = createFakePool(() => ({
        rows: [{
          id: 1,
          user_id: String(ALICE),
          wallet_id: 5,
          tx_hash: TX_HASH,
          tx_type: 'swap',
          amount: '0.5',
          token_address: TOKEN,
          status: 'pending',
          created_at: CREATED_AT
        }]
      }));
      const store = new PostgresLedgerStore(fake.pool, box);

      const record = await store.appendTransaction({
        walletId: 5,
        txHash: TX_HASH,
        type: 'swap',
        amount: '0.5',
        tokenAddress: TOKEN,
        status: 'pending'
      });

      expect(record).toEqual({
        id: 1,
        walletId: 5,
        userId: ALICE,
        txHash: TX_HASH,
        type: 'swap',
        amount: '0.5',
        tokenAddress: TOKEN,
        status: 'pending',
        createdAt: CREATED_AT
      });
    });

    it('should fail when the wallet does not exist', async () => {
      const fake = createFakePool(() => ({ rows: [] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await expect(
        store.appendTransaction({
          walletId: 99,
          txHash: TX_HASH,
          type: 'swap',
          amount: '0.5',
          tokenAddress: TOKEN,
          status: 'pending'
        })
      ).rejects.toThrow(StorageError);
    });

    it('should pass the history limit', async () => {
      const fake = createFakePool(() => ({ rows: [] }));
      const store = new PostgresLedgerStore(fake.pool, box);

      await store.listTransactions(ALICE, 5);

      expect(fake.statements[0].values).toEqual([ALICE, 5]);
    });
  });

  it('should wrap driver failures in a storage error', async () => {
    const fake = createFakePool(() => new Error('connection terminated'));
    const store = new PostgresLedgerStore(fake.pool, box);

    await expect(store.listWallets(ALICE)).rejects.toThrow('Ledger listWallets failed');
  });
});
