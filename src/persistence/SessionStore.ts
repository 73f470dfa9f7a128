import { isAddress } from 'viem';
import type { ConversationState } from '../types';
import { logger } from '../utils/logger';

/**
 * The subset of the Redis command surface sessions need
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

const IDLE: ConversationState = { step: 'idle' };

/**
 * Per-user conversation state with a sliding TTL
 */
export class SessionStore {
  private readonly keyPrefix = 'session:';

  constructor(
    private readonly backend: KeyValueBackend,
    private readonly ttlSeconds: number
  ) {}

  private getKey(userId: number): string {
    return `${this.keyPrefix}${userId}`;
  }

  async load(userId: number): Promise<ConversationState> {
    const data = await this.backend.get(this.getKey(userId));
    if (!data) {
      return IDLE;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logger.warn({ userId, error: error instanceof Error ? error.message : String(error) }, 'Discarding unreadable session');
      return IDLE;
    }

    const state = parseConversationState(parsed);
    if (!state) {
      logger.warn({ userId }, 'Discarding session with unknown shape');
      return IDLE;
    }
    return state;
  }

  async save(userId: number, state: ConversationState): Promise<void> {
    if (state.step === 'idle') {
      await this.clear(userId);
      return;
    }
    await this.backend.setex(this.getKey(userId), this.ttlSeconds, JSON.stringify(state));
  }

  async clear(userId: number): Promise<void> {
    await this.backend.del(this.getKey(userId));
  }
}

/**
 * In-process backend for development and tests
 */
export class MemoryKeyValue implements KeyValueBackend {
  private readonly entries = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<string | null> {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async setex(key: string, seconds: number, value: string): Promise<'OK'> {
    this.entries.set(key, { value, expiresAt: this.now() + seconds * 1000 });
    return 'OK';
  }

  async del(key: string): Promise<number> {
    return this.entries.delete(key) ? 1 : 0;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isAddressString(value: unknown): value is `0x${string}` {
  return typeof value === 'string' && isAddress(value, { strict: false });
}

export function parseConversationState(value: unknown): ConversationState | null {
  if (!isRecord(value)) {
    return null;
  }

  switch (value.step) {
    case 'idle':
      return { step: 'idle' };
    case 'awaiting-wallet-name':
      return value.mode === 'create' || value.mode === 'import'
        ? { step: 'awaiting-wallet-name', mode: value.mode }
        : null;
    case 'awaiting-private-key':
      return typeof value.walletName === 'string'
        ? { step: 'awaiting-private-key', walletName: value.walletName }
        : null;
    case 'awaiting-token-address':
      return { step: 'awaiting-token-address' };
    case 'awaiting-swap-amount': {
      const { token, pool, symbol } = value;
      return isAddressString(token) && isAddressString(pool) && typeof symbol === 'string'
        ? { step: 'awaiting-swap-amount', token, pool, symbol }
        : null;
    }
    case 'awaiting-confirmation': {
      const { token, pool, symbol, amount } = value;
      return isAddressString(token) && isAddressString(pool) && typeof symbol === 'string' && typeof amount === 'string'
        ? { step: 'awaiting-confirmation', token, pool, symbol, amount }
        : null;
    }
    default:
      return null;
  }
}
