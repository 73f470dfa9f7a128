import { describe, it, expect, vi } from 'vitest';
import { MemoryKeyValue, SessionStore, type KeyValueBackend } from './SessionStore';
import type { ConversationState } from '../types';

const TOKEN = '0x3333333333333333333333333333333333333333';
const POOL = '0x4444444444444444444444444444444444444444';

describe('SessionStore', () => {
  it('should return idle when nothing is stored', async () => {
    const store = new SessionStore(new MemoryKeyValue(), 900);

    expect(await store.load(1)).toEqual({ step: 'idle' });
  });

  it('should persist state under session:<userId> with the TTL', async () => {
    const backend: KeyValueBackend = {
      get: vi.fn(async () => null),
      setex: vi.fn(async () => 'OK'),
      del: vi.fn(async () => 1)
    };
    const store = new SessionStore(backend, 900);
    const state: ConversationState = { step: 'awaiting-swap-amount', token: TOKEN, pool: POOL, symbol: 'USDC' };

    await store.save(42, state);

    expect(backend.setex).toHaveBeenCalledWith('session:42', 900, JSON.stringify(state));
  });

  it('should round trip a stored state', async () => {
    const store = new SessionStore(new MemoryKeyValue(), 900);
    const state: ConversationState = {
      step: 'awaiting-confirmation',
      token: TOKEN,
      pool: POOL,
      symbol: 'USDC',
      amount: '0.5'
    };

    await store.save(7, state);

    expect(await store.load(7)).toEqual(state);
  });

  it('should delete the key when saving idle', async () => {
    const backend: KeyValueBackend = {
      get: vi.fn(async () => null),
      setex: vi.fn(async () => 'OK'),
      del: vi.fn(async () => 1)
    };
    const store = new SessionStore(backend, 900);

    await store.save(42, { step: 'idle' });

    expect(backend.del).toHaveBeenCalledWith('session:42');
    expect(backend.setex).not.toHaveBeenCalled();
  });

  it('should expire sessions after the TTL', async () => {
    let now = 1_000_000;
    const store = new SessionStore(new MemoryKeyValue(() => now), 900);
    await store.save(7, { step: 'awaiting-token-address' });

    now += 899_000;
    expect(await store.load(7)).toEqual({ step: 'awaiting-token-address' });

    now += 1_000;
    expect(await store.load(7)).toEqual({ step: 'idle' });
  });

  it('should discard unreadable or malformed sessions', async () => {
    const backend = new MemoryKeyValue();
    const store = new SessionStore(backend, 900);

    await backend.setex('session:1', 900, 'not json');
    await backend.setex('session:2', 900, JSON.stringify({ step: 'awaiting-swap-amount', token: 'nope', pool: POOL, symbol: 'X' }));
    await backend.setex('session:3', 900, JSON.stringify({ step: 'launch-rocket' }));

    expect(await store.load(1)).toEqual({ step: 'idle' });
    expect(await store.load(2)).toEqual({ step: 'idle' });
    expect(await store.load(3)).toEqual({ step: 'idle' });
  });
});
