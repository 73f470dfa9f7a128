import { formatEther, getAddress, isAddress, parseEther, type Address, type Hex } from 'viem';
import { ValidationError } from '../errors';
import { MAX_WALLET_NAME_LENGTH } from '../persistence/LedgerStore';

/**
 * Parsers for untrusted input arriving from the messaging front end.
 * Each returns a typed value or throws ValidationError.
 */

const AMOUNT_PATTERN = /^(\d+(\.\d*)?|\.\d+)$/;
const NATIVE_DECIMALS = 18;

export interface NativeAmount {
  wei: bigint;
  display: string;
}

export function isPrivateKeyHex(value: string): value is Hex {
  return /^0x[0-9a-fA-F]{64}$/.test(value);
}

export function parseTokenAddress(input: unknown, field: string = 'tokenAddress'): Address {
  if (typeof input !== 'string' || !isAddress(input.trim(), { strict: false })) {
    throw new ValidationError(`${field} must be a valid address`, { field });
  }
  return getAddress(input.trim());
}

/**
 * Parses a decimal amount of the native asset into its smallest unit
 */
export function parseNativeAmount(input: unknown, field: string = 'amount'): NativeAmount {
  const text = typeof input === 'number' && Number.isFinite(input) ? String(input) : input;

  if (typeof text !== 'string' || !AMOUNT_PATTERN.test(text.trim())) {
    throw new ValidationError(`${field} must be a positive decimal number`, { field });
  }

  const trimmed = text.trim();
  const fraction = trimmed.split('.')[1] ?? '';
  if (fraction.length > NATIVE_DECIMALS) {
    throw new ValidationError(`${field} supports at most ${NATIVE_DECIMALS} decimal places`, { field });
  }

  const normalized = `${trimmed.startsWith('.') ? '0' : ''}${trimmed.endsWith('.') ? trimmed.slice(0, -1) : trimmed}`;
  const wei = parseEther(normalized);
  if (wei <= 0n) {
    throw new ValidationError(`${field} must be greater than 0`, { field });
  }

  return { wei, display: formatEther(wei) };
}

/**
 * Checks the private key format only. The key is never included in the error.
 */
export function parsePrivateKey(input: unknown): Hex {
  const value = typeof input === 'string' ? input.trim() : '';
  if (!isPrivateKeyHex(value)) {
    throw new ValidationError('Private key must be 64 hexadecimal characters prefixed with 0x');
  }
  return value;
}

export function parseWalletName(input: unknown): string {
  const name = typeof input === 'string' ? input.trim() : '';
  if (name.length < 1 || name.length > MAX_WALLET_NAME_LENGTH) {
    throw new ValidationError(
      `Wallet name must be between 1 and ${MAX_WALLET_NAME_LENGTH} characters`,
      { length: name.length }
    );
  }
  return name;
}

/**
 * Ids from the messaging platform are positive integers, received as numbers or strings
 */
export function parseId(input: unknown, field: string): number {
  const value = typeof input === 'string' && /^\d+$/.test(input) ? Number(input) : input;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer`, { field });
  }
  return value;
}
