import { describe, it, expect } from 'vitest';
import {
  parseId,
  parseNativeAmount,
  parsePrivateKey,
  parseTokenAddress,
  parseWalletName
} from './validation';
import { ValidationError } from '../errors';

describe('validation', () => {
  describe('parseNativeAmount', () => {
    it('should convert decimal text to wei', () => {
      expect(parseNativeAmount('0.5')).toEqual({ wei: 5n * 10n ** 17n, display: '0.5' });
      expect(parseNativeAmount(' 10 ')).toEqual({ wei: 10n * 10n ** 18n, display: '10' });
      expect(parseNativeAmount('.25')).toEqual({ wei: 25n * 10n ** 16n, display: '0.25' });
      expect(parseNativeAmount('1.50')).toEqual({ wei: 15n * 10n ** 17n, display: '1.5' });
    });

    it('should accept finite numbers', () => {
      expect(parseNativeAmount(2).wei).toBe(2n * 10n ** 18n);
    });

    it('should reject zero, negatives and junk', () => {
      expect(() => parseNativeAmount('0')).toThrow('amount must be greater than 0');
      expect(() => parseNativeAmount('-1')).toThrow(ValidationError);
      expect(() => parseNativeAmount('1e18')).toThrow(ValidationError);
      expect(() => parseNativeAmount('')).toThrow(ValidationError);
      expect(() => parseNativeAmount(undefined)).toThrow(ValidationError);
    });

    it('should reject more than 18 decimal places', () => {
      expect(() => parseNativeAmount(`0.${'1'.repeat(19)}`)).toThrow('amount supports at most 18 decimal places');
    });
  });

  describe('parseTokenAddress', () => {
    it('should checksum valid addresses', () => {
      expect(parseTokenAddress('0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed'))
        .toBe('0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed');
    });

    it('should name the field in the error', () => {
      expect(() => parseTokenAddress('0x123', 'toToken')).toThrow('toToken must be a valid address');
      expect(() => parseTokenAddress(42)).toThrow('tokenAddress must be a valid address');
    });
  });

  describe('parsePrivateKey', () => {
    it('should accept 0x-prefixed 64 hex characters', () => {
      const key = `0x${'Ab'.repeat(32)}`;
      expect(parsePrivateKey(` ${key} `)).toBe(key);
    });

    it('should reject other shapes', () => {
      expect(() => parsePrivateKey('ab'.repeat(32))).toThrow(ValidationError);
      expect(() => parsePrivateKey(`0x${'ab'.repeat(31)}`)).toThrow(ValidationError);
      expect(() => parsePrivateKey(null)).toThrow(ValidationError);
    });
  });

  describe('parseWalletName', () => {
    it('should allow 1 to 50 characters after trimming', () => {
      expect(parseWalletName(' a ')).toBe('a');
      expect(parseWalletName('x'.repeat(50))).toBe('x'.repeat(50));
      expect(() => parseWalletName('x'.repeat(51))).toThrow('Wallet name must be between 1 and 50 characters');
      expect(() => parseWalletName('')).toThrow(ValidationError);
    });
  });

  describe('parseId', () => {
    it('should accept positive integers as numbers or digit strings', () => {
      expect(parseId('1001', 'userId')).toBe(1001);
      expect(parseId(7, 'walletId')).toBe(7);
    });

    it('should reject everything else', () => {
      expect(() => parseId('0', 'userId')).toThrow('userId must be a positive integer');
      expect(() => parseId('1.5', 'userId')).toThrow(ValidationError);
      expect(() => parseId('abc', 'userId')).toThrow(ValidationError);
      expect(() => parseId(-3, 'userId')).toThrow(ValidationError);
    });
  });
});
