import { createCipheriv, createDecipheriv, randomBytes } from 'crypto';
import { StorageError } from '../errors';

const ALGORITHM = 'aes-256-gcm';
const IV_LENGTH = 12;
const VERSION = 'v1';

/**
 * Encryption-at-rest boundary for custody secrets.
 *
 * Sealed values have the form `v1:<iv>:<auth tag>:<ciphertext>`, each part
 * base64 encoded. A value that fails authentication is rejected rather than
 * returned, and the offending value is never echoed in the error.
 */
export class SecretBox {
  private readonly key: Buffer;

  constructor(hexKey: string) {
    if (!/^[0-9a-fA-F]{64}$/.test(hexKey)) {
      throw new Error('SecretBox key must be 64 hexadecimal characters');
    }
    this.key = Buffer.from(hexKey, 'hex');
  }

  /**
   * Creates a box with a throwaway key, for stores that do not outlive the process
   */
  static ephemeral(): SecretBox {
    return new SecretBox(randomBytes(32).toString('hex'));
  }

  seal(plaintext: string): string {
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    const tag = cipher.getAuthTag();

    return [VERSION, iv.toString('base64'), tag.toString('base64'), ciphertext.toString('base64')].join(':');
  }

  open(sealed: string): string {
    const parts = sealed.split(':');
    if (parts.length !== 4 || parts[0] !== VERSION) {
      throw new StorageError('Stored secret has an unrecognized format');
    }

    const [, ivPart, tagPart, dataPart] = parts;

    try {
      const decipher = createDecipheriv(ALGORITHM, this.key, Buffer.from(ivPart, 'base64'));
      decipher.setAuthTag(Buffer.from(tagPart, 'base64'));
      const plaintext = Buffer.concat([
        decipher.update(Buffer.from(dataPart, 'base64')),
        decipher.final()
      ]);
      return plaintext.toString('utf8');
    } catch {
      throw new StorageError('Stored secret failed authentication');
    }
  }

  /**
   * True when the value looks like something seal() produced
   */
  static isSealed(value: string): boolean {
    return value.startsWith(`${VERSION}:`) && value.split(':').length === 4;
  }
}
