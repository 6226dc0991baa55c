// src/core/credentials/TokenEncryption.ts

import * as crypto from 'crypto';
import { ConfigError } from '../../utils/errors';

const KEY_PATTERN = /^[0-9a-f]{64}$/i;

/**
 * AES-256-GCM for credential sets at rest. Output format is
 * `iv:authTag:ciphertext` (hex). Previous keys are tried on decrypt so a key
 * can be rotated without losing the stored set.
 */
export class TokenEncryption {
  private currentKey: Buffer;
  private previousKeys: Buffer[];

  constructor(currentKey: string, previousKeys: string[] = []) {
    this.currentKey = TokenEncryption.parseKey(currentKey, 'Encryption key');
    this.previousKeys = previousKeys.map((key) => TokenEncryption.parseKey(key, 'Previous encryption key'));
  }

  encrypt(plaintext: string): string {
    const iv = crypto.randomBytes(16);
    const cipher = crypto.createCipheriv('aes-256-gcm', this.currentKey, iv);

    let encrypted = cipher.update(plaintext, 'utf8', 'hex');
    encrypted += cipher.final('hex');

    return `${iv.toString('hex')}:${cipher.getAuthTag().toString('hex')}:${encrypted}`;
  }

  decrypt(payload: string): string {
    for (const key of [this.currentKey, ...this.previousKeys]) {
      const plaintext = this.tryDecrypt(payload, key);
      if (plaintext !== undefined) return plaintext;
    }
    throw new Error('Failed to decrypt credentials with any available key');
  }

  private tryDecrypt(payload: string, key: Buffer): string | undefined {
    const [iv, authTag, ciphertext] = payload.split(':');
    if (!iv || !authTag || ciphertext === undefined) return undefined;

    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(iv, 'hex'));
      decipher.setAuthTag(Buffer.from(authTag, 'hex'));
      return decipher.update(ciphertext, 'hex', 'utf8') + decipher.final('utf8');
    } catch {
      // wrong key: auth tag mismatch
      return undefined;
    }
  }

  private static parseKey(key: string, label: string): Buffer {
    if (!KEY_PATTERN.test(key)) {
      throw new ConfigError(`${label} must be a 32-byte hex string (64 hexadecimal characters)`);
    }
    return Buffer.from(key, 'hex');
  }
}
