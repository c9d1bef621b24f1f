/**
 * Encryption of password values at rest (AES-256-GCM).
 *
 * Encrypted values are stored as `enc:v1:<iv>:<tag>:<ciphertext>`, each
 * part base64.
 */

import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { DescriptorError } from '@siemlink/core';

const PREFIX = 'enc:v1:';
const KEY_SALT = 'siemlink-configuration-store';

export class SecretCipher {
  private readonly key: Buffer;

  constructor(secret: string) {
    if (!secret) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: 'An encryption secret is required for the configuration store',
      });
    }
    this.key = scryptSync(secret, KEY_SALT, 32);
  }

  static isEncrypted(value: string): boolean {
    return value.startsWith(PREFIX);
  }

  encrypt(plaintext: string): string {
    const iv = randomBytes(12);
    const cipher = createCipheriv('aes-256-gcm', this.key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf-8'), cipher.final()]);
    const tag = cipher.getAuthTag();
    return `${PREFIX}${iv.toString('base64')}:${tag.toString('base64')}:${ciphertext.toString('base64')}`;
  }

  /**
   * @throws DescriptorError if the value is malformed or the key is wrong
   */
  decrypt(value: string): string {
    if (!SecretCipher.isEncrypted(value)) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: 'Stored secret is not in the encrypted format',
      });
    }
    const [iv, tag, ciphertext] = value.slice(PREFIX.length).split(':');
    if (!iv || !tag || ciphertext === undefined) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: 'Stored secret is malformed',
      });
    }

    try {
      const decipher = createDecipheriv('aes-256-gcm', this.key, Buffer.from(iv, 'base64'));
      decipher.setAuthTag(Buffer.from(tag, 'base64'));
      return Buffer.concat([
        decipher.update(Buffer.from(ciphertext, 'base64')),
        decipher.final(),
      ]).toString('utf-8');
    } catch (err) {
      throw new DescriptorError({
        code: 'STORE_ERROR',
        message: 'Failed to decrypt stored secret',
        suggestion: 'Check that the store secret has not changed since the record was written.',
        cause: err instanceof Error ? err : undefined,
      });
    }
  }
}
