import crypto from 'crypto';
import { EncryptionError } from '../errors/index.js';
import { isRecord } from '../utils/records.js';

/**
 * 3DES-24 payload codec
 *
 * Card and account payloads are encrypted locally with Triple DES (ECB,
 * PKCS#7 padding) before transmission. Only the ciphertext leaves the server;
 * the secret key never does.
 */

export const ENCRYPTION_ALGORITHM = '3DES-24';

const SECRET_PREFIX = 'XPSECK-';
const KEY_LENGTH = 24;
const CIPHER = 'des-ede3';

/**
 * Derive the 24-byte 3DES key from the merchant secret.
 *
 * First 12 characters of the secret with the "XPSECK-" prefix removed, followed by
 * the last 12 hex characters of the MD5 of the whole secret.
 */
export function deriveKey(secretKey: string): Buffer {
  if (!secretKey) {
    throw new EncryptionError('Secret key must not be empty.');
  }

  const stripped = secretKey.split(SECRET_PREFIX).join('');
  if (stripped.length < 12) {
    throw new EncryptionError(
      'Secret key is too short to derive an encryption key. ' +
        'Ensure you are using the full key from your Xpresspay dashboard.'
    );
  }

  const head = stripped.substring(0, 12);
  const tail = crypto.createHash('md5').update(secretKey, 'utf8').digest('hex').slice(-12);

  const key = Buffer.from(head + tail, 'utf8');
  if (key.length !== KEY_LENGTH) {
    throw new EncryptionError(`Derived key must be ${KEY_LENGTH} bytes, got ${key.length}.`);
  }
  return key;
}

function isPlainObject(value: object): boolean {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function assertSerializable(value: unknown, path: string, seen: Set<object>): void {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new EncryptionError(`Failed to serialize payload to JSON: ${path} is not a finite number`);
      }
      return;
    case 'object':
      break;
    default:
      throw new EncryptionError(`Failed to serialize payload to JSON: ${path} is of type ${typeof value}`);
  }

  if (value === null) {
    return;
  }
  if (seen.has(value)) {
    throw new EncryptionError(`Failed to serialize payload to JSON: ${path} is circular`);
  }

  seen.add(value);
  if (Array.isArray(value)) {
    value.forEach((item, index) => assertSerializable(item, `${path}[${index}]`, seen));
  } else if (isPlainObject(value)) {
    for (const [key, item] of Object.entries(value)) {
      assertSerializable(item, `${path}.${key}`, seen);
    }
  } else {
    throw new EncryptionError(
      `Failed to serialize payload to JSON: ${path} is a ${value.constructor?.name ?? 'non-plain'} instance`
    );
  }
  seen.delete(value);
}

/**
 * Compact JSON with DEL and every non-ASCII code unit written as a \uXXXX escape,
 * byte-identical to the gateway's reference encoder.
 */
export function serializePayload(data: Record<string, unknown>): string {
  assertSerializable(data, 'payload', new Set());

  return JSON.stringify(data).replace(
    /[\u007f-\uffff]/g,
    (char) => '\\u' + char.charCodeAt(0).toString(16).padStart(4, '0')
  );
}

export function encrypt(key: Buffer, data: Record<string, unknown>): string {
  const plaintext = serializePayload(data);

  try {
    const cipher = crypto.createCipheriv(CIPHER, key, null);
    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return encrypted.toString('base64');
  } catch (error) {
    throw new EncryptionError(
      `Encryption failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function decrypt(key: Buffer, ciphertext: string): Record<string, unknown> {
  let plaintext: string;
  try {
    const decipher = crypto.createDecipheriv(CIPHER, key, null);
    plaintext = Buffer.concat([
      decipher.update(Buffer.from(ciphertext, 'base64')),
      decipher.final(),
    ]).toString('utf8');
  } catch (error) {
    throw new EncryptionError(
      `Decryption failed: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch {
    throw new EncryptionError('Decrypted payload is not valid JSON.');
  }

  if (!isRecord(parsed)) {
    throw new EncryptionError('Decrypted payload is not a JSON object.');
  }
  return parsed;
}

export function encryptPayload(data: Record<string, unknown>, secretKey: string): string {
  return encrypt(deriveKey(secretKey), data);
}
