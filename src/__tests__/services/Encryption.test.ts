import { describe, it, expect } from '@jest/globals';
import crypto from 'crypto';
import { EncryptionError } from '../../errors';
import {
  ENCRYPTION_ALGORITHM,
  decrypt,
  deriveKey,
  encrypt,
  encryptPayload,
  serializePayload,
} from '../../services/encryption';

const SECRET = 'XPSECK-test-secret-0001';

describe('encryption', () => {
  describe('deriveKey', () => {
    it('should derive a 24-byte key', () => {
      expect(deriveKey(SECRET)).toHaveLength(24);
    });

    it('should be deterministic', () => {
      expect(deriveKey(SECRET).equals(deriveKey(SECRET))).toBe(true);
    });

    it('should start with the first 12 characters of the unprefixed secret', () => {
      expect(deriveKey(SECRET).subarray(0, 12).toString('utf8')).toBe('test-secret-');
    });

    it('should end with the last 12 hex characters of the md5 of the full secret', () => {
      const md5 = crypto.createHash('md5').update(SECRET).digest('hex');

      expect(deriveKey(SECRET).subarray(12).toString('utf8')).toBe(md5.slice(-12));
    });

    it('should derive different keys for different secrets', () => {
      expect(deriveKey(SECRET).equals(deriveKey('XPSECK-test-secret-0002'))).toBe(false);
    });

    it('should reject an empty secret', () => {
      expect(() => deriveKey('')).toThrow(EncryptionError);
    });

    it('should reject a secret shorter than 12 characters after the prefix', () => {
      expect(() => deriveKey('XPSECK-short')).toThrow('too short');
    });

    it('should reject a secret whose head is not 12 bytes', () => {
      // 12 two-byte characters make a 36-byte key
      expect(() => deriveKey('XPSECK-éééééééééééé')).toThrow('Derived key must be 24 bytes, got 36.');
    });
  });

  describe('serializePayload', () => {
    it('should produce compact JSON in insertion order', () => {
      expect(serializePayload({ amount: '1000', nested: { ok: true, n: 5 }, list: [1, null] })).toBe(
        '{"amount":"1000","nested":{"ok":true,"n":5},"list":[1,null]}'
      );
    });

    it('should escape non-ASCII characters', () => {
      expect(serializePayload({ firstName: 'Adé' })).toBe('{"firstName":"Ad\\u00e9"}');
    });

    it('should escape the DEL control character', () => {
      expect(serializePayload({ note: 'a\x7fb' })).toBe('{"note":"a\\u007fb"}');
    });

    it('should escape characters outside the BMP as surrogate pairs', () => {
      expect(serializePayload({ note: '😀' })).toBe('{"note":"\\ud83d\\ude00"}');
    });

    const unserializable: Array<{ label: string; payload: Record<string, unknown>; detail: string }> = [
      { label: 'a function', payload: { callback: () => undefined }, detail: 'payload.callback is of type function' },
      { label: 'undefined', payload: { value: undefined }, detail: 'payload.value is of type undefined' },
      { label: 'a bigint', payload: { amount: BigInt(5) }, detail: 'payload.amount is of type bigint' },
      { label: 'NaN', payload: { amount: Number.NaN }, detail: 'payload.amount is not a finite number' },
      { label: 'a Date', payload: { when: new Date(0) }, detail: 'payload.when is a Date instance' },
      { label: 'a nested Map', payload: { meta: [new Map()] }, detail: 'payload.meta[0] is a Map instance' },
    ];

    for (const { label, payload, detail } of unserializable) {
      it(`should reject ${label}`, () => {
        expect(() => serializePayload(payload)).toThrow(`Failed to serialize payload to JSON: ${detail}`);
      });
    }

    it('should reject circular structures', () => {
      const payload: Record<string, unknown> = { amount: '1' };
      payload.self = payload;

      expect(() => serializePayload(payload)).toThrow('payload.self is circular');
    });

    it('should accept the same object twice when it is not circular', () => {
      const shared = { code: '1' };

      expect(serializePayload({ a: shared, b: shared })).toBe('{"a":{"code":"1"},"b":{"code":"1"}}');
    });
  });

  describe('known-answer vectors', () => {
    // Computed with `openssl enc -des-ede3 -nosalt -K <key hex> -base64` over the
    // reference encoder's output, independently of this module
    const KEY_HEX = '746573742d7365637265742d326161616438636162626638';
    const CIPHERTEXT =
      'STw9DO/sJ3Qy62w9H9xUtgdxswsBT4KOnH0WwgjCES8TOKXFrUQed0wFNfIPymjyfjvb/Yx7m4toVq6J3paGS1Ibb5zWiOR4';
    const payload = { amount: '50000', firstName: 'Adé', transactionId: 'TXN-000123' };

    it('should derive the fixed key for the fixed secret', () => {
      expect(deriveKey(SECRET).toString('hex')).toBe(KEY_HEX);
      expect(deriveKey(SECRET).toString('utf8')).toBe('test-secret-2aaad8cabbf8');
    });

    it('should serialize the fixed payload exactly', () => {
      expect(serializePayload(payload)).toBe(
        '{"amount":"50000","firstName":"Ad\\u00e9","transactionId":"TXN-000123"}'
      );
    });

    it('should encrypt the fixed payload to the fixed ciphertext', () => {
      expect(encryptPayload(payload, SECRET)).toBe(CIPHERTEXT);
    });

    it('should decrypt the fixed ciphertext', () => {
      expect(decrypt(Buffer.from(KEY_HEX, 'hex'), CIPHERTEXT)).toEqual(payload);
    });
  });

  describe('encrypt / decrypt', () => {
    const key = deriveKey(SECRET);
    const payload = {
      cardNumber: '5399000000000001',
      amount: '50000',
      firstName: 'Adé',
      meta: [{ metaName: 'order', metaValue: 'A-1' }],
    };

    it('should round-trip a nested payload', () => {
      expect(decrypt(key, encrypt(key, payload))).toEqual(payload);
    });

    it('should produce Base64 of a whole number of 8-byte blocks', () => {
      const bytes = Buffer.from(encrypt(key, payload), 'base64');

      expect(bytes.length % 8).toBe(0);
      expect(bytes.length).toBeGreaterThan(serializePayload(payload).length);
    });

    it('should pad an empty object to a single block', () => {
      expect(Buffer.from(encrypt(key, {}), 'base64')).toHaveLength(8);
    });

    it('should be deterministic for the same key and payload', () => {
      expect(encrypt(key, payload)).toBe(encrypt(key, payload));
    });

    it('should decrypt to the serialized payload with a standard 3DES-ECB decipher', () => {
      const decipher = crypto.createDecipheriv('des-ede3', key, null);
      const plaintext = Buffer.concat([
        decipher.update(Buffer.from(encrypt(key, payload), 'base64')),
        decipher.final(),
      ]).toString('utf8');

      expect(plaintext).toBe(serializePayload(payload));
    });

    it('should wrap serialization failures in EncryptionError', () => {
      expect(() => encrypt(key, { value: undefined })).toThrow(EncryptionError);
    });

    it('should reject ciphertext that is not a whole number of blocks', () => {
      expect(() => decrypt(key, Buffer.from('12345').toString('base64'))).toThrow('Decryption failed');
    });

    it('should reject plaintext that is not a JSON object', () => {
      const cipher = crypto.createCipheriv('des-ede3', key, null);
      const ciphertext = Buffer.concat([cipher.update('[1,2]', 'utf8'), cipher.final()]).toString('base64');

      expect(() => decrypt(key, ciphertext)).toThrow('Decrypted payload is not a JSON object.');
    });

    it('should derive the key from the secret in encryptPayload', () => {
      expect(encryptPayload(payload, SECRET)).toBe(encrypt(key, payload));
      expect(ENCRYPTION_ALGORITHM).toBe('3DES-24');
    });
  });
});
