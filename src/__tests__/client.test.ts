import { jest, describe, it, expect, beforeEach } from '@jest/globals';
import { XpresspayClient } from '../client';
import { LIVE_BASE_URL, SANDBOX_BASE_URL } from '../config';
import { ConfigurationError, EncryptionError, NetworkError, ValidationError } from '../errors';
import { createRecordingLogger, MockTransport, RecordingLogger } from './mocks/MockTransport';

const PUBLIC_KEY = 'XPPUBK-test-public';
const SECRET_KEY = 'XPSECK-test-secret-0001';

describe('XpresspayClient', () => {
  let transport: MockTransport;
  let logger: RecordingLogger;

  beforeEach(() => {
    transport = new MockTransport();
    logger = createRecordingLogger();
  });

  describe('credentials', () => {
    for (const publicKey of ['', 'pk_test_123', 'xppubk-lowercase', SECRET_KEY]) {
      it(`should reject the public key "${publicKey}" before any network call`, () => {
        expect(() => new XpresspayClient({ publicKey, transport, logger, env: {} })).toThrow(ConfigurationError);
        expect(transport.callCount).toBe(0);
      });
    }

    it('should reject a missing public key', () => {
      expect(() => new XpresspayClient({ transport, logger, env: {} })).toThrow(
        "A valid Xpresspay public key starting with 'XPPUBK-' is required."
      );
    });

    it('should reject a secret key without its prefix', () => {
      expect(
        () => new XpresspayClient({ publicKey: PUBLIC_KEY, secretKey: 'test-secret-0001', transport, logger, env: {} })
      ).toThrow("The Xpresspay secret key must start with 'XPSECK-'.");
    });

    it('should reject a secret key too short to derive a key', () => {
      const create = () =>
        new XpresspayClient({ publicKey: PUBLIC_KEY, secretKey: 'XPSECK-short', transport, logger, env: {} });

      expect(create).toThrow(EncryptionError);
      expect(create).toThrow(ConfigurationError);
    });

    it('should work without a secret for hosted payments', () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, transport, logger, env: {} });

      expect(client.canEncrypt).toBe(false);
      expect(logger.log).toHaveBeenCalledWith(
        `[XpresspayClient] Initialized (sandbox) against ${SANDBOX_BASE_URL}, no secret key: card and account payments disabled`
      );
    });

    it('should read credentials from the environment', () => {
      const client = new XpresspayClient({
        transport,
        logger,
        env: { XPRESSPAY_PUBLIC_KEY: PUBLIC_KEY, XPRESSPAY_SECRET_KEY: SECRET_KEY },
      });

      expect(client.publicKey).toBe(PUBLIC_KEY);
      expect(client.canEncrypt).toBe(true);
    });

    it('should prefer explicit options over the environment', () => {
      const client = new XpresspayClient({
        publicKey: 'XPPUBK-explicit',
        transport,
        logger,
        env: { XPRESSPAY_PUBLIC_KEY: PUBLIC_KEY },
      });

      expect(client.publicKey).toBe('XPPUBK-explicit');
    });
  });

  describe('endpoints', () => {
    it('should default to the sandbox', () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, transport, logger, env: {} });

      expect(client.isSandbox).toBe(true);
      expect(client.baseUrl).toBe(SANDBOX_BASE_URL);
    });

    it('should use the live endpoint when the sandbox is off', () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, sandbox: false, transport, logger, env: {} });

      expect(client.isSandbox).toBe(false);
      expect(client.baseUrl).toBe(LIVE_BASE_URL);
    });

    it('should read the sandbox flag from the environment', () => {
      const client = new XpresspayClient({
        publicKey: PUBLIC_KEY,
        transport,
        logger,
        env: { XPRESSPAY_SANDBOX: 'false' },
      });

      expect(client.baseUrl).toBe(LIVE_BASE_URL);
    });

    it('should honour a base URL override', () => {
      const client = new XpresspayClient({
        publicKey: PUBLIC_KEY,
        baseUrl: 'https://gateway.example.test/',
        transport,
        logger,
        env: {},
      });

      expect(client.baseUrl).toBe('https://gateway.example.test');
    });

    it('should list banks through the same transport', async () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, transport, logger, env: {} });
      transport.reply({ data: [{ bankName: 'Access Bank', bankCode: '044' }] });

      const banks = await client.banks.listBanks();

      expect(banks.map((bank) => bank.code)).toEqual(['044']);
      expect(transport.lastCall().url).toBe(`${SANDBOX_BASE_URL}/v1/banks?publicKey=${PUBLIC_KEY}`);
    });
  });

  describe('transactions', () => {
    it('should create independent transactions', () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, secretKey: SECRET_KEY, transport, logger, env: {} });

      const first = client.createTransaction('CARD');
      const second = client.createTransaction('ACCOUNT');

      expect(first).not.toBe(second);
      expect(first.kind).toBe('CARD');
      expect(second.kind).toBe('ACCOUNT');
      expect(first.status).toBe('CREATED');
      expect(first.transactionId).toBeNull();
    });

    it('should resume a transaction by id', () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, transport, logger, env: {} });

      const payment = client.resumeTransaction('HOSTED', 'TXN-000125');

      expect(payment.transactionId).toBe('TXN-000125');
      expect(payment.status).toBe('CREATED');
    });
  });

  describe('retry', () => {
    it('should retry network failures with the configured settings', async () => {
      const client = new XpresspayClient({
        publicKey: PUBLIC_KEY,
        retry: { maxRetries: 1 },
        transport,
        logger,
        env: { XPRESSPAY_RETRY_DELAY_MS: '0' },
      });
      const operation = jest
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new NetworkError('Network error: fetch failed'))
        .mockResolvedValueOnce('ok');

      await expect(client.retry(operation)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(2);
    });

    it('should not retry validation failures', async () => {
      const client = new XpresspayClient({ publicKey: PUBLIC_KEY, transport, logger, env: {} });
      const payment = client.createTransaction('HOSTED');

      await expect(client.retry(() => payment.query())).rejects.toThrow(ValidationError);
      expect(transport.callCount).toBe(0);
    });
  });
});
