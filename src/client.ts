import { RetrySettings, loadConfig, resolveBaseUrl } from './config/index.js';
import { ConfigurationError } from './errors/index.js';
import { BankRegistry } from './services/bank-registry.js';
import { deriveKey } from './services/encryption.js';
import { FetchTransport } from './services/gateway-transport.js';
import { withRetry } from './services/retry.js';
import { PaymentTransaction, TransactionContext } from './services/transaction.js';
import { Logger, Transport } from './types/gateway.js';
import { PaymentKind } from './types/payment.js';

export const PUBLIC_KEY_PREFIX = 'XPPUBK-';
export const SECRET_KEY_PREFIX = 'XPSECK-';

export interface XpresspayClientOptions {
  /** Falls back to XPRESSPAY_PUBLIC_KEY */
  publicKey?: string;
  /** Needed for card and account payments only. Falls back to XPRESSPAY_SECRET_KEY */
  secretKey?: string;
  sandbox?: boolean;
  baseUrl?: string;
  timeoutMs?: number;
  retry?: Partial<RetrySettings>;
  transport?: Transport;
  logger?: Logger;
  /** Environment to read defaults from, process.env when omitted */
  env?: Record<string, string | undefined>;
}

/**
 * Entry point for the Xpresspay gateway.
 *
 * Each client is an independent value (credentials, endpoint, transport);
 * transactions created from it share nothing but those.
 *
 * @example
 * const client = new XpresspayClient({ publicKey: 'XPPUBK-...', secretKey: 'XPSECK-...' });
 * const payment = client.createTransaction('CARD');
 * const outcome = await payment.initiate({ ... });
 * if (outcome.challenge.type === 'PIN_REQUIRED') await payment.authenticatePin({ pin });
 */
export class XpresspayClient {
  readonly banks: BankRegistry;

  private context: TransactionContext;
  private sandbox: boolean;
  private retrySettings: RetrySettings;

  constructor(options: XpresspayClientOptions = {}) {
    const config = loadConfig(options.env);
    const logger = options.logger ?? console;

    const publicKey = options.publicKey ?? config.publicKey;
    if (!publicKey || !publicKey.startsWith(PUBLIC_KEY_PREFIX)) {
      throw new ConfigurationError(
        `A valid Xpresspay public key starting with '${PUBLIC_KEY_PREFIX}' is required. ` +
          'Pass it as publicKey or set the XPRESSPAY_PUBLIC_KEY environment variable.'
      );
    }

    const secretKey = options.secretKey ?? config.secretKey;
    let encryptionKey: Buffer | undefined;
    if (secretKey !== undefined) {
      if (!secretKey.startsWith(SECRET_KEY_PREFIX)) {
        throw new ConfigurationError(
          `The Xpresspay secret key must start with '${SECRET_KEY_PREFIX}'.`
        );
      }
      encryptionKey = deriveKey(secretKey);
    }

    this.sandbox = options.sandbox ?? config.sandbox;
    const baseUrl = resolveBaseUrl(this.sandbox, options.baseUrl ?? config.baseUrl);
    const timeoutMs = options.timeoutMs ?? config.timeoutMs;

    this.retrySettings = {
      maxRetries: options.retry?.maxRetries ?? config.retry.maxRetries,
      retryDelayMs: options.retry?.retryDelayMs ?? config.retry.retryDelayMs,
    };
    this.context = {
      publicKey,
      encryptionKey,
      baseUrl,
      transport: options.transport ?? new FetchTransport({ timeoutMs, logger }),
      logger,
    };
    this.banks = new BankRegistry({ transport: this.context.transport, baseUrl, publicKey });

    logger.log(
      `[XpresspayClient] Initialized (${this.sandbox ? 'sandbox' : 'live'}) against ${baseUrl}` +
        (encryptionKey ? '' : ', no secret key: card and account payments disabled')
    );
  }

  get publicKey(): string {
    return this.context.publicKey;
  }

  get isSandbox(): boolean {
    return this.sandbox;
  }

  get baseUrl(): string {
    return this.context.baseUrl;
  }

  get canEncrypt(): boolean {
    return this.context.encryptionKey !== undefined;
  }

  /**
   * Begin a new transaction. The branch is fixed for its lifetime.
   */
  createTransaction(kind: PaymentKind): PaymentTransaction {
    return new PaymentTransaction(kind, this.context);
  }

  /**
   * Rebuild a transaction started elsewhere (another process, a redirect
   * callback) so it can be queried.
   */
  resumeTransaction(kind: PaymentKind, transactionId: string): PaymentTransaction {
    return new PaymentTransaction(kind, this.context, { transactionId });
  }

  /**
   * Run a step with this client's retry settings. Only NetworkError and
   * ProcessingError are retried.
   */
  retry<T>(operation: () => Promise<T>): Promise<T> {
    return withRetry(operation, { ...this.retrySettings, logger: this.context.logger });
  }
}
