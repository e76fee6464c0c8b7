import { EncryptionError, NetworkError, ValidationError } from '../errors/index.js';
import {
  AuthenticationChallenge,
  GatewayOutcome,
  GatewayReply,
  InitializeResult,
  Logger,
  OutcomeResult,
  PaymentResult,
  Transport,
  VerifyResult,
} from '../types/gateway.js';
import {
  AccountInitiateRequest,
  AvsAuthenticationRequest,
  CardInitiateRequest,
  HostedInitializeRequest,
  OtpValidationRequest,
  PaymentKind,
  PinAuthenticationRequest,
  StartRequest,
  TransactionOperation,
  TransactionStatus,
} from '../types/payment.js';
import { ENCRYPTION_ALGORITHM, encrypt } from './encryption.js';
import { buildHeaders, sendRequest } from './gateway-transport.js';
import { classifyInitialize, classifyPayment, classifyVerify } from './response-classifier.js';
import {
  validateAvsRequest,
  validateOtpRequest,
  validatePinRequest,
  validateStartRequest,
  validateTransactionId,
} from './validation.js';

export const DEFAULT_CURRENCY = 'NGN';
export const DEFAULT_COUNTRY = 'NG';

const TERMINAL_STATUSES: TransactionStatus[] = ['SETTLED', 'FAILED'];

/**
 * Everything a transaction needs from its client
 */
export interface TransactionContext {
  publicKey: string;
  /** Derived 3DES key; absent when the client has no secret */
  encryptionKey?: Buffer;
  baseUrl: string;
  transport: Transport;
  logger: Logger;
}

export interface TransactionSnapshot {
  transactionId: string | null;
  kind: PaymentKind;
  status: TransactionStatus;
  challenge: AuthenticationChallenge;
  awaitingRedirect: boolean;
  lastOutcome: GatewayOutcome | null;
}

/**
 * Mask a card number for logging, keeping the last four digits
 */
export function maskCardNumber(cardNumber: string): string {
  if (cardNumber.length <= 4) {
    return '****';
  }
  return '*'.repeat(cardNumber.length - 4) + cardNumber.slice(-4);
}

function copyOptional<T extends object>(
  target: Record<string, unknown>,
  source: T,
  keys: (keyof T & string)[]
): Record<string, unknown> {
  for (const key of keys) {
    const value = source[key];
    if (value !== undefined && value !== null && value !== '') {
      target[key] = value;
    }
  }
  return target;
}

function isCardRequest(request: CardInitiateRequest | AccountInitiateRequest): request is CardInitiateRequest {
  return 'cardNumber' in request;
}

function isAccountRequest(
  request: CardInitiateRequest | AccountInitiateRequest
): request is AccountInitiateRequest {
  return 'accountNumber' in request;
}

/**
 * PaymentTransaction - one transaction's step sequence against the gateway
 *
 *   HOSTED:  initialize -> verify
 *   CARD:    initiate -> authenticatePin | authenticateAvs -> validateOtp -> query
 *   ACCOUNT: initiate -> validateOtp -> query
 *
 * Every guard runs before the network call, and a failed call leaves the
 * status where it was. One exchange at a time: a step called while another
 * is awaiting the gateway is rejected locally. The gateway's query/verify
 * answer is the only one to trust before fulfilling an order.
 */
export class PaymentTransaction {
  readonly kind: PaymentKind;

  private context: TransactionContext;
  private currentStatus: TransactionStatus = 'CREATED';
  private id: string | null = null;
  private started = false;
  private pendingChallenge: AuthenticationChallenge = { type: 'NONE' };
  private latestOutcome: GatewayOutcome | null = null;
  private inFlight: TransactionOperation | null = null;

  constructor(kind: PaymentKind, context: TransactionContext, options: { transactionId?: string } = {}) {
    this.kind = kind;
    this.context = context;

    // Resumed transactions already exist at the gateway and can only be queried
    if (options.transactionId !== undefined) {
      validateTransactionId(options.transactionId);
      this.id = options.transactionId;
      this.started = true;
    }
  }

  get status(): TransactionStatus {
    return this.currentStatus;
  }

  get transactionId(): string | null {
    return this.id;
  }

  get challenge(): AuthenticationChallenge {
    return this.pendingChallenge;
  }

  get lastOutcome(): GatewayOutcome | null {
    return this.latestOutcome;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATUSES.includes(this.currentStatus);
  }

  /**
   * True while the customer must complete an out-of-band redirect
   * (3-D-Secure page or bank login); only query() is legal meanwhile.
   */
  get awaitingRedirect(): boolean {
    return (
      this.currentStatus === 'AUTH_PENDING' &&
      this.pendingChallenge.type === 'AVS_REQUIRED' &&
      Boolean(this.pendingChallenge.authUrl)
    );
  }

  snapshot(): TransactionSnapshot {
    return {
      transactionId: this.id,
      kind: this.kind,
      status: this.currentStatus,
      challenge: this.pendingChallenge,
      awaitingRedirect: this.awaitingRedirect,
      lastOutcome: this.latestOutcome,
    };
  }

  /**
   * Start a hosted-page payment. Redirect the customer to result.paymentUrl,
   * then call verify().
   */
  async initialize(request: HostedInitializeRequest): Promise<GatewayOutcome<InitializeResult>> {
    this.assertIdle('initialize');
    this.assertKind('initialize', ['HOSTED']);
    this.assertFresh('initialize');
    validateStartRequest({ kind: 'HOSTED', request });

    const body = copyOptional(
      {
        amount: request.amount,
        email: request.email,
        transactionId: request.transactionId,
        currency: request.currency || DEFAULT_CURRENCY,
      },
      request,
      ['callbackUrl', 'productId', 'productDescription', 'applyConviniencyCharge']
    );
    if (request.metadata && request.metadata.length > 0) {
      body.metadata = request.metadata;
    }

    this.context.logger.log('[PaymentTransaction] Initialize request:', {
      transactionId: request.transactionId,
      amount: request.amount,
      currency: body.currency,
    });

    const outcome = await this.exchange('initialize', '/api/Payments/Initialize', body, classifyInitialize);

    this.started = true;
    this.id = request.transactionId;
    this.record('initialize', outcome, outcome.successful ? 'CREATED' : 'FAILED');
    return outcome;
  }

  /**
   * Encrypt card or account details and start a direct charge.
   * Inspect result.challenge for the next step.
   */
  async initiate(request: CardInitiateRequest | AccountInitiateRequest): Promise<GatewayOutcome<PaymentResult>> {
    this.assertIdle('initiate');
    this.assertKind('initiate', ['CARD', 'ACCOUNT']);
    this.assertFresh('initiate');

    const start = this.toStartRequest(request);
    validateStartRequest(start);

    const key = this.context.encryptionKey;
    if (!key) {
      throw new EncryptionError(
        `A secret key is required to encrypt ${this.kind} payment details. ` +
          'Pass secretKey to the client or set XPRESSPAY_SECRET_KEY.'
      );
    }

    const payload = this.buildEncryptedPayload(start);
    const body = {
      publicKey: this.context.publicKey,
      request: encrypt(key, payload),
      alg: ENCRYPTION_ALGORITHM,
      paymentType: this.kind,
    };

    this.context.logger.log('[PaymentTransaction] Initiate request:', {
      transactionId: start.request.transactionId,
      kind: this.kind,
      amount: start.request.amount,
      ...(start.kind === 'CARD'
        ? { card: maskCardNumber(start.request.cardNumber) }
        : start.kind === 'ACCOUNT'
          ? { bankCode: start.request.bankCode }
          : {}),
    });

    // The gateway may have taken the charge even when the reply is an error,
    // so query() must be able to find it
    this.id = start.request.transactionId;

    let outcome: GatewayOutcome<PaymentResult>;
    try {
      outcome = await this.exchange('initiate', '/v1/payments', body, (reply) => classifyPayment('initiate', reply));
    } catch (error) {
      if (error instanceof NetworkError) {
        this.id = null;
      }
      throw error;
    }

    this.started = true;
    this.advance('initiate', outcome);
    return outcome;
  }

  /**
   * Submit the cardholder PIN for local cards. An OTP normally follows.
   */
  async authenticatePin(request: PinAuthenticationRequest): Promise<GatewayOutcome<PaymentResult>> {
    this.assertIdle('authenticatePin');
    this.assertKind('authenticatePin', ['CARD']);
    this.assertStatus('authenticatePin', ['AUTH_PENDING']);
    this.assertChallenge('authenticatePin', this.pendingChallenge.type === 'PIN_REQUIRED', 'PIN_REQUIRED');
    validatePinRequest(request);

    const outcome = await this.exchange(
      'authenticatePin',
      '/v1/payments/authenticate',
      {
        publicKey: this.context.publicKey,
        suggestedAuthentication: 'PIN',
        pin: request.pin,
        transactionId: this.id,
        paymentType: 'CARD',
      },
      (reply) => classifyPayment('authenticate', reply)
    );

    this.advance('authenticatePin', outcome);
    return outcome;
  }

  /**
   * Submit the billing address for international cards. The reply either
   * carries a 3-D-Secure URL (redirect, then query) or announces an OTP.
   */
  async authenticateAvs(request: AvsAuthenticationRequest): Promise<GatewayOutcome<PaymentResult>> {
    this.assertIdle('authenticateAvs');
    this.assertKind('authenticateAvs', ['CARD']);
    this.assertStatus('authenticateAvs', ['AUTH_PENDING']);
    this.assertChallenge(
      'authenticateAvs',
      this.pendingChallenge.type === 'AVS_REQUIRED' && !this.pendingChallenge.authUrl,
      'AVS_REQUIRED'
    );
    validateAvsRequest(request);

    const body = copyOptional(
      {
        publicKey: this.context.publicKey,
        suggestedAuthentication: 'AVS_VBVSECURECODE',
        transactionId: this.id,
        paymentType: 'CARD',
      },
      request,
      ['billingZip', 'billingCity', 'billingAddress', 'billingState', 'billingCountry']
    );

    const outcome = await this.exchange('authenticateAvs', '/v1/payments/authenticate', body, (reply) =>
      classifyPayment('authenticate', reply)
    );

    this.advance('authenticateAvs', outcome);
    return outcome;
  }

  /**
   * Submit the OTP the customer received. paymentType must match the branch.
   */
  async validateOtp(request: OtpValidationRequest): Promise<GatewayOutcome<PaymentResult>> {
    this.assertIdle('validateOtp');
    this.assertKind('validateOtp', ['CARD', 'ACCOUNT']);
    this.assertStatus('validateOtp', ['VALIDATION_PENDING']);
    validateOtpRequest(request);

    if (request.paymentType !== this.kind) {
      throw new ValidationError(
        `paymentType "${request.paymentType}" does not match this ${this.kind} transaction`,
        { errorType: 'payment_type_mismatch', fields: ['paymentType'] }
      );
    }

    const outcome = await this.exchange(
      'validateOtp',
      '/v1/payments/validate',
      {
        publicKey: this.context.publicKey,
        transactionReference: this.id,
        otp: request.otp,
        paymentType: request.paymentType,
      },
      (reply) => classifyPayment('validate', reply)
    );

    this.advance('validateOtp', outcome);
    return outcome;
  }

  /**
   * Ask the gateway for the final state. Safe to call repeatedly. Only a
   * successful answer changes the status; SETTLED is never rewritten.
   */
  async query(): Promise<GatewayOutcome<PaymentResult | VerifyResult>> {
    this.assertIdle('query');
    const transactionId = this.id;
    if (transactionId === null) {
      throw new ValidationError(`Cannot query a ${this.kind} transaction before it has been started`, {
        errorType: 'invalid_state',
      });
    }

    const outcome: GatewayOutcome<PaymentResult | VerifyResult> =
      this.kind === 'HOSTED'
        ? await this.exchange('query', '/api/Payments/VerifyPayment', { transactionId }, classifyVerify)
        : await this.exchange(
            'query',
            '/v1/payments/query',
            { publicKey: this.context.publicKey, transactionId, paymentType: this.kind },
            (reply) => classifyPayment('query', reply)
          );

    this.advance('query', outcome);
    return outcome;
  }

  /** Alias of query(), named after the hosted-page endpoint */
  async verify(): Promise<GatewayOutcome<PaymentResult | VerifyResult>> {
    return this.query();
  }

  private toStartRequest(request: CardInitiateRequest | AccountInitiateRequest): StartRequest {
    if (this.kind === 'CARD' && isCardRequest(request)) {
      return { kind: 'CARD', request };
    }
    if (this.kind === 'ACCOUNT' && isAccountRequest(request)) {
      return { kind: 'ACCOUNT', request };
    }

    const field = this.kind === 'CARD' ? 'cardNumber' : 'accountNumber';
    throw new ValidationError(`Missing required field(s): ${field}`, {
      errorType: 'missing_field',
      fields: [field],
    });
  }

  private buildEncryptedPayload(start: StartRequest): Record<string, unknown> {
    const publicKey = this.context.publicKey;

    switch (start.kind) {
      case 'CARD': {
        const { request } = start;
        const payload = copyOptional(
          {
            publicKey,
            cardNumber: request.cardNumber,
            cvv: request.cvv,
            expiryMonth: request.expiryMonth,
            expiryYear: request.expiryYear,
            amount: request.amount,
            email: request.email,
            transactionId: request.transactionId,
            currency: request.currency || DEFAULT_CURRENCY,
            country: request.country || DEFAULT_COUNTRY,
            paymentType: 'CARD',
          },
          request,
          [
            'phoneNumber',
            'firstName',
            'lastName',
            'ip',
            'deviceFingerPrint',
            'redirectUrl',
            'billingZip',
            'billingCity',
            'billingAddress',
            'billingState',
            'billingCountry',
          ]
        );
        if (request.meta && request.meta.length > 0) {
          payload.meta = request.meta;
        }
        return payload;
      }
      case 'ACCOUNT': {
        const { request } = start;
        return copyOptional(
          {
            publicKey,
            accountNumber: request.accountNumber,
            bankCode: request.bankCode,
            amount: request.amount,
            email: request.email,
            transactionId: request.transactionId,
            currency: request.currency || DEFAULT_CURRENCY,
            country: request.country || DEFAULT_COUNTRY,
            paymentType: 'ACCOUNT',
          },
          request,
          ['phoneNumber', 'firstName', 'lastName', 'ip', 'deviceFingerPrint', 'dateOfBirth', 'bvn', 'redirectUrl']
        );
      }
      case 'HOSTED':
        throw new ValidationError('Hosted payments carry no encrypted payload', { errorType: 'invalid_branch' });
    }
  }

  private async exchange<T extends OutcomeResult>(
    operation: TransactionOperation,
    path: string,
    body: Record<string, unknown>,
    classify: (reply: GatewayReply) => GatewayOutcome<T>
  ): Promise<GatewayOutcome<T>> {
    this.inFlight = operation;
    try {
      const reply = await sendRequest(this.context.transport, {
        method: 'POST',
        url: `${this.context.baseUrl}${path}`,
        headers: buildHeaders(this.context.publicKey),
        body,
      });
      const outcome = classify(reply);

      this.context.logger.log(`[PaymentTransaction] ${operation} response:`, {
        transactionId: this.id ?? body.transactionId,
        successful: outcome.successful,
        code: outcome.code,
        authenticationPending: outcome.authenticationPending,
        challenge: outcome.challenge.type,
      });
      return outcome;
    } catch (error) {
      this.context.logger.error(`[PaymentTransaction] ${operation} failed:`, {
        transactionId: this.id ?? body.transactionId,
        status: this.currentStatus,
        error: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
      });
      throw error;
    } finally {
      this.inFlight = null;
    }
  }

  /**
   * Move to the status the classified reply implies for this step
   */
  private advance(operation: TransactionOperation, outcome: GatewayOutcome): void {
    const { challenge } = outcome;
    const needsInput = challenge.type !== 'NONE' || outcome.authenticationPending;
    const otp: AuthenticationChallenge = {
      type: 'OTP_REQUIRED',
      instruction: outcome.result.type === 'payment' ? outcome.result.validationInstruction : undefined,
    };

    if (outcome.successful) {
      return this.record(operation, outcome, 'SETTLED', { type: 'NONE' });
    }

    // A query answer short of success is not final: the customer may still be
    // paying, redirecting or entering an OTP
    if (operation === 'query') {
      return this.record(operation, outcome, this.currentStatus, this.pendingChallenge);
    }

    // 3-D-Secure page or bank login: only query() may follow
    if (challenge.type === 'AVS_REQUIRED' && challenge.authUrl) {
      return this.record(operation, outcome, 'AUTH_PENDING', challenge);
    }

    switch (operation) {
      case 'initiate':
        if (this.kind === 'CARD' && (challenge.type === 'PIN_REQUIRED' || challenge.type === 'AVS_REQUIRED')) {
          return this.record(operation, outcome, 'AUTH_PENDING', challenge);
        }
        if (needsInput) {
          return this.record(operation, outcome, 'VALIDATION_PENDING', otp);
        }
        break;
      case 'authenticatePin':
      case 'authenticateAvs':
      case 'validateOtp':
        if (needsInput) {
          return this.record(operation, outcome, 'VALIDATION_PENDING', otp);
        }
        break;
    }

    this.record(operation, outcome, 'FAILED', { type: 'NONE' });
  }

  private record(
    operation: TransactionOperation,
    outcome: GatewayOutcome,
    status: TransactionStatus,
    challenge: AuthenticationChallenge = outcome.challenge
  ): void {
    this.latestOutcome = outcome;

    // SETTLED is final; FAILED yields only to a successful query
    if (this.currentStatus === 'SETTLED') {
      return;
    }
    if (this.currentStatus === 'FAILED' && !(operation === 'query' && status === 'SETTLED')) {
      return;
    }

    if (status !== this.currentStatus) {
      this.context.logger.log(
        `[PaymentTransaction] ${this.id}: ${this.currentStatus} -> ${status} (${challenge.type})`
      );
    }
    this.currentStatus = status;
    this.pendingChallenge = challenge;
  }

  private assertKind(operation: TransactionOperation, allowed: PaymentKind[]): void {
    if (!allowed.includes(this.kind)) {
      throw new ValidationError(`${operation} is not available for ${this.kind} transactions`, {
        errorType: 'invalid_branch',
      });
    }
  }

  private assertIdle(operation: TransactionOperation): void {
    if (this.inFlight !== null) {
      throw new ValidationError(`${operation} cannot start while ${this.inFlight} is awaiting the gateway`, {
        errorType: 'invalid_state',
      });
    }
  }

  private assertFresh(operation: TransactionOperation): void {
    if (this.started || this.currentStatus !== 'CREATED') {
      throw new ValidationError(`${operation} can only be called once, on a new transaction`, {
        errorType: 'invalid_state',
      });
    }
  }

  private assertStatus(operation: TransactionOperation, allowed: TransactionStatus[]): void {
    if (!allowed.includes(this.currentStatus)) {
      throw new ValidationError(
        `${operation} requires status ${allowed.join(' or ')}, but the transaction is ${this.currentStatus}`,
        { errorType: 'invalid_state' }
      );
    }
  }

  private assertChallenge(operation: TransactionOperation, satisfied: boolean, expected: string): void {
    if (!satisfied) {
      throw new ValidationError(
        `${operation} requires a ${expected} challenge, but the gateway asked for ${this.describeChallenge()}`,
        { errorType: 'invalid_state' }
      );
    }
  }

  private describeChallenge(): string {
    const { pendingChallenge } = this;
    if (pendingChallenge.type === 'AVS_REQUIRED' && pendingChallenge.authUrl) {
      return 'a 3-D-Secure redirect';
    }
    return pendingChallenge.type;
  }
}
