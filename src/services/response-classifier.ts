import {
  AuthenticationError,
  GatewayError,
  NetworkError,
  NotFoundError,
  ProcessingError,
  TransportFailure,
  ValidationError,
} from '../errors/index.js';
import {
  AuthenticationChallenge,
  GatewayOutcome,
  GatewayReply,
  GatewayStep,
  InitializeResult,
  PaymentResult,
  PaymentStep,
  VerifyResult,
} from '../types/gateway.js';
import { isRecord, readBoolean, readRecord, readString } from '../utils/records.js';

/**
 * Response classifier
 *
 * Turns a raw gateway reply into either a typed outcome or a typed error.
 * HTTP errors always throw; a 2xx reply never does, even when the gateway
 * reports the payment as unsuccessful.
 */

/** Hosted-page initialize/verify */
export const HOSTED_SUCCESS_CODE = '00';
/** Card/account operations */
export const PAYMENT_SUCCESS_CODE = '000';
/** OTP, PIN or AVS still required */
export const AUTHENTICATION_PENDING_CODE = '02';

const BILLING_FIELDS = [
  'billingZip',
  'billingCity',
  'billingAddress',
  'billingState',
  'billingCountry',
] as const;

function parseBody(body: GatewayReply['body']): { parsed: unknown; text: string } {
  if (typeof body !== 'string') {
    return { parsed: body, text: JSON.stringify(body) };
  }
  try {
    return { parsed: JSON.parse(body), text: body };
  } catch {
    return { parsed: undefined, text: body };
  }
}

function errorMessage(body: Record<string, unknown> | undefined, text: string): string {
  return (
    readString(body, 'responseMessage') ||
    readString(body, 'message') ||
    text ||
    'Unknown error'
  );
}

/**
 * Check the HTTP status and return the parsed body of a 2xx reply.
 * Every other status is mapped to its error subtype.
 */
export function triageReply(reply: GatewayReply): unknown {
  const { parsed, text } = parseBody(reply.body);
  const { status } = reply;

  if (status >= 200 && status < 300) {
    if (parsed === undefined) {
      throw new GatewayError(`Gateway returned a malformed response: ${text.substring(0, 200)}`, status);
    }
    return parsed;
  }

  const body = isRecord(parsed) ? parsed : undefined;
  const message = errorMessage(body, text);

  if (status === 400) {
    const errorType = readString(body, 'errorType') || readString(body, 'error') || undefined;
    throw new ValidationError(message, { errorType, statusCode: 400 });
  }
  if (status === 401) {
    throw new AuthenticationError(message, 401);
  }
  if (status === 404) {
    throw new NotFoundError(message, 404);
  }
  if (status >= 500) {
    throw new ProcessingError(message, status);
  }

  throw new GatewayError(message, status);
}

function triageRecord(reply: GatewayReply): Record<string, unknown> {
  const parsed = triageReply(reply);
  if (!isRecord(parsed)) {
    throw new GatewayError('Gateway returned an unexpected response shape', reply.status);
  }
  return parsed;
}

export function classifyInitialize(reply: GatewayReply): GatewayOutcome<InitializeResult> {
  const body = triageRecord(reply);
  const data = readRecord(body, 'data');
  const code = readString(body, 'responseCode') ?? '';

  return {
    step: 'initialize',
    successful: code === HOSTED_SUCCESS_CODE,
    authenticationPending: false,
    code,
    message: readString(body, 'responseMessage') ?? readString(body, 'message') ?? '',
    challenge: { type: 'NONE' },
    result: {
      type: 'initialize',
      paymentUrl: readString(data, 'paymentUrl'),
      reference: readString(data, 'reference'),
    },
    httpStatus: reply.status,
    raw: body,
  };
}

export function classifyVerify(reply: GatewayReply): GatewayOutcome<VerifyResult> {
  const body = triageRecord(reply);
  const data = readRecord(body, 'data');
  const code = readString(body, 'responseCode') ?? '';

  return {
    step: 'verify',
    successful: code === HOSTED_SUCCESS_CODE,
    authenticationPending: false,
    code,
    message: readString(body, 'responseMessage') ?? readString(body, 'message') ?? '',
    challenge: { type: 'NONE' },
    result: {
      type: 'verify',
      transactionId: readString(data, 'transactionId'),
      amount: readString(data, 'amount'),
      paymentType: readString(data, 'paymentType'),
      isSuccessful: readBoolean(data, 'isSuccessful'),
    },
    httpStatus: reply.status,
    raw: body,
  };
}

/**
 * Card/account replies nest their fields under data.payment, but older
 * endpoints return them under data or at the top level.
 */
function paymentFieldReader(body: Record<string, unknown>): (key: string) => string | undefined {
  const data = readRecord(body, 'data');
  const payment = readRecord(data, 'payment');
  return (key) => readString(payment, key) ?? readString(data, key) ?? readString(body, key);
}

export function deriveChallenge(
  fields: Pick<PaymentResult, 'suggestedAuthentication' | 'authUrl' | 'validationInstruction'> & {
    billing?: Partial<Record<(typeof BILLING_FIELDS)[number], string>>;
  },
  authenticationPending: boolean
): AuthenticationChallenge {
  if (fields.authUrl) {
    return { type: 'AVS_REQUIRED', authUrl: fields.authUrl, billing: fields.billing };
  }

  switch (fields.suggestedAuthentication?.toUpperCase()) {
    case 'PIN':
      return { type: 'PIN_REQUIRED' };
    case 'AVS':
    case 'VBVSECURECODE':
    case 'AVS_VBVSECURECODE':
      return { type: 'AVS_REQUIRED', billing: fields.billing };
    case 'OTP':
      return { type: 'OTP_REQUIRED', instruction: fields.validationInstruction };
  }

  if (authenticationPending) {
    return { type: 'OTP_REQUIRED', instruction: fields.validationInstruction };
  }
  return { type: 'NONE' };
}

export function classifyPayment(step: PaymentStep, reply: GatewayReply): GatewayOutcome<PaymentResult> {
  const body = triageRecord(reply);
  const field = paymentFieldReader(body);

  const code = field('paymentResponseCode') ?? '';
  // Independent of `code`: a reply can be unsuccessful and pending at once
  const authenticationPending = field('authenticatePaymentResponseCode') === AUTHENTICATION_PENDING_CODE;

  const result: PaymentResult = {
    type: 'payment',
    transactionReference: field('transactionReference'),
    uniqueKey: field('uniqueKey'),
    amount: field('amount'),
    chargedAmount: field('chargedAmount'),
    paymentType: field('paymentType'),
    suggestedAuthentication: field('suggestedAuthentication'),
    authUrl: field('authUrl'),
    validationInstruction: field('validationInstruction'),
  };

  const billing: Partial<Record<(typeof BILLING_FIELDS)[number], string>> = {};
  for (const name of BILLING_FIELDS) {
    const value = field(name);
    if (value) {
      billing[name] = value;
    }
  }

  return {
    step,
    successful: code === PAYMENT_SUCCESS_CODE,
    authenticationPending,
    code,
    message:
      readString(body, 'message') ??
      readString(body, 'responseMessage') ??
      field('paymentResponseMessage') ??
      '',
    challenge: deriveChallenge(
      { ...result, billing: Object.keys(billing).length > 0 ? billing : undefined },
      authenticationPending
    ),
    result,
    httpStatus: reply.status,
    raw: body,
  };
}

export function classifyResponse(step: GatewayStep, reply: GatewayReply): GatewayOutcome {
  switch (step) {
    case 'initialize':
      return classifyInitialize(reply);
    case 'verify':
      return classifyVerify(reply);
    default:
      return classifyPayment(step, reply);
  }
}

/**
 * A request that never reached the gateway. Always retry-safe.
 */
export function classifyTransportFailure(error: TransportFailure): NetworkError {
  return new NetworkError(`Network error: ${error.message}`, { cause: error });
}
