/**
 * Gateway wire types
 * Transport contract, raw replies and classified outcomes
 */

export type HttpMethod = 'GET' | 'POST';

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body?: Record<string, unknown>;
}

export interface GatewayReply {
  status: number;
  /** Raw response text, or an already-parsed body */
  body: string | Record<string, unknown> | unknown[];
}

/**
 * Narrow network boundary. Implementations must throw TransportFailure when
 * the request never reached the gateway and return every HTTP status as a reply.
 */
export interface Transport {
  send(request: TransportRequest): Promise<GatewayReply>;
}

export type GatewayStep =
  | 'initialize'
  | 'verify'
  | 'initiate'
  | 'authenticate'
  | 'validate'
  | 'query';

export type HostedStep = Extract<GatewayStep, 'initialize' | 'verify'>;
export type PaymentStep = Exclude<GatewayStep, HostedStep>;

export type AuthenticationChallenge =
  | { type: 'NONE' }
  | { type: 'PIN_REQUIRED' }
  | {
      type: 'AVS_REQUIRED';
      /** 3-D-Secure page the customer must be redirected to */
      authUrl?: string;
      billing?: {
        billingZip?: string;
        billingCity?: string;
        billingAddress?: string;
        billingState?: string;
        billingCountry?: string;
      };
    }
  | { type: 'OTP_REQUIRED'; instruction?: string };

export interface InitializeResult {
  type: 'initialize';
  paymentUrl?: string;
  reference?: string;
}

export interface PaymentResult {
  type: 'payment';
  transactionReference?: string;
  uniqueKey?: string;
  amount?: string;
  chargedAmount?: string;
  paymentType?: string;
  suggestedAuthentication?: string;
  authUrl?: string;
  validationInstruction?: string;
}

export interface VerifyResult {
  type: 'verify';
  transactionId?: string;
  amount?: string;
  paymentType?: string;
  isSuccessful?: boolean;
}

export type OutcomeResult = InitializeResult | PaymentResult | VerifyResult;

/**
 * Classified result of one exchange. `successful` and `authenticationPending`
 * are independent: a reply can be unsuccessful and still waiting on the customer.
 */
export interface GatewayOutcome<TResult extends OutcomeResult = OutcomeResult> {
  step: GatewayStep;
  successful: boolean;
  authenticationPending: boolean;
  code: string;
  message: string;
  challenge: AuthenticationChallenge;
  result: TResult;
  httpStatus: number;
  raw: Record<string, unknown>;
}

export interface Logger {
  log(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}
