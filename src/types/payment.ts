/**
 * Payment Types
 * Request shapes and transaction state for the hosted, card and account flows
 */

export type PaymentKind = 'HOSTED' | 'CARD' | 'ACCOUNT';

export type TransactionStatus =
  | 'CREATED'
  | 'AUTH_PENDING'
  | 'VALIDATION_PENDING'
  | 'SETTLED'
  | 'FAILED';

export type TransactionOperation =
  | 'initialize'
  | 'initiate'
  | 'authenticatePin'
  | 'authenticateAvs'
  | 'validateOtp'
  | 'query';

export interface MetaEntry {
  metaName: string;
  metaValue: string;
}

export interface HostedMetadataEntry {
  name: string;
  value: string;
}

export interface BillingAddress {
  billingZip?: string;
  billingCity?: string;
  billingAddress?: string;
  billingState?: string;
  billingCountry?: string;
}

interface CustomerDetails {
  phoneNumber?: string;
  firstName?: string;
  lastName?: string;
  ip?: string;
  deviceFingerPrint?: string;
}

/** Hosted-page flow. Amount is in major units, e.g. "1000.00". */
export interface HostedInitializeRequest {
  amount: string;
  email: string;
  transactionId: string;
  currency?: string;
  callbackUrl?: string;
  productId?: string;
  productDescription?: string;
  applyConviniencyCharge?: boolean;
  metadata?: HostedMetadataEntry[];
}

/** Direct card charge. Amount is in kobo. */
export interface CardInitiateRequest extends CustomerDetails, BillingAddress {
  cardNumber: string;
  cvv: string;
  expiryMonth: string;
  expiryYear: string;
  amount: string;
  email: string;
  transactionId: string;
  currency?: string;
  country?: string;
  redirectUrl?: string;
  meta?: MetaEntry[];
}

/**
 * Direct bank account debit. Amount is in kobo.
 * Some banks need extra fields, see BankDebitProfile.
 */
export interface AccountInitiateRequest extends CustomerDetails {
  accountNumber: string;
  bankCode: string;
  amount: string;
  email: string;
  transactionId: string;
  currency?: string;
  country?: string;
  dateOfBirth?: string; // DDMMYYYY
  bvn?: string;
  redirectUrl?: string;
}

export interface PinAuthenticationRequest {
  pin: string;
}

export type AvsAuthenticationRequest = BillingAddress;

export interface OtpValidationRequest {
  otp: string;
  paymentType: 'CARD' | 'ACCOUNT';
}

/** Start request tagged by branch, see validateStartRequest() */
export type StartRequest =
  | { kind: 'HOSTED'; request: HostedInitializeRequest }
  | { kind: 'CARD'; request: CardInitiateRequest }
  | { kind: 'ACCOUNT'; request: AccountInitiateRequest };

export type BankRequirement = 'dateOfBirth' | 'bvn' | 'redirectUrl';

export interface BankDebitProfile {
  bankCode: string;
  bankName: string;
  requiredFields: BankRequirement[];
}

export interface Bank {
  name: string;
  code: string;
  raw: Record<string, unknown>;
}
