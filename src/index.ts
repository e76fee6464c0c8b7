export { XpresspayClient, PUBLIC_KEY_PREFIX, SECRET_KEY_PREFIX } from './client.js';
export type { XpresspayClientOptions } from './client.js';
export type { GatewayConfig, RetrySettings } from './config/index.js';
export {
  loadConfig,
  resolveBaseUrl,
  LIVE_BASE_URL,
  SANDBOX_BASE_URL,
} from './config/index.js';
export {
  GatewayError,
  AuthenticationError,
  ValidationError,
  NotFoundError,
  ProcessingError,
  NetworkError,
  ConfigurationError,
  EncryptionError,
  TransportFailure,
  isRetryable,
} from './errors/index.js';
export { PaymentTransaction, DEFAULT_CURRENCY, DEFAULT_COUNTRY, maskCardNumber } from './services/transaction.js';
export type { TransactionContext, TransactionSnapshot } from './services/transaction.js';
export {
  ENCRYPTION_ALGORITHM,
  deriveKey,
  encrypt,
  decrypt,
  encryptPayload,
  serializePayload,
} from './services/encryption.js';
export {
  HOSTED_SUCCESS_CODE,
  PAYMENT_SUCCESS_CODE,
  AUTHENTICATION_PENDING_CODE,
  classifyResponse,
  classifyInitialize,
  classifyVerify,
  classifyPayment,
  classifyTransportFailure,
  deriveChallenge,
  triageReply,
} from './services/response-classifier.js';
export { FetchTransport, buildHeaders, sendRequest } from './services/gateway-transport.js';
export type { FetchTransportOptions } from './services/gateway-transport.js';
export { BankRegistry, getDebitProfile, requiredFieldsFor, listDebitProfiles } from './services/bank-registry.js';
export {
  validateStartRequest,
  validatePinRequest,
  validateAvsRequest,
  validateOtpRequest,
  validateTransactionId,
} from './services/validation.js';
export { withRetry } from './services/retry.js';
export type * from './types/gateway.js';
export type * from './types/payment.js';
