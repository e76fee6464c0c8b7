import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import {
  AvsAuthenticationRequest,
  OtpValidationRequest,
  PinAuthenticationRequest,
  StartRequest,
} from '../types/payment.js';
import { getDebitProfile } from './bank-registry.js';

// Blank strings count as missing
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const required = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema);
const optional = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankToUndefined, schema.optional());

const digits = (min: number, max: number, label: string) =>
  z.string().regex(new RegExp(`^\\d{${min},${max}}$`), `must be ${label}`);

// === Common ===

export const transactionIdSchema = required(
  z.string().min(6, 'must be at least 6 characters').max(30, 'must be at most 30 characters')
);

const emailSchema = required(z.string().email('must be a valid email address'));

/** Card and account debits are denominated in kobo */
const koboAmountSchema = required(z.string().regex(/^[1-9]\d*$/, 'must be a positive whole number of kobo'));

/** Hosted page takes major units, e.g. "1000.00" */
const majorAmountSchema = required(
  z
    .string()
    .regex(/^\d+(\.\d{1,2})?$/, 'must be a decimal amount with at most two decimal places')
    .refine((value) => Number(value) > 0, 'must be greater than zero')
);

const currencySchema = optional(z.string().regex(/^[A-Z]{3}$/, 'must be an ISO 4217 code'));
const countrySchema = optional(z.string().regex(/^[A-Z]{2}$/, 'must be an ISO 3166 alpha-2 code'));

const customerShape = {
  phoneNumber: optional(z.string()),
  firstName: optional(z.string()),
  lastName: optional(z.string()),
  ip: optional(z.string().ip()),
  deviceFingerPrint: optional(z.string()),
};

const billingShape = {
  billingZip: optional(z.string()),
  billingCity: optional(z.string()),
  billingAddress: optional(z.string()),
  billingState: optional(z.string()),
  billingCountry: optional(z.string()),
};

// === Hosted ===

export const hostedInitializeSchema = z.object({
  amount: majorAmountSchema,
  email: emailSchema,
  transactionId: transactionIdSchema,
  currency: currencySchema,
  callbackUrl: optional(z.string().url('must be a valid URL')),
  productId: optional(z.string()),
  productDescription: optional(z.string()),
  applyConviniencyCharge: z.boolean().optional(),
  metadata: z.array(z.object({ name: z.string(), value: z.string() })).optional(),
});

// === Card ===

export const cardInitiateSchema = z.object({
  cardNumber: required(digits(12, 19, '12 to 19 digits')),
  cvv: required(digits(3, 4, '3 or 4 digits')),
  expiryMonth: required(z.string().regex(/^(0[1-9]|1[0-2])$/, 'must be a month from 01 to 12')),
  expiryYear: required(z.string().regex(/^(\d{2}|\d{4})$/, 'must be a 2 or 4 digit year')),
  amount: koboAmountSchema,
  email: emailSchema,
  transactionId: transactionIdSchema,
  currency: currencySchema,
  country: countrySchema,
  redirectUrl: optional(z.string().url('must be a valid URL')),
  meta: z.array(z.object({ metaName: z.string(), metaValue: z.string() })).optional(),
  ...customerShape,
  ...billingShape,
});

// === Account ===

export const accountInitiateSchema = z
  .object({
    accountNumber: required(digits(10, 10, '10 digits')),
    bankCode: required(z.string().regex(/^\d{3,6}$/, 'must be a numeric bank code')),
    amount: koboAmountSchema,
    email: emailSchema,
    transactionId: transactionIdSchema,
    currency: currencySchema,
    country: countrySchema,
    dateOfBirth: optional(z.string().regex(/^(0[1-9]|[12]\d|3[01])(0[1-9]|1[0-2])\d{4}$/, 'must be DDMMYYYY')),
    bvn: optional(digits(11, 11, '11 digits')),
    redirectUrl: optional(z.string().url('must be a valid URL')),
    ...customerShape,
  })
  .superRefine((request, ctx) => {
    const profile = getDebitProfile(request.bankCode);
    if (!profile) {
      return;
    }
    for (const field of profile.requiredFields) {
      if (request[field] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [field],
          message: `is required for ${profile.bankName} (${profile.bankCode})`,
          params: { missing: true },
        });
      }
    }
  });

// === Authentication steps ===

export const pinAuthenticationSchema = z.object({
  pin: required(z.string().regex(/^\d{4}$/, 'must be exactly 4 digits')),
});

export const avsAuthenticationSchema = z.object({
  billingAddress: required(z.string()),
  billingCity: required(z.string()),
  billingZip: required(z.string()),
  billingCountry: required(z.string()),
  billingState: optional(z.string()),
});

export const otpValidationSchema = z.object({
  otp: required(digits(4, 8, '4 to 8 digits')),
  paymentType: z.enum(['CARD', 'ACCOUNT']),
});

function isMissing(issue: z.ZodIssue): boolean {
  if (issue.code === z.ZodIssueCode.invalid_type) {
    return issue.received === 'undefined';
  }
  return issue.code === z.ZodIssueCode.custom && issue.params?.missing === true;
}

/**
 * Convert zod issues into a single ValidationError.
 * Any absent required field makes the whole error a "missing_field".
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const missing: string[] = [];
  const invalid: string[] = [];

  for (const issue of error.issues) {
    const field = issue.path.join('.') || 'request';
    if (isMissing(issue)) {
      if (!missing.includes(field)) missing.push(field);
    } else {
      invalid.push(`${field} ${issue.message}`);
    }
  }

  const fields = [...new Set(error.issues.map((issue) => issue.path.join('.') || 'request'))];

  if (missing.length > 0) {
    const extra = invalid.length > 0 ? `; invalid: ${invalid.join(', ')}` : '';
    return new ValidationError(`Missing required field(s): ${missing.join(', ')}${extra}`, {
      errorType: 'missing_field',
      fields,
    });
  }
  return new ValidationError(`Invalid field(s): ${invalid.join(', ')}`, {
    errorType: 'invalid_field',
    fields,
  });
}

function check(schema: z.ZodTypeAny, input: unknown): void {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw toValidationError(result.error);
  }
}

/**
 * Validate the first request of a transaction against its branch's schema
 */
export function validateStartRequest(start: StartRequest): void {
  switch (start.kind) {
    case 'HOSTED':
      return check(hostedInitializeSchema, start.request);
    case 'CARD':
      return check(cardInitiateSchema, start.request);
    case 'ACCOUNT':
      return check(accountInitiateSchema, start.request);
  }
}

export function validatePinRequest(request: PinAuthenticationRequest): void {
  check(pinAuthenticationSchema, request);
}

export function validateAvsRequest(request: AvsAuthenticationRequest): void {
  check(avsAuthenticationSchema, request);
}

export function validateOtpRequest(request: OtpValidationRequest): void {
  check(otpValidationSchema, request);
}

const transactionReferenceSchema = z.object({ transactionId: transactionIdSchema });

export function validateTransactionId(transactionId: string): void {
  check(transactionReferenceSchema, { transactionId });
}
