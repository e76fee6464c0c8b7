/**
 * Bank Registry
 *
 * Static per-bank debit requirements plus the gateway's list of banks that
 * accept direct account debits.
 *
 * Bank-specific fields:
 *   - Zenith (057): dateOfBirth (DDMMYYYY)
 *   - UBA (033): dateOfBirth and bvn
 *   - GTBank (058), First Bank (011): redirectUrl
 */

import { GatewayReply, Transport } from '../types/gateway.js';
import { Bank, BankDebitProfile, BankRequirement } from '../types/payment.js';
import { isRecord, readRecord, readString } from '../utils/records.js';
import { buildHeaders, sendRequest } from './gateway-transport.js';
import { triageReply } from './response-classifier.js';

const DEBIT_PROFILES: BankDebitProfile[] = [
  { bankCode: '057', bankName: 'Zenith Bank', requiredFields: ['dateOfBirth'] },
  { bankCode: '033', bankName: 'United Bank for Africa', requiredFields: ['dateOfBirth', 'bvn'] },
  { bankCode: '058', bankName: 'Guaranty Trust Bank', requiredFields: ['redirectUrl'] },
  { bankCode: '011', bankName: 'First Bank of Nigeria', requiredFields: ['redirectUrl'] },
];

const profiles = new Map(DEBIT_PROFILES.map((profile) => [profile.bankCode, profile]));

/**
 * Get the debit profile for a bank code
 * @returns The profile, or undefined when the bank needs no extra fields
 */
export function getDebitProfile(bankCode: string): BankDebitProfile | undefined {
  return profiles.get(bankCode);
}

export function requiredFieldsFor(bankCode: string): BankRequirement[] {
  return profiles.get(bankCode)?.requiredFields ?? [];
}

export function listDebitProfiles(): BankDebitProfile[] {
  return Array.from(profiles.values());
}

function extractBankEntries(parsed: unknown): unknown[] {
  if (Array.isArray(parsed)) {
    return parsed;
  }
  if (!isRecord(parsed)) {
    return [];
  }

  const data = parsed.data;
  if (Array.isArray(data)) {
    return data;
  }
  const banks = readRecord(parsed, 'data')?.banks ?? parsed.banks;
  return Array.isArray(banks) ? banks : [];
}

export class BankRegistry {
  private transport: Transport;
  private baseUrl: string;
  private publicKey: string;

  constructor(options: { transport: Transport; baseUrl: string; publicKey: string }) {
    this.transport = options.transport;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.publicKey = options.publicKey;
  }

  /**
   * List all banks supported for account payments, in gateway order
   */
  async listBanks(): Promise<Bank[]> {
    const reply: GatewayReply = await sendRequest(this.transport, {
      method: 'GET',
      url: `${this.baseUrl}/v1/banks?publicKey=${encodeURIComponent(this.publicKey)}`,
      headers: buildHeaders(this.publicKey),
    });

    const banks: Bank[] = [];
    for (const entry of extractBankEntries(triageReply(reply))) {
      if (!isRecord(entry)) {
        continue;
      }
      banks.push({
        name: readString(entry, 'name') ?? readString(entry, 'bankName') ?? '',
        code: readString(entry, 'code') ?? readString(entry, 'bankCode') ?? '',
        raw: entry,
      });
    }
    return banks;
  }

  getDebitProfile(bankCode: string): BankDebitProfile | undefined {
    return getDebitProfile(bankCode);
  }

  requiredFieldsFor(bankCode: string): BankRequirement[] {
    return requiredFieldsFor(bankCode);
  }
}
