import dotenv from 'dotenv';

dotenv.config({ quiet: true });

export const LIVE_BASE_URL = 'https://myxpresspay.com:6004';
export const SANDBOX_BASE_URL = 'https://pgsandbox.xpresspayments.com:6004';

export interface RetrySettings {
  maxRetries: number;
  retryDelayMs: number;
}

export interface GatewayConfig {
  publicKey?: string;
  secretKey?: string;
  sandbox: boolean;
  /** Explicit endpoint override; otherwise chosen by `sandbox` */
  baseUrl?: string;
  timeoutMs: number;
  retry: RetrySettings;
}

type Env = Record<string, string | undefined>;

// Anything other than an explicit "false"/"0" keeps the sandbox on
const parseSandbox = (value: string | undefined): boolean => {
  if (value === undefined) {
    return true;
  }
  return !['false', '0', 'no', 'live'].includes(value.trim().toLowerCase());
};

const parseIntOr = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

/**
 * Read gateway settings from the environment.
 * Returns a fresh object on every call; clients never share a mutable config.
 */
export function loadConfig(env: Env = process.env): GatewayConfig {
  const sandbox = parseSandbox(env.XPRESSPAY_SANDBOX);

  return {
    publicKey: env.XPRESSPAY_PUBLIC_KEY || undefined,
    secretKey: env.XPRESSPAY_SECRET_KEY || undefined,
    sandbox,
    baseUrl: env.XPRESSPAY_BASE_URL || undefined,

    // Per-request timeout handed to the transport
    timeoutMs: parseIntOr(env.XPRESSPAY_TIMEOUT_MS, 30000),

    // Defaults for withRetry()
    retry: {
      maxRetries: parseIntOr(env.XPRESSPAY_MAX_RETRIES, 3),
      retryDelayMs: parseIntOr(env.XPRESSPAY_RETRY_DELAY_MS, 500),
    },
  };
}

export function resolveBaseUrl(sandbox: boolean, override?: string): string {
  return (override || (sandbox ? SANDBOX_BASE_URL : LIVE_BASE_URL)).replace(/\/+$/, '');
}
