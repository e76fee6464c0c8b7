import { GatewayError, TransportFailure } from '../errors/index.js';
import { GatewayReply, Logger, Transport, TransportRequest } from '../types/gateway.js';
import { classifyTransportFailure } from './response-classifier.js';

/**
 * Default transport for communicating with the Xpresspay gateway
 * Uses the global fetch with a per-request timeout
 */

export interface FetchTransportOptions {
  timeoutMs: number;
  logger?: Logger;
}

export class FetchTransport implements Transport {
  private timeoutMs: number;
  private logger: Logger;

  constructor(options: FetchTransportOptions) {
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? console;
  }

  async send(request: TransportRequest): Promise<GatewayReply> {
    this.logger.log(`[FetchTransport] ${request.method} ${request.url}`);

    let response: Response;
    try {
      response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body ? JSON.stringify(request.body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'TimeoutError'
          ? `Request timed out after ${this.timeoutMs}ms`
          : error instanceof Error
            ? error.message
            : String(error);
      this.logger.error(`[FetchTransport] ${request.method} ${request.url} failed: ${reason}`);
      throw new TransportFailure(reason, { cause: error });
    }

    // The gateway has seen the request by now, so this is not a TransportFailure
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw new GatewayError(
        `Failed to read response body: ${error instanceof Error ? error.message : String(error)}`,
        response.status
      );
    }

    if (!response.ok) {
      this.logger.error(`[FetchTransport] Error ${response.status}: ${text.substring(0, 500)}`);
    }

    return { status: response.status, body: text };
  }
}

export function buildHeaders(publicKey: string): Record<string, string> {
  return {
    'Content-Type': 'application/json',
    Accept: 'application/json',
    Authorization: `Bearer ${publicKey}`,
  };
}

/**
 * Send through any Transport, converting a TransportFailure into a NetworkError
 */
export async function sendRequest(transport: Transport, request: TransportRequest): Promise<GatewayReply> {
  try {
    return await transport.send(request);
  } catch (error) {
    if (error instanceof TransportFailure) {
      throw classifyTransportFailure(error);
    }
    throw error;
  }
}
