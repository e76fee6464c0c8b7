import { jest } from '@jest/globals';
import { TransportFailure } from '../../errors/index.js';
import { GatewayReply, Logger, Transport, TransportRequest } from '../../types/gateway.js';

/**
 * Mock gateway transport for testing
 * Replays queued replies in order without HTTP calls
 */
export class MockTransport implements Transport {
  private replies: Array<GatewayReply | Error> = [];

  // Call tracking
  public calls: TransportRequest[] = [];

  // Configuration
  public shouldFailNetwork = false;
  public networkErrorMessage = 'connect ECONNREFUSED 127.0.0.1:6004';

  /**
   * Queue a JSON reply
   */
  reply(body: Record<string, unknown> | unknown[], status = 200): this {
    this.replies.push({ status, body: JSON.stringify(body) });
    return this;
  }

  /**
   * Queue a raw text reply
   */
  replyText(body: string, status: number): this {
    this.replies.push({ status, body });
    return this;
  }

  /**
   * Queue an error thrown by send()
   */
  fail(error: Error): this {
    this.replies.push(error);
    return this;
  }

  get callCount(): number {
    return this.calls.length;
  }

  lastCall(): TransportRequest {
    const call = this.calls[this.calls.length - 1];
    if (!call) {
      throw new Error('MockTransport: no calls recorded');
    }
    return call;
  }

  async send(request: TransportRequest): Promise<GatewayReply> {
    this.calls.push(request);

    if (this.shouldFailNetwork) {
      throw new TransportFailure(this.networkErrorMessage);
    }

    const next = this.replies.shift();
    if (!next) {
      throw new Error(`MockTransport: no reply queued for ${request.method} ${request.url}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  }
}

export interface RecordingLogger extends Logger {
  log: jest.Mock<(...args: unknown[]) => void>;
  warn: jest.Mock<(...args: unknown[]) => void>;
  error: jest.Mock<(...args: unknown[]) => void>;
}

/**
 * Logger that records instead of printing
 */
export function createRecordingLogger(): RecordingLogger {
  return {
    log: jest.fn<(...args: unknown[]) => void>(),
    warn: jest.fn<(...args: unknown[]) => void>(),
    error: jest.fn<(...args: unknown[]) => void>(),
  };
}

/**
 * Everything the logger received, as one string
 */
export function loggedText(logger: RecordingLogger): string {
  return [...logger.log.mock.calls, ...logger.warn.mock.calls, ...logger.error.mock.calls]
    .map((args) => JSON.stringify(args))
    .join('\n');
}
