import { setTimeout as sleep } from 'timers/promises';
import type pino from 'pino';
import { decodeResponse, encodeRequest, verifyDigest } from '../codec/index.js';
import { DecodeError, IntegrityMismatchError, RelayTimeoutError, errorMessage } from '../errors.js';
import type { EventLog } from '../store/event-log.js';
import type { ExchangeStore } from '../store/exchange-store.js';
import type {
  CapturedCall,
  ExchangeState,
  HeaderMap,
  RelayOutcome,
  RelayResult,
  ResponseDescriptor
} from '../types/index.js';

export interface InterceptorOptions {
  responseTimeoutMs: number;
  pollIntervalMs: number;
}

export interface RelayOptions {
  signal?: AbortSignal;
}

const TEXT_HEADERS: HeaderMap = { 'Content-Type': 'text/plain' };

type Terminal = {
  state: Extract<ExchangeState, 'RESOLVED' | 'TIMED_OUT' | 'CORRUPTED' | 'ABORTED'>;
  outcome: RelayOutcome;
  status: number;
  reason: string;
  headers: HeaderMap;
  body: Buffer;
  filtered: boolean;
};

function synthesized(
  state: Terminal['state'],
  outcome: RelayOutcome,
  status: number,
  reason: string,
  message: string
): Terminal {
  return { state, outcome, status, reason, headers: { ...TEXT_HEADERS }, body: Buffer.from(message, 'utf-8'), filtered: false };
}

/**
 * Runs one exchange per captured call: publish the request, wait for the
 * forwarder's response, verify it and hand it back to the capture point.
 *
 * Invocations share nothing but the store, so any number may run at once.
 */
export class InterceptorAgent {
  private store: ExchangeStore;
  private events: EventLog;
  private logger: pino.Logger;
  private options: InterceptorOptions;

  constructor(store: ExchangeStore, events: EventLog, logger: pino.Logger, options: InterceptorOptions) {
    this.store = store;
    this.events = events;
    this.logger = logger.child({ component: 'interceptor' });
    this.options = options;
  }

  async relay(call: CapturedCall, relayOptions: RelayOptions = {}): Promise<RelayResult> {
    const startTime = Date.now();
    const { id, bytes } = encodeRequest({
      method: call.method,
      url: call.url,
      headers: call.headers,
      body: call.body,
      httpVersion: call.httpVersion
    });
    const log = this.logger.child({ request_id: id });
    let state: ExchangeState = 'CREATED';

    const transition = (next: ExchangeState): void => {
      log.debug({ from: state, to: next }, 'Exchange state change');
      state = next;
    };

    try {
      await this.store.publish('requests', id, bytes);
    } catch (error) {
      const message = errorMessage(error);
      log.error({ error: message }, 'Failed to publish request');
      this.events.log('REQUEST_FAILED', id, `publish failed: ${message}`);
      await this.cleanup(id, log);
      transition('CLEANED_UP');
      return {
        requestId: id,
        outcome: 'failed',
        status: 500,
        reason: 'Internal Server Error',
        headers: { ...TEXT_HEADERS },
        body: Buffer.from(`Proxy error: ${message}`, 'utf-8'),
        filtered: false,
        elapsedMs: Date.now() - startTime
      };
    }

    transition('PUBLISHED');
    log.info({ method: call.method, url: call.url }, 'Serialized request');
    this.events.log('REQUEST_START', id, `${call.method} ${call.url}`);

    transition('WAITING');
    let terminal: Terminal;
    try {
      terminal = await this.waitForResponse(id, startTime, relayOptions.signal, log);
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Error processing response');
      terminal = synthesized('CORRUPTED', 'corrupted', 502, 'Bad Gateway', `Response processing error: ${errorMessage(error)}`);
    }
    transition(terminal.state);

    if (terminal.outcome === 'resolved') {
      this.events.log('REQUEST_SUCCESS', id, `${terminal.status} ${terminal.reason}`);
    } else {
      this.events.log('REQUEST_FAILED', id, `${terminal.outcome}: ${terminal.body.toString('utf-8')}`);
    }

    await this.cleanup(id, log);
    transition('CLEANED_UP');

    return {
      requestId: id,
      outcome: terminal.outcome,
      status: terminal.status,
      reason: terminal.reason,
      headers: terminal.headers,
      body: terminal.body,
      filtered: terminal.filtered,
      elapsedMs: Date.now() - startTime
    };
  }

  private async waitForResponse(
    id: string,
    startTime: number,
    signal: AbortSignal | undefined,
    log: pino.Logger
  ): Promise<Terminal> {
    const deadline = startTime + this.options.responseTimeoutMs;
    const parse = (raw: Buffer): ResponseDescriptor => {
      const descriptor = decodeResponse(raw);
      if (descriptor.id !== id) {
        throw new DecodeError(`Response carries request id ${descriptor.id}`);
      }
      return descriptor;
    };

    for (;;) {
      if (signal?.aborted) {
        log.warn('Relay interrupted while waiting for response');
        return synthesized('ABORTED', 'aborted', 503, 'Service Unavailable', 'Relay interrupted');
      }

      const read = await this.store.tryRead('responses', id, parse);

      if (read.status === 'ok') {
        const response = read.value;
        if (!verifyDigest(response)) {
          log.error(new IntegrityMismatchError(id).message);
          return synthesized('CORRUPTED', 'corrupted', 502, 'Bad Gateway', 'Response integrity check failed');
        }
        log.info({ status: response.status, filtered: response.filtered }, 'Reconstructed response');
        return {
          state: 'RESOLVED',
          outcome: 'resolved',
          status: response.status,
          reason: response.reason,
          headers: response.headers,
          body: response.body,
          filtered: response.filtered
        };
      }

      if (read.status === 'corrupt') {
        log.error({ error: read.error }, 'Error processing response');
        return synthesized('CORRUPTED', 'corrupted', 502, 'Bad Gateway', `Response processing error: ${read.error}`);
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        log.error(new RelayTimeoutError(id, this.options.responseTimeoutMs).message);
        return synthesized('TIMED_OUT', 'timed_out', 504, 'Gateway Timeout', 'Gateway Timeout: No response from relay');
      }

      try {
        await sleep(Math.min(this.options.pollIntervalMs, remaining), undefined, { signal });
      } catch (error) {
        if (!signal?.aborted) throw error;
      }
    }
  }

  private async cleanup(id: string, log: pino.Logger): Promise<void> {
    // Request first: a scan must never find a request whose response is already gone
    for (const kind of ['requests', 'responses'] as const) {
      try {
        await this.store.delete(kind, id);
      } catch (error) {
        log.warn({ kind, error: errorMessage(error) }, 'Failed to clean up exchange file');
      }
    }
  }
}
