import { setTimeout as sleep } from 'timers/promises';
import type pino from 'pino';
import { decodeRequest, encodeResponse, type ResponseParams } from '../codec/index.js';
import { SecurityDeniedError, TransportError, errorMessage } from '../errors.js';
import type { SecurityGate } from '../gates/index.js';
import type { EventLog } from '../store/event-log.js';
import type { ExchangeStore } from '../store/exchange-store.js';
import type { OutboundResult, OutboundTransport } from '../transport/http-transport.js';
import type { RequestDescriptor } from '../types/index.js';

export interface ForwarderOptions {
  pollIntervalMs: number;
  outboundTimeoutMs: number;
  maintenanceIntervalMs: number;
  staleResponseMs: number;
}

export type ProcessOutcome = 'forwarded' | 'blocked' | 'failed' | 'skipped' | 'gone';

export interface ScanSummary {
  found: number;
  outcomes: Record<ProcessOutcome, number>;
}

export interface MaintenanceSummary {
  transportReset: boolean;
  staleRemoved: string[];
}

const ERROR_BACKOFF_MS = 1000;
const TEXT_HEADERS = { 'Content-Type': 'text/plain' };

function errorResponse(status: number, reason: string, message: string): ResponseParams {
  return {
    status,
    reason,
    headers: { ...TEXT_HEADERS },
    body: Buffer.from(message, 'utf-8'),
    securityStatus: 'error'
  };
}

/**
 * Egress side of the relay. Each scan picks up published requests, runs them
 * through the security gate, performs the real call and publishes exactly one
 * response per request id.
 */
export class ForwarderAgent {
  private store: ExchangeStore;
  private gate: SecurityGate;
  private transport: OutboundTransport;
  private events: EventLog;
  private logger: pino.Logger;
  private options: ForwarderOptions;
  private running = false;
  private abort?: AbortController;

  constructor(
    store: ExchangeStore,
    gate: SecurityGate,
    transport: OutboundTransport,
    events: EventLog,
    logger: pino.Logger,
    options: ForwarderOptions
  ) {
    this.store = store;
    this.gate = gate;
    this.transport = transport;
    this.events = events;
    this.logger = logger.child({ component: 'forwarder' });
    this.options = options;
  }

  get isRunning(): boolean {
    return this.running;
  }

  blockDomain(domain: string): void {
    this.gate.addBlockedDomain(domain);
  }

  async start(): Promise<void> {
    if (this.running) {
      throw new Error('Forwarder is already running');
    }

    await this.store.init();
    this.running = true;
    const abort = new AbortController();
    this.abort = abort;

    this.logger.info(
      {
        requests: this.store.dir('requests'),
        responses: this.store.dir('responses'),
        policy_hash: this.gate.fingerprint()
      },
      'Started forwarder'
    );

    let lastMaintenance = Date.now();

    while (this.running) {
      let delay = this.options.pollIntervalMs;

      try {
        await this.scanOnce();

        if (Date.now() - lastMaintenance >= this.options.maintenanceIntervalMs) {
          lastMaintenance = Date.now();
          await this.runMaintenance();
        }
      } catch (error) {
        this.logger.error({ error: errorMessage(error) }, 'Error in main loop');
        delay = ERROR_BACKOFF_MS;
      }

      try {
        await sleep(delay, undefined, { signal: abort.signal });
      } catch (error) {
        if (!abort.signal.aborted) throw error;
      }
    }

    this.logger.info('Forwarder stopped');
  }

  stop(): void {
    if (!this.running) return;
    this.logger.info('Shutting down forwarder');
    this.running = false;
    this.abort?.abort();
  }

  async scanOnce(): Promise<ScanSummary> {
    const ids = await this.store.listPending('requests');
    const summary: ScanSummary = {
      found: ids.size,
      outcomes: { forwarded: 0, blocked: 0, failed: 0, skipped: 0, gone: 0 }
    };

    if (ids.size > 0) {
      this.logger.info(`Found ${ids.size} request files`);
      this.events.log('SCAN', undefined, `found ${ids.size} request files`);
    }

    for (const id of ids) {
      if (this.abort?.signal.aborted) break;
      const outcome = await this.processRequest(id);
      summary.outcomes[outcome]++;
    }

    return summary;
  }

  async processRequest(id: string): Promise<ProcessOutcome> {
    const log = this.logger.child({ request_id: id });

    try {
      if (await this.store.exists('responses', id)) {
        this.events.log('REQUEST_SKIP', id, 'response already exists');
        return 'skipped';
      }

      const read = await this.store.tryRead('requests', id, decodeRequest);

      if (read.status === 'absent') {
        log.debug('Request vanished before processing');
        return 'gone';
      }

      if (read.status === 'corrupt') {
        log.error({ error: read.error }, 'Unreadable request');
        this.events.log('REQUEST_FAILED', id, `decode failed: ${read.error}`);
        await this.publishResponse(id, errorResponse(502, 'Bad Gateway', `Processing error: ${read.error}`), log);
        await this.store.delete('requests', id);
        return 'failed';
      }

      const request = read.value;
      log.info({ method: request.method, url: request.url }, 'Processing request');
      this.events.log('REQUEST_START', id, `${request.method} ${request.url}`);

      const decision = this.gate.validateRequest(request);
      if (!decision.allowed) {
        const denied = new SecurityDeniedError(decision.reason);
        log.warn({ code: decision.code }, denied.message);
        await this.publishResponse(id, errorResponse(403, 'Forbidden', denied.message), log);
        await this.store.delete('requests', id);
        this.events.log('REQUEST_FAILED', id, denied.message);
        return 'blocked';
      }

      const result = await this.forward(request, log);
      const filter = this.gate.filterResponse(result.body);

      if (filter.filtered) {
        log.warn({ original_bytes: result.body.length }, 'Response content was filtered');
      }

      await this.publishResponse(
        id,
        {
          status: result.status,
          reason: result.reason,
          headers: result.headers,
          body: filter.body,
          filtered: filter.filtered,
          suspiciousContent: filter.matches.length > 0,
          securityStatus: 'approved'
        },
        log
      );
      await this.store.delete('requests', id);

      this.events.log('REQUEST_SUCCESS', id, `${result.status} ${result.reason}`);
      return 'forwarded';
    } catch (error) {
      const message = errorMessage(error);
      log.error({ error: message }, 'Error processing request');
      this.events.log('REQUEST_FAILED', id, `processing error: ${message}`);

      // The request stays pending only if no response could be written for it
      try {
        await this.publishResponse(id, errorResponse(502, 'Bad Gateway', `Processing error: ${message}`), log);
        await this.store.delete('requests', id);
      } catch (publishError) {
        log.error({ error: errorMessage(publishError) }, 'Failed to publish error response');
      }
      return 'failed';
    }
  }

  private async forward(request: RequestDescriptor, log: pino.Logger): Promise<OutboundResult> {
    try {
      return await this.transport.call({
        method: request.method,
        url: request.url,
        headers: request.headers,
        body: request.body,
        timeoutMs: this.options.outboundTimeoutMs
      });
    } catch (error) {
      if (!(error instanceof TransportError)) throw error;

      log.error({ error: error.message }, 'HTTP request failed');
      return {
        status: 502,
        reason: 'Bad Gateway',
        headers: { ...TEXT_HEADERS },
        body: Buffer.from(`Request failed: ${error.message}`, 'utf-8')
      };
    }
  }

  // A response is written at most once per id
  private async publishResponse(id: string, params: ResponseParams, log: pino.Logger): Promise<boolean> {
    if (await this.store.exists('responses', id)) {
      log.warn('Response already exists, not overwriting');
      return false;
    }

    await this.store.publish('responses', id, encodeResponse(id, params));
    log.info({ status: params.status }, 'Response written');
    return true;
  }

  async runMaintenance(now: number = Date.now()): Promise<MaintenanceSummary> {
    let transportReset = false;
    if (this.transport.reset) {
      await this.transport.reset();
      transportReset = true;
    }

    const staleRemoved: string[] = [];
    for (const id of await this.store.listStale('responses', this.options.staleResponseMs, now)) {
      await this.store.delete('responses', id);
      await this.store.delete('requests', id);
      staleRemoved.push(id);
    }

    this.logger.info({ transport_reset: transportReset, stale_removed: staleRemoved.length }, 'Maintenance complete');
    return { transportReset, staleRemoved };
  }
}
