import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import pino from 'pino';
import { ForwarderAgent, type ForwarderOptions } from '../agents/forwarder.js';
import { InterceptorAgent, type InterceptorOptions } from '../agents/interceptor.js';
import { SecurityGate, type SecurityGateOptions } from '../gates/index.js';
import { EventLog } from '../store/event-log.js';
import { ExchangeStore } from '../store/exchange-store.js';
import type { OutboundCall, OutboundResult, OutboundTransport } from '../transport/http-transport.js';

export const silentLogger = pino({ level: 'silent' });

export function createTempStore(options: { readRetries?: number; readBackoffMs?: number } = {}) {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-test-'));
  const store = new ExchangeStore(dir, { readRetries: 1, readBackoffMs: 5, ...options });
  return {
    dir,
    store,
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
}

export class FakeTransport implements OutboundTransport {
  calls: OutboundCall[] = [];
  resets = 0;
  private handler: (call: OutboundCall) => Promise<OutboundResult>;

  constructor(handler?: (call: OutboundCall) => Promise<OutboundResult>) {
    this.handler = handler ?? (async () => ({
      status: 200,
      reason: 'OK',
      headers: { 'content-type': 'text/plain' },
      body: Buffer.from('hello'),
    }));
  }

  async call(request: OutboundCall): Promise<OutboundResult> {
    this.calls.push(request);
    return this.handler(request);
  }

  async reset(): Promise<void> {
    this.resets++;
  }
}

export const gateDefaults: SecurityGateOptions = {
  blockedDomains: ['blocked.example'],
  blockedPatterns: ['\\b(password|token|secret|key)\\b=', '\\b(admin|root|administrator)\\b'],
  maxRequestBytes: 1024,
  maxResponseBytes: 1024,
};

export const forwarderDefaults: ForwarderOptions = {
  pollIntervalMs: 10,
  outboundTimeoutMs: 1000,
  maintenanceIntervalMs: 60_000,
  staleResponseMs: 60_000,
};

export function createForwarder(
  store: ExchangeStore,
  transport: OutboundTransport,
  overrides: { gate?: Partial<SecurityGateOptions>; options?: Partial<ForwarderOptions> } = {},
) {
  const gate = new SecurityGate({ ...gateDefaults, ...overrides.gate }, silentLogger);
  const events = new EventLog(path.join(store.logDir, 'forwarder.log'));
  const forwarder = new ForwarderAgent(store, gate, transport, events, silentLogger, {
    ...forwarderDefaults,
    ...overrides.options,
  });
  return { forwarder, gate, events };
}

export function createInterceptor(store: ExchangeStore, options: Partial<InterceptorOptions> = {}) {
  const events = new EventLog(path.join(store.logDir, 'interceptor.log'));
  const interceptor = new InterceptorAgent(store, events, silentLogger, {
    responseTimeoutMs: 2000,
    pollIntervalMs: 10,
    ...options,
  });
  return { interceptor, events };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export async function waitFor<T>(probe: () => Promise<T | undefined>, timeoutMs = 2000): Promise<T> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    const value = await probe();
    if (value !== undefined) return value;
    await delay(5);
  }
  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

export async function waitForRequestId(store: ExchangeStore): Promise<string> {
  return waitFor(async () => {
    const [id] = await store.listPending('requests');
    return id;
  });
}

// Keep scanning until the given promise settles
export async function serveWhile<T>(forwarder: ForwarderAgent, work: Promise<T>): Promise<T> {
  let settled = false;
  const tracked = work.finally(() => { settled = true; });
  while (!settled) {
    await forwarder.scanOnce();
    await delay(5);
  }
  return tracked;
}
