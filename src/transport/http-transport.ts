import type pino from 'pino';
import { Agent, fetch } from 'undici';
import { TransportError, errorMessage } from '../errors.js';
import type { HeaderMap } from '../types/index.js';

export interface OutboundCall {
  method: string;
  url: string;
  headers: HeaderMap;
  body: Buffer;
  timeoutMs: number;
}

export interface OutboundResult {
  status: number;
  reason: string;
  headers: HeaderMap;
  body: Buffer;
}

export interface OutboundTransport {
  call(request: OutboundCall): Promise<OutboundResult>;
  // Drop pooled connections and any cached lookups
  reset?(): Promise<void>;
  close?(): Promise<void>;
}

// Hop-by-hop and proxy headers that must not travel with the forwarded call
const STRIPPED_REQUEST_HEADERS = new Set([
  'proxy-connection',
  'proxy-authorization',
  'connection',
  'keep-alive',
  'transfer-encoding',
  'upgrade',
  'te',
  'trailer',
  'host',
  'content-length'
]);

// The body handed back is already decoded
const STRIPPED_RESPONSE_HEADERS = new Set(['content-encoding', 'content-length', 'transfer-encoding']);

export function forwardableHeaders(headers: HeaderMap): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (!STRIPPED_REQUEST_HEADERS.has(name.toLowerCase())) {
      result[name] = value;
    }
  }
  return result;
}

const BODYLESS_METHODS = new Set(['GET', 'HEAD']);

export interface HttpTransportOptions {
  keepAliveTimeoutMs?: number;
  logger?: pino.Logger;
}

export class HttpTransport implements OutboundTransport {
  private agent: Agent;
  private options: HttpTransportOptions;
  private logger?: pino.Logger;

  constructor(options: HttpTransportOptions = {}) {
    this.options = options;
    this.logger = options.logger?.child({ component: 'transport' });
    this.agent = this.createAgent();
  }

  private createAgent(): Agent {
    return new Agent({
      keepAliveTimeout: this.options.keepAliveTimeoutMs ?? 10_000
    });
  }

  async call(request: OutboundCall): Promise<OutboundResult> {
    const method = request.method.toUpperCase();
    const sendBody = !BODYLESS_METHODS.has(method) && request.body.length > 0;

    // fetch refuses a body on GET and HEAD
    if (BODYLESS_METHODS.has(method) && request.body.length > 0) {
      this.logger?.warn({ method, url: request.url, bytes: request.body.length }, 'Discarding request body');
    }

    try {
      const response = await fetch(request.url, {
        method,
        headers: forwardableHeaders(request.headers),
        body: sendBody ? request.body : undefined,
        redirect: 'follow',
        dispatcher: this.agent,
        signal: AbortSignal.timeout(request.timeoutMs)
      });

      const body = Buffer.from(await response.arrayBuffer());
      const headers: HeaderMap = {};
      response.headers.forEach((value, name) => {
        if (!STRIPPED_RESPONSE_HEADERS.has(name) && name !== 'set-cookie') {
          headers[name] = value;
        }
      });
      const cookies = response.headers.getSetCookie();
      if (cookies.length > 0) {
        headers['set-cookie'] = cookies.join(', ');
      }

      return {
        status: response.status,
        reason: response.statusText,
        headers,
        body
      };
    } catch (error) {
      throw new TransportError(`${method} ${request.url} failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  async reset(): Promise<void> {
    const previous = this.agent;
    this.agent = this.createAgent();
    await previous.close();
  }

  async close(): Promise<void> {
    await this.agent.close();
  }
}
