import type pino from 'pino';
import { hashObject } from '../crypto/index.js';
import type {
  GateDecision,
  RequestDescriptor,
  ResponseFilterResult,
  SecurityGateConfig
} from '../types/index.js';
import { OVERSIZE_MARKER } from '../types/index.js';
import { compilePatterns, scanPatterns } from './gate-pattern.js';
import { runGateChain } from './chain.js';

export interface SecurityGateOptions {
  blockedDomains: Iterable<string>;
  blockedPatterns: string[];
  maxRequestBytes: number;
  maxResponseBytes: number;
}

/**
 * Policy consulted by the forwarder before and after each outbound call.
 *
 * Requests are denied on a blocked host, an oversized body or a blocked pattern in
 * the URL or a header value. Responses are only rewritten when they exceed the
 * size cap; pattern hits in a response body are reported, never redacted.
 */
export class SecurityGate {
  private config: SecurityGateConfig;
  private logger: pino.Logger;

  constructor(options: SecurityGateOptions, logger: pino.Logger) {
    this.config = {
      blockedDomains: new Set(Array.from(options.blockedDomains, domain => domain.toLowerCase())),
      blockedPatterns: compilePatterns(options.blockedPatterns),
      maxRequestBytes: options.maxRequestBytes,
      maxResponseBytes: options.maxResponseBytes
    };
    this.logger = logger.child({ component: 'security-gate' });
  }

  addBlockedDomain(domain: string): void {
    this.config.blockedDomains.add(domain.toLowerCase());
    this.logger.info({ domain }, 'Added domain to blocklist');
  }

  addBlockedPattern(pattern: string): void {
    this.config.blockedPatterns.push(...compilePatterns([pattern]));
    this.logger.info({ pattern }, 'Added blocked pattern');
  }

  get blockedDomains(): string[] {
    return Array.from(this.config.blockedDomains).sort();
  }

  // Stable digest of the active policy, logged at startup
  fingerprint(): string {
    return hashObject({
      blockedDomains: this.blockedDomains,
      blockedPatterns: this.config.blockedPatterns.map(pattern => pattern.source),
      maxRequestBytes: this.config.maxRequestBytes,
      maxResponseBytes: this.config.maxResponseBytes
    });
  }

  validateRequest(request: RequestDescriptor): GateDecision {
    const ctx = runGateChain(request, this.config);

    if (ctx.blocked) {
      this.logger.warn({ request_id: request.id, gate: ctx.blocked.gate, code: ctx.blocked.code }, ctx.blocked.reason);
      return { allowed: false, ...ctx.blocked };
    }

    return { allowed: true, gatesPassed: ctx.gatesPassed };
  }

  filterResponse(body: Buffer): ResponseFilterResult {
    if (body.length > this.config.maxResponseBytes) {
      return { body: Buffer.from(OVERSIZE_MARKER, 'utf-8'), filtered: true, matches: [] };
    }

    const matches = scanPatterns(body.toString('utf-8'), this.config.blockedPatterns);
    for (const pattern of matches) {
      this.logger.warn({ pattern }, 'Sensitive pattern in response body');
    }

    return { body, filtered: false, matches };
  }
}
