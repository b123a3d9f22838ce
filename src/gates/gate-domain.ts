import type { GateContext, SecurityGateConfig } from '../types/index.js';

export function extractHost(url: string): string | undefined {
  try {
    return new URL(url).hostname;
  } catch {
    return undefined;
  }
}

// Exact, case-insensitive host match. Subdomains of a blocked host are not blocked.
export function isBlockedHost(host: string, blockedDomains: Set<string>): boolean {
  return blockedDomains.has(host.toLowerCase());
}

export function gateDomain(ctx: GateContext, config: SecurityGateConfig): GateContext {
  if (ctx.blocked) return ctx;

  const host = extractHost(ctx.request.url);
  if (host === undefined) {
    return {
      ...ctx,
      blocked: {
        gate: 'domain',
        reason: `Invalid URL ${ctx.request.url}`,
        code: 'INVALID_URL'
      }
    };
  }

  if (isBlockedHost(host, config.blockedDomains)) {
    return {
      ...ctx,
      host,
      blocked: {
        gate: 'domain',
        reason: `Domain ${host} is blocked`,
        code: 'DOMAIN_BLOCKED'
      }
    };
  }

  return {
    ...ctx,
    host,
    gatesPassed: [...ctx.gatesPassed, 'domain']
  };
}
