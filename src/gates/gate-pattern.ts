import type { GateContext, SecurityGateConfig } from '../types/index.js';

// Credential-looking assignments and privileged account names
export const DEFAULT_BLOCKED_PATTERNS = [
  '\\b(password|token|secret|key)\\b=',
  '\\b(admin|root|administrator)\\b'
];

export function compilePatterns(patterns: string[]): RegExp[] {
  return patterns.map(pattern => new RegExp(pattern, 'i'));
}

// Sticky and global flags make test() stateful, so every check gets a fresh copy
function matches(pattern: RegExp, text: string): boolean {
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')).test(text);
}

export function scanPatterns(text: string, patterns: RegExp[]): string[] {
  return patterns.filter(pattern => matches(pattern, text)).map(pattern => pattern.source);
}

export function gatePattern(ctx: GateContext, config: SecurityGateConfig): GateContext {
  if (ctx.blocked) return ctx;

  const { url, headers } = ctx.request;
  const headerValues = Object.values(headers);

  for (const pattern of config.blockedPatterns) {
    if (matches(pattern, url) || headerValues.some(value => matches(pattern, value))) {
      return {
        ...ctx,
        blocked: {
          gate: 'pattern',
          reason: 'Suspicious pattern detected',
          code: 'PATTERN_BLOCKED'
        }
      };
    }
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, 'pattern']
  };
}
