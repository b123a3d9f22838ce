import type { GateContext, SecurityGateConfig } from '../types/index.js';

export function gateSize(ctx: GateContext, config: SecurityGateConfig): GateContext {
  if (ctx.blocked) return ctx;

  const size = ctx.request.body.length;
  if (size > config.maxRequestBytes) {
    return {
      ...ctx,
      blocked: {
        gate: 'size',
        reason: `Request size ${size} exceeds limit`,
        code: 'REQUEST_TOO_LARGE'
      }
    };
  }

  return {
    ...ctx,
    gatesPassed: [...ctx.gatesPassed, 'size']
  };
}
