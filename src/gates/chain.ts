import type { GateContext, RequestDescriptor, SecurityGateConfig } from '../types/index.js';
import { gateDomain } from './gate-domain.js';
import { gateSize } from './gate-size.js';
import { gatePattern } from './gate-pattern.js';

export function runGateChain(request: RequestDescriptor, config: SecurityGateConfig): GateContext {
  let result: GateContext = { request, gatesPassed: [] };

  // Domain blocklist
  result = gateDomain(result, config);
  if (result.blocked) return result;

  // Request body size
  result = gateSize(result, config);
  if (result.blocked) return result;

  // URL and header content
  result = gatePattern(result, config);

  return result;
}
