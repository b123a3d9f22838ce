export { gateDomain, extractHost, isBlockedHost } from './gate-domain.js';
export { gateSize } from './gate-size.js';
export { gatePattern, scanPatterns, compilePatterns, DEFAULT_BLOCKED_PATTERNS } from './gate-pattern.js';
export { runGateChain } from './chain.js';
export { SecurityGate, type SecurityGateOptions } from './security-gate.js';
