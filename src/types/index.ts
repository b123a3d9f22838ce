export type {
  HeaderMap,
  RequestDescriptor,
  ResponseDescriptor,
  Descriptor,
  SecurityStatus,
  ScanResults,
  ExchangeKind
} from './descriptor.js';
export type {
  CapturedCall,
  ExchangeState,
  RelayOutcome,
  RelayResult,
  LifecycleTag
} from './exchange.js';

export const PROTOCOL_VERSION = '1.0.0';
export const DEFAULT_HTTP_VERSION = 'HTTP/1.1';
export const OVERSIZE_MARKER = 'Response too large';
export type { SecurityGateConfig, GateContext, GateDecision, ResponseFilterResult } from './gate.js';
