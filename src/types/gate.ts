import type { RequestDescriptor } from './descriptor.js';

export interface SecurityGateConfig {
  blockedDomains: Set<string>;
  blockedPatterns: RegExp[];
  maxRequestBytes: number;
  maxResponseBytes: number;
}

export interface GateContext {
  request: RequestDescriptor;
  gatesPassed: string[];
  host?: string;
  blocked?: {
    gate: string;
    reason: string;
    code: string;
  };
}

export type GateDecision =
  | { allowed: true; gatesPassed: string[] }
  | { allowed: false; gate: string; reason: string; code: string };

export interface ResponseFilterResult {
  body: Buffer;
  filtered: boolean;
  matches: string[];
}
