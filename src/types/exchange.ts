import type { HeaderMap } from './descriptor.js';

// A call handed over by the capture point
export interface CapturedCall {
  method: string;
  url: string;
  headers: HeaderMap;
  body: Buffer;
  httpVersion?: string;
}

export type ExchangeState =
  | 'CREATED'
  | 'PUBLISHED'
  | 'WAITING'
  | 'RESOLVED'
  | 'TIMED_OUT'
  | 'CORRUPTED'
  | 'ABORTED'
  | 'CLEANED_UP';

export type RelayOutcome = 'resolved' | 'timed_out' | 'corrupted' | 'aborted' | 'failed';

export interface RelayResult {
  requestId: string;
  outcome: RelayOutcome;
  status: number;
  reason: string;
  headers: HeaderMap;
  body: Buffer;
  filtered: boolean;
  elapsedMs: number;
}

export type LifecycleTag = 'SCAN' | 'REQUEST_START' | 'REQUEST_SUCCESS' | 'REQUEST_FAILED' | 'REQUEST_SKIP';
