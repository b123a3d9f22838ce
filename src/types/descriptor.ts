export type HeaderMap = Record<string, string>;

export interface RequestDescriptor {
  kind: 'request';
  id: string;
  createdAt: Date;
  method: string;
  url: string;
  headers: HeaderMap;
  body: Buffer;
  contentHash: string;
  httpVersion: string;
  version: string;
  sourceProcess?: string;
}

export type SecurityStatus = 'approved' | 'error';

export interface ScanResults {
  malware: boolean;
  suspiciousContent: boolean;
}

export interface ResponseDescriptor {
  kind: 'response';
  id: string;
  processedAt: Date;
  status: number;
  reason: string;
  headers: HeaderMap;
  body: Buffer;
  bodyHash: string;
  filtered: boolean;
  scanResults: ScanResults;
  securityStatus: SecurityStatus;
  httpVersion: string;
  version: string;
}

export type Descriptor = RequestDescriptor | ResponseDescriptor;

export type ExchangeKind = 'requests' | 'responses';
