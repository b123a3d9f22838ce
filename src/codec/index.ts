import { v4 as uuidv4 } from 'uuid';
import { sha256, digestsMatch } from '../crypto/index.js';
import { DecodeError, errorMessage } from '../errors.js';
import type {
  Descriptor,
  HeaderMap,
  RequestDescriptor,
  ResponseDescriptor,
  SecurityStatus
} from '../types/index.js';
import { DEFAULT_HTTP_VERSION, PROTOCOL_VERSION } from '../types/index.js';
import {
  RequestEnvelopeSchema,
  ResponseEnvelopeSchema,
  formatIssues,
  type RequestEnvelope,
  type ResponseEnvelope
} from './envelope.js';

export { RequestEnvelopeSchema, ResponseEnvelopeSchema } from './envelope.js';

export interface RequestParams {
  method: string;
  url: string;
  headers: HeaderMap;
  body: Buffer;
  httpVersion?: string;
}

export interface ResponseParams {
  status: number;
  reason: string;
  headers: HeaderMap;
  body: Buffer;
  filtered?: boolean;
  suspiciousContent?: boolean;
  securityStatus?: SecurityStatus;
}

export interface EncodeOptions {
  id?: string;
  now?: Date;
  sourceProcess?: string;
}

export interface EncodedRequest {
  id: string;
  bytes: Buffer;
}

function serialize(envelope: RequestEnvelope | ResponseEnvelope): Buffer {
  return Buffer.from(JSON.stringify(envelope, null, 2), 'utf-8');
}

export function encodeRequest(params: RequestParams, options: EncodeOptions = {}): EncodedRequest {
  const id = options.id ?? uuidv4();
  const now = options.now ?? new Date();

  const envelope: RequestEnvelope = {
    metadata: {
      request_id: id,
      timestamp: now.toISOString(),
      proxy_version: PROTOCOL_VERSION,
      source_process: options.sourceProcess ?? 'interceptor'
    },
    request: {
      method: params.method,
      url: params.url,
      headers: { ...params.headers },
      content: params.body.toString('base64'),
      http_version: params.httpVersion ?? DEFAULT_HTTP_VERSION
    },
    security: {
      content_hash: sha256(params.body)
    }
  };

  return { id, bytes: serialize(envelope) };
}

export function encodeResponse(id: string, params: ResponseParams, options: Omit<EncodeOptions, 'id'> = {}): Buffer {
  const now = options.now ?? new Date();

  const envelope: ResponseEnvelope = {
    metadata: {
      request_id: id,
      processed_at: now.toISOString(),
      processor_version: PROTOCOL_VERSION,
      security_status: params.securityStatus ?? 'approved'
    },
    response: {
      status_code: params.status,
      reason: params.reason,
      headers: { ...params.headers },
      content: params.body.toString('base64'),
      http_version: DEFAULT_HTTP_VERSION
    },
    security: {
      response_hash: sha256(params.body),
      content_filtered: params.filtered ?? false,
      scan_results: {
        malware: false,
        suspicious_content: params.suspiciousContent ?? false
      }
    }
  };

  return serialize(envelope);
}

function toRequestDescriptor(envelope: RequestEnvelope): RequestDescriptor {
  return {
    kind: 'request',
    id: envelope.metadata.request_id,
    createdAt: new Date(envelope.metadata.timestamp),
    method: envelope.request.method,
    url: envelope.request.url,
    headers: envelope.request.headers,
    body: Buffer.from(envelope.request.content, 'base64'),
    contentHash: envelope.security.content_hash,
    httpVersion: envelope.request.http_version ?? DEFAULT_HTTP_VERSION,
    version: envelope.metadata.proxy_version,
    sourceProcess: envelope.metadata.source_process
  };
}

function toResponseDescriptor(envelope: ResponseEnvelope): ResponseDescriptor {
  const scan = envelope.security.scan_results;
  return {
    kind: 'response',
    id: envelope.metadata.request_id,
    processedAt: new Date(envelope.metadata.processed_at),
    status: envelope.response.status_code,
    reason: envelope.response.reason,
    headers: envelope.response.headers,
    body: Buffer.from(envelope.response.content, 'base64'),
    bodyHash: envelope.security.response_hash,
    filtered: envelope.security.content_filtered,
    scanResults: {
      malware: scan?.malware ?? false,
      suspiciousContent: scan?.suspicious_content ?? false
    },
    securityStatus: envelope.metadata.security_status,
    httpVersion: envelope.response.http_version ?? DEFAULT_HTTP_VERSION,
    version: envelope.metadata.processor_version
  };
}

function parseJson(bytes: Buffer | string): unknown {
  const text = typeof bytes === 'string' ? bytes : bytes.toString('utf-8');
  if (text.trim().length === 0) {
    throw new DecodeError('Empty envelope');
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError('Malformed envelope JSON', [errorMessage(error)]);
  }
}

export function decode(bytes: Buffer | string): Descriptor {
  const raw = parseJson(bytes);

  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new DecodeError('Envelope is not an object');
  }

  if ('request' in raw) {
    const parsed = RequestEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError('Invalid request envelope', formatIssues(parsed.error));
    }
    return toRequestDescriptor(parsed.data);
  }

  if ('response' in raw) {
    const parsed = ResponseEnvelopeSchema.safeParse(raw);
    if (!parsed.success) {
      throw new DecodeError('Invalid response envelope', formatIssues(parsed.error));
    }
    return toResponseDescriptor(parsed.data);
  }

  throw new DecodeError('Envelope has neither a request nor a response section');
}

export function decodeRequest(bytes: Buffer | string): RequestDescriptor {
  const descriptor = decode(bytes);
  if (descriptor.kind !== 'request') {
    throw new DecodeError('Expected a request envelope');
  }
  return descriptor;
}

export function decodeResponse(bytes: Buffer | string): ResponseDescriptor {
  const descriptor = decode(bytes);
  if (descriptor.kind !== 'response') {
    throw new DecodeError('Expected a response envelope');
  }
  return descriptor;
}

// Recompute the body digest and compare it with the recorded one
export function verifyDigest(descriptor: Descriptor): boolean {
  const recorded = descriptor.kind === 'request' ? descriptor.contentHash : descriptor.bodyHash;
  return digestsMatch(recorded, sha256(descriptor.body));
}
