import Fastify, { type FastifyInstance } from 'fastify';
import rateLimit from '@fastify/rate-limit';
import type pino from 'pino';
import { z } from 'zod';

import type { InterceptorAgent } from './agents/interceptor.js';
import { formatIssues, isBase64 } from './codec/envelope.js';
import type { RelayConfig } from './config.js';
import type { ExchangeStore } from './store/exchange-store.js';
import type { CapturedCall, HeaderMap } from './types/index.js';
import { PROTOCOL_VERSION } from './types/index.js';

export interface AppDependencies {
  config: RelayConfig;
  store: ExchangeStore;
  interceptor: InterceptorAgent;
  logger: pino.Logger;
  shutdownSignal?: AbortSignal;
}

const RelayCallSchema = z.object({
  method: z.string().min(1).regex(/^[A-Za-z]+$/, 'method must be a token'),
  url: z.string().url(),
  headers: z.record(z.union([z.string(), z.array(z.string())])).default({}),
  body: z.string().refine(isBase64, 'body must be base64').default(''),
  http_version: z.string().optional()
});

export type RelayCall = z.infer<typeof RelayCallSchema>;

function flattenHeaders(headers: RelayCall['headers']): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    result[name] = Array.isArray(value) ? value.join(', ') : value;
  }
  return result;
}

export function toCapturedCall(call: RelayCall): CapturedCall {
  return {
    method: call.method.toUpperCase(),
    url: call.url,
    headers: flattenHeaders(call.headers),
    body: Buffer.from(call.body, 'base64'),
    httpVersion: call.http_version
  };
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const { config, store, interceptor, logger } = deps;

  const app = Fastify({ logger: false, bodyLimit: config.security.max_request_bytes * 2 });

  await app.register(rateLimit, {
    max: config.rate_limits.requests_per_minute,
    timeWindow: '1 minute'
  });

  // Health endpoint
  app.get('/api/health', async () => {
    const stats = await store.stats();
    return {
      status: 'healthy',
      version: PROTOCOL_VERSION,
      shared_dir: store.root,
      pending_requests: stats.pendingRequests,
      pending_responses: stats.pendingResponses
    };
  });

  // Relay one captured call through the shared directory
  app.post('/api/relay', async (request, reply) => {
    const parsed = RelayCallSchema.safeParse(request.body);
    if (!parsed.success) {
      reply.status(400);
      return { error: 'INVALID_CALL', issues: formatIssues(parsed.error) };
    }

    const result = await interceptor.relay(toCapturedCall(parsed.data), { signal: deps.shutdownSignal });

    logger.info(
      {
        request_id: result.requestId,
        outcome: result.outcome,
        status: result.status,
        processing_time_ms: result.elapsedMs
      },
      'Call relayed'
    );

    reply
      .status(result.status)
      .headers(result.headers)
      .header('x-relay-request-id', result.requestId)
      .header('x-relay-outcome', result.outcome);
    return reply.send(result.body);
  });

  return app;
}
