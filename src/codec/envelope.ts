import { z } from 'zod';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function isBase64(value: string): boolean {
  return value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

const timestamp = z
  .string()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'unparseable timestamp' });

const content = z.string().refine(isBase64, { message: 'content is not valid base64' });

const headers = z.record(z.string());

// Unknown keys are stripped by zod, so newer writers can add fields freely.
export const RequestEnvelopeSchema = z.object({
  metadata: z.object({
    request_id: z.string().min(1),
    timestamp,
    proxy_version: z.string().min(1),
    source_process: z.string().optional()
  }),
  request: z.object({
    method: z.string().min(1),
    url: z.string().min(1),
    headers,
    content,
    http_version: z.string().optional()
  }),
  security: z.object({
    content_hash: z.string().min(1)
  })
});

export const ResponseEnvelopeSchema = z.object({
  metadata: z.object({
    request_id: z.string().min(1),
    processed_at: timestamp,
    processor_version: z.string().min(1),
    security_status: z.enum(['approved', 'error'])
  }),
  response: z.object({
    status_code: z.number().int().min(100).max(599),
    reason: z.string(),
    headers,
    content,
    http_version: z.string().optional()
  }),
  security: z.object({
    response_hash: z.string().min(1),
    content_filtered: z.boolean(),
    scan_results: z
      .object({
        malware: z.boolean(),
        suspicious_content: z.boolean()
      })
      .optional()
  })
});

export type RequestEnvelope = z.infer<typeof RequestEnvelopeSchema>;
export type ResponseEnvelope = z.infer<typeof ResponseEnvelopeSchema>;

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
