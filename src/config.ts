import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { homedir } from 'os';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { DEFAULT_BLOCKED_PATTERNS } from './gates/index.js';
import { formatIssues } from './codec/envelope.js';

export const DEFAULT_BLOCKED_DOMAINS = ['malicious-site.com', 'phishing-site.net', 'spam-domain.org'];

const PortSchema = z.number().int().min(0).max(65535);

const RelayConfigSchema = z.object({
  shared_dir: z.string().min(1).optional(),
  server: z
    .object({
      port: PortSchema.default(9025),
      host: z.string().default('127.0.0.1')
    })
    .default({}),
  rate_limits: z
    .object({
      requests_per_minute: z.number().int().positive().default(600)
    })
    .default({}),
  interceptor: z
    .object({
      response_timeout_seconds: z.number().positive().default(300),
      poll_interval_ms: z.number().int().positive().default(200),
      read_retries: z.number().int().min(0).max(20).default(3),
      read_backoff_ms: z.number().int().min(0).default(50)
    })
    .default({}),
  forwarder: z
    .object({
      poll_interval_ms: z.number().int().positive().default(500),
      outbound_timeout_seconds: z.number().positive().default(30),
      maintenance_interval_seconds: z.number().positive().default(3600),
      stale_response_seconds: z.number().positive().default(900)
    })
    .default({}),
  security: z
    .object({
      blocked_domains: z.array(z.string().min(1)).default(DEFAULT_BLOCKED_DOMAINS),
      blocked_patterns: z.array(z.string().min(1)).default(DEFAULT_BLOCKED_PATTERNS),
      max_request_bytes: z.number().int().positive().default(1024 * 1024),
      max_response_bytes: z.number().int().positive().default(10 * 1024 * 1024)
    })
    .default({})
});

type ParsedConfig = z.infer<typeof RelayConfigSchema>;

export type RelayConfig = Omit<ParsedConfig, 'shared_dir'> & { shared_dir: string };

export interface LoadConfigOptions {
  cwd?: string;
  homeDir?: string;
  env?: NodeJS.ProcessEnv;
  path?: string;
}

export function defaultSharedDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.FERRY_SHARED_DIR || `/tmp/shared_${env.USER || 'unknown'}`;
}

export function configSearchPaths(cwd: string, homeDir: string): string[] {
  return [
    resolve(cwd, 'ferry.yaml'),
    resolve(homeDir, '.ferry', 'config.yaml'),
    resolve(homeDir, '.config', 'ferry', 'config.yaml')
  ];
}

function validateRegex(patterns: string[], source: string): void {
  const issues: string[] = [];
  patterns.forEach((pattern, index) => {
    try {
      new RegExp(pattern, 'i');
    } catch (error) {
      issues.push(`security.blocked_patterns.${index}: ${errorMessage(error)}`);
    }
  });
  if (issues.length > 0) throw new ConfigError(source, issues);
}

export function parseConfig(raw: unknown, source: string, env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = RelayConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(source, formatIssues(parsed.error));
  }

  const config = parsed.data;
  validateRegex(config.security.blocked_patterns, source);

  let port = config.server.port;
  if (env.FERRY_PORT) {
    const override = z.coerce.number().pipe(PortSchema).safeParse(env.FERRY_PORT);
    if (!override.success) {
      throw new ConfigError(source, formatIssues(override.error).map(issue => `FERRY_PORT: ${issue}`));
    }
    port = override.data;
  }

  return {
    ...config,
    shared_dir: resolve(env.FERRY_SHARED_DIR || config.shared_dir || defaultSharedDir(env)),
    server: {
      port,
      host: env.FERRY_HOST || config.server.host
    }
  };
}

export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const paths = options.path
    ? [resolve(options.path)]
    : configSearchPaths(options.cwd ?? process.cwd(), options.homeDir ?? homedir());

  for (const path of paths) {
    if (existsSync(path)) {
      const content = readFileSync(path, 'utf-8');
      return parseConfig(parseYaml(content), path, env);
    }
  }

  if (options.path) {
    throw new ConfigError(options.path, ['file not found']);
  }

  // Default configuration
  return parseConfig({}, 'defaults', env);
}
