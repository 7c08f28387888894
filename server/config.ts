/**
 * Gateway configuration, read from the environment.
 *
 * `.env` is loaded by server/index.ts before this module is used. Every value
 * has a default so a bare `npm run dev` serves HTTP on 8095; HTTPS is only
 * enabled when both a certificate and a key are configured, and a configured
 * path that does not exist stops startup.
 */

import fs from 'fs';
import { z } from 'zod';
import type { LogLevel } from './logger';

const portSchema = z.coerce.number().int().min(0).max(65535);
const positiveMsSchema = z.coerce.number().int().positive();

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const GatewayEnvSchema = z.object({
  HOST: z.string().min(1).default('0.0.0.0'),
  HTTP_PORT: portSchema.default(8095),
  HTTPS_PORT: portSchema.default(8096),
  SSL_CERTIFICATE: z.string().default(''),
  SSL_KEY: z.string().default(''),
  CERT_FQDN_HOST: z.string().default(''),
  LOG_LEVEL: logLevelSchema.default('info'),
  BROADCAST_TIMEOUT_MS: positiveMsSchema.default(5000),
  WS_HEARTBEAT_INTERVAL_MS: positiveMsSchema.default(30000),
  SETTINGS_FILE: z.string().min(1).default('data/settings.yaml'),
  DEMO_MODE: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export interface GatewayConfig {
  host: string;
  httpPort: number;
  httpsPort: number;
  /** Both paths are set when HTTPS is enabled, otherwise null. */
  tls: { certificate: string; key: string } | null;
  certFqdnHost: string;
  logLevel: LogLevel;
  broadcastTimeoutMs: number;
  heartbeatIntervalMs: number;
  settingsFile: string;
  demoMode: boolean;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validate the environment and build the gateway configuration.
 *
 * Empty strings count as unset, matching how `.env` files leave optional
 * values blank.
 *
 * @throws ConfigError when a value is invalid or a TLS file is missing
 */
export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const raw: Record<string, string> = {};
  for (const key of Object.keys(GatewayEnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value !== '') {
      raw[key] = value;
    }
  }

  const parsed = GatewayEnvSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid gateway configuration: ${details}`);
  }
  const values = parsed.data;

  if (values.SSL_CERTIFICATE && !fs.existsSync(values.SSL_CERTIFICATE)) {
    throw new ConfigError(`SSL certificate file not found: ${values.SSL_CERTIFICATE}`);
  }
  if (values.SSL_KEY && !fs.existsSync(values.SSL_KEY)) {
    throw new ConfigError(`SSL certificate key file not found: ${values.SSL_KEY}`);
  }

  return {
    host: values.HOST,
    httpPort: values.HTTP_PORT,
    httpsPort: values.HTTPS_PORT,
    tls:
      values.SSL_CERTIFICATE && values.SSL_KEY
        ? { certificate: values.SSL_CERTIFICATE, key: values.SSL_KEY }
        : null,
    certFqdnHost: values.CERT_FQDN_HOST,
    logLevel: values.LOG_LEVEL,
    broadcastTimeoutMs: values.BROADCAST_TIMEOUT_MS,
    heartbeatIntervalMs: values.WS_HEARTBEAT_INTERVAL_MS,
    settingsFile: values.SETTINGS_FILE,
    demoMode: values.DEMO_MODE,
  };
}
