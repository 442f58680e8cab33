import dotenv from 'dotenv';
import { ConfigSchema, type AppConfig } from './schema.js';

dotenv.config();

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const rawConfig = {
    session: {
      endpoint: {
        host: env.SMPP_HOST || '127.0.0.1',
        port: int(env.SMPP_PORT, 2775),
        tls: env.SMPP_TLS === 'true',
      },
      enquireLinkIntervalMs: int(env.ENQUIRE_LINK_INTERVAL_S, 30) * 1000,
      connectTimeoutMs: int(env.SMPP_CONNECT_TIMEOUT_MS, 3000),
      requestTimeoutMs: int(env.SMPP_REQUEST_TIMEOUT_MS, 0),
    },
    bind: {
      systemId: env.SMPP_SYSTEM_ID,
      password: env.SMPP_PASSWORD,
      systemType: env.SMPP_SYSTEM_TYPE || undefined,
      mode: env.SMPP_BIND_MODE || 'transceiver',
    },
    health: {
      port: int(env.HEALTH_PORT, 8080),
      bindAddress: env.HEALTH_BIND_ADDRESS || '127.0.0.1',
    },
    logLevel: env.LOG_LEVEL || 'info',
  };

  return ConfigSchema.parse(rawConfig);
}

function int(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  const n = parseInt(value, 10);
  return isNaN(n) ? fallback : n;
}
