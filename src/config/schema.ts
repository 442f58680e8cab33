import { z } from 'zod';

const EndpointSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.number().int().min(1).max(65535).default(2775),
  tls: z.boolean().default(false),
});

const BindSchema = z.object({
  systemId: z.string().min(1).max(16),
  password: z.string().min(1).max(9),
  systemType: z.string().max(13).optional(),
  mode: z.enum(['transceiver', 'transmitter', 'receiver']).default('transceiver'),
});

const SessionSchema = z.object({
  endpoint: EndpointSchema.optional().transform(v => EndpointSchema.parse(v ?? {})),
  /** 0 disables enquire_link probing. */
  enquireLinkIntervalMs: z.number().int().min(0).default(30_000),
  connectTimeoutMs: z.number().int().min(1).default(3_000),
  /** 0 disables the per-request timeout. */
  requestTimeoutMs: z.number().int().min(0).default(0),
});

export type SessionConfig = z.output<typeof SessionSchema>;
export type SessionConfigInput = z.input<typeof SessionSchema>;

const HealthSchema = z.object({
  port: z.number().int().default(8080),
  bindAddress: z.string().default('127.0.0.1'),
});

const ConfigSchema = z.object({
  session: SessionSchema.optional().transform(v => SessionSchema.parse(v ?? {})),
  bind: BindSchema,
  health: HealthSchema.optional().transform(v => HealthSchema.parse(v ?? {})),
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
});

export type AppConfig = z.output<typeof ConfigSchema>;

export { ConfigSchema, SessionSchema, BindSchema };
