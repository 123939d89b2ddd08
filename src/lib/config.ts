/**
 * Application Configuration
 * Reads process.env once and validates it
 */

import { z } from 'zod';

import { configureLogging } from './logger.js';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value?.toLowerCase() === 'true');

/**
 * One MCP server: spawned over stdio, or reached over streamable HTTP
 */
export const mcpServerConfigSchema = z.union([
  z.object({
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).optional(),
  }),
  z.object({
    url: z.string().url(),
  }),
]);

export type MCPServerConfig = z.infer<typeof mcpServerConfigSchema>;

export const mcpServersSchema = z.record(mcpServerConfigSchema);

const mcpServersFromJson = z
  .string()
  .default('{}')
  .transform((raw, ctx) => {
    try {
      const servers: unknown = JSON.parse(raw);
      return servers;
    } catch {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'MCP_SERVERS must be valid JSON',
      });
      return z.NEVER;
    }
  })
  .pipe(mcpServersSchema);

const envSchema = z.object({
  SERVICE_NAME: z.string().default('calendar-agent'),
  AGENT_ID: z.string().default('calendar_agent'),
  AGENT_NAME: z.string().default('Calendar Agent'),
  NODE_ENV: z
    .enum(['development', 'test', 'production'])
    .default('production'),
  HOST: z.string().default('localhost'),
  PORT: z.coerce.number().int().positive().default(10001),
  APP_URL: z.string().url().optional(),
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error'])),
  DISABLE_LOG: booleanFlag,
  ALLOWED_ORIGINS: z
    .string()
    .default('http://localhost:3000')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin !== '')
    ),

  OPENAI_API_KEY: z.string().min(1, 'OPENAI_API_KEY is required'),
  OPENAI_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().default('gpt-4.1-mini'),
  LLM_RETRY: z.coerce.number().int().min(0).default(2),
  LLM_STREAMING: z
    .string()
    .default('true')
    .transform((value) => value.toLowerCase() !== 'false'),

  GOOGLE_CLIENT_ID: z.string().min(1, 'GOOGLE_CLIENT_ID is required'),
  GOOGLE_CLIENT_SECRET: z.string().min(1, 'GOOGLE_CLIENT_SECRET is required'),

  UPSTASH_REDIS_URL: z.string().url('UPSTASH_REDIS_URL is required'),
  UPSTASH_REDIS_TOKEN: z.string().min(1, 'UPSTASH_REDIS_TOKEN is required'),

  JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),
  SESSION_EXPIRY_SECONDS: z.coerce
    .number()
    .int()
    .positive()
    .default(365 * 24 * 60 * 60),
  EXCHANGE_CODE_TTL_SECONDS: z.coerce.number().int().positive().default(300),

  MCP_SERVERS: mcpServersFromJson,
});

export interface AppConfig {
  serviceName: string;
  agentId: string;
  agentName: string;
  env: 'development' | 'test' | 'production';
  host: string;
  port: number;
  appUrl: string;
  allowedOrigins: string[];
  llm: {
    apiKey: string;
    baseURL?: string;
    model: string;
    retry: number;
    streaming: boolean;
  };
  google: {
    clientId: string;
    clientSecret: string;
  };
  redis: {
    url: string;
    token: string;
  };
  vault: {
    jwtSecret: string;
    sessionTtlSeconds: number;
    exchangeCodeTtlSeconds: number;
  };
  mcpServers: Record<string, MCPServerConfig>;
}

/**
 * Parse and validate configuration.
 * Throws with every invalid variable listed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;

  configureLogging({ level: vars.LOG_LEVEL, disabled: vars.DISABLE_LOG });

  return {
    serviceName: vars.SERVICE_NAME,
    agentId: vars.AGENT_ID,
    agentName: vars.AGENT_NAME,
    env: vars.NODE_ENV,
    host: vars.HOST,
    port: vars.PORT,
    appUrl: vars.APP_URL ?? `http://${vars.HOST}:${vars.PORT}`,
    allowedOrigins: vars.ALLOWED_ORIGINS,
    llm: {
      apiKey: vars.OPENAI_API_KEY,
      ...(vars.OPENAI_BASE_URL !== undefined && {
        baseURL: vars.OPENAI_BASE_URL,
      }),
      model: vars.LLM_MODEL,
      retry: vars.LLM_RETRY,
      streaming: vars.LLM_STREAMING,
    },
    google: {
      clientId: vars.GOOGLE_CLIENT_ID,
      clientSecret: vars.GOOGLE_CLIENT_SECRET,
    },
    redis: {
      url: vars.UPSTASH_REDIS_URL,
      token: vars.UPSTASH_REDIS_TOKEN,
    },
    vault: {
      jwtSecret: vars.JWT_SECRET,
      sessionTtlSeconds: vars.SESSION_EXPIRY_SECONDS,
      exchangeCodeTtlSeconds: vars.EXCHANGE_CODE_TTL_SECONDS,
    },
    mcpServers: vars.MCP_SERVERS,
  };
}
