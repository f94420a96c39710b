/**
 * Centralized configuration with runtime validation
 * All environment variables validated at startup via Zod
 */
import { z } from 'zod';
import 'dotenv/config';

const configSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3030),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Redis (directory + invites)
  REDIS_HOST: z.string().default('127.0.0.1'),
  REDIS_PORT: z.coerce.number().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().default(4),
  REDIS_TLS: z.enum(['true', 'false', '1', '0', '']).default('').transform(v => v === 'true' || v === '1'),

  // Chat client authentication
  JWT_SECRET: z.string().min(32),
  JWT_MAX_AGE_SECONDS: z.coerce.number().default(86_400),

  // LMS (Moodle web services)
  LMS_URL: z.string().url(),
  LMS_TOKEN: z.string().min(1),
  LMS_TIMEOUT_MS: z.coerce.number().default(20_000),

  // Chat identities
  SERVER_NAME: z.string().default('campus.example.edu'),
  BOT_USER_ID: z.string().default('@tutorbot:campus.example.edu'),
  COMMAND_PREFIX: z.string().min(1).default('!'),

  // Tutoring queue
  TUTORING_CONFIRM_TIMEOUT_SECONDS: z.coerce.number().positive().default(60),
  ROOM_INVITE_TTL_SECONDS: z.coerce.number().positive().default(86_400),

  // Questions
  QUESTION_CHECK_INTERVAL_SECONDS: z.coerce.number().positive().default(30),

  // Limits
  RATE_LIMIT_MESSAGES_PER_MINUTE: z.coerce.number().default(60),

  // Security
  CORS_ORIGINS: z.string().default('http://localhost:5173').transform(s => s.split(',').map(o => o.trim())),
});

export type Config = z.infer<typeof configSchema>;

/** Validated configuration object - fails fast on invalid config */
export const config: Config = configSchema.parse(process.env);

export const isDev = config.NODE_ENV === 'development';
export const isProd = config.NODE_ENV === 'production';
