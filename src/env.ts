import dotenv from 'dotenv';
import { z } from 'zod';

const emptyToUndefined = (value: unknown): unknown => {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return value;
};

const upper = (value: unknown): unknown => {
  const cleaned = emptyToUndefined(value);
  return typeof cleaned === 'string' ? cleaned.trim().toUpperCase() : cleaned;
};

const lower = (value: unknown): unknown => {
  const cleaned = emptyToUndefined(value);
  return typeof cleaned === 'string' ? cleaned.trim().toLowerCase() : cleaned;
};

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
  SIP_EXTENSION: z.string().trim().min(1),
  SIP_PASSWORD: z.string().min(1),
  SIP_SERVER: z.string().trim().min(1),
  SIP_AUTH_ID: z.preprocess(emptyToUndefined, z.string().trim().min(1).optional()),
  SIP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).default(5060)),
  SIP_TRANSPORT: z.preprocess(lower, z.enum(['udp', 'tcp', 'tls']).default('udp')),
  PREFERRED_CODEC: z.preprocess(upper, z.enum(['PCMU', 'PCMA', 'L16']).default('PCMU')),
  TELEPHONY_GATEWAY_URL: z.string().trim().url(),

  GEMINI_API_KEY: z.string().trim().min(1),
  GEMINI_MODEL: z.preprocess(emptyToUndefined, z.string().trim().min(1).default('gemini-2.0-flash-exp')),
  GEMINI_VOICE_NAME: z.preprocess(emptyToUndefined, z.string().trim().min(1).default('Aoede')),
  GEMINI_SEND_SAMPLE_RATE: positiveInt(16000),
  GEMINI_RECEIVE_SAMPLE_RATE: positiveInt(24000),
  GEMINI_CONNECT_TIMEOUT_MS: positiveInt(10000),
  GREETING_PROMPT: z.preprocess(emptyToUndefined, z.string().min(1).optional()),
  SYSTEM_INSTRUCTION_PATH: z.preprocess(emptyToUndefined, z.string().min(1).optional()),

  TELEPHONY_SAMPLE_RATE: positiveInt(8000),
  FRAME_TIME_MS: positiveInt(20),
  BRIDGE_QUEUE_CAPACITY: positiveInt(100),
  ANSWER_DELAY_MS: nonNegativeInt(200),

  REGISTRATION_TIMEOUT_MS: positiveInt(10000),
  REGISTRATION_RETRY_DELAY_MS: nonNegativeInt(10000),
  REGISTRATION_MAX_RETRIES: nonNegativeInt(0),

  HTTP_PORT: z.preprocess(emptyToUndefined, z.coerce.number().int().min(1).max(65535).optional()),
  LOG_LEVEL: z.preprocess(lower, z.string().default('info')),
});

export type Env = z.infer<typeof EnvSchema>;

export class ConfigError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment variables: ${issues.join(', ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/** Validates `source` (process.env by default, after loading .env) and lists every problem at once. */
export function loadEnv(source?: NodeJS.ProcessEnv): Env {
  if (!source) {
    dotenv.config();
  }
  const parsed = EnvSchema.safeParse(source ?? process.env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(issues);
  }

  return parsed.data;
}
