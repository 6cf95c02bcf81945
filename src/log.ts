import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type LogLevel = (typeof LEVELS)[number];

export function resolveLevel(raw: string | undefined): LogLevel {
  const normalized = (raw ?? '').trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return LEVELS.find((level) => level === normalized) ?? 'info';
}

export const log = pino({
  name: 'realtime-voice-gateway',
  level: resolveLevel(process.env.LOG_LEVEL),
  redact: ['password', 'apiKey', 'sip.password', 'gemini.apiKey'],
});

/** Applies LOG_LEVEL from the validated config (which may come from .env) after startup. */
export function applyLogLevel(raw: string | undefined): void {
  log.level = resolveLevel(raw);
}
