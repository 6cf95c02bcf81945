import type { Request, Response } from 'express';
import client from 'prom-client';

/**
 * Gateway Prometheus metrics (private registry, served on /metrics).
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_gateway_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

export type BridgeDirection = 'telephony_to_ai' | 'ai_to_telephony';

const bridgeChunksEnqueuedTotal = new client.Counter({
  name: `${METRICS_PREFIX}bridge_chunks_enqueued_total`,
  help: 'Audio chunks accepted by a bridge queue',
  labelNames: ['direction'] as const,
  registers: [register],
});

const bridgeChunksDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}bridge_chunks_dropped_total`,
  help: 'Audio chunks dropped because a bridge queue was full',
  labelNames: ['direction'] as const,
  registers: [register],
});

const resampleFailuresTotal = new client.Counter({
  name: `${METRICS_PREFIX}resample_failures_total`,
  help: 'Chunks passed through unconverted after a resampling failure',
  labelNames: ['direction'] as const,
  registers: [register],
});

const playbackFramesTotal = new client.Counter({
  name: `${METRICS_PREFIX}playback_frames_total`,
  help: 'Frames handed to the telephony engine, audio or silence',
  labelNames: ['kind'] as const,
  registers: [register],
});

const aiSessionsStartedTotal = new client.Counter({
  name: `${METRICS_PREFIX}ai_sessions_started_total`,
  help: 'AI sessions that reached the active state',
  registers: [register],
});

const aiPumpErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}ai_pump_errors_total`,
  help: 'Transport errors seen by the AI session pumps',
  labelNames: ['pump'] as const,
  registers: [register],
});

const toolCallsTotal = new client.Counter({
  name: `${METRICS_PREFIX}tool_calls_total`,
  help: 'Tool calls requested by the AI session',
  labelNames: ['tool', 'outcome'] as const,
  registers: [register],
});

const registrationAttemptsTotal = new client.Counter({
  name: `${METRICS_PREFIX}registration_attempts_total`,
  help: 'Telephony registration attempts',
  labelNames: ['outcome'] as const,
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls torn down',
  labelNames: ['reason'] as const,
  registers: [register],
});

const callDurationSeconds = new client.Histogram({
  name: `${METRICS_PREFIX}call_duration_seconds`,
  help: 'Call duration in seconds',
  buckets: [5, 10, 30, 60, 120, 300, 900],
  registers: [register],
});

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function incBridgeChunksEnqueued(direction: BridgeDirection): void {
  bridgeChunksEnqueuedTotal.inc({ direction });
}

export function incBridgeChunksDropped(direction: BridgeDirection): void {
  bridgeChunksDroppedTotal.inc({ direction });
}

export function incResampleFailures(direction: BridgeDirection): void {
  resampleFailuresTotal.inc({ direction });
}

export function incPlaybackFrames(kind: 'audio' | 'silence'): void {
  playbackFramesTotal.inc({ kind });
}

export function incAiSessionsStarted(): void {
  aiSessionsStartedTotal.inc();
}

export function incAiPumpErrors(pump: 'inbound' | 'outbound'): void {
  aiPumpErrorsTotal.inc({ pump });
}

export function incToolCalls(tool: string, outcome: 'ok' | 'unknown_tool' | 'failed'): void {
  // Avoid unbounded tool labels for names the model invents
  const label = outcome === 'unknown_tool' ? 'unknown' : tool;
  toolCallsTotal.inc({ tool: label, outcome });
}

export function incRegistrationAttempts(outcome: 'ok' | 'failed' | 'timeout' | 'error'): void {
  registrationAttemptsTotal.inc({ outcome });
}

export function recordCallMetrics(opts: { reason: string; durationMs: number }): void {
  callCompletionsTotal.inc({ reason: opts.reason.trim() === '' ? 'unknown' : opts.reason });
  callDurationSeconds.observe(opts.durationMs / 1000);
}
