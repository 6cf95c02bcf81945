import type { AiSessionState } from '../ai/aiSessionController';

export type CallId = string;

export type CallPhase = 'ringing' | 'media_active' | 'ended';

export interface CallSessionConfig {
  callId: CallId;
  generation: number;
  remoteUri?: string;
}

export interface CallSnapshot {
  callId: CallId;
  generation: number;
  phase: CallPhase;
  remoteUri?: string;
  createdAt: Date;
  mediaActiveAt?: Date;
  aiState: AiSessionState | 'none';
  bufferedPlaybackBytes: number;
}
