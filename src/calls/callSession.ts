import type { AiSessionController } from '../ai/aiSessionController';
import type { DuplexAudioBridge } from '../audio/duplexAudioBridge';
import type { FrameAssembler } from '../audio/frameAssembler';
import { log } from '../log';
import { isAbortedError } from '../retry';
import type { CallId, CallPhase, CallSessionConfig, CallSnapshot } from './types';

/**
 * State for the one active call. The orchestrator drives every transition; this class only holds
 * what the call owns and runs the playback pump that moves AI audio into the frame assembler.
 */
export class CallSession {
  public readonly callId: CallId;
  public readonly generation: number;
  public readonly remoteUri?: string;
  public readonly createdAt = new Date();
  public readonly logContext: Record<string, unknown>;

  private phase: CallPhase = 'ringing';
  private mediaActiveAt?: Date;
  private endedAt?: Date;
  private frameAssembler: FrameAssembler | null = null;
  private controller: AiSessionController | null = null;
  private answerTimer?: NodeJS.Timeout;
  private playbackAbort: AbortController | null = null;
  private playbackTask: Promise<void> | null = null;

  constructor(config: CallSessionConfig) {
    this.callId = config.callId;
    this.generation = config.generation;
    this.remoteUri = config.remoteUri;
    this.logContext = { call_id: this.callId, generation: this.generation };
  }

  public getPhase(): CallPhase {
    return this.phase;
  }

  public isEnded(): boolean {
    return this.phase === 'ended';
  }

  public hasMedia(): boolean {
    return this.controller !== null;
  }

  public getFrameAssembler(): FrameAssembler | null {
    return this.frameAssembler;
  }

  public getController(): AiSessionController | null {
    return this.controller;
  }

  public setAnswerTimer(timer: NodeJS.Timeout): void {
    this.clearAnswerTimer();
    this.answerTimer = timer;
  }

  public clearAnswerTimer(): void {
    if (this.answerTimer) {
      clearTimeout(this.answerTimer);
      this.answerTimer = undefined;
    }
  }

  public attachMedia(frameAssembler: FrameAssembler, controller: AiSessionController): void {
    this.frameAssembler = frameAssembler;
    this.controller = controller;
    this.phase = 'media_active';
    this.mediaActiveAt = new Date();
  }

  public markEnded(): void {
    this.phase = 'ended';
    this.endedAt = new Date();
    this.clearAnswerTimer();
  }

  public durationMs(): number {
    return (this.endedAt ?? new Date()).getTime() - this.createdAt.getTime();
  }

  public startPlaybackPump(bridge: DuplexAudioBridge, pollMs: number): void {
    const assembler = this.frameAssembler;
    if (!assembler || this.playbackTask) {
      return;
    }

    const abort = new AbortController();
    this.playbackAbort = abort;
    this.playbackTask = this.runPlaybackPump(bridge, assembler, pollMs, abort.signal).catch((error: unknown) => {
      log.error({ err: error, event: 'playback_pump_failed', ...this.logContext }, 'playback pump failed');
    });
  }

  public async stopPlaybackPump(): Promise<void> {
    this.playbackAbort?.abort();
    await this.playbackTask;
    this.playbackAbort = null;
    this.playbackTask = null;
  }

  public snapshot(): CallSnapshot {
    return {
      callId: this.callId,
      generation: this.generation,
      phase: this.phase,
      remoteUri: this.remoteUri,
      createdAt: this.createdAt,
      mediaActiveAt: this.mediaActiveAt,
      aiState: this.controller ? this.controller.getState() : 'none',
      bufferedPlaybackBytes: this.frameAssembler ? this.frameAssembler.bufferedBytes() : 0,
    };
  }

  private async runPlaybackPump(
    bridge: DuplexAudioBridge,
    assembler: FrameAssembler,
    pollMs: number,
    signal: AbortSignal,
  ): Promise<void> {
    while (!signal.aborted) {
      let chunk: Buffer | null;
      try {
        chunk = await bridge.takeForTelephony({ timeoutMs: pollMs, signal });
      } catch (error) {
        if (isAbortedError(error)) return;
        throw error;
      }
      if (chunk) {
        assembler.appendPlaybackAudio(chunk);
      }
    }
  }
}
