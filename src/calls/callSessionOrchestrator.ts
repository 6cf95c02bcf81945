// src/calls/callSessionOrchestrator.ts
// How it works: subscribes to telephony engine events and turns them into call state changes.
// Engine callbacks never touch state directly; each one enqueues a work item on a serial WorkQueue
// so incoming, media-active, ended and AI lifecycle events are handled one at a time, in order.
// One call at a time: a second incoming call while one is up is answered busy (486).

import { AiSessionController, type AiSessionSettings } from '../ai/aiSessionController';
import type { AiConnector } from '../ai/types';
import type { DuplexAudioBridge } from '../audio/duplexAudioBridge';
import { FrameAssembler } from '../audio/frameAssembler';
import { log } from '../log';
import { recordCallMetrics } from '../metrics';
import type { ToolExecutor } from '../tools/toolExecutor';
import type {
  CallEventInfo,
  IncomingCallInfo,
  TelephonyEngine,
  TelephonyEventSubscriber,
} from '../telephony/types';
import { CallSession } from './callSession';
import type { CallId, CallSnapshot } from './types';
import { WorkQueue } from './workQueue';

const SIP_OK = 200;
const SIP_BUSY_HERE = 486;
const ENDED_CALL_MEMORY = 64;

export interface CallSessionOrchestratorOptions {
  bridge: DuplexAudioBridge;
  connector: AiConnector;
  tools: ToolExecutor;
  session: AiSessionSettings;
  engine?: TelephonyEngine;
  telephonySampleRate?: number;
  frameTimeMs?: number;
  answerDelayMs?: number;
  playbackPollMs?: number;
  outboundPollMs?: number;
  retryBackoffMs?: number;
}

export class CallSessionOrchestrator implements TelephonyEventSubscriber {
  private readonly bridge: DuplexAudioBridge;
  private readonly connector: AiConnector;
  private readonly tools: ToolExecutor;
  private readonly session: AiSessionSettings;
  private readonly telephonySampleRate: number;
  private readonly frameTimeMs: number;
  private readonly answerDelayMs: number;
  private readonly playbackPollMs: number;
  private readonly outboundPollMs?: number;
  private readonly retryBackoffMs?: number;
  private readonly queue = new WorkQueue({ component: 'call_orchestrator' });
  private readonly endedCallIds = new Set<CallId>();

  private engine: TelephonyEngine | null;
  private current: CallSession | null = null;
  private generation = 0;

  constructor(options: CallSessionOrchestratorOptions) {
    this.bridge = options.bridge;
    this.connector = options.connector;
    this.tools = options.tools;
    this.session = options.session;
    this.engine = options.engine ?? null;
    this.telephonySampleRate = options.telephonySampleRate ?? options.bridge.telephonyRate;
    this.frameTimeMs = options.frameTimeMs ?? 20;
    this.answerDelayMs = options.answerDelayMs ?? 200;
    this.playbackPollMs = options.playbackPollMs ?? 100;
    this.outboundPollMs = options.outboundPollMs;
    this.retryBackoffMs = options.retryBackoffMs;
  }

  public attachEngine(engine: TelephonyEngine): void {
    this.engine = engine;
  }

  public detachEngine(engine: TelephonyEngine): void {
    if (this.engine === engine) {
      this.engine = null;
    }
  }

  public onIncomingCall(info: IncomingCallInfo): void {
    this.queue.enqueue({ name: 'incoming_call', run: () => this.handleIncomingCall(info) });
  }

  public onMediaActive(info: CallEventInfo): void {
    this.queue.enqueue({ name: 'media_active', run: () => this.handleMediaActive(info) });
  }

  public onCallEnded(info: CallEventInfo): void {
    this.queue.enqueue({
      name: 'call_ended',
      run: () => this.handleCallEnded(info.callId, info.reason ?? 'remote_hangup'),
    });
  }

  public getCurrentCall(): CallSnapshot | null {
    return this.current ? this.current.snapshot() : null;
  }

  public hasActiveCall(): boolean {
    return this.current !== null && !this.current.isEnded();
  }

  /** Resolves once every event received so far has been handled. */
  public idle(): Promise<void> {
    return this.queue.idle();
  }

  /** Hangs up and tears down the current call, if any. */
  public async shutdown(reason = 'shutdown'): Promise<void> {
    this.queue.enqueue({
      name: 'shutdown',
      run: async () => {
        const call = this.current;
        if (!call) return;
        if (this.engine) {
          this.engine.hangup(call.callId);
        }
        await this.teardown(call, reason);
      },
    });
    await this.queue.idle();
  }

  private handleIncomingCall(info: IncomingCallInfo): void {
    const engine = this.engine;
    if (!engine) {
      log.warn({ event: 'incoming_call_without_engine', call_id: info.callId }, 'incoming call with no engine attached');
      return;
    }

    const existing = this.current;
    if (existing && existing.callId === info.callId) {
      log.info({ event: 'incoming_call_duplicate', ...existing.logContext }, 'duplicate incoming call event ignored');
      return;
    }
    if (existing) {
      log.warn(
        { event: 'incoming_call_rejected_busy', call_id: info.callId, active_call_id: existing.callId },
        'rejecting incoming call, another call is active',
      );
      engine.answer(info.callId, SIP_BUSY_HERE);
      return;
    }

    this.generation += 1;
    const call = new CallSession({ callId: info.callId, generation: this.generation, remoteUri: info.remoteUri });
    this.current = call;
    log.info({ event: 'incoming_call', remote_uri: info.remoteUri, ...call.logContext }, 'incoming call');

    const timer = setTimeout(() => {
      this.queue.enqueue({ name: 'answer_call', run: () => this.answerCall(call) });
    }, this.answerDelayMs);
    call.setAnswerTimer(timer);
  }

  private answerCall(call: CallSession): void {
    if (this.current !== call || call.isEnded()) {
      return;
    }
    if (!this.engine) {
      log.warn({ event: 'answer_without_engine', ...call.logContext }, 'cannot answer, no engine attached');
      return;
    }
    this.engine.answer(call.callId, SIP_OK);
    log.info({ event: 'call_answered', ...call.logContext }, 'call answered');
  }

  private handleMediaActive(info: CallEventInfo): void {
    const call = this.current;
    if (!call || call.callId !== info.callId) {
      const late = this.endedCallIds.has(info.callId);
      log.info(
        { event: late ? 'media_active_after_end' : 'media_active_unknown_call', call_id: info.callId },
        late ? 'media active for ended call ignored' : 'media active for unknown call ignored',
      );
      return;
    }
    if (call.hasMedia()) {
      log.info({ event: 'media_active_duplicate', ...call.logContext }, 'media already active, ignoring');
      return;
    }

    const engine = this.engine;
    if (!engine) {
      log.warn({ event: 'media_active_without_engine', ...call.logContext }, 'media active with no engine attached');
      return;
    }

    this.bridge.resetForNewCall();
    const frameAssembler = new FrameAssembler({
      bridge: this.bridge,
      sampleRate: this.telephonySampleRate,
      frameTimeMs: this.frameTimeMs,
      logContext: call.logContext,
    });

    const generation = call.generation;
    const controller = new AiSessionController({
      bridge: this.bridge,
      connector: this.connector,
      tools: this.tools,
      session: this.session,
      outboundPollMs: this.outboundPollMs,
      retryBackoffMs: this.retryBackoffMs,
      logContext: call.logContext,
      onInterrupted: () => frameAssembler.clear(),
      onEnded: (reason) => {
        this.queue.enqueue({ name: 'ai_session_ended', run: () => this.handleAiEnded(generation, reason) });
      },
    });

    engine.attachMediaPort(call.callId, frameAssembler);
    call.attachMedia(frameAssembler, controller);
    call.startPlaybackPump(this.bridge, this.playbackPollMs);
    log.info({ event: 'call_media_active', ...call.logContext }, 'call media active, starting ai session');

    void controller.start().catch((error: unknown) => {
      log.error(
        { err: error, event: 'call_ai_unavailable', ...call.logContext },
        'ai session could not start, call continues with silence',
      );
    });
  }

  private handleAiEnded(generation: number, reason: string): void {
    const call = this.current;
    if (!call || call.generation !== generation || call.isEnded()) {
      log.debug({ event: 'ai_session_ended_stale', generation, reason }, 'stale ai session end ignored');
      return;
    }
    log.warn(
      { event: 'ai_session_ended_mid_call', reason, ...call.logContext },
      'ai session ended while call is up, caller hears silence',
    );
  }

  private async handleCallEnded(callId: CallId, reason: string): Promise<void> {
    const call = this.current;
    if (!call || call.callId !== callId) {
      log.info({ event: 'call_ended_unknown_call', call_id: callId, reason }, 'call ended for non-current call ignored');
      return;
    }
    await this.teardown(call, reason);
  }

  private async teardown(call: CallSession, reason: string): Promise<void> {
    if (call.isEnded()) return;
    call.markEnded();

    const controller = call.getController();
    if (controller) {
      await controller.stop(reason);
    }
    await call.stopPlaybackPump();
    call.getFrameAssembler()?.clear();
    if (call.hasMedia() && this.engine) {
      this.engine.detachMediaPort(call.callId);
    }

    this.rememberEnded(call.callId);
    if (this.current === call) {
      this.current = null;
    }

    const durationMs = call.durationMs();
    recordCallMetrics({ reason, durationMs });
    log.info({ event: 'call_ended', reason, duration_ms: durationMs, ...call.logContext }, 'call ended');
  }

  private rememberEnded(callId: CallId): void {
    this.endedCallIds.add(callId);
    if (this.endedCallIds.size > ENDED_CALL_MEMORY) {
      const oldest = this.endedCallIds.values().next();
      if (!oldest.done) {
        this.endedCallIds.delete(oldest.value);
      }
    }
  }
}
