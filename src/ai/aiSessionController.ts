// src/ai/aiSessionController.ts
// How it works: owns at most one AI transport per call. start() connects, sends the greeting turn
// and launches two background pumps: outbound drains the bridge's telephony->AI queue into
// transport.sendAudio, inbound reads transport responses and routes audio back into the bridge,
// tool calls through the tool executor and barge-in to the owner. Both pumps watch one
// AbortSignal and race every transport await against it, so stop() abandons in-flight sends and
// tool responses, closes the transport and waits only for the pumps to unwind.

import type { DuplexAudioBridge } from '../audio/duplexAudioBridge';
import { log } from '../log';
import { incAiPumpErrors, incAiSessionsStarted } from '../metrics';
import { isAbortedError, raceAbort, sleep } from '../retry';
import type { ToolExecutor } from '../tools/toolExecutor';
import type { AiConnector, AiResponse, AiTransport } from './types';

export type AiSessionState = 'idle' | 'starting' | 'active' | 'stopping';

export interface AiSessionSettings {
  model: string;
  instructions: string;
  voice: string;
  greetingPrompt: string;
}

export interface AiSessionControllerOptions {
  bridge: DuplexAudioBridge;
  connector: AiConnector;
  tools: ToolExecutor;
  session: AiSessionSettings;
  outboundPollMs?: number;
  retryBackoffMs?: number;
  onStateChange?: (state: AiSessionState) => void;
  onText?: (text: string) => void;
  onInterrupted?: () => void;
  onEnded?: (reason: string) => void;
  logContext?: Record<string, unknown>;
}

type InboundOutcome = 'closed' | 'aborted';

export class AiSessionController {
  private readonly bridge: DuplexAudioBridge;
  private readonly connector: AiConnector;
  private readonly tools: ToolExecutor;
  private readonly session: AiSessionSettings;
  private readonly outboundPollMs: number;
  private readonly retryBackoffMs: number;
  private readonly options: AiSessionControllerOptions;
  private readonly logContext: Record<string, unknown>;

  private state: AiSessionState = 'idle';
  private transport: AiTransport | null = null;
  private abort: AbortController | null = null;
  private startTask: Promise<void> | null = null;
  private stopTask: Promise<void> | null = null;
  private pumps: Promise<void> | null = null;

  constructor(options: AiSessionControllerOptions) {
    this.options = options;
    this.bridge = options.bridge;
    this.connector = options.connector;
    this.tools = options.tools;
    this.session = options.session;
    this.outboundPollMs = options.outboundPollMs ?? 100;
    this.retryBackoffMs = options.retryBackoffMs ?? 100;
    this.logContext = options.logContext ?? {};
  }

  public getState(): AiSessionState {
    return this.state;
  }

  public isActive(): boolean {
    return this.state === 'active';
  }

  /**
   * Resolves once the session is active (pumps running in the background), or once a stop()
   * issued during connect has unwound. Rejects when connect or the greeting fails.
   */
  public start(): Promise<void> {
    if (this.state !== 'idle') {
      log.warn(
        { event: 'ai_session_start_ignored', state: this.state, ...this.logContext },
        'ai session already running',
      );
      return Promise.resolve();
    }

    const task = this.runStart();
    this.startTask = task;
    return task;
  }

  public stop(reason = 'stopped'): Promise<void> {
    if (this.state === 'idle') {
      return Promise.resolve();
    }
    if (this.stopTask) {
      return this.stopTask;
    }

    const task = this.runStop(reason).finally(() => {
      this.stopTask = null;
    });
    this.stopTask = task;
    return task;
  }

  private async runStart(): Promise<void> {
    const abort = new AbortController();
    this.abort = abort;
    this.setState('starting');

    log.info({ event: 'ai_session_starting', model: this.session.model, ...this.logContext }, 'ai session starting');

    let transport: AiTransport | null = null;
    try {
      transport = await this.connector.connect({
        model: this.session.model,
        instructions: this.session.instructions,
        voice: this.session.voice,
        tools: this.tools.declarations(),
        signal: abort.signal,
      });
      if (!abort.signal.aborted && this.session.greetingPrompt.trim() !== '') {
        await transport.sendText(this.session.greetingPrompt);
      }
    } catch (error) {
      if (transport) {
        await this.closeTransport(transport);
      }
      this.abort = null;
      this.setState('idle');
      if (abort.signal.aborted) {
        log.info({ event: 'ai_session_start_cancelled', ...this.logContext }, 'ai session start cancelled');
        return;
      }
      log.error({ err: error, event: 'ai_session_start_failed', ...this.logContext }, 'ai session failed to start');
      throw error;
    }

    if (abort.signal.aborted) {
      await this.closeTransport(transport);
      this.abort = null;
      this.setState('idle');
      log.info({ event: 'ai_session_start_cancelled', ...this.logContext }, 'ai session start cancelled');
      return;
    }

    this.transport = transport;
    this.setState('active');
    incAiSessionsStarted();
    log.info({ event: 'ai_session_active', ...this.logContext }, 'ai session active');

    const signal = abort.signal;
    const active = transport;
    const inbound = this.runInboundPump(active, signal);
    this.pumps = Promise.all([this.runOutboundPump(active, signal), inbound]).then(
      () => undefined,
      (error: unknown) => {
        log.error({ err: error, event: 'ai_pump_crashed', ...this.logContext }, 'ai pump crashed');
      },
    );

    inbound.then(
      (outcome) => {
        if (outcome === 'closed') {
          this.handleTransportClosed(active);
        }
      },
      (error: unknown) => {
        log.debug({ err: error, event: 'ai_inbound_settled_with_error', ...this.logContext }, 'inbound pump rejected');
      },
    );
  }

  private async runStop(reason: string): Promise<void> {
    const wasStarting = this.state === 'starting';
    this.abort?.abort();

    if (wasStarting) {
      try {
        await this.startTask;
      } catch (error) {
        log.debug({ err: error, event: 'ai_session_start_unwound', ...this.logContext }, 'start unwound during stop');
      }
      return;
    }

    this.setState('stopping');
    const transport = this.transport;
    this.transport = null;
    if (transport) {
      await this.closeTransport(transport);
    }
    await this.pumps;
    this.pumps = null;
    this.abort = null;
    this.setState('idle');
    log.info({ event: 'ai_session_stopped', reason, ...this.logContext }, 'ai session stopped');
  }

  private handleTransportClosed(transport: AiTransport): void {
    if (this.transport !== transport || this.state !== 'active') {
      return;
    }
    log.warn({ event: 'ai_transport_closed', ...this.logContext }, 'ai transport closed by remote');
    this.stop('transport_closed').then(
      () => this.options.onEnded?.('transport_closed'),
      (error: unknown) => {
        log.error({ err: error, event: 'ai_session_stop_failed', ...this.logContext }, 'ai session stop failed');
      },
    );
  }

  private async runOutboundPump(transport: AiTransport, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let chunk: Buffer | null;
      try {
        chunk = await this.bridge.takeForAi({ timeoutMs: this.outboundPollMs, signal });
      } catch (error) {
        if (isAbortedError(error)) return;
        throw error;
      }
      if (!chunk) continue;

      try {
        await raceAbort(transport.sendAudio(chunk), signal, 'ai send audio');
      } catch (error) {
        if (signal.aborted) return;
        incAiPumpErrors('outbound');
        log.warn({ err: error, event: 'ai_send_audio_failed', ...this.logContext }, 'failed to send audio to ai');
        await sleep(this.retryBackoffMs, signal);
      }
    }
  }

  private async runInboundPump(transport: AiTransport, signal: AbortSignal): Promise<InboundOutcome> {
    while (!signal.aborted) {
      try {
        const responses = transport.receive()[Symbol.asyncIterator]();
        for (;;) {
          const next = await raceAbort(responses.next(), signal, 'ai receive');
          if (next.done) break;
          await raceAbort(this.handleResponse(transport, next.value), signal, `ai ${next.value.kind} handling`);
        }
        return signal.aborted ? 'aborted' : 'closed';
      } catch (error) {
        if (signal.aborted) return 'aborted';
        incAiPumpErrors('inbound');
        log.warn({ err: error, event: 'ai_receive_failed', ...this.logContext }, 'failed to read from ai');
        const waited = await sleep(this.retryBackoffMs, signal);
        if (!waited) return 'aborted';
      }
    }
    return 'aborted';
  }

  private async handleResponse(transport: AiTransport, response: AiResponse): Promise<void> {
    switch (response.kind) {
      case 'audio':
        this.bridge.submitFromAi(response.data);
        return;
      case 'text':
        log.info({ event: 'ai_text', text: response.text, ...this.logContext }, 'ai text');
        this.options.onText?.(response.text);
        return;
      case 'tool_call':
        await this.handleToolCall(transport, response.id, response.name, response.args);
        return;
      case 'interrupted':
        log.info({ event: 'ai_interrupted', ...this.logContext }, 'ai turn interrupted by caller');
        this.options.onInterrupted?.();
        return;
      case 'turn_complete':
      case 'empty':
        return;
    }
  }

  private async handleToolCall(
    transport: AiTransport,
    id: string,
    name: string,
    args: Record<string, unknown>,
  ): Promise<void> {
    log.info({ event: 'ai_tool_call', tool: name, call_id: id, ...this.logContext }, 'ai requested tool');

    let payload: { result: string } | { error: string };
    try {
      payload = { result: await this.tools.execute(name, args) };
    } catch (error) {
      payload = { error: error instanceof Error ? error.message : String(error) };
    }

    try {
      await transport.respondToTool(id, name, payload);
    } catch (error) {
      incAiPumpErrors('inbound');
      log.warn(
        { err: error, event: 'ai_tool_response_failed', tool: name, call_id: id, ...this.logContext },
        'failed to send tool response',
      );
    }
  }

  private async closeTransport(transport: AiTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      log.warn({ err: error, event: 'ai_transport_close_failed', ...this.logContext }, 'ai transport close failed');
    }
  }

  private setState(next: AiSessionState): void {
    if (this.state === next) return;
    const previous = this.state;
    this.state = next;
    log.debug({ event: 'ai_session_state', from: previous, to: next, ...this.logContext }, 'ai session state change');
    this.options.onStateChange?.(next);
  }
}
