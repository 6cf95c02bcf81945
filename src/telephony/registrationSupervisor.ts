import type { CallSessionOrchestrator } from '../calls/callSessionOrchestrator';
import { log } from '../log';
import { incRegistrationAttempts } from '../metrics';
import { sleep, TimeoutError, withTimeout } from '../retry';
import type { SipCredentials, TelephonyEngine, TelephonyEngineFactory } from './types';

export interface RegistrationSupervisorOptions {
  engineFactory: TelephonyEngineFactory;
  credentials: SipCredentials;
  orchestrator: CallSessionOrchestrator;
  registrationTimeoutMs?: number;
  retryDelayMs?: number;
  /** Total registration attempts before giving up; 0 retries forever. */
  maxRetries?: number;
}

/**
 * Keeps the gateway registered. Each attempt gets a fresh engine whose call events are held back
 * until it registers; a failed or timed-out attempt shuts that engine down and waits a fixed delay before the next one. When a registered engine
 * reports the registration lost, the current call is torn down and the loop starts over.
 */
export class RegistrationSupervisor {
  private readonly engineFactory: TelephonyEngineFactory;
  private readonly credentials: SipCredentials;
  private readonly orchestrator: CallSessionOrchestrator;
  private readonly registrationTimeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly maxRetries: number;

  private abort = new AbortController();
  private engine: TelephonyEngine | null = null;
  private loop: Promise<boolean> | null = null;
  private registered = false;
  private attempts = 0;

  constructor(options: RegistrationSupervisorOptions) {
    this.engineFactory = options.engineFactory;
    this.credentials = options.credentials;
    this.orchestrator = options.orchestrator;
    this.registrationTimeoutMs = options.registrationTimeoutMs ?? 10_000;
    this.retryDelayMs = options.retryDelayMs ?? 10_000;
    this.maxRetries = Math.max(0, options.maxRetries ?? 0);
  }

  public isRegistered(): boolean {
    return this.registered;
  }

  public getAttempts(): number {
    return this.attempts;
  }

  /** Resolves true once registered, false when attempts ran out or stop() was called. */
  public start(): Promise<boolean> {
    if (this.loop) {
      return this.loop;
    }
    if (this.abort.signal.aborted) {
      this.abort = new AbortController();
    }
    const loop = this.runLoop(this.abort.signal).finally(() => {
      if (this.loop === loop) {
        this.loop = null;
      }
    });
    this.loop = loop;
    return loop;
  }

  public async stop(): Promise<void> {
    this.abort.abort();
    const loop = this.loop;
    if (loop) {
      await loop;
    }
    this.registered = false;
    const engine = this.engine;
    this.engine = null;
    if (engine) {
      this.orchestrator.detachEngine(engine);
      await this.shutdownEngine(engine);
    }
  }

  private async runLoop(signal: AbortSignal): Promise<boolean> {
    let attempt = 0;
    while (!signal.aborted) {
      attempt += 1;
      this.attempts += 1;
      if (attempt > 1) {
        log.info({ event: 'sip_registration_attempt', attempt }, `registration attempt ${attempt}`);
      }

      const engine = this.engineFactory();
      this.engine = engine;
      this.subscribeGated(engine);

      try {
        const result = await withTimeout(
          engine.register(this.credentials),
          this.registrationTimeoutMs,
          'sip registration',
        );
        if (result.ok && !signal.aborted) {
          incRegistrationAttempts('ok');
          this.registered = true;
          this.orchestrator.attachEngine(engine);
          log.info(
            { event: 'gateway_registered', attempt, expires_sec: result.expiresSec },
            'gateway registered and waiting for calls',
          );
          return true;
        }
        if (!result.ok) {
          incRegistrationAttempts('failed');
          log.warn(
            { event: 'sip_registration_rejected', attempt, status: result.status, reason: result.reason },
            'registration rejected',
          );
        }
      } catch (error) {
        incRegistrationAttempts(error instanceof TimeoutError ? 'timeout' : 'error');
        log.warn({ err: error, event: 'sip_registration_error', attempt }, 'registration attempt failed');
      }

      if (this.engine === engine) {
        this.engine = null;
      }
      await this.orchestrator.shutdown('registration_failed');
      this.orchestrator.detachEngine(engine);
      await this.shutdownEngine(engine);

      if (signal.aborted) {
        break;
      }
      if (this.maxRetries > 0 && attempt >= this.maxRetries) {
        log.error(
          { event: 'sip_registration_gave_up', attempts: attempt },
          `max registration retries (${this.maxRetries}) exceeded`,
        );
        return false;
      }

      log.warn(
        { event: 'sip_registration_retry_scheduled', delay_ms: this.retryDelayMs },
        `registration failed, retrying in ${this.retryDelayMs}ms`,
      );
      const waited = await sleep(this.retryDelayMs, signal);
      if (!waited) {
        break;
      }
    }
    return false;
  }

  /** Call events reach the orchestrator only from the current engine once it is registered. */
  private subscribeGated(engine: TelephonyEngine): void {
    const accepts = (event: string, callId: string): boolean => {
      if (this.engine === engine && this.registered) {
        return true;
      }
      log.warn(
        { event: 'telephony_event_before_registration', telephony_event: event, call_id: callId },
        'call event from an unregistered engine dropped',
      );
      return false;
    };
    engine.subscribe({
      onIncomingCall: (info) => {
        if (accepts('incoming_call', info.callId)) this.orchestrator.onIncomingCall(info);
      },
      onMediaActive: (info) => {
        if (accepts('media_active', info.callId)) this.orchestrator.onMediaActive(info);
      },
      onCallEnded: (info) => {
        if (accepts('call_ended', info.callId)) this.orchestrator.onCallEnded(info);
      },
      onRegistrationLost: (reason) => this.handleRegistrationLost(engine, reason),
    });
  }

  private handleRegistrationLost(engine: TelephonyEngine, reason: string): void {
    if (this.engine !== engine || !this.registered) {
      return;
    }
    this.registered = false;
    log.warn({ event: 'gateway_registration_lost', reason }, 'lost sip registration, reconnecting');
    void this.recover(engine);
  }

  private async recover(engine: TelephonyEngine): Promise<void> {
    try {
      await this.orchestrator.shutdown('registration_lost');
      this.orchestrator.detachEngine(engine);
      if (this.engine === engine) {
        this.engine = null;
      }
      await this.shutdownEngine(engine);
      if (this.abort.signal.aborted) {
        return;
      }
      const registered = await this.start();
      if (!registered) {
        log.error({ event: 'gateway_reregistration_failed' }, 'could not re-register after registration loss');
      }
    } catch (error) {
      log.error({ err: error, event: 'gateway_recovery_failed' }, 'registration recovery failed');
    }
  }

  private async shutdownEngine(engine: TelephonyEngine): Promise<void> {
    try {
      await engine.shutdown();
    } catch (error) {
      log.warn({ err: error, event: 'telephony_engine_shutdown_failed' }, 'telephony engine shutdown failed');
    }
  }
}
