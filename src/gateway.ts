import { GeminiLiveConnector } from './ai/geminiLiveTransport';
import type { AiConnector } from './ai/types';
import { DuplexAudioBridge } from './audio/duplexAudioBridge';
import { CallSessionOrchestrator } from './calls/callSessionOrchestrator';
import type { CallSnapshot } from './calls/types';
import type { GatewayConfig } from './config';
import { log } from './log';
import { MediaGatewayEngine } from './telephony/mediaGatewayEngine';
import { RegistrationSupervisor } from './telephony/registrationSupervisor';
import type { TelephonyEngineFactory } from './telephony/types';
import { createDefaultToolRegistry } from './tools/builtinTools';
import type { ToolExecutor } from './tools/toolExecutor';

export interface GatewayDependencies {
  engineFactory?: TelephonyEngineFactory;
  connector?: AiConnector;
  tools?: ToolExecutor;
}

export interface GatewayStatus {
  registered: boolean;
  registrationAttempts: number;
  call: CallSnapshot | null;
  bridge: ReturnType<DuplexAudioBridge['stats']>;
}

/** Wires the audio bridge, AI connector, call orchestrator and registration loop from one config. */
export class VoiceGateway {
  public readonly bridge: DuplexAudioBridge;
  public readonly orchestrator: CallSessionOrchestrator;
  public readonly supervisor: RegistrationSupervisor;

  constructor(config: GatewayConfig, deps: GatewayDependencies = {}) {
    this.bridge = new DuplexAudioBridge({
      telephonyRate: config.telephony.sampleRate,
      aiInputRate: config.gemini.sendSampleRate,
      aiOutputRate: config.gemini.receiveSampleRate,
      queueCapacity: config.bridge.queueCapacity,
    });

    const connector =
      deps.connector ??
      new GeminiLiveConnector({
        apiKey: config.gemini.apiKey,
        inputSampleRate: config.gemini.sendSampleRate,
        connectTimeoutMs: config.gemini.connectTimeoutMs,
      });

    this.orchestrator = new CallSessionOrchestrator({
      bridge: this.bridge,
      connector,
      tools: deps.tools ?? createDefaultToolRegistry(),
      session: {
        model: config.gemini.model,
        instructions: config.gemini.instructions,
        voice: config.gemini.voice,
        greetingPrompt: config.gemini.greetingPrompt,
      },
      telephonySampleRate: config.telephony.sampleRate,
      frameTimeMs: config.telephony.frameTimeMs,
      answerDelayMs: config.telephony.answerDelayMs,
    });

    const engineFactory =
      deps.engineFactory ??
      (() =>
        new MediaGatewayEngine({
          url: config.telephony.gatewayUrl,
          frameTimeMs: config.telephony.frameTimeMs,
        }));

    this.supervisor = new RegistrationSupervisor({
      engineFactory,
      credentials: config.sip,
      orchestrator: this.orchestrator,
      registrationTimeoutMs: config.registration.timeoutMs,
      retryDelayMs: config.registration.retryDelayMs,
      maxRetries: config.registration.maxRetries,
    });
  }

  public async start(): Promise<boolean> {
    log.info({ event: 'gateway_starting' }, 'voice gateway starting');
    return this.supervisor.start();
  }

  public async stop(): Promise<void> {
    log.info({ event: 'gateway_stopping' }, 'voice gateway stopping');
    await this.orchestrator.shutdown('shutdown');
    await this.supervisor.stop();
    log.info({ event: 'gateway_stopped' }, 'voice gateway stopped');
  }

  public status(): GatewayStatus {
    return {
      registered: this.supervisor.isRegistered(),
      registrationAttempts: this.supervisor.getAttempts(),
      call: this.orchestrator.getCurrentCall(),
      bridge: this.bridge.stats(),
    };
  }
}
