import { DEFAULT_GREETING_PROMPT, loadSystemInstruction } from './ai/systemInstruction';
import type { TelephonyCodec } from './audio/g711';
import type { Env } from './env';
import type { SipCredentials } from './telephony/types';

export interface GatewayConfig {
  sip: SipCredentials;
  telephony: {
    gatewayUrl: string;
    sampleRate: number;
    frameTimeMs: number;
    answerDelayMs: number;
    codec: TelephonyCodec;
  };
  gemini: {
    apiKey: string;
    model: string;
    voice: string;
    sendSampleRate: number;
    receiveSampleRate: number;
    connectTimeoutMs: number;
    instructions: string;
    greetingPrompt: string;
  };
  bridge: {
    queueCapacity: number;
  };
  registration: {
    timeoutMs: number;
    retryDelayMs: number;
    maxRetries: number;
  };
  http: {
    port?: number;
  };
}

export interface BuildConfigOptions {
  readInstruction?: (filePath?: string) => string;
}

export function buildGatewayConfig(env: Env, options: BuildConfigOptions = {}): GatewayConfig {
  const readInstruction = options.readInstruction ?? loadSystemInstruction;

  return {
    sip: {
      extension: env.SIP_EXTENSION,
      authId: env.SIP_AUTH_ID ?? env.SIP_EXTENSION,
      password: env.SIP_PASSWORD,
      server: env.SIP_SERVER,
      port: env.SIP_PORT,
      transport: env.SIP_TRANSPORT,
      codec: env.PREFERRED_CODEC,
    },
    telephony: {
      gatewayUrl: env.TELEPHONY_GATEWAY_URL,
      sampleRate: env.TELEPHONY_SAMPLE_RATE,
      frameTimeMs: env.FRAME_TIME_MS,
      answerDelayMs: env.ANSWER_DELAY_MS,
      codec: env.PREFERRED_CODEC,
    },
    gemini: {
      apiKey: env.GEMINI_API_KEY,
      model: env.GEMINI_MODEL,
      voice: env.GEMINI_VOICE_NAME,
      sendSampleRate: env.GEMINI_SEND_SAMPLE_RATE,
      receiveSampleRate: env.GEMINI_RECEIVE_SAMPLE_RATE,
      connectTimeoutMs: env.GEMINI_CONNECT_TIMEOUT_MS,
      instructions: readInstruction(env.SYSTEM_INSTRUCTION_PATH),
      greetingPrompt: env.GREETING_PROMPT ?? DEFAULT_GREETING_PROMPT,
    },
    bridge: {
      queueCapacity: env.BRIDGE_QUEUE_CAPACITY,
    },
    registration: {
      timeoutMs: env.REGISTRATION_TIMEOUT_MS,
      retryDelayMs: env.REGISTRATION_RETRY_DELAY_MS,
      maxRetries: env.REGISTRATION_MAX_RETRIES,
    },
    http: {
      port: env.HTTP_PORT,
    },
  };
}
