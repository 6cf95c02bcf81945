import type { TelephonyCodec } from '../audio/g711';

export type SipTransport = 'udp' | 'tcp' | 'tls';

export interface SipCredentials {
  extension: string;
  authId: string;
  password: string;
  server: string;
  port: number;
  transport: SipTransport;
  codec: TelephonyCodec;
}

export type RegistrationResult =
  | { ok: true; expiresSec?: number }
  | { ok: false; status: number; reason: string };

export interface IncomingCallInfo {
  callId: string;
  remoteUri?: string;
}

export interface CallEventInfo {
  callId: string;
  reason?: string;
}

/**
 * Receives engine callbacks. Implementations must return promptly: these fire from the engine's
 * own event handling and must not wait on I/O.
 */
export interface TelephonyEventSubscriber {
  onIncomingCall(info: IncomingCallInfo): void;
  onMediaActive(info: CallEventInfo): void;
  onCallEnded(info: CallEventInfo): void;
  onRegistrationLost?(reason: string): void;
}

/** Audio endpoint the engine drives for one call, in PCM16LE at the engine's sample rate. */
export interface MediaPort {
  /** Captured audio from the remote party; size is chosen by the engine. */
  onFrameReceived(frame: Buffer): void;
  /** Playback pull; must return exactly one frame and must not block. */
  onFrameRequested(): Buffer;
}

export interface TelephonyEngine {
  register(credentials: SipCredentials): Promise<RegistrationResult>;
  isRegistered(): boolean;
  subscribe(subscriber: TelephonyEventSubscriber): void;
  answer(callId: string, status?: number): void;
  hangup(callId: string): void;
  attachMediaPort(callId: string, port: MediaPort): void;
  detachMediaPort(callId: string): void;
  shutdown(): Promise<void>;
}

export type TelephonyEngineFactory = () => TelephonyEngine;
