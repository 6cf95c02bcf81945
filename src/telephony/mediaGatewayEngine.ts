// src/telephony/mediaGatewayEngine.ts
// How it works: the SIP stack lives in an external media gateway; this engine drives it over one
// WebSocket carrying JSON text messages. Registration, answer and hangup are commands; call and
// media state changes come back as events and are forwarded to the subscriber. Inbound media is
// decoded to PCM16 and handed to the call's MediaPort; a per-call clock pulls one playback frame
// every frameTimeMs, encodes it with the negotiated codec and sends it back.

import WebSocket from 'ws';
import { z } from 'zod';
import { decodeTelephonyPayload, encodeTelephonyPayload, type TelephonyCodec } from '../audio/g711';
import { log } from '../log';
import type {
  MediaPort,
  RegistrationResult,
  SipCredentials,
  TelephonyEngine,
  TelephonyEventSubscriber,
} from './types';

const CallIdSchema = z.string().min(1);

const GatewayMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('registered'), expiresSec: z.number().int().nonnegative().optional() }),
  z.object({
    type: z.literal('registration_failed'),
    status: z.number().int(),
    reason: z.string().default(''),
  }),
  z.object({ type: z.literal('unregistered'), reason: z.string().default('unregistered') }),
  z.object({ type: z.literal('incoming_call'), callId: CallIdSchema, remoteUri: z.string().optional() }),
  z.object({ type: z.literal('media_state'), callId: CallIdSchema, state: z.enum(['active', 'inactive']) }),
  z.object({
    type: z.literal('call_state'),
    callId: CallIdSchema,
    state: z.enum(['early', 'connecting', 'confirmed', 'disconnected']),
    reason: z.string().optional(),
  }),
  z.object({ type: z.literal('media'), callId: CallIdSchema, payload: z.string() }),
]);

export type GatewayMessage = z.infer<typeof GatewayMessageSchema>;

export function parseGatewayMessage(raw: string): GatewayMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.warn({ err: error, event: 'gateway_message_unparseable' }, 'media gateway message is not json');
    return null;
  }
  const parsed = GatewayMessageSchema.safeParse(json);
  if (!parsed.success) {
    log.warn(
      { event: 'gateway_message_invalid', issues: parsed.error.issues.map((issue) => issue.message) },
      'media gateway message failed validation',
    );
    return null;
  }
  return parsed.data;
}

export interface MediaGatewayEngineOptions {
  url: string;
  frameTimeMs?: number;
  connectTimeoutMs?: number;
}

interface AttachedPort {
  port: MediaPort;
  clock: NodeJS.Timeout;
}

interface PendingRegistration {
  resolve: (result: RegistrationResult) => void;
  reject: (error: Error) => void;
}

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export class MediaGatewayEngine implements TelephonyEngine {
  private readonly url: string;
  private readonly frameTimeMs: number;
  private readonly connectTimeoutMs: number;
  private readonly ports = new Map<string, AttachedPort>();

  private ws: WebSocket | null = null;
  private subscriber: TelephonyEventSubscriber | null = null;
  private pending: PendingRegistration | null = null;
  private codec: TelephonyCodec = 'PCMU';
  private registered = false;
  private shuttingDown = false;

  constructor(options: MediaGatewayEngineOptions) {
    this.url = options.url;
    this.frameTimeMs = options.frameTimeMs ?? 20;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10_000;
  }

  public async register(credentials: SipCredentials): Promise<RegistrationResult> {
    if (this.pending) {
      throw new Error('registration already in progress');
    }
    const ws = await this.connect();
    this.codec = credentials.codec;

    log.info(
      {
        event: 'sip_registering',
        extension: credentials.extension,
        server: credentials.server,
        port: credentials.port,
        transport: credentials.transport,
        codec: credentials.codec,
      },
      'registering with sip server',
    );

    const result = new Promise<RegistrationResult>((resolve, reject) => {
      this.pending = { resolve, reject };
    });
    this.send(ws, {
      type: 'register',
      extension: credentials.extension,
      authId: credentials.authId,
      password: credentials.password,
      server: credentials.server,
      port: credentials.port,
      transport: credentials.transport,
      codec: credentials.codec,
    });
    return result;
  }

  public isRegistered(): boolean {
    return this.registered;
  }

  public subscribe(subscriber: TelephonyEventSubscriber): void {
    this.subscriber = subscriber;
  }

  public answer(callId: string, status = 200): void {
    this.sendCommand({ type: 'answer', callId, status });
  }

  public hangup(callId: string): void {
    this.sendCommand({ type: 'hangup', callId });
  }

  public attachMediaPort(callId: string, port: MediaPort): void {
    this.detachMediaPort(callId);
    const clock = setInterval(() => this.pushPlaybackFrame(callId, port), this.frameTimeMs);
    this.ports.set(callId, { port, clock });
    log.info({ event: 'media_port_attached', call_id: callId, frame_ms: this.frameTimeMs }, 'media port attached');
  }

  public detachMediaPort(callId: string): void {
    const attached = this.ports.get(callId);
    if (!attached) return;
    clearInterval(attached.clock);
    this.ports.delete(callId);
    log.info({ event: 'media_port_detached', call_id: callId }, 'media port detached');
  }

  public async shutdown(): Promise<void> {
    this.shuttingDown = true;
    this.registered = false;
    for (const callId of [...this.ports.keys()]) {
      this.detachMediaPort(callId);
    }
    this.failPending(new Error('telephony engine shut down'));

    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return;
    }

    await new Promise<void>((resolve) => {
      const fallback = setTimeout(() => {
        ws.terminate();
        resolve();
      }, 1000);
      ws.once('close', () => {
        clearTimeout(fallback);
        resolve();
      });
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close(1000, 'shutdown');
      }
    });
    log.info({ event: 'telephony_engine_shutdown' }, 'telephony engine shut down');
  }

  private connect(): Promise<WebSocket> {
    const existing = this.ws;
    if (existing && existing.readyState === WebSocket.OPEN) {
      return Promise.resolve(existing);
    }

    return new Promise<WebSocket>((resolve, reject) => {
      const ws = new WebSocket(this.url);
      const timer = setTimeout(() => {
        ws.terminate();
        reject(new Error(`media gateway connect timed out after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      const onError = (error: Error): void => {
        clearTimeout(timer);
        reject(error);
      };

      ws.once('error', onError);
      ws.once('open', () => {
        clearTimeout(timer);
        ws.off('error', onError);
        this.ws = ws;
        this.bindSocket(ws);
        log.info({ event: 'media_gateway_connected', url: this.url }, 'connected to media gateway');
        resolve(ws);
      });
    });
  }

  private bindSocket(ws: WebSocket): void {
    ws.on('message', (raw) => {
      const message = parseGatewayMessage(rawToString(raw));
      if (message) {
        this.handleMessage(message);
      }
    });

    ws.on('error', (error) => {
      log.error({ err: error, event: 'media_gateway_ws_error' }, 'media gateway websocket error');
    });

    ws.on('close', (code, reason) => {
      if (this.ws === ws) {
        this.ws = null;
      }
      const wasRegistered = this.registered;
      this.registered = false;
      for (const callId of [...this.ports.keys()]) {
        this.detachMediaPort(callId);
      }
      this.failPending(new Error(`media gateway closed during registration (code=${code})`));

      if (this.shuttingDown) return;
      log.warn(
        { event: 'media_gateway_closed', code, reason: reason.toString('utf8') },
        'media gateway connection closed',
      );
      if (wasRegistered) {
        this.subscriber?.onRegistrationLost?.('gateway_closed');
      }
    });
  }

  private handleMessage(message: GatewayMessage): void {
    switch (message.type) {
      case 'registered':
        this.registered = true;
        log.info({ event: 'sip_registered', expires_sec: message.expiresSec }, 'sip registration successful');
        this.settlePending({ ok: true, expiresSec: message.expiresSec });
        return;
      case 'registration_failed':
        this.registered = false;
        log.warn(
          { event: 'sip_registration_failed', status: message.status, reason: message.reason },
          'sip registration failed',
        );
        this.settlePending({ ok: false, status: message.status, reason: message.reason });
        return;
      case 'unregistered': {
        const wasRegistered = this.registered;
        this.registered = false;
        log.warn({ event: 'sip_unregistered', reason: message.reason }, 'sip registration lost');
        if (wasRegistered) {
          this.subscriber?.onRegistrationLost?.(message.reason);
        }
        return;
      }
      case 'incoming_call':
        this.subscriber?.onIncomingCall({ callId: message.callId, remoteUri: message.remoteUri });
        return;
      case 'media_state':
        if (message.state === 'active') {
          this.subscriber?.onMediaActive({ callId: message.callId });
        } else {
          log.debug({ event: 'media_inactive', call_id: message.callId }, 'call media inactive');
        }
        return;
      case 'call_state':
        log.debug({ event: 'call_state', call_id: message.callId, state: message.state }, 'call state changed');
        if (message.state === 'disconnected') {
          this.detachMediaPort(message.callId);
          this.subscriber?.onCallEnded({ callId: message.callId, reason: message.reason });
        }
        return;
      case 'media': {
        const attached = this.ports.get(message.callId);
        if (!attached) return;
        const pcm = decodeTelephonyPayload(this.codec, Buffer.from(message.payload, 'base64'));
        attached.port.onFrameReceived(pcm);
        return;
      }
    }
  }

  private pushPlaybackFrame(callId: string, port: MediaPort): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) return;
    const frame = port.onFrameRequested();
    const payload = encodeTelephonyPayload(this.codec, frame).toString('base64');
    this.send(ws, { type: 'media', callId, codec: this.codec, payload });
  }

  private sendCommand(payload: Record<string, unknown>): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      log.warn({ event: 'media_gateway_not_connected', command: payload.type }, 'media gateway not connected');
      return;
    }
    this.send(ws, payload);
  }

  private send(ws: WebSocket, payload: Record<string, unknown>): void {
    ws.send(JSON.stringify(payload), (error) => {
      if (error) {
        log.warn({ err: error, event: 'media_gateway_send_failed', command: payload.type }, 'media gateway send failed');
      }
    });
  }

  private settlePending(result: RegistrationResult): void {
    const pending = this.pending;
    this.pending = null;
    pending?.resolve(result);
  }

  private failPending(error: Error): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(error);
  }
}
