/**
 * Gemini Live API over a single WebSocket.
 *
 * Audio: PCM16 mono at the configured input rate in, PCM16 24 kHz mono out (base64 on the wire).
 * The connection is usable once the server acknowledges `setup` with `setupComplete`; server
 * messages are validated and flattened into AiResponse values on a push stream.
 */
import WebSocket from 'ws';
import { z } from 'zod';
import { log } from '../log';
import { AbortedError, TimeoutError } from '../retry';
import type { AiConnectOptions, AiConnector, AiResponse, AiTransport, ToolResponsePayload } from './types';

export const GEMINI_LIVE_ENDPOINT =
  'wss://generativelanguage.googleapis.com/ws/google.ai.generativelanguage.v1beta.GenerativeService.BidiGenerateContent';

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

const PartSchema = z
  .object({
    text: z.string().optional(),
    inlineData: z
      .object({
        mimeType: z.string().optional(),
        data: z.string(),
      })
      .optional(),
  })
  .passthrough();

const FunctionCallSchema = z.object({
  id: z.string().optional(),
  name: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});

const ServerMessageSchema = z
  .object({
    setupComplete: z.object({}).passthrough().optional(),
    serverContent: z
      .object({
        modelTurn: z.object({ parts: z.array(PartSchema).default([]) }).optional(),
        interrupted: z.boolean().optional(),
        turnComplete: z.boolean().optional(),
      })
      .passthrough()
      .optional(),
    toolCall: z.object({ functionCalls: z.array(FunctionCallSchema).default([]) }).optional(),
    goAway: z.object({ timeLeft: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type GeminiServerMessage = z.infer<typeof ServerMessageSchema>;

function rawToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

export function parseServerMessage(raw: string): GeminiServerMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    log.warn({ err: error, event: 'gemini_message_unparseable' }, 'gemini message is not json');
    return null;
  }
  const parsed = ServerMessageSchema.safeParse(json);
  if (!parsed.success) {
    log.warn(
      { event: 'gemini_message_invalid', issues: parsed.error.issues.length },
      'gemini message failed validation',
    );
    return null;
  }
  return parsed.data;
}

/** Flattens one server message into the responses the session controller acts on. */
export function toAiResponses(message: GeminiServerMessage): AiResponse[] {
  const responses: AiResponse[] = [];
  const content = message.serverContent;

  if (content) {
    for (const part of content.modelTurn?.parts ?? []) {
      if (part.inlineData?.data) {
        const data = Buffer.from(part.inlineData.data, 'base64');
        if (data.length > 0) {
          responses.push({ kind: 'audio', data });
        }
      }
      if (part.text) {
        responses.push({ kind: 'text', text: part.text });
      }
    }
    if (content.interrupted) {
      responses.push({ kind: 'interrupted' });
    }
    if (content.turnComplete) {
      responses.push({ kind: 'turn_complete' });
    }
  }

  for (const call of message.toolCall?.functionCalls ?? []) {
    responses.push({
      kind: 'tool_call',
      id: call.id ?? call.name,
      name: call.name,
      args: call.args ?? {},
    });
  }

  if (responses.length === 0) {
    responses.push({ kind: 'empty' });
  }
  return responses;
}

/** Push-fed async stream; ended streams drain what is buffered, then finish. */
class ResponseStream implements AsyncIterable<AiResponse> {
  private readonly buffer: AiResponse[] = [];
  private pending: ((result: IteratorResult<AiResponse>) => void) | null = null;
  private ended = false;

  public push(item: AiResponse): void {
    if (this.ended) return;
    const resolve = this.pending;
    if (resolve) {
      this.pending = null;
      resolve({ value: item, done: false });
      return;
    }
    this.buffer.push(item);
  }

  public end(): void {
    this.ended = true;
    const resolve = this.pending;
    if (resolve) {
      this.pending = null;
      resolve({ value: undefined, done: true });
    }
  }

  public [Symbol.asyncIterator](): AsyncIterator<AiResponse> {
    return {
      next: (): Promise<IteratorResult<AiResponse>> => {
        const item = this.buffer.shift();
        if (item) {
          return Promise.resolve({ value: item, done: false });
        }
        if (this.ended) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.pending = resolve;
        });
      },
    };
  }
}

export class GeminiLiveTransport implements AiTransport {
  private readonly ws: WebSocket;
  private readonly stream = new ResponseStream();
  private readonly inputMimeType: string;
  private closed = false;

  constructor(ws: WebSocket, inputSampleRate: number) {
    this.ws = ws;
    this.inputMimeType = `audio/pcm;rate=${inputSampleRate}`;

    ws.on('message', (raw) => {
      const message = parseServerMessage(rawToString(raw));
      if (!message) return;
      if (message.goAway) {
        log.warn({ event: 'gemini_go_away', time_left: message.goAway.timeLeft }, 'gemini session closing soon');
      }
      for (const response of toAiResponses(message)) {
        this.stream.push(response);
      }
    });

    ws.on('close', (code, reason) => {
      this.closed = true;
      log.info(
        { event: 'gemini_ws_closed', code, reason: reason.toString('utf8') },
        'gemini websocket closed',
      );
      this.stream.end();
    });

    ws.on('error', (error) => {
      log.error({ err: error, event: 'gemini_ws_error' }, 'gemini websocket error');
    });
  }

  public sendAudio(chunk: Buffer): Promise<void> {
    return this.send({
      realtimeInput: {
        audio: { mimeType: this.inputMimeType, data: chunk.toString('base64') },
      },
    });
  }

  public sendText(text: string): Promise<void> {
    return this.send({
      clientContent: {
        turns: [{ role: 'user', parts: [{ text }] }],
        turnComplete: true,
      },
    });
  }

  public respondToTool(callId: string, name: string, payload: ToolResponsePayload): Promise<void> {
    return this.send({
      toolResponse: {
        functionResponses: [{ id: callId, name, response: payload }],
      },
    });
  }

  public receive(): AsyncIterable<AiResponse> {
    return this.stream;
  }

  public close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    this.closed = true;
    this.stream.end();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(1000, 'session_stopped');
    }
    return Promise.resolve();
  }

  private send(payload: Record<string, unknown>): Promise<void> {
    if (this.closed || this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('gemini transport is not open'));
    }
    return new Promise((resolve, reject) => {
      this.ws.send(JSON.stringify(payload), (error) => {
        if (error) {
          reject(error);
          return;
        }
        resolve();
      });
    });
  }
}

export interface GeminiLiveConnectorOptions {
  apiKey: string;
  inputSampleRate: number;
  endpoint?: string;
  connectTimeoutMs?: number;
}

export class GeminiLiveConnector implements AiConnector {
  private readonly apiKey: string;
  private readonly inputSampleRate: number;
  private readonly endpoint: string;
  private readonly connectTimeoutMs: number;

  constructor(options: GeminiLiveConnectorOptions) {
    this.apiKey = options.apiKey;
    this.inputSampleRate = options.inputSampleRate;
    this.endpoint = options.endpoint ?? GEMINI_LIVE_ENDPOINT;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
  }

  public buildSetup(options: AiConnectOptions): Record<string, unknown> {
    const model = options.model.startsWith('models/') ? options.model : `models/${options.model}`;
    return {
      setup: {
        model,
        generationConfig: {
          responseModalities: ['AUDIO'],
          speechConfig: {
            voiceConfig: { prebuiltVoiceConfig: { voiceName: options.voice } },
          },
        },
        systemInstruction: { parts: [{ text: options.instructions }] },
        tools: options.tools.length > 0 ? [{ functionDeclarations: options.tools }] : [],
      },
    };
  }

  public connect(options: AiConnectOptions): Promise<AiTransport> {
    if (options.signal?.aborted) {
      return Promise.reject(new AbortedError('gemini connect aborted'));
    }
    const url = new URL(this.endpoint);
    url.searchParams.set('key', this.apiKey);

    log.info(
      { event: 'gemini_connecting', model: options.model, voice: options.voice, tools: options.tools.length },
      'connecting to gemini live',
    );

    return new Promise<AiTransport>((resolve, reject) => {
      const ws = new WebSocket(url.toString());
      let settled = false;

      const finish = (error: Error | null): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        options.signal?.removeEventListener('abort', onAbort);
        ws.off('message', onSetupMessage);
        ws.off('close', onEarlyClose);
        ws.off('error', onEarlyError);
        if (error) {
          ws.on('error', (lateError) => {
            log.debug({ err: lateError, event: 'gemini_ws_error_after_abort' }, 'gemini websocket error after abort');
          });
          ws.terminate();
          reject(error);
          return;
        }
        resolve(new GeminiLiveTransport(ws, this.inputSampleRate));
      };

      const onAbort = (): void => finish(new AbortedError('gemini connect aborted'));
      const onEarlyError = (error: Error): void => finish(error);
      const onEarlyClose = (code: number, reason: Buffer): void =>
        finish(new Error(`gemini websocket closed during setup (code=${code} reason=${reason.toString('utf8')})`));
      const onSetupMessage = (raw: WebSocket.RawData): void => {
        const message = parseServerMessage(rawToString(raw));
        if (message?.setupComplete) {
          log.info({ event: 'gemini_setup_complete' }, 'gemini session ready');
          finish(null);
        }
      };

      const timer = setTimeout(
        () => finish(new TimeoutError('gemini connect', this.connectTimeoutMs)),
        this.connectTimeoutMs,
      );
      options.signal?.addEventListener('abort', onAbort, { once: true });

      ws.on('open', () => {
        ws.send(JSON.stringify(this.buildSetup(options)), (error) => {
          if (error) finish(error);
        });
      });
      ws.on('message', onSetupMessage);
      ws.on('close', onEarlyClose);
      ws.on('error', onEarlyError);
    });
  }
}
