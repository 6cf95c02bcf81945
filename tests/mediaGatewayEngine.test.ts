import assert from 'node:assert/strict';
import { test } from 'node:test';
import WebSocket, { WebSocketServer } from 'ws';
import type { CallEventInfo, IncomingCallInfo, MediaPort, TelephonyEventSubscriber } from '../src/telephony/types';
import { testCredentials } from './fakes';
import { setTestEnv, waitFor } from './testEnv';

setTestEnv();

interface FakeGateway {
  url: string;
  received: Array<Record<string, unknown>>;
  socket: () => WebSocket;
  close: () => Promise<void>;
}

async function startFakeGateway(reply: (message: Record<string, unknown>) => unknown | null): Promise<FakeGateway> {
  const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
  await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
  const address = wss.address();
  if (typeof address !== 'object' || address === null) {
    throw new Error('server has no address');
  }

  const received: Array<Record<string, unknown>> = [];
  let current: WebSocket | null = null;

  wss.on('connection', (socket) => {
    current = socket;
    socket.on('message', (raw) => {
      const message: unknown = JSON.parse(raw.toString());
      if (typeof message !== 'object' || message === null || Array.isArray(message)) return;
      const record: Record<string, unknown> = { ...message };
      received.push(record);
      const response = reply(record);
      if (response !== null) {
        socket.send(JSON.stringify(response));
      }
    });
  });

  return {
    url: `ws://127.0.0.1:${address.port}/gateway`,
    received,
    socket: () => {
      if (!current) throw new Error('no gateway connection');
      return current;
    },
    close: () =>
      new Promise<void>((resolve) => {
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close(() => resolve());
      }),
  };
}

const acceptRegistration = (message: Record<string, unknown>): unknown | null =>
  message.type === 'register' ? { type: 'registered', expiresSec: 300 } : null;

class RecordingSubscriber implements TelephonyEventSubscriber {
  public readonly incoming: IncomingCallInfo[] = [];
  public readonly mediaActive: CallEventInfo[] = [];
  public readonly ended: CallEventInfo[] = [];
  public readonly lost: string[] = [];

  public onIncomingCall(info: IncomingCallInfo): void {
    this.incoming.push(info);
  }

  public onMediaActive(info: CallEventInfo): void {
    this.mediaActive.push(info);
  }

  public onCallEnded(info: CallEventInfo): void {
    this.ended.push(info);
  }

  public onRegistrationLost(reason: string): void {
    this.lost.push(reason);
  }
}

class RecordingPort implements MediaPort {
  public readonly frames: Buffer[] = [];

  public onFrameReceived(frame: Buffer): void {
    this.frames.push(frame);
  }

  public onFrameRequested(): Buffer {
    return Buffer.alloc(320);
  }
}

test('register sends the credentials and resolves on registered', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const engine = new MediaGatewayEngine({ url: gateway.url });
  try {
    const result = await engine.register(testCredentials);

    assert.deepEqual(result, { ok: true, expiresSec: 300 });
    assert.equal(engine.isRegistered(), true);
    assert.deepEqual(gateway.received[0], {
      type: 'register',
      extension: '1001',
      authId: '1001',
      password: 'test-secret',
      server: 'sip.example.test',
      port: 5060,
      transport: 'udp',
      codec: 'PCMU',
    });
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('a rejected registration resolves with the status and reason', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway((message) =>
    message.type === 'register' ? { type: 'registration_failed', status: 403, reason: 'Forbidden' } : null,
  );
  const engine = new MediaGatewayEngine({ url: gateway.url });
  try {
    assert.deepEqual(await engine.register(testCredentials), { ok: false, status: 403, reason: 'Forbidden' });
    assert.equal(engine.isRegistered(), false);
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('call events reach the subscriber and malformed messages are skipped', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const engine = new MediaGatewayEngine({ url: gateway.url });
  const subscriber = new RecordingSubscriber();
  engine.subscribe(subscriber);
  try {
    await engine.register(testCredentials);
    const socket = gateway.socket();

    socket.send('not json');
    socket.send(JSON.stringify({ type: 'bogus' }));
    socket.send(JSON.stringify({ type: 'incoming_call', callId: 'call-1', remoteUri: 'sip:caller@example.test' }));
    socket.send(JSON.stringify({ type: 'call_state', callId: 'call-1', state: 'confirmed' }));
    socket.send(JSON.stringify({ type: 'media_state', callId: 'call-1', state: 'inactive' }));
    socket.send(JSON.stringify({ type: 'media_state', callId: 'call-1', state: 'active' }));
    socket.send(JSON.stringify({ type: 'call_state', callId: 'call-1', state: 'disconnected', reason: 'bye' }));
    await waitFor(() => subscriber.ended.length === 1, 2000, 'call ended');

    assert.deepEqual(subscriber.incoming, [{ callId: 'call-1', remoteUri: 'sip:caller@example.test' }]);
    assert.deepEqual(subscriber.mediaActive, [{ callId: 'call-1' }]);
    assert.deepEqual(subscriber.ended, [{ callId: 'call-1', reason: 'bye' }]);
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('answer and hangup are sent as commands', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const engine = new MediaGatewayEngine({ url: gateway.url });
  try {
    await engine.register(testCredentials);
    engine.answer('call-1');
    engine.answer('call-2', 486);
    engine.hangup('call-1');
    await waitFor(() => gateway.received.length === 4, 2000, 'commands');

    assert.deepEqual(gateway.received.slice(1), [
      { type: 'answer', callId: 'call-1', status: 200 },
      { type: 'answer', callId: 'call-2', status: 486 },
      { type: 'hangup', callId: 'call-1' },
    ]);
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('inbound media is decoded for the port and playback frames are encoded back', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const engine = new MediaGatewayEngine({ url: gateway.url, frameTimeMs: 10 });
  const port = new RecordingPort();
  try {
    await engine.register(testCredentials);
    engine.attachMediaPort('call-1', port);

    gateway.socket().send(
      JSON.stringify({ type: 'media', callId: 'call-1', payload: Buffer.alloc(160, 0xff).toString('base64') }),
    );
    gateway.socket().send(
      JSON.stringify({ type: 'media', callId: 'call-other', payload: Buffer.alloc(160, 0xff).toString('base64') }),
    );
    await waitFor(() => port.frames.length === 1, 2000, 'inbound media');
    assert.deepEqual(port.frames[0], Buffer.alloc(320));

    await waitFor(() => gateway.received.some((message) => message.type === 'media'), 2000, 'playback frame');
    const media = gateway.received.find((message) => message.type === 'media');
    assert.deepEqual(media, {
      type: 'media',
      callId: 'call-1',
      codec: 'PCMU',
      payload: Buffer.alloc(160, 0xff).toString('base64'),
    });

    engine.detachMediaPort('call-1');
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('the gateway dropping the socket reports registration lost', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const engine = new MediaGatewayEngine({ url: gateway.url });
  const subscriber = new RecordingSubscriber();
  engine.subscribe(subscriber);
  try {
    await engine.register(testCredentials);
    gateway.socket().close();

    await waitFor(() => subscriber.lost.length === 1, 2000, 'registration lost');
    assert.deepEqual(subscriber.lost, ['gateway_closed']);
    assert.equal(engine.isRegistered(), false);
  } finally {
    await engine.shutdown();
    await gateway.close();
  }
});

test('register fails when the gateway cannot be reached', async () => {
  const { MediaGatewayEngine } = await import('../src/telephony/mediaGatewayEngine');
  const gateway = await startFakeGateway(acceptRegistration);
  const url = gateway.url;
  await gateway.close();

  const engine = new MediaGatewayEngine({ url, connectTimeoutMs: 1000 });
  await assert.rejects(engine.register(testCredentials));
  await engine.shutdown();
});
