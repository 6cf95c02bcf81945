import assert from 'node:assert/strict';
import { test } from 'node:test';
import { FakeAiConnector, FakeTelephonyEngine, testSessionSettings } from './fakes';
import { constantPcm16, setTestEnv, waitFor } from './testEnv';

setTestEnv();

async function buildOrchestrator() {
  const { CallSessionOrchestrator } = await import('../src/calls/callSessionOrchestrator');
  const { DuplexAudioBridge } = await import('../src/audio/duplexAudioBridge');
  const { createDefaultToolRegistry } = await import('../src/tools/builtinTools');

  const engine = new FakeTelephonyEngine();
  const connector = new FakeAiConnector();
  const bridge = new DuplexAudioBridge();
  const orchestrator = new CallSessionOrchestrator({
    bridge,
    connector,
    tools: createDefaultToolRegistry(),
    session: testSessionSettings,
    engine,
    answerDelayMs: 5,
    playbackPollMs: 10,
    outboundPollMs: 10,
    retryBackoffMs: 5,
  });
  return { orchestrator, engine, connector, bridge };
}

test('an incoming call is answered with 200 after the answer delay', async () => {
  const { orchestrator, engine } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1', remoteUri: 'sip:caller@example.test' });
  await orchestrator.idle();
  assert.deepEqual(engine.answers, []);
  assert.equal(orchestrator.getCurrentCall()?.phase, 'ringing');

  await waitFor(() => engine.answers.length === 1, 2000, 'answer');
  assert.deepEqual(engine.answers, [{ callId: 'call-1', status: 200 }]);

  await orchestrator.shutdown();
});

test('a second incoming call is rejected busy while one is active', async () => {
  const { orchestrator, engine } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onIncomingCall({ callId: 'call-2' });
  await orchestrator.idle();

  assert.deepEqual(engine.answers, [{ callId: 'call-2', status: 486 }]);
  assert.equal(orchestrator.getCurrentCall()?.callId, 'call-1');

  await orchestrator.shutdown();
});

test('duplicate media-active then ended starts and stops exactly one AI session', async () => {
  const { orchestrator, engine, connector } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();
  await waitFor(() => connector.transports.length === 1, 2000, 'ai connect');

  assert.equal(orchestrator.getCurrentCall()?.phase, 'media_active');
  assert.equal(engine.ports.size, 1);

  orchestrator.onCallEnded({ callId: 'call-1' });
  await orchestrator.idle();

  assert.equal(connector.requests.length, 1);
  assert.equal(connector.latest().closeCount, 1);
  assert.equal(orchestrator.getCurrentCall(), null);
  assert.deepEqual(engine.detached, ['call-1']);
});

test('media-active for an ended call does not start a session', async () => {
  const { orchestrator, connector } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onCallEnded({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();

  assert.equal(connector.requests.length, 0);
  assert.equal(orchestrator.getCurrentCall(), null);
});

test('an ended event for another call id is ignored', async () => {
  const { orchestrator } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onCallEnded({ callId: 'call-9' });
  await orchestrator.idle();

  assert.equal(orchestrator.getCurrentCall()?.callId, 'call-1');
  await orchestrator.shutdown();
});

test('audio flows from the caller to the AI and back to the playback frames', async () => {
  const { FrameAssembler } = await import('../src/audio/frameAssembler');
  const { orchestrator, engine, connector } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();
  await waitFor(() => connector.transports.length === 1, 2000, 'ai connect');
  const port = engine.ports.get('call-1');
  assert.ok(port instanceof FrameAssembler);
  const transport = connector.latest();

  for (let i = 0; i < 10; i += 1) {
    port.onFrameReceived(constantPcm16(80, i));
  }
  await waitFor(() => transport.audio.length === 10, 2000, 'outbound audio');
  assert.deepEqual(
    transport.audio.map((chunk) => chunk.length),
    [318, 320, 320, 320, 320, 320, 320, 320, 320, 320],
  );

  transport.push({ kind: 'audio', data: constantPcm16(480, 1000) });
  await waitFor(() => port.bufferedBytes() === 320, 2000, 'playback audio');
  assert.deepEqual(port.onFrameRequested(), constantPcm16(160, 1000));
  assert.deepEqual(port.onFrameRequested(), Buffer.alloc(320));

  await orchestrator.shutdown();
  assert.deepEqual(engine.hangups, ['call-1']);
});

test('barge-in clears buffered playback audio', async () => {
  const { FrameAssembler } = await import('../src/audio/frameAssembler');
  const { orchestrator, engine, connector } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();
  await waitFor(() => connector.transports.length === 1, 2000, 'ai connect');
  const port = engine.ports.get('call-1');
  assert.ok(port instanceof FrameAssembler);

  port.appendPlaybackAudio(constantPcm16(800, 5));
  connector.latest().push({ kind: 'interrupted' });
  await waitFor(() => port.bufferedBytes() === 0, 2000, 'playback cleared');

  await orchestrator.shutdown();
});

test('the AI closing mid-call leaves the call up', async () => {
  const { orchestrator, connector } = await buildOrchestrator();

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();
  await waitFor(() => connector.transports.length === 1, 2000, 'ai connect');

  connector.latest().end();
  await waitFor(() => orchestrator.getCurrentCall()?.aiState === 'idle', 2000, 'ai session end');
  await orchestrator.idle();

  assert.equal(orchestrator.getCurrentCall()?.phase, 'media_active');
  assert.equal(orchestrator.hasActiveCall(), true);
  await orchestrator.shutdown();
});

test('a failed AI start keeps the call and a later call gets a fresh session', async () => {
  const { orchestrator, connector } = await buildOrchestrator();
  connector.failWith = new Error('quota exceeded');

  orchestrator.onIncomingCall({ callId: 'call-1' });
  orchestrator.onMediaActive({ callId: 'call-1' });
  await orchestrator.idle();
  await waitFor(() => orchestrator.getCurrentCall()?.aiState === 'idle', 2000, 'failed start');
  assert.equal(orchestrator.getCurrentCall()?.phase, 'media_active');

  orchestrator.onCallEnded({ callId: 'call-1' });
  connector.failWith = null;
  orchestrator.onIncomingCall({ callId: 'call-2' });
  orchestrator.onMediaActive({ callId: 'call-2' });
  await orchestrator.idle();
  await waitFor(() => connector.transports.length === 1, 2000, 'second call connect');

  const call = orchestrator.getCurrentCall();
  assert.equal(call?.callId, 'call-2');
  assert.equal(call?.generation, 2);
  await orchestrator.shutdown();
  assert.equal(connector.latest().closeCount, 1);
});
