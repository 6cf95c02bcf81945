import assert from 'node:assert/strict';
import { test } from 'node:test';
import type { RegistrationResult } from '../src/telephony/types';
import { FakeAiConnector, FakeTelephonyEngine, testCredentials, testSessionSettings } from './fakes';
import { setTestEnv, waitFor } from './testEnv';

setTestEnv();

async function buildSupervisor(
  results: Array<(engine: FakeTelephonyEngine) => Promise<RegistrationResult>>,
  options: { maxRetries?: number; registrationTimeoutMs?: number; retryDelayMs?: number } = {},
) {
  const { RegistrationSupervisor } = await import('../src/telephony/registrationSupervisor');
  const { CallSessionOrchestrator } = await import('../src/calls/callSessionOrchestrator');
  const { DuplexAudioBridge } = await import('../src/audio/duplexAudioBridge');
  const { createDefaultToolRegistry } = await import('../src/tools/builtinTools');

  const engines: FakeTelephonyEngine[] = [];
  const orchestrator = new CallSessionOrchestrator({
    bridge: new DuplexAudioBridge(),
    connector: new FakeAiConnector(),
    tools: createDefaultToolRegistry(),
    session: testSessionSettings,
    answerDelayMs: 0,
  });
  const supervisor = new RegistrationSupervisor({
    engineFactory: () => {
      const next = results[engines.length] ?? (() => Promise.resolve<RegistrationResult>({ ok: true }));
      const engine: FakeTelephonyEngine = new FakeTelephonyEngine(() => next(engine));
      engines.push(engine);
      return engine;
    },
    credentials: testCredentials,
    orchestrator,
    registrationTimeoutMs: options.registrationTimeoutMs ?? 1000,
    retryDelayMs: options.retryDelayMs ?? 5,
    maxRetries: options.maxRetries ?? 0,
  });
  return { supervisor, orchestrator, engines };
}

const rejected = (): Promise<RegistrationResult> =>
  Promise.resolve({ ok: false, status: 403, reason: 'Forbidden' });

test('a rejected registration is retried with a fresh engine', async () => {
  const { supervisor, engines } = await buildSupervisor([rejected]);

  assert.equal(await supervisor.start(), true);

  assert.equal(supervisor.isRegistered(), true);
  assert.equal(supervisor.getAttempts(), 2);
  assert.equal(engines.length, 2);
  assert.equal(engines[0]?.shutdownCount, 1);
  assert.equal(engines[1]?.shutdownCount, 0);

  await supervisor.stop();
  assert.equal(engines[1]?.shutdownCount, 1);
  assert.equal(supervisor.isRegistered(), false);
});

test('the loop gives up after the configured number of attempts', async () => {
  const { supervisor, engines } = await buildSupervisor([rejected, rejected, rejected], { maxRetries: 2 });

  assert.equal(await supervisor.start(), false);

  assert.equal(engines.length, 2);
  assert.equal(supervisor.isRegistered(), false);
});

test('a registration that never answers times out', async () => {
  const hanging = (): Promise<RegistrationResult> => new Promise<RegistrationResult>(() => undefined);
  const { supervisor, engines } = await buildSupervisor([hanging], { maxRetries: 1, registrationTimeoutMs: 20 });

  assert.equal(await supervisor.start(), false);
  assert.equal(engines[0]?.shutdownCount, 1);
});

test('stop interrupts the retry wait', async () => {
  const { supervisor } = await buildSupervisor([rejected, rejected], { retryDelayMs: 60_000 });

  const started = supervisor.start();
  await waitFor(() => supervisor.getAttempts() === 1, 2000, 'first attempt');
  await supervisor.stop();

  assert.equal(await started, false);
});

test('calls from a registered engine reach the orchestrator', async () => {
  const { supervisor, orchestrator, engines } = await buildSupervisor([]);
  await supervisor.start();
  const engine = engines[0];
  assert.ok(engine?.subscriber);

  engine.subscriber.onIncomingCall({ callId: 'call-1' });
  await orchestrator.idle();
  assert.equal(orchestrator.getCurrentCall()?.callId, 'call-1');

  await supervisor.stop();
  await orchestrator.shutdown();
});

test('losing registration ends the call and registers again', async () => {
  const { supervisor, orchestrator, engines } = await buildSupervisor([]);
  await supervisor.start();
  const first = engines[0];
  assert.ok(first?.subscriber);

  first.subscriber.onIncomingCall({ callId: 'call-1' });
  await orchestrator.idle();
  first.subscriber.onRegistrationLost?.('gateway_closed');

  await waitFor(() => engines.length === 2 && supervisor.isRegistered(), 2000, 're-registration');
  assert.equal(first.shutdownCount, 1);
  assert.deepEqual(first.hangups, ['call-1']);
  assert.equal(orchestrator.getCurrentCall(), null);

  await supervisor.stop();
});

test('call events from an engine that fails to register are dropped', async () => {
  const strayThenUnavailable = (engine: FakeTelephonyEngine): Promise<RegistrationResult> => {
    engine.subscriber?.onIncomingCall({ callId: 'stray' });
    engine.subscriber?.onMediaActive({ callId: 'stray' });
    return Promise.resolve({ ok: false, status: 503, reason: 'Service Unavailable' });
  };
  const { supervisor, orchestrator, engines } = await buildSupervisor([strayThenUnavailable]);

  assert.equal(await supervisor.start(), true);
  await orchestrator.idle();
  assert.equal(orchestrator.getCurrentCall(), null);

  const registered = engines[1];
  assert.ok(registered?.subscriber);
  registered.subscriber.onIncomingCall({ callId: 'real' });
  await orchestrator.idle();
  await waitFor(() => registered.answers.length === 1, 2000, 'answer on registered engine');

  assert.deepEqual(engines[0]?.answers, []);
  assert.deepEqual(registered.answers, [{ callId: 'real', status: 200 }]);
  assert.equal(orchestrator.getCurrentCall()?.callId, 'real');

  await orchestrator.shutdown();
  await supervisor.stop();
});
