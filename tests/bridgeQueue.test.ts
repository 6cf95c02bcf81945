import assert from 'node:assert/strict';
import { test } from 'node:test';
import { setTestEnv } from './testEnv';

setTestEnv();

test('offer rejects the newest chunk once the queue is full', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue(2);

  assert.equal(queue.offer(Buffer.from([1])), true);
  assert.equal(queue.offer(Buffer.from([2])), true);
  assert.equal(queue.offer(Buffer.from([3])), false);

  assert.equal(queue.size(), 2);
  assert.equal(queue.getDroppedCount(), 1);
  assert.deepEqual(queue.tryTake(), Buffer.from([1]));
  assert.deepEqual(queue.tryTake(), Buffer.from([2]));
  assert.equal(queue.tryTake(), null);
});

test('the default queue holds 100 chunks and keeps the oldest in order', async () => {
  const { BridgeQueue, DEFAULT_BRIDGE_QUEUE_CAPACITY } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue();

  const accepted = Array.from({ length: 110 }, (_, index) => queue.offer(Buffer.from([index])));

  assert.equal(DEFAULT_BRIDGE_QUEUE_CAPACITY, 100);
  assert.equal(accepted.filter(Boolean).length, 100);
  assert.equal(queue.size(), 100);
  assert.equal(queue.getDroppedCount(), 10);
  const kept: number[] = [];
  for (let chunk = queue.tryTake(); chunk; chunk = queue.tryTake()) {
    kept.push(chunk[0] ?? -1);
  }
  assert.deepEqual(
    kept,
    Array.from({ length: 100 }, (_, index) => index),
  );
});

test('take waits for the next offer', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue(4);

  const pending = queue.take();
  assert.equal(queue.waitingTakers(), 1);
  queue.offer(Buffer.from([7]));

  assert.deepEqual(await pending, Buffer.from([7]));
  assert.equal(queue.size(), 0);
});

test('waiting takers are served in arrival order', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue(4);

  const first = queue.take();
  const second = queue.take();
  queue.offer(Buffer.from([1]));
  queue.offer(Buffer.from([2]));

  assert.deepEqual(await first, Buffer.from([1]));
  assert.deepEqual(await second, Buffer.from([2]));
});

test('take resolves null on timeout and immediately for a zero timeout', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue(4);

  assert.equal(await queue.take({ timeoutMs: 0 }), null);
  assert.equal(await queue.take({ timeoutMs: 10 }), null);
  assert.equal(queue.waitingTakers(), 0);
});

test('take rejects when its signal aborts', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const { AbortedError } = await import('../src/retry');
  const queue = new BridgeQueue(4);

  const aborted = new AbortController();
  aborted.abort();
  await assert.rejects(queue.take({ signal: aborted.signal }), AbortedError);

  const controller = new AbortController();
  const pending = queue.take({ signal: controller.signal });
  controller.abort();
  await assert.rejects(pending, AbortedError);
  assert.equal(queue.waitingTakers(), 0);

  queue.offer(Buffer.from([9]));
  assert.equal(queue.size(), 1);
});

test('drain empties the queue and reports the discarded count', async () => {
  const { BridgeQueue } = await import('../src/audio/bridgeQueue');
  const queue = new BridgeQueue(4);
  queue.offer(Buffer.from([1]));
  queue.offer(Buffer.from([2]));

  assert.equal(queue.drain(), 2);
  assert.equal(queue.size(), 0);
  assert.equal(queue.drain(), 0);
});
