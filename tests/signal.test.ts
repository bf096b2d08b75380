import { test } from 'node:test';
import assert from 'node:assert/strict';

import { batch, configureScheduler, getSchedulerConfig } from '../src/core/scheduler.js';
import { computed, effect, observe, setEffectErrorHandler, signal } from '../src/core/signal.js';
import { captureConsole, tick } from './helpers/dom.js';

test('observe runs immediately, then synchronously on every change', () => {
  const count = signal(1);
  const seen: number[] = [];

  observe(count, (value) => seen.push(value));
  count.set(2);
  count.set(2);
  count.update((n) => n + 1);

  assert.deepEqual(seen, [1, 2, 3]);
});

test('observe stops after dispose', () => {
  const count = signal(1);
  const seen: number[] = [];

  const stop = observe(count, (value) => seen.push(value));
  stop();
  count.set(2);

  assert.deepEqual(seen, [1]);
});

test('the observer callback itself is not tracked', () => {
  const tracked = signal('a');
  const other = signal(0);
  const seen: string[] = [];

  observe(tracked, (value) => seen.push(`${value}${other()}`));
  other.set(1);
  tracked.set('b');

  assert.deepEqual(seen, ['a0', 'b1']);
});

test('batch defers observer notifications until the batch is flushed', async () => {
  const count = signal(1);
  const seen: number[] = [];
  observe(count, (value) => seen.push(value));

  batch(() => {
    count.set(2);
    count.set(3);
    assert.equal(count(), 3);
  });

  assert.deepEqual(seen, [1]);
  await tick(10);
  assert.deepEqual(seen, [1, 3]);
});

test('effect runs in a microtask and tracks its reads', async () => {
  const name = signal('ada');
  const seen: string[] = [];

  const dispose = effect(() => {
    seen.push(name());
  });
  assert.deepEqual(seen, []);

  await tick();
  assert.deepEqual(seen, ['ada']);

  name.set('grace');
  await tick();
  assert.deepEqual(seen, ['ada', 'grace']);

  dispose();
  name.set('linus');
  await tick();
  assert.deepEqual(seen, ['ada', 'grace']);
});

test('computed is lazy, cached and read-only', () => {
  const base = signal(2);
  let runs = 0;
  const doubled = computed(() => {
    runs++;
    return base() * 2;
  });

  assert.equal(runs, 0);
  assert.equal(doubled(), 4);
  assert.equal(doubled(), 4);
  assert.equal(runs, 1);

  base.set(5);
  assert.equal(doubled(), 10);
  assert.equal(runs, 2);

  assert.throws(() => doubled.set(1), /Cannot set a computed signal directly/);
});

test('observer errors on change go to the effect error handler', () => {
  const count = signal(1);
  const reported: Array<[string, string]> = [];
  setEffectErrorHandler((error, source) => reported.push([error.message, source]));

  try {
    observe(count, (value) => {
      if (value === 2) throw new Error('bad value');
    });
    count.set(2);
  } finally {
    setEffectErrorHandler(null);
  }

  assert.deepEqual(reported, [['bad value', 'observer']]);
});

test('a self-retriggering effect is cut off at the configured microtask limit', async () => {
  const previous = getSchedulerConfig();
  configureScheduler({ maxMicrotaskIterations: 2 });
  const count = signal(0);
  let runs = 0;
  let dispose = () => {};

  try {
    const errors = await captureConsole('error', async () => {
      dispose = effect(() => {
        runs++;
        count.set(count() + 1);
      });
      await tick(10);
    });

    assert.equal(runs, 2);
    assert.deepEqual(errors, [
      '[Holdfast] Scheduler exceeded 2 microtask iterations. Possible infinite loop detected. Remaining 1 tasks discarded.',
    ]);
  } finally {
    dispose();
    configureScheduler(previous);
  }
});
