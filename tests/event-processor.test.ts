import { test } from 'node:test';
import assert from 'node:assert/strict';

import { on, type Processed } from '../src/runtime/event-processor.js';
import { onClick, onInput } from '../src/runtime/keys.js';
import { typeInto, withDom } from './helpers/dom.js';

test('mapToValue, filter and map chain on a dispatched event', async () => {
  await withDom((dom) => {
    const ref = dom.window.document.createElement('input');
    const processor = on(onInput)
      .mapToValue()
      .filter((v) => /^\d*$/.test(v))
      .map(Number);
    const results: Array<Processed<number>> = [];
    ref.addEventListener('input', (ev) => results.push(processor.process(ev)));

    typeInto(dom, ref, '42');
    typeInto(dom, ref, '4x');

    assert.deepEqual(results, [{ accepted: true, value: 42 }, { accepted: false }]);
  });
});

test('events that do not match the event prop are rejected before processing', async () => {
  await withDom((dom) => {
    let runs = 0;
    const processor = on(onClick).map(() => ++runs);

    assert.deepEqual(processor.process(new dom.window.Event('click')), { accepted: false });
    assert.deepEqual(processor.process(new dom.window.MouseEvent('click')), { accepted: true, value: 1 });
    assert.equal(runs, 1);
  });
});

test('orElseEval only runs for filtered-out events', async () => {
  await withDom((dom) => {
    const rejected: string[] = [];
    const processor = on(onInput)
      .mapTo('x')
      .filter((v) => v === 'y')
      .orElseEval((ev) => rejected.push(ev.type));
    const passing = on(onInput)
      .mapTo('y')
      .orElseEval((ev) => rejected.push(`passing:${ev.type}`));

    assert.deepEqual(processor.process(new dom.window.Event('input')), { accepted: false });
    assert.deepEqual(passing.process(new dom.window.Event('input')), { accepted: true, value: 'y' });
    assert.deepEqual(rejected, ['input']);
  });
});

test('orElseEval also runs for events failing the event prop guard', async () => {
  await withDom((dom) => {
    const rejected: string[] = [];
    const processor = on(onClick)
      .orElseEval((ev) => rejected.push(`first:${ev.type}`))
      .filter(() => false)
      .orElseEval((ev) => rejected.push(`second:${ev.type}`));

    processor.process(new dom.window.Event('click'));
    assert.deepEqual(rejected, ['first:click', 'second:click']);

    rejected.length = 0;
    processor.process(new dom.window.MouseEvent('click'));
    assert.deepEqual(rejected, ['second:click']);
  });
});

test('mapToValue without a target yields an empty string', async () => {
  await withDom((dom) => {
    const result = on(onInput).mapToValue().process(new dom.window.Event('input'));
    assert.deepEqual(result, { accepted: true, value: '' });
  });
});

test('preventDefault cancels the event before the rest of the chain', async () => {
  await withDom((dom) => {
    const ev = new dom.window.Event('input', { cancelable: true });
    on(onInput).preventDefault().filter(() => false).process(ev);
    assert.equal(ev.defaultPrevented, true);
  });
});

test('capture keeps the event name and switches the phase', () => {
  const processor = on(onInput).mapToValue();
  const captured = processor.capture();

  assert.equal(processor.useCapture, false);
  assert.equal(captured.useCapture, true);
  assert.equal(captured.eventName, 'input');
});
